/**
 * Tool Registry
 *
 * Name -> handler table consulted by the dispatcher for `tools/call`.
 * Handlers are opaque: they take the call's arguments and return a value
 * (or throw); what they do is up to the host.
 */

import type { MCPTool, MCPToolInputSchema } from '../../../shared/types/mcp';
import { createLogger } from '../../logger';

const logger = createLogger('ToolRegistry');

/**
 * The return value is normalized into `result.content`: a full tool result
 * passes through, an array of content items becomes the content list, a
 * string one text item, anything else its JSON text.
 */
export type ToolHandler = (args: Record<string, unknown>) => unknown;

export interface ToolDefinition {
  name: string;
  description?: string;
  inputSchema?: MCPToolInputSchema;
  handler: ToolHandler;
}

interface ToolRegistryEntry {
  descriptor: MCPTool;
  handler: ToolHandler;
}

export class ToolRegistry {
  private tools = new Map<string, ToolRegistryEntry>();
  private aliases = new Map<string, string>(); // Map aliases to canonical names

  /**
   * Register a tool. Re-registering a name replaces the earlier entry.
   */
  register(tool: ToolDefinition): this {
    if (!tool.name) {
      throw new Error('Tool name must be a non-empty string');
    }
    if (this.tools.has(tool.name)) {
      logger.warn('Replacing registered tool', { name: tool.name });
    }

    const descriptor: MCPTool = {
      name: tool.name,
      inputSchema: tool.inputSchema ?? { type: 'object', properties: {} },
    };
    if (tool.description !== undefined) {
      descriptor.description = tool.description;
    }

    this.tools.set(tool.name, { descriptor, handler: tool.handler });
    return this;
  }

  registerAll(tools: ToolDefinition[]): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  /**
   * Extra name a tool answers to. Aliases are not listed.
   */
  registerAlias(alias: string, name: string): void {
    if (!this.tools.has(name)) {
      throw new Error(`Cannot alias unknown tool: ${name}`);
    }
    this.aliases.set(alias, name);
  }

  unregister(name: string): boolean {
    const removed = this.tools.delete(name);
    for (const [alias, canonical] of this.aliases) {
      if (canonical === name) {
        this.aliases.delete(alias);
      }
    }
    return removed;
  }

  has(name: string): boolean {
    return this.tools.has(this.aliases.get(name) ?? name);
  }

  getDefinition(name: string): MCPTool | undefined {
    return this.tools.get(this.aliases.get(name) ?? name)?.descriptor;
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.tools.get(this.aliases.get(name) ?? name)?.handler;
  }

  /**
   * Descriptors in registration order, as sent in `tools/list`
   */
  list(): MCPTool[] {
    return Array.from(this.tools.values(), (entry) => structuredClone(entry.descriptor));
  }

  get size(): number {
    return this.tools.size;
  }
}
