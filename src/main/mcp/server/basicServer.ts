/**
 * Convenience factory for a dispatcher built from plain definitions.
 * Advertised capabilities follow which kinds of definitions were given.
 */

import type { MCPResourceTemplate } from '../../../shared/types/mcp';
import { MCPDispatcher } from './MCPDispatcher';
import { PromptRegistry, type PromptDefinition } from './PromptRegistry';
import { ResourceRegistry, type ResourceDefinition } from './ResourceRegistry';
import { ToolRegistry, type ToolDefinition } from './ToolRegistry';

export interface BasicServerOptions {
  name: string;
  version: string;
  tools?: ToolDefinition[] | ToolRegistry;
  resources?: ResourceDefinition[] | ResourceRegistry;
  resourceTemplates?: MCPResourceTemplate[];
  prompts?: PromptDefinition[] | PromptRegistry;
  instructions?: string;
}

export function createBasicServer(options: BasicServerOptions): MCPDispatcher {
  let tools: ToolRegistry | undefined;
  if (options.tools instanceof ToolRegistry) {
    tools = options.tools;
  } else if (options.tools) {
    tools = new ToolRegistry().registerAll(options.tools);
  }

  let resources: ResourceRegistry | undefined;
  if (options.resources instanceof ResourceRegistry) {
    resources = options.resources;
  } else if (options.resources || options.resourceTemplates) {
    resources = new ResourceRegistry();
    for (const resource of options.resources ?? []) {
      resources.register(resource);
    }
  }
  for (const template of options.resourceTemplates ?? []) {
    resources?.registerTemplate(template);
  }

  let prompts: PromptRegistry | undefined;
  if (options.prompts instanceof PromptRegistry) {
    prompts = options.prompts;
  } else if (options.prompts) {
    prompts = new PromptRegistry();
    for (const prompt of options.prompts) {
      prompts.register(prompt);
    }
  }

  return new MCPDispatcher({
    serverInfo: { name: options.name, version: options.version },
    tools,
    resources,
    prompts,
    instructions: options.instructions,
  });
}
