/**
 * Prompt Registry
 */

import type { MCPPrompt, MCPPromptResult } from '../../../shared/types/mcp';

export type PromptRenderResult = string | MCPPromptResult;

export interface PromptDefinition extends MCPPrompt {
  render: (args: Record<string, string>) => PromptRenderResult | Promise<PromptRenderResult>;
}

export class PromptRegistry {
  private prompts = new Map<string, PromptDefinition>();

  register(prompt: PromptDefinition): this {
    if (!prompt.name) {
      throw new Error('Prompt name must be a non-empty string');
    }
    this.prompts.set(prompt.name, prompt);
    return this;
  }

  unregister(name: string): boolean {
    return this.prompts.delete(name);
  }

  get(name: string): PromptDefinition | undefined {
    return this.prompts.get(name);
  }

  list(): MCPPrompt[] {
    return Array.from(this.prompts.values(), ({ name, description, arguments: args }) => {
      const prompt: MCPPrompt = { name };
      if (description !== undefined) prompt.description = description;
      if (args !== undefined) prompt.arguments = args.map((arg) => ({ ...arg }));
      return prompt;
    });
  }

  /**
   * Names of required arguments missing from `args`
   */
  missingArguments(name: string, args: Record<string, string>): string[] {
    const prompt = this.prompts.get(name);
    if (!prompt?.arguments) return [];
    return prompt.arguments.filter((arg) => arg.required && !Object.prototype.hasOwnProperty.call(args, arg.name)).map((arg) => arg.name);
  }

  /**
   * A bare string becomes a single user message.
   */
  async render(name: string, args: Record<string, string>): Promise<MCPPromptResult | undefined> {
    const prompt = this.prompts.get(name);
    if (!prompt) {
      return undefined;
    }
    const result = await prompt.render(args);
    if (typeof result === 'string') {
      const rendered: MCPPromptResult = { messages: [{ role: 'user', content: { type: 'text', text: result } }] };
      if (prompt.description !== undefined) rendered.description = prompt.description;
      return rendered;
    }
    return result;
  }

  get size(): number {
    return this.prompts.size;
  }
}
