/**
 * Resource Registry
 *
 * Fixed-URI resources with a read handler, plus templates that are only
 * listed.
 */

import type { MCPResource, MCPResourceContent, MCPResourceTemplate } from '../../../shared/types/mcp';

export type ResourceReadResult = string | MCPResourceContent | MCPResourceContent[];

export interface ResourceDefinition extends MCPResource {
  read: (uri: string) => ResourceReadResult | Promise<ResourceReadResult>;
}

export class ResourceRegistry {
  private resources = new Map<string, ResourceDefinition>();
  private templates: MCPResourceTemplate[] = [];

  register(resource: ResourceDefinition): this {
    if (!resource.uri) {
      throw new Error('Resource URI must be a non-empty string');
    }
    this.resources.set(resource.uri, resource);
    return this;
  }

  registerTemplate(template: MCPResourceTemplate): this {
    this.templates.push({ ...template });
    return this;
  }

  unregister(uri: string): boolean {
    return this.resources.delete(uri);
  }

  get(uri: string): ResourceDefinition | undefined {
    return this.resources.get(uri);
  }

  list(): MCPResource[] {
    return Array.from(this.resources.values(), ({ uri, name, description, mimeType }) => {
      const resource: MCPResource = { uri, name };
      if (description !== undefined) resource.description = description;
      if (mimeType !== undefined) resource.mimeType = mimeType;
      return resource;
    });
  }

  listTemplates(): MCPResourceTemplate[] {
    return this.templates.map((template) => ({ ...template }));
  }

  /**
   * Read and normalize to a `contents` list. A bare string becomes one text
   * entry carrying the resource's mime type.
   */
  async read(uri: string): Promise<MCPResourceContent[] | undefined> {
    const resource = this.resources.get(uri);
    if (!resource) {
      return undefined;
    }
    const result = await resource.read(uri);
    if (typeof result === 'string') {
      const content: MCPResourceContent = { uri, text: result };
      if (resource.mimeType !== undefined) content.mimeType = resource.mimeType;
      return [content];
    }
    return Array.isArray(result) ? result : [result];
  }

  get size(): number {
    return this.resources.size;
  }
}
