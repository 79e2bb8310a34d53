/**
 * Shape checks for the payloads a peer sends back: initialize results,
 * discovery listings and operation results. Each parser either returns a
 * typed value or throws an MCPError describing what was wrong.
 */

import type {
  MCPContent,
  MCPInitializeResult,
  MCPPrompt,
  MCPPromptArgument,
  MCPPromptMessage,
  MCPPromptResult,
  MCPReadResourceResult,
  MCPResource,
  MCPResourceContent,
  MCPResourceTemplate,
  MCPServerCapabilities,
  MCPTool,
  MCPToolInputSchema,
  MCPToolResult,
} from '../../../shared/types/mcp';
import { isRecord } from './envelope';
import { MCPError } from './errors';

function malformed(what: string, detail: string): MCPError {
  return new MCPError('InternalError', `Malformed ${what}: ${detail}`);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parseInputSchema(value: unknown): MCPToolInputSchema {
  const schema: MCPToolInputSchema = { type: 'object' };
  if (!isRecord(value)) {
    return schema;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (key === 'type') continue;
    if (key === 'properties') {
      if (isRecord(entry)) schema.properties = entry;
      continue;
    }
    if (key === 'required') {
      if (Array.isArray(entry)) schema.required = entry.filter((name): name is string => typeof name === 'string');
      continue;
    }
    schema[key] = entry;
  }
  return schema;
}

export function parseTool(value: unknown): MCPTool {
  if (!isRecord(value) || typeof value.name !== 'string' || value.name.length === 0) {
    throw malformed('tool', 'name must be a non-empty string');
  }
  const tool: MCPTool = { name: value.name, inputSchema: parseInputSchema(value.inputSchema) };
  const description = optionalString(value.description);
  if (description !== undefined) tool.description = description;
  return tool;
}

export function parseResource(value: unknown): MCPResource {
  if (!isRecord(value) || typeof value.uri !== 'string' || value.uri.length === 0) {
    throw malformed('resource', 'uri must be a non-empty string');
  }
  const resource: MCPResource = { uri: value.uri, name: optionalString(value.name) ?? value.uri };
  const description = optionalString(value.description);
  const mimeType = optionalString(value.mimeType);
  if (description !== undefined) resource.description = description;
  if (mimeType !== undefined) resource.mimeType = mimeType;
  return resource;
}

export function parseResourceTemplate(value: unknown): MCPResourceTemplate {
  if (!isRecord(value) || typeof value.uriTemplate !== 'string') {
    throw malformed('resource template', 'uriTemplate must be a string');
  }
  const template: MCPResourceTemplate = {
    uriTemplate: value.uriTemplate,
    name: optionalString(value.name) ?? value.uriTemplate,
  };
  const description = optionalString(value.description);
  const mimeType = optionalString(value.mimeType);
  if (description !== undefined) template.description = description;
  if (mimeType !== undefined) template.mimeType = mimeType;
  return template;
}

function parsePromptArgument(value: unknown): MCPPromptArgument | null {
  if (!isRecord(value) || typeof value.name !== 'string') {
    return null;
  }
  const argument: MCPPromptArgument = { name: value.name };
  const description = optionalString(value.description);
  if (description !== undefined) argument.description = description;
  if (typeof value.required === 'boolean') argument.required = value.required;
  return argument;
}

export function parsePrompt(value: unknown): MCPPrompt {
  if (!isRecord(value) || typeof value.name !== 'string' || value.name.length === 0) {
    throw malformed('prompt', 'name must be a non-empty string');
  }
  const prompt: MCPPrompt = { name: value.name };
  const description = optionalString(value.description);
  if (description !== undefined) prompt.description = description;
  if (Array.isArray(value.arguments)) {
    prompt.arguments = value.arguments
      .map(parsePromptArgument)
      .filter((argument): argument is MCPPromptArgument => argument !== null);
  }
  return prompt;
}

/**
 * Pull `result[key]` as a list, parsing each entry. Entries that fail to
 * parse are reported through `onSkip` and left out.
 */
export function parseListing<T>(
  result: unknown,
  key: string,
  parse: (value: unknown) => T,
  onSkip?: (error: MCPError, value: unknown) => void
): T[] {
  if (!isRecord(result)) {
    throw malformed(`${key} listing`, 'result must be an object');
  }
  const entries = result[key];
  if (!Array.isArray(entries)) {
    throw malformed(`${key} listing`, `${key} must be an array`);
  }
  const parsed: T[] = [];
  for (const entry of entries) {
    try {
      parsed.push(parse(entry));
    } catch (error) {
      if (error instanceof MCPError) {
        onSkip?.(error, entry);
      } else {
        throw error;
      }
    }
  }
  return parsed;
}

export function parseInitializeResult(value: unknown): MCPInitializeResult {
  if (!isRecord(value)) {
    throw malformed('initialize result', 'result must be an object');
  }
  const { protocolVersion, serverInfo, capabilities, instructions } = value;
  if (typeof protocolVersion !== 'string') {
    throw malformed('initialize result', 'protocolVersion must be a string');
  }
  if (!isRecord(serverInfo) || typeof serverInfo.name !== 'string') {
    throw malformed('initialize result', 'serverInfo.name must be a string');
  }
  const result: MCPInitializeResult = {
    protocolVersion,
    serverInfo: {
      name: serverInfo.name,
      version: typeof serverInfo.version === 'string' ? serverInfo.version : 'unknown',
    },
    capabilities: parseServerCapabilities(capabilities),
  };
  if (typeof instructions === 'string') {
    result.instructions = instructions;
  }
  return result;
}

function parseServerCapabilities(value: unknown): MCPServerCapabilities {
  if (!isRecord(value)) {
    return {};
  }
  const capabilities: MCPServerCapabilities = {};
  if (isRecord(value.tools)) {
    capabilities.tools = { listChanged: value.tools.listChanged === true };
  }
  if (isRecord(value.resources)) {
    capabilities.resources = {
      subscribe: value.resources.subscribe === true,
      listChanged: value.resources.listChanged === true,
    };
  }
  if (isRecord(value.prompts)) {
    capabilities.prompts = { listChanged: value.prompts.listChanged === true };
  }
  if (isRecord(value.logging)) {
    capabilities.logging = value.logging;
  }
  if (isRecord(value.experimental)) {
    capabilities.experimental = value.experimental;
  }
  return capabilities;
}

function parseResourceContent(value: unknown): MCPResourceContent | null {
  if (!isRecord(value) || typeof value.uri !== 'string') {
    return null;
  }
  const content: MCPResourceContent = { uri: value.uri };
  if (typeof value.mimeType === 'string') content.mimeType = value.mimeType;
  if (typeof value.text === 'string') content.text = value.text;
  if (typeof value.blob === 'string') content.blob = value.blob;
  return content;
}

export function parseContent(value: unknown): MCPContent | null {
  if (!isRecord(value)) {
    return null;
  }
  switch (value.type) {
    case 'text':
      return typeof value.text === 'string' ? { type: 'text', text: value.text } : null;
    case 'image':
      return typeof value.data === 'string' && typeof value.mimeType === 'string'
        ? { type: 'image', data: value.data, mimeType: value.mimeType }
        : null;
    case 'resource': {
      const resource = parseResourceContent(value.resource);
      return resource ? { type: 'resource', resource } : null;
    }
    default:
      return null;
  }
}

/**
 * Content items of an unknown type are kept as their JSON text.
 */
function parseContentList(values: unknown[]): MCPContent[] {
  return values.map((value) => parseContent(value) ?? { type: 'text', text: JSON.stringify(value) });
}

export function parseToolResult(value: unknown): MCPToolResult {
  if (!isRecord(value) || !Array.isArray(value.content)) {
    throw malformed('tools/call result', 'content must be an array');
  }
  const result: MCPToolResult = { content: parseContentList(value.content) };
  if (typeof value.isError === 'boolean') {
    result.isError = value.isError;
  }
  return result;
}

export function parseReadResourceResult(value: unknown): MCPReadResourceResult {
  if (!isRecord(value) || !Array.isArray(value.contents)) {
    throw malformed('resources/read result', 'contents must be an array');
  }
  return {
    contents: value.contents
      .map(parseResourceContent)
      .filter((content): content is MCPResourceContent => content !== null),
  };
}

export function parsePromptResult(value: unknown): MCPPromptResult {
  if (!isRecord(value) || !Array.isArray(value.messages)) {
    throw malformed('prompts/get result', 'messages must be an array');
  }
  const messages: MCPPromptMessage[] = [];
  for (const entry of value.messages) {
    if (!isRecord(entry) || (entry.role !== 'user' && entry.role !== 'assistant')) continue;
    const content = parseContent(entry.content);
    if (content) {
      messages.push({ role: entry.role, content });
    }
  }
  const result: MCPPromptResult = { messages };
  if (typeof value.description === 'string') {
    result.description = value.description;
  }
  return result;
}
