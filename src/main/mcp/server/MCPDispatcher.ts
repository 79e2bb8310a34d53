/**
 * MCP Dispatcher
 *
 * Server-side counterpart of a connection. Answers one client over one
 * transport:
 * - Handshake gate: only `initialize` is accepted until the client sends
 *   `initialized`
 * - Built-in methods routed through a closed switch; anything else is
 *   MethodNotFound
 * - Tool, resource and prompt lookups through injected registries
 * - Handler failures become InternalError responses, never transport faults
 */

import type {
  MCPCapabilityCategory,
  MCPClientCapabilities,
  MCPClientInfo,
  MCPContent,
  MCPServerCapabilities,
  MCPServerInfo,
  MCPToolResult,
} from '../../../shared/types/mcp';
import { getErrorMessage } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';
import { parseContent } from '../protocol/descriptors';
import {
  createErrorResponse,
  createSuccessResponse,
  isNotification,
  isRecord,
  isRequest,
  type DecodeError,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type MCPMessage,
} from '../protocol/envelope';
import { MCPError } from '../protocol/errors';
import {
  MCP_METHODS,
  MCP_PROTOCOL_VERSION,
  isBuiltinRequestMethod,
  isInitializedNotification,
  type BuiltinRequestMethod,
} from '../protocol/methods';
import type { MCPTransport } from '../transports/types';
import type { PromptRegistry } from './PromptRegistry';
import type { ResourceRegistry } from './ResourceRegistry';
import type { ToolRegistry } from './ToolRegistry';

const logger = createLogger('MCPDispatcher');

export type DispatcherState = 'uninitialized' | 'initialized';

export interface MCPDispatcherOptions {
  serverInfo: MCPServerInfo;
  tools?: ToolRegistry;
  resources?: ResourceRegistry;
  prompts?: PromptRegistry;
  /** Defaults to one entry per registry given */
  capabilities?: MCPServerCapabilities;
  instructions?: string;
}

type Params = Record<string, unknown>;

export class MCPDispatcher {
  private readonly serverInfo: MCPServerInfo;
  private readonly tools?: ToolRegistry;
  private readonly resources?: ResourceRegistry;
  private readonly prompts?: PromptRegistry;
  private readonly capabilities: MCPServerCapabilities;
  private readonly instructions?: string;

  private state: DispatcherState = 'uninitialized';
  private initializeSeen = false;
  private clientInfo?: MCPClientInfo;
  private clientCapabilities?: MCPClientCapabilities;

  constructor(options: MCPDispatcherOptions) {
    this.serverInfo = { ...options.serverInfo };
    this.tools = options.tools;
    this.resources = options.resources;
    this.prompts = options.prompts;
    this.instructions = options.instructions;
    this.capabilities = options.capabilities ?? {
      ...(options.tools ? { tools: { listChanged: false } } : {}),
      ...(options.resources ? { resources: { subscribe: false, listChanged: false } } : {}),
      ...(options.prompts ? { prompts: { listChanged: false } } : {}),
    };
  }

  get currentState(): DispatcherState {
    return this.state;
  }

  getClientInfo(): MCPClientInfo | undefined {
    return this.clientInfo ? { ...this.clientInfo } : undefined;
  }

  getClientCapabilities(): MCPClientCapabilities | undefined {
    return this.clientCapabilities;
  }

  getCapabilities(): MCPServerCapabilities {
    return structuredClone(this.capabilities);
  }

  // =========================================================================
  // Serving
  // =========================================================================

  /**
   * Serve one transport until its receive sequence ends. Requests are
   * handled concurrently, so responses may leave out of order; notifications
   * are applied in arrival order.
   */
  async serve(transport: MCPTransport): Promise<void> {
    const inflight = new Set<Promise<unknown>>();
    const reply = (response: MCPMessage | null): Promise<void> =>
      response ? transport.send(response) : Promise.resolve();

    for await (const decoded of transport.receive()) {
      if (!decoded.ok) {
        logger.warn('Rejecting undecodable message', { kind: decoded.error.kind, error: decoded.error.message });
        const task: Promise<unknown> = reply(this.decodeFailureResponse(decoded.error))
          .catch((error: unknown) => logger.warn('Failed to send error response', { error: getErrorMessage(error) }))
          .finally(() => inflight.delete(task));
        inflight.add(task);
        continue;
      }

      const message = decoded.message;
      if (!isRequest(message)) {
        await this.handle(message);
        continue;
      }

      const task: Promise<unknown> = this.handle(message)
        .then(reply)
        .catch((error: unknown) =>
          logger.warn('Failed to send response', { id: message.id, method: message.method, error: getErrorMessage(error) })
        )
        .finally(() => inflight.delete(task));
      inflight.add(task);
    }

    await Promise.allSettled(inflight);
    logger.debug('Transport closed; dispatcher stopped');
  }

  /**
   * Handle one decoded message. Resolves to the response to send, or null
   * for notifications and stray responses.
   */
  async handle(message: MCPMessage): Promise<MCPMessage | null> {
    if (isRequest(message)) {
      return this.handleRequest(message);
    }
    if (isNotification(message)) {
      this.handleNotification(message);
      return null;
    }
    logger.debug('Ignoring response from client', { id: message.id });
    return null;
  }

  private decodeFailureResponse(error: DecodeError): MCPMessage {
    if (error.kind === 'parse') {
      return createErrorResponse(null, new MCPError('ParseError', 'Parse error', { data: { message: error.message } }));
    }
    return createErrorResponse(
      error.id ?? null,
      new MCPError('InvalidRequest', 'Invalid request', { data: { message: error.message } })
    );
  }

  private async handleRequest(request: JsonRpcRequest): Promise<MCPMessage> {
    const { id, method } = request;

    if (this.state === 'uninitialized' && method !== MCP_METHODS.INITIALIZE) {
      logger.warn('Request before initialization', { id, method });
      return createErrorResponse(id, new MCPError('InvalidRequest', 'Server not initialized'));
    }

    if (!isBuiltinRequestMethod(method)) {
      return createErrorResponse(id, new MCPError('MethodNotFound', `Method not found: ${method}`));
    }

    try {
      const result = await this.dispatch(method, request.params ?? {});
      return createSuccessResponse(id, result);
    } catch (error) {
      if (error instanceof MCPError) {
        return createErrorResponse(id, error);
      }
      const message = getErrorMessage(error);
      logger.error('MCP handler failed', { id, method, error: message });
      return createErrorResponse(id, new MCPError('InternalError', `Internal error: ${message}`, { data: { message } }));
    }
  }

  private handleNotification(notification: JsonRpcNotification): void {
    if (isInitializedNotification(notification.method)) {
      if (!this.initializeSeen) {
        logger.warn('Ignoring initialized notification before initialize');
        return;
      }
      if (this.state !== 'initialized') {
        this.state = 'initialized';
        logger.info('Client initialized', { client: this.clientInfo?.name });
      }
      return;
    }
    logger.debug('Received notification', { method: notification.method });
  }

  private dispatch(method: BuiltinRequestMethod, params: Params): unknown {
    switch (method) {
      case MCP_METHODS.INITIALIZE:
        return this.initialize(params);
      case MCP_METHODS.PING:
        return {};
      case MCP_METHODS.LIST_TOOLS:
        return { tools: this.requireTools().list() };
      case MCP_METHODS.CALL_TOOL:
        return this.callTool(params);
      case MCP_METHODS.LIST_RESOURCES:
        return { resources: this.requireResources().list() };
      case MCP_METHODS.LIST_RESOURCE_TEMPLATES:
        return { resourceTemplates: this.requireResources().listTemplates() };
      case MCP_METHODS.READ_RESOURCE:
        return this.readResource(params);
      case MCP_METHODS.LIST_PROMPTS:
        return { prompts: this.requirePrompts().list() };
      case MCP_METHODS.GET_PROMPT:
        return this.getPrompt(params);
    }
  }

  // =========================================================================
  // Built-in handlers
  // =========================================================================

  private initialize(params: Params): Record<string, unknown> {
    const { clientInfo, capabilities, protocolVersion } = params;
    if (isRecord(clientInfo) && typeof clientInfo.name === 'string') {
      this.clientInfo = {
        name: clientInfo.name,
        version: typeof clientInfo.version === 'string' ? clientInfo.version : 'unknown',
      };
    }
    this.clientCapabilities = isRecord(capabilities) ? capabilities : {};
    this.initializeSeen = true;

    logger.info('Initialize request', {
      client: this.clientInfo?.name,
      requestedVersion: typeof protocolVersion === 'string' ? protocolVersion : undefined,
    });

    const result: Record<string, unknown> = {
      protocolVersion: MCP_PROTOCOL_VERSION,
      serverInfo: { ...this.serverInfo },
      capabilities: this.getCapabilities(),
    };
    if (this.instructions !== undefined) {
      result.instructions = this.instructions;
    }
    return result;
  }

  private async callTool(params: Params): Promise<MCPToolResult> {
    const tools = this.requireTools();
    const { name } = params;
    if (typeof name !== 'string' || name.length === 0) {
      throw new MCPError('InvalidParams', 'Tool name required');
    }

    const definition = tools.getDefinition(name);
    const handler = tools.getHandler(name);
    if (!definition || !handler) {
      throw new MCPError('ToolNotFound', `Tool not found: ${name}`, { data: { name } });
    }

    const rawArgs = params.arguments ?? {};
    if (!isRecord(rawArgs)) {
      throw new MCPError('InvalidParams', 'Tool arguments must be an object');
    }

    const missing = (definition.inputSchema.required ?? []).filter(
      (field) => !Object.prototype.hasOwnProperty.call(rawArgs, field)
    );
    if (missing.length > 0) {
      throw new MCPError('InvalidParams', `Missing required arguments: ${missing.join(', ')}`, {
        data: { tool: name, missing },
      });
    }

    const start = performance.now();
    try {
      const output: unknown = await handler(rawArgs);
      const result = normalizeToolResult(output);
      logger.trackToolInvocation(name, Math.round(performance.now() - start), result.isError !== true, {
        args: rawArgs,
        result: summarize(result.content),
        clientName: this.clientInfo?.name,
      });
      return result;
    } catch (error) {
      const message = getErrorMessage(error);
      logger.trackToolInvocation(name, Math.round(performance.now() - start), false, {
        args: rawArgs,
        result: message,
        clientName: this.clientInfo?.name,
      });
      throw new MCPError('InternalError', `Tool execution failed: ${message}`, { data: { tool: name, message } });
    }
  }

  private async readResource(params: Params): Promise<{ contents: unknown[] }> {
    const resources = this.requireResources();
    const { uri } = params;
    if (typeof uri !== 'string' || uri.length === 0) {
      throw new MCPError('InvalidParams', 'Resource URI required');
    }
    if (!resources.get(uri)) {
      throw new MCPError('ResourceNotFound', `Resource not found: ${uri}`, { data: { uri } });
    }

    try {
      const contents = (await resources.read(uri)) ?? [];
      return { contents };
    } catch (error) {
      const message = getErrorMessage(error);
      throw new MCPError('InternalError', `Resource read failed: ${message}`, { data: { uri, message } });
    }
  }

  private async getPrompt(params: Params): Promise<unknown> {
    const prompts = this.requirePrompts();
    const { name } = params;
    if (typeof name !== 'string' || name.length === 0) {
      throw new MCPError('InvalidParams', 'Prompt name required');
    }
    if (!prompts.get(name)) {
      throw new MCPError('PromptNotFound', `Prompt not found: ${name}`, { data: { name } });
    }

    const args = stringArguments(params.arguments);
    const missing = prompts.missingArguments(name, args);
    if (missing.length > 0) {
      throw new MCPError('InvalidParams', `Missing required arguments: ${missing.join(', ')}`, {
        data: { prompt: name, missing },
      });
    }

    try {
      return await prompts.render(name, args);
    } catch (error) {
      const message = getErrorMessage(error);
      throw new MCPError('InternalError', `Prompt render failed: ${message}`, { data: { name, message } });
    }
  }

  private requireTools(): ToolRegistry {
    if (!this.capabilities.tools || !this.tools) {
      throw unsupported('tools');
    }
    return this.tools;
  }

  private requireResources(): ResourceRegistry {
    if (!this.capabilities.resources || !this.resources) {
      throw unsupported('resources');
    }
    return this.resources;
  }

  private requirePrompts(): PromptRegistry {
    if (!this.capabilities.prompts || !this.prompts) {
      throw unsupported('prompts');
    }
    return this.prompts;
  }
}

function unsupported(capability: MCPCapabilityCategory): MCPError {
  return new MCPError('CapabilityNotSupported', `Server does not support ${capability}`, { data: { capability } });
}

function stringArguments(value: unknown): Record<string, string> {
  const args: Record<string, string> = {};
  if (!isRecord(value)) return args;
  for (const [key, entry] of Object.entries(value)) {
    args[key] = typeof entry === 'string' ? entry : JSON.stringify(entry);
  }
  return args;
}

function isContentList(value: unknown[]): value is MCPContent[] {
  return value.every((item) => parseContent(item) !== null);
}

/**
 * Shape a handler's return value as a `tools/call` result.
 */
export function normalizeToolResult(output: unknown): MCPToolResult {
  if (isRecord(output) && Array.isArray(output.content) && isContentList(output.content)) {
    const result: MCPToolResult = { content: output.content };
    if (typeof output.isError === 'boolean') result.isError = output.isError;
    return result;
  }
  if (Array.isArray(output) && output.length > 0 && isContentList(output)) {
    return { content: output };
  }
  if (typeof output === 'string') {
    return { content: [{ type: 'text', text: output }] };
  }
  return { content: [{ type: 'text', text: output === undefined ? '' : JSON.stringify(output) ?? String(output) }] };
}

function summarize(content: MCPContent[]): string {
  return content.map((item) => (item.type === 'text' ? item.text : `[${item.type}]`)).join('\n');
}
