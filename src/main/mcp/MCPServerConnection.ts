/**
 * MCP Server Connection
 *
 * One logical link to a single server:
 * - Transport lifecycle and the background reader
 * - Protocol initialization (initialize / initialized)
 * - Tool, resource and prompt discovery
 * - Request correlation, timeouts and teardown
 */

import { EventEmitter } from 'node:events';
import type {
  MCPClientCapabilities,
  MCPClientInfo,
  MCPConnectionState,
  MCPInitializeParams,
  MCPPrompt,
  MCPPromptResult,
  MCPReadResourceResult,
  MCPResource,
  MCPResourceTemplate,
  MCPServerCapabilities,
  MCPServerInfo,
  MCPServerState,
  MCPTool,
  MCPToolResult,
} from '../../shared/types/mcp';
import { getErrorMessage } from '../../shared/utils/errorHandling';
import { createLogger } from '../logger';
import { CorrelationTable, type CallOutcome } from './CorrelationTable';
import {
  parseInitializeResult,
  parseListing,
  parsePrompt,
  parsePromptResult,
  parseReadResourceResult,
  parseResource,
  parseResourceTemplate,
  parseTool,
  parseToolResult,
} from './protocol/descriptors';
import {
  createErrorResponse,
  createNotification,
  createRequest,
  createSuccessResponse,
  isErrorResponse,
  isNotification,
  isRequest,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type MCPMessage,
} from './protocol/envelope';
import {
  MCPConnectError,
  MCPConnectionClosedError,
  MCPError,
  MCPTimeoutError,
  MCPTransportError,
} from './protocol/errors';
import { MCP_METHODS, MCP_NOTIFICATIONS, MCP_PROTOCOL_VERSION } from './protocol/methods';
import type { MCPTransport } from './transports/types';

const logger = createLogger('MCPServerConnection');

export const DEFAULT_REQUEST_TIMEOUT = 30000;
export const DEFAULT_CONNECT_TIMEOUT = 10000;

/** Longest delay a timer accepts; larger values fire after 1ms */
export const MAX_REQUEST_TIMEOUT = 2 ** 31 - 1;

/**
 * Client capabilities
 */
const CLIENT_CAPABILITIES: MCPClientCapabilities = {};

/**
 * Requests a server may send back to the client
 */
const CLIENT_REQUEST_HANDLERS: ReadonlyMap<string, (params: Record<string, unknown>) => unknown> = new Map([
  [MCP_METHODS.PING, () => ({})],
]);

export interface MCPConnectionOptions {
  clientInfo: MCPClientInfo;
  clientCapabilities?: MCPClientCapabilities;
  /** Default deadline for calls made once ready */
  requestTimeout?: number;
  /** Deadline for each handshake and discovery request */
  connectTimeout?: number;
}

/**
 * Connection events
 */
export interface MCPConnectionEvents {
  stateChanged: (state: MCPServerState) => void;
  notification: (method: string, params: Record<string, unknown>) => void;
  disconnected: (reason: string) => void;
}

export class MCPServerConnection extends EventEmitter {
  readonly serverName: string;

  private readonly transport: MCPTransport;
  private readonly table = new CorrelationTable();
  private readonly clientInfo: MCPClientInfo;
  private readonly clientCapabilities: MCPClientCapabilities;
  private readonly requestTimeout: number;
  private readonly connectTimeout: number;

  private state: MCPConnectionState = 'disconnected';
  private started = false;
  private closing = false;
  private closeReason: string | null = null;
  private reader: Promise<void> | null = null;
  private teardownPromise: Promise<void> | null = null;

  private serverInfo?: MCPServerInfo;
  private capabilities?: MCPServerCapabilities;
  private protocolVersion?: string;
  private connectedAt?: number;

  private tools = new Map<string, Readonly<MCPTool>>();
  private resources = new Map<string, Readonly<MCPResource>>();
  private resourceTemplates: Readonly<MCPResourceTemplate>[] = [];
  private prompts = new Map<string, Readonly<MCPPrompt>>();

  constructor(serverName: string, transport: MCPTransport, options: MCPConnectionOptions) {
    super();
    this.serverName = serverName;
    this.transport = transport;
    this.clientInfo = options.clientInfo;
    this.clientCapabilities = options.clientCapabilities ?? CLIENT_CAPABILITIES;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
  }

  get currentState(): MCPConnectionState {
    return this.state;
  }

  get isReady(): boolean {
    return this.state === 'ready' && !this.closing;
  }

  get isClosed(): boolean {
    return this.closing;
  }

  /**
   * Copy-out view of the connection record
   */
  getState(): MCPServerState {
    const state: MCPServerState = {
      serverName: this.serverName,
      transport: this.transport.type,
      state: this.state,
      toolCount: this.tools.size,
      resourceCount: this.resources.size,
      resourceTemplateCount: this.resourceTemplates.length,
      promptCount: this.prompts.size,
      pendingCalls: this.table.size,
    };
    if (this.serverInfo) state.serverInfo = { ...this.serverInfo };
    if (this.capabilities) state.capabilities = structuredClone(this.capabilities);
    if (this.protocolVersion !== undefined) state.protocolVersion = this.protocolVersion;
    if (this.connectedAt !== undefined) state.connectedAt = this.connectedAt;
    return state;
  }

  getServerInfo(): MCPServerInfo | undefined {
    return this.serverInfo ? { ...this.serverInfo } : undefined;
  }

  getCapabilities(): MCPServerCapabilities {
    return this.capabilities ?? {};
  }

  // =========================================================================
  // Discovered descriptors (owned by this connection)
  // =========================================================================

  listTools(): Readonly<MCPTool>[] {
    return [...this.tools.values()];
  }

  findTool(name: string): Readonly<MCPTool> | undefined {
    return this.tools.get(name);
  }

  listResources(): Readonly<MCPResource>[] {
    return [...this.resources.values()];
  }

  findResource(uri: string): Readonly<MCPResource> | undefined {
    return this.resources.get(uri);
  }

  listResourceTemplates(): Readonly<MCPResourceTemplate>[] {
    return [...this.resourceTemplates];
  }

  listPrompts(): Readonly<MCPPrompt>[] {
    return [...this.prompts.values()];
  }

  findPrompt(name: string): Readonly<MCPPrompt> | undefined {
    return this.prompts.get(name);
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  /**
   * Drive the connection from disconnected to ready. Rejects with
   * MCPConnectError, leaving the connection torn down, if the transport
   * cannot be opened or the server rejects the handshake.
   */
  async connect(): Promise<void> {
    if (this.started) {
      throw new MCPConnectError(this.serverName, 'Connection has already been used');
    }
    this.started = true;

    this.updateState('connecting');
    try {
      await this.transport.connect();
    } catch (error) {
      await this.teardown(`Transport failed to open: ${getErrorMessage(error)}`);
      throw new MCPConnectError(this.serverName, getErrorMessage(error), error);
    }

    // Reader first, so an immediate answer to initialize is not lost
    this.reader = this.readLoop();

    try {
      await this.initialize();
      await this.discover();
    } catch (error) {
      await this.teardown(`Handshake failed: ${getErrorMessage(error)}`);
      throw error instanceof MCPConnectError ? error : new MCPConnectError(this.serverName, getErrorMessage(error), error);
    }

    if (this.closing) {
      throw new MCPConnectError(this.serverName, this.closeReason ?? 'Connection closed during discovery');
    }

    this.connectedAt = Date.now();
    this.updateState('ready');

    logger.info('MCP server connected', {
      server: this.serverName,
      serverName: this.serverInfo?.name,
      toolCount: this.tools.size,
      resourceCount: this.resources.size,
      promptCount: this.prompts.size,
    });
  }

  /**
   * Tear the connection down and wait for the reader to finish.
   */
  async close(reason = 'Disconnected by client'): Promise<void> {
    await this.teardown(reason);
    if (this.reader) {
      await this.reader;
    }
  }

  private async initialize(): Promise<void> {
    this.updateState('awaiting-init-response');

    const params = {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: this.clientCapabilities,
      clientInfo: this.clientInfo,
    } satisfies MCPInitializeParams;
    const raw = await this.request(MCP_METHODS.INITIALIZE, params, this.connectTimeout);
    const result = parseInitializeResult(raw);

    this.serverInfo = result.serverInfo;
    this.capabilities = result.capabilities;
    this.protocolVersion = result.protocolVersion;

    if (result.protocolVersion !== MCP_PROTOCOL_VERSION) {
      logger.info('Server answered with a different protocol version', {
        server: this.serverName,
        requested: MCP_PROTOCOL_VERSION,
        received: result.protocolVersion,
      });
    }

    this.updateState('awaiting-initialized-ack');
    await this.transport.send(createNotification(MCP_METHODS.INITIALIZED));
  }

  /**
   * Each advertised category is attempted once; a failure leaves only that
   * category empty.
   */
  private async discover(): Promise<void> {
    this.updateState('discovering');
    const capabilities = this.capabilities ?? {};

    const skip = (kind: string) => (error: MCPError, value: unknown): void => {
      logger.warn(`Skipping malformed ${kind}`, { server: this.serverName, error: error.message, value });
    };

    if (capabilities.tools) {
      try {
        const result = await this.request(MCP_METHODS.LIST_TOOLS, undefined, this.connectTimeout);
        for (const tool of parseListing(result, 'tools', parseTool, skip('tool'))) {
          if (!this.tools.has(tool.name)) this.tools.set(tool.name, Object.freeze(tool));
        }
      } catch (error) {
        this.tools.clear();
        logger.warn('Failed to list tools', { server: this.serverName, error: getErrorMessage(error) });
      }
    }

    if (capabilities.resources) {
      try {
        const result = await this.request(MCP_METHODS.LIST_RESOURCES, undefined, this.connectTimeout);
        for (const resource of parseListing(result, 'resources', parseResource, skip('resource'))) {
          if (!this.resources.has(resource.uri)) this.resources.set(resource.uri, Object.freeze(resource));
        }
      } catch (error) {
        this.resources.clear();
        logger.warn('Failed to list resources', { server: this.serverName, error: getErrorMessage(error) });
      }

      try {
        const result = await this.request(MCP_METHODS.LIST_RESOURCE_TEMPLATES, undefined, this.connectTimeout);
        this.resourceTemplates = parseListing(result, 'resourceTemplates', parseResourceTemplate).map((template) =>
          Object.freeze(template)
        );
      } catch (error) {
        // Optional endpoint; many servers do not implement it
        logger.debug('Failed to list resource templates', { server: this.serverName, error: getErrorMessage(error) });
      }
    }

    if (capabilities.prompts) {
      try {
        const result = await this.request(MCP_METHODS.LIST_PROMPTS, undefined, this.connectTimeout);
        for (const prompt of parseListing(result, 'prompts', parsePrompt, skip('prompt'))) {
          if (!this.prompts.has(prompt.name)) this.prompts.set(prompt.name, Object.freeze(prompt));
        }
      } catch (error) {
        this.prompts.clear();
        logger.warn('Failed to list prompts', { server: this.serverName, error: getErrorMessage(error) });
      }
    }
  }

  // =========================================================================
  // Operations
  // =========================================================================

  async callTool(name: string, args: Record<string, unknown> = {}, timeout?: number): Promise<MCPToolResult> {
    this.assertReady();
    logger.debug('Calling MCP tool', { server: this.serverName, toolName: name });
    const result = await this.request(MCP_METHODS.CALL_TOOL, { name, arguments: args }, timeout);
    return parseToolResult(result);
  }

  async readResource(uri: string, timeout?: number): Promise<MCPReadResourceResult> {
    this.assertReady();
    logger.debug('Reading MCP resource', { server: this.serverName, uri });
    const result = await this.request(MCP_METHODS.READ_RESOURCE, { uri }, timeout);
    return parseReadResourceResult(result);
  }

  async getPrompt(name: string, args: Record<string, unknown> = {}, timeout?: number): Promise<MCPPromptResult> {
    this.assertReady();
    logger.debug('Getting MCP prompt', { server: this.serverName, promptName: name });
    const result = await this.request(MCP_METHODS.GET_PROMPT, { name, arguments: args }, timeout);
    return parsePromptResult(result);
  }

  async ping(timeout?: number): Promise<void> {
    this.assertReady();
    await this.request(MCP_METHODS.PING, undefined, timeout);
  }

  /**
   * Send a request and wait for its correlated response.
   *
   * On timeout the pending entry is removed and the connection stays open.
   * A timeout that is not a positive delay a timer can hold fails with
   * InvalidParams before anything is sent.
   * A response `error` rejects with the matching MCPError kind.
   */
  async request(method: string, params?: Record<string, unknown>, timeout = this.requestTimeout): Promise<unknown> {
    if (this.closing) {
      throw new MCPConnectionClosedError(this.serverName, this.closeReason ?? 'closed');
    }
    if (!Number.isFinite(timeout) || timeout <= 0 || timeout > MAX_REQUEST_TIMEOUT) {
      throw new MCPError('InvalidParams', `Invalid timeout for ${method}: ${timeout}ms`, {
        data: { method, timeout, max: MAX_REQUEST_TIMEOUT },
      });
    }

    const call = this.table.register(method);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<CallOutcome>((resolve) => {
      timer = setTimeout(() => resolve({ ok: false, error: new MCPTimeoutError(method, timeout) }), timeout);
    });

    let outcome: CallOutcome;
    try {
      outcome = await Promise.race([this.sendAndWait(call.id, method, params, call.slot), deadline]);
    } catch (error) {
      this.table.cancel(call.id);
      throw error instanceof MCPError ? error : new MCPTransportError(getErrorMessage(error), error);
    } finally {
      clearTimeout(timer);
    }

    if (!outcome.ok) {
      if (this.table.cancel(call.id)) {
        logger.warn('MCP request timed out', { server: this.serverName, id: call.id, method, timeout });
      }
      throw outcome.error;
    }
    return outcome.result;
  }

  private async sendAndWait(
    id: number,
    method: string,
    params: Record<string, unknown> | undefined,
    slot: Promise<CallOutcome>
  ): Promise<CallOutcome> {
    await this.transport.send(createRequest(id, method, params));
    logger.debug('Sent MCP request', { server: this.serverName, id, method });
    return slot;
  }

  private assertReady(): void {
    if (this.closing) {
      throw new MCPConnectionClosedError(this.serverName, this.closeReason ?? 'closed');
    }
    if (this.state !== 'ready') {
      throw new MCPError('InvalidRequest', `Connection to "${this.serverName}" is not ready (${this.state})`);
    }
  }

  // =========================================================================
  // Reader
  // =========================================================================

  private async readLoop(): Promise<void> {
    try {
      for await (const decoded of this.transport.receive()) {
        if (this.closing) break;
        if (!decoded.ok) {
          logger.warn('Dropping undecodable message', {
            server: this.serverName,
            kind: decoded.error.kind,
            error: decoded.error.message,
          });
          continue;
        }
        this.route(decoded.message);
      }
    } catch (error) {
      logger.error('MCP reader failed', { server: this.serverName, error: getErrorMessage(error) });
    }

    if (!this.closing) {
      await this.teardown('Transport closed by peer');
    }
  }

  private route(message: MCPMessage): void {
    if (isRequest(message)) {
      this.handleServerRequest(message);
    } else if (isNotification(message)) {
      this.handleNotification(message);
    } else {
      this.handleResponse(message);
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    if (response.id === null) {
      const error = isErrorResponse(response) ? response.error : undefined;
      logger.warn('Dropping error response without id', { server: this.serverName, error });
      return;
    }

    const outcome: CallOutcome = isErrorResponse(response)
      ? { ok: false, error: MCPError.fromWireError(response.error) }
      : { ok: true, result: response.result };

    if (!this.table.resolve(response.id, outcome)) {
      logger.warn('Received response for unknown request', { server: this.serverName, id: response.id });
    }
  }

  private handleNotification(notification: JsonRpcNotification): void {
    const { method } = notification;
    const params = notification.params ?? {};

    switch (method) {
      case MCP_NOTIFICATIONS.PROGRESS:
      case MCP_NOTIFICATIONS.LEGACY_PROGRESS:
        logger.debug('MCP progress', { server: this.serverName, ...params });
        break;
      case MCP_NOTIFICATIONS.TOOLS_LIST_CHANGED:
      case MCP_NOTIFICATIONS.RESOURCES_LIST_CHANGED:
      case MCP_NOTIFICATIONS.PROMPTS_LIST_CHANGED:
        logger.info('Server reported a list change; reconnect to refresh', { server: this.serverName, method });
        break;
      default:
        logger.debug('Received MCP notification', { server: this.serverName, method });
    }

    try {
      this.emit('notification', method, params);
    } catch (error) {
      logger.error('Notification handler failed', { server: this.serverName, method, error: getErrorMessage(error) });
    }
  }

  private handleServerRequest(request: JsonRpcRequest): void {
    const handler = CLIENT_REQUEST_HANDLERS.get(request.method);
    let response: MCPMessage;
    if (!handler) {
      response = createErrorResponse(
        request.id,
        new MCPError('MethodNotFound', `Method not found: ${request.method}`)
      );
    } else {
      try {
        response = createSuccessResponse(request.id, handler(request.params ?? {}));
      } catch (error) {
        response = createErrorResponse(
          request.id,
          new MCPError('InternalError', getErrorMessage(error), { data: { message: getErrorMessage(error) } })
        );
      }
    }

    void this.transport.send(response).catch((error: unknown) => {
      logger.warn('Failed to answer server request', {
        server: this.serverName,
        method: request.method,
        error: getErrorMessage(error),
      });
    });
  }

  // =========================================================================
  // Teardown
  // =========================================================================

  private teardown(reason: string): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.runTeardown(reason);
    }
    return this.teardownPromise;
  }

  private async runTeardown(reason: string): Promise<void> {
    this.closing = true;
    this.closeReason = reason;
    const closingTransport = this.transport.close();

    const failed = this.table.cancelAll(new MCPConnectionClosedError(this.serverName, reason));
    if (failed > 0) {
      logger.warn('Cancelling pending requests due to disconnect', { server: this.serverName, count: failed, reason });
    }

    this.tools.clear();
    this.resources.clear();
    this.resourceTemplates = [];
    this.prompts.clear();

    this.state = 'disconnected';
    logger.info('MCP server disconnected', { server: this.serverName, reason });
    this.emitSafely('stateChanged', this.getState());
    this.emitSafely('disconnected', reason);

    try {
      await closingTransport;
    } catch (error) {
      logger.warn('Error during disconnect', { server: this.serverName, error: getErrorMessage(error) });
    }
  }

  private updateState(state: MCPConnectionState): void {
    if (this.closing) return;
    this.state = state;
    logger.debug('Connection state changed', { server: this.serverName, state });
    this.emitSafely('stateChanged', this.getState());
  }

  private emitSafely(event: keyof MCPConnectionEvents, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      logger.error('Connection event listener failed', { server: this.serverName, event, error: getErrorMessage(error) });
    }
  }
}
