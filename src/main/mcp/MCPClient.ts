/**
 * MCP Client
 *
 * Owns a named set of server connections and the aggregate indices built
 * from what each one discovered:
 * - Connection lifecycle (connect, disconnect, shutdown)
 * - Tool / resource / prompt lookup across servers
 * - Notification fan-out
 *
 * Indices are keyed by server, then by item key, and hold references to
 * the descriptors owned by each connection. They are written when a connection reaches ready and purged
 * when it is torn down; every other operation only reads them.
 */

import { EventEmitter } from 'node:events';
import type {
  MCPClientInfo,
  MCPHealthReport,
  MCPHealthStatus,
  MCPIndexedItem,
  MCPPrompt,
  MCPPromptResult,
  MCPReadResourceResult,
  MCPResource,
  MCPServerConfig,
  MCPServerHealth,
  MCPServerState,
  MCPSettings,
  MCPTool,
  MCPToolResult,
  MCPTransportConfig,
} from '../../shared/types/mcp';
import { DEFAULT_MCP_SETTINGS } from '../../shared/types/mcp';
import { getErrorMessage } from '../../shared/utils/errorHandling';
import { createLogger } from '../logger';
import { MCPServerConnection } from './MCPServerConnection';
import { MCPConnectError, MCPConnectionClosedError, MCPError } from './protocol/errors';
import { createTransport } from './transports';
import type { MCPTransport } from './transports/types';

const logger = createLogger('MCPClient');

export type MCPTransportFactory = (config: MCPTransportConfig, serverName: string) => MCPTransport;

export type MCPNotificationHandler = (serverName: string, params: Record<string, unknown>) => void;

export interface MCPClientOptions {
  clientInfo?: MCPClientInfo;
  /** Request deadline when neither the call nor the server config gives one */
  defaultTimeout?: number;
  connectTimeout?: number;
  /** Builds the transport for a server config; tests inject in-memory pairs */
  transportFactory?: MCPTransportFactory;
}

export type MCPConnectOutcome =
  | { serverName: string; ok: true }
  | { serverName: string; ok: false; error: MCPError };

/**
 * MCP Client events
 */
export interface MCPClientEvents {
  serverConnected: (serverName: string, state: MCPServerState) => void;
  serverDisconnected: (serverName: string, reason: string) => void;
}

interface IndexEntry<T> {
  serverName: string;
  key: string;
  item: T;
}

/**
 * Items grouped by server, then by item key. Servers keep the order they
 * were indexed in, which is the order lookups try them.
 */
class ServerIndex<T> {
  private readonly servers = new Map<string, Map<string, T>>();

  set(serverName: string, items: Iterable<[string, T]>): void {
    this.servers.set(serverName, new Map(items));
  }

  find(key: string): IndexEntry<T> | undefined {
    for (const [serverName, items] of this.servers) {
      const item = items.get(key);
      if (item !== undefined) {
        return { serverName, key, item };
      }
    }
    return undefined;
  }

  delete(serverName: string): void {
    this.servers.delete(serverName);
  }

  clear(): void {
    this.servers.clear();
  }

  entries(): IndexEntry<T>[] {
    const entries: IndexEntry<T>[] = [];
    for (const [serverName, items] of this.servers) {
      for (const [key, item] of items) {
        entries.push({ serverName, key, item });
      }
    }
    return entries;
  }
}

export class MCPClient extends EventEmitter {
  private readonly clientInfo: MCPClientInfo;
  private readonly defaultTimeout: number;
  private readonly connectTimeout: number;
  private readonly transportFactory: MCPTransportFactory;

  private connections = new Map<string, MCPServerConnection>();
  private indexedServers = new Set<string>();
  private notificationHandlers = new Map<string, Set<MCPNotificationHandler>>();

  private toolIndex = new ServerIndex<MCPTool>();
  private resourceIndex = new ServerIndex<MCPResource>();
  private promptIndex = new ServerIndex<MCPPrompt>();

  constructor(options: MCPClientOptions = {}) {
    super();
    this.clientInfo = options.clientInfo ?? DEFAULT_MCP_SETTINGS.clientInfo;
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_MCP_SETTINGS.defaultTimeout;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_MCP_SETTINGS.connectTimeout;
    this.transportFactory = options.transportFactory ?? ((config) => createTransport(config));
  }

  static fromSettings(settings: MCPSettings, transportFactory?: MCPTransportFactory): MCPClient {
    return new MCPClient({
      clientInfo: settings.clientInfo,
      defaultTimeout: settings.defaultTimeout,
      connectTimeout: settings.connectTimeout,
      transportFactory,
    });
  }

  // =========================================================================
  // Connection Management
  // =========================================================================

  /**
   * Connect to a server and merge what it advertises into the indices.
   * Connecting under a name that is already in use tears the old
   * connection down first.
   */
  async connectServer(serverName: string, config: MCPServerConfig): Promise<void> {
    if (this.connections.has(serverName)) {
      logger.info('Replacing existing connection', { server: serverName });
      await this.disconnectServer(serverName);
    }

    let transport: MCPTransport;
    try {
      transport = this.transportFactory(config.transport, serverName);
    } catch (error) {
      throw new MCPConnectError(serverName, getErrorMessage(error), error);
    }

    const connection = new MCPServerConnection(serverName, transport, {
      clientInfo: this.clientInfo,
      requestTimeout: config.timeout ?? this.defaultTimeout,
      connectTimeout: this.connectTimeout,
    });

    connection.on('notification', (method: string, params: Record<string, unknown>) => {
      this.dispatchNotification(serverName, method, params);
    });
    connection.once('disconnected', (reason: string) => {
      this.handleDisconnected(serverName, connection, reason);
    });

    this.connections.set(serverName, connection);

    try {
      await connection.connect();
    } catch (error) {
      if (this.connections.get(serverName) === connection) {
        this.connections.delete(serverName);
      }
      logger.error('Failed to connect to MCP server', { server: serverName, error: getErrorMessage(error) });
      throw error instanceof MCPError ? error : new MCPConnectError(serverName, getErrorMessage(error), error);
    }

    if (this.connections.get(serverName) !== connection || !connection.isReady) {
      throw new MCPConnectError(serverName, 'Disconnected while connecting');
    }

    this.indexConnection(serverName, connection);
    this.emit('serverConnected', serverName, connection.getState());
  }

  /**
   * Connect every enabled server in the settings. One server failing does
   * not affect the others.
   */
  async connectConfigured(settings: Pick<MCPSettings, 'servers'>): Promise<MCPConnectOutcome[]> {
    const entries = Object.entries(settings.servers).filter(([, config]) => config.enabled !== false);

    const results = await Promise.allSettled(entries.map(([name, config]) => this.connectServer(name, config)));

    return results.map((result, index): MCPConnectOutcome => {
      const serverName = entries[index][0];
      if (result.status === 'fulfilled') {
        return { serverName, ok: true };
      }
      const reason: unknown = result.reason;
      return {
        serverName,
        ok: false,
        error: reason instanceof MCPError ? reason : new MCPConnectError(serverName, getErrorMessage(reason), reason),
      };
    });
  }

  /**
   * Tear one connection down. Outstanding calls on it fail with
   * ConnectionClosed; its index entries are purged.
   */
  async disconnectServer(serverName: string): Promise<void> {
    const connection = this.connections.get(serverName);
    if (!connection) {
      return;
    }
    await connection.close('Disconnected by client');
    // Normally done by the disconnected listener; covers a listener that never ran
    if (this.connections.get(serverName) === connection) {
      this.connections.delete(serverName);
      this.purgeServer(serverName);
    }
  }

  /**
   * Disconnect all servers. Safe with connections already closed.
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down MCP client', { servers: this.connections.size });

    await Promise.allSettled([...this.connections.keys()].map((name) => this.disconnectServer(name)));

    this.connections.clear();
    this.toolIndex.clear();
    this.resourceIndex.clear();
    this.promptIndex.clear();
    this.indexedServers.clear();
  }

  private handleDisconnected(serverName: string, connection: MCPServerConnection, reason: string): void {
    if (this.connections.get(serverName) !== connection) {
      return;
    }
    this.connections.delete(serverName);
    const wasIndexed = this.indexedServers.has(serverName);
    this.purgeServer(serverName);
    if (wasIndexed) {
      this.emit('serverDisconnected', serverName, reason);
    }
  }

  // =========================================================================
  // Indices
  // =========================================================================

  private indexConnection(serverName: string, connection: MCPServerConnection): void {
    const tools = connection.listTools();
    for (const tool of tools) {
      const owner = this.toolIndex.find(tool.name);
      if (owner) {
        logger.warn('Tool name advertised by more than one server; first registered wins', {
          tool: tool.name,
          winner: owner.serverName,
          shadowed: serverName,
        });
      }
    }
    this.toolIndex.set(serverName, tools.map((tool): [string, MCPTool] => [tool.name, tool]));
    this.resourceIndex.set(
      serverName,
      connection.listResources().map((resource): [string, MCPResource] => [resource.uri, resource])
    );
    this.promptIndex.set(serverName, connection.listPrompts().map((prompt): [string, MCPPrompt] => [prompt.name, prompt]));
    this.indexedServers.add(serverName);
  }

  private purgeServer(serverName: string): void {
    this.toolIndex.delete(serverName);
    this.resourceIndex.delete(serverName);
    this.promptIndex.delete(serverName);
    this.indexedServers.delete(serverName);
  }

  private requireConnection(serverName: string): MCPServerConnection {
    const connection = this.connections.get(serverName);
    if (!connection) {
      throw new MCPConnectionClosedError(serverName, 'not connected');
    }
    return connection;
  }

  // =========================================================================
  // Operations
  // =========================================================================

  /**
   * Call a tool by name on whichever server registered it first. Fails with
   * ToolNotFound, without sending anything, when no server has it.
   */
  async callTool(toolName: string, args: Record<string, unknown> = {}, timeout?: number): Promise<MCPToolResult> {
    const entry = this.toolIndex.find(toolName);
    if (!entry) {
      throw new MCPError('ToolNotFound', `Tool not found: ${toolName}`, { data: { toolName } });
    }
    const connection = this.requireConnection(entry.serverName);
    return connection.callTool(toolName, args, timeout);
  }

  /**
   * Call a tool on one specific server.
   */
  async callServerTool(
    serverName: string,
    toolName: string,
    args: Record<string, unknown> = {},
    timeout?: number
  ): Promise<MCPToolResult> {
    const connection = this.requireConnection(serverName);
    if (!connection.getCapabilities().tools) {
      throw new MCPError('CapabilityNotSupported', `Server "${serverName}" does not support tools`, {
        data: { serverName, capability: 'tools' },
      });
    }
    if (!connection.findTool(toolName)) {
      throw new MCPError('ToolNotFound', `Tool not found on "${serverName}": ${toolName}`, {
        data: { serverName, toolName },
      });
    }
    return connection.callTool(toolName, args, timeout);
  }

  async readResource(uri: string, timeout?: number): Promise<MCPReadResourceResult> {
    const entry = this.resourceIndex.find(uri);
    if (!entry) {
      throw new MCPError('ResourceNotFound', `Resource not found: ${uri}`, { data: { uri } });
    }
    const connection = this.requireConnection(entry.serverName);
    return connection.readResource(uri, timeout);
  }

  async getPrompt(name: string, args: Record<string, unknown> = {}, timeout?: number): Promise<MCPPromptResult> {
    const entry = this.promptIndex.find(name);
    if (!entry) {
      throw new MCPError('PromptNotFound', `Prompt not found: ${name}`, { data: { name } });
    }
    const connection = this.requireConnection(entry.serverName);
    return connection.getPrompt(name, args, timeout);
  }

  async ping(serverName: string, timeout?: number): Promise<void> {
    const connection = this.requireConnection(serverName);
    await connection.ping(timeout);
  }

  /**
   * Ping every connection at once and report each result. A failing or
   * slow server does not hold back the others' results beyond `timeout`.
   */
  async healthCheck(timeout?: number): Promise<MCPHealthReport> {
    const connections = [...this.connections.values()];
    const started = performance.now();

    const results = await Promise.allSettled(
      connections.map(async (connection) => {
        await connection.ping(timeout);
        return Math.round(performance.now() - started);
      })
    );

    const servers = results.map((result, index): MCPServerHealth => {
      const { serverName, state, toolCount } = connections[index].getState();
      if (result.status === 'fulfilled') {
        return { serverName, status: 'healthy', responseTime: result.value, state, toolCount };
      }
      return { serverName, status: 'unhealthy', state, toolCount, error: getErrorMessage(result.reason) };
    });

    const unhealthy = servers.filter((server) => server.status === 'unhealthy').length;
    let status: MCPHealthStatus = 'healthy';
    if (unhealthy > 0) {
      status = unhealthy < servers.length ? 'degraded' : 'unhealthy';
    }

    logger.info('Health check complete', { status, servers: servers.length, unhealthy });
    return { status, checkedAt: Date.now(), servers };
  }

  // =========================================================================
  // Notifications
  // =========================================================================

  /**
   * Register a handler for a notification method on every present and
   * future connection. Returns an unsubscribe function.
   */
  onNotification(method: string, handler: MCPNotificationHandler): () => void {
    let handlers = this.notificationHandlers.get(method);
    if (!handlers) {
      handlers = new Set();
      this.notificationHandlers.set(method, handlers);
    }
    handlers.add(handler);

    return () => {
      const current = this.notificationHandlers.get(method);
      current?.delete(handler);
      if (current && current.size === 0) {
        this.notificationHandlers.delete(method);
      }
    };
  }

  private dispatchNotification(serverName: string, method: string, params: Record<string, unknown>): void {
    const handlers = this.notificationHandlers.get(method);
    if (!handlers) return;
    for (const handler of [...handlers]) {
      try {
        handler(serverName, params);
      } catch (error) {
        logger.error('Notification handler failed', { server: serverName, method, error: getErrorMessage(error) });
      }
    }
  }

  // =========================================================================
  // Snapshots
  // =========================================================================

  /**
   * Names of servers whose connection is ready
   */
  listConnectedServers(): string[] {
    return [...this.connections.values()].filter((c) => c.isReady).map((c) => c.serverName);
  }

  /**
   * `server:tool` for every indexed tool, in registration order
   */
  listTools(): string[] {
    return this.toolIndex.entries().map(qualifiedName);
  }

  /**
   * `server:uri` for every indexed resource
   */
  listResources(): string[] {
    return this.resourceIndex.entries().map(qualifiedName);
  }

  listPrompts(): string[] {
    return this.promptIndex.entries().map(qualifiedName);
  }

  getToolDescriptors(): MCPIndexedItem<MCPTool>[] {
    return this.toolIndex.entries().map(snapshot);
  }

  getResourceDescriptors(): MCPIndexedItem<MCPResource>[] {
    return this.resourceIndex.entries().map(snapshot);
  }

  getPromptDescriptors(): MCPIndexedItem<MCPPrompt>[] {
    return this.promptIndex.entries().map(snapshot);
  }

  getServerState(serverName: string): MCPServerState | undefined {
    return this.connections.get(serverName)?.getState();
  }

  getServerStates(): MCPServerState[] {
    return [...this.connections.values()].map((connection) => connection.getState());
  }
}

/** Display form only; lookups never parse it back */
function qualifiedName(entry: IndexEntry<unknown>): string {
  return `${entry.serverName}:${entry.key}`;
}

function snapshot<T>(entry: IndexEntry<T>): MCPIndexedItem<T> {
  return { serverName: entry.serverName, item: structuredClone(entry.item) };
}
