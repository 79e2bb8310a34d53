/**
 * MCP (Model Context Protocol) Type Definitions
 *
 * Shared types for both sides of a relay: the client that connects to many
 * servers, and the dispatcher that answers one client per transport.
 * @see https://modelcontextprotocol.io/specification/2024-11-05
 */

// =============================================================================
// Transport Types
// =============================================================================

/**
 * MCP transport type
 * - stdio: Server runs as subprocess communicating via stdin/stdout
 * - websocket: Server is reached over a persistent socket, one frame per message
 */
export type MCPTransportType = 'stdio' | 'websocket';

/**
 * Any transport a connection or dispatcher can run over; 'stream' wraps an
 * arbitrary readable/writable pair (a host's own stdio, in-process pipes).
 */
export type MCPTransportKind = MCPTransportType | 'stream';

/**
 * Connection state machine
 *
 * disconnected -> connecting -> awaiting-init-response -> awaiting-initialized-ack
 *   -> discovering -> ready -> disconnected (terminal)
 */
export type MCPConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'awaiting-init-response'
  | 'awaiting-initialized-ack'
  | 'discovering'
  | 'ready';

// =============================================================================
// Server Configuration
// =============================================================================

/**
 * Environment variables for MCP server
 */
export interface MCPServerEnv {
  [key: string]: string;
}

/**
 * stdio transport configuration
 */
export interface MCPStdioConfig {
  type: 'stdio';
  /** Command to run the server */
  command: string;
  /** Arguments to pass to the command */
  args?: string[];
  /** Working directory for the server process */
  cwd?: string;
  /** Environment variables */
  env?: MCPServerEnv;
}

/**
 * WebSocket transport configuration
 */
export interface MCPWebSocketConfig {
  type: 'websocket';
  /** ws:// or wss:// endpoint */
  url: string;
  /** Optional headers for authentication */
  headers?: Record<string, string>;
}

/**
 * Transport configuration union
 */
export type MCPTransportConfig = MCPStdioConfig | MCPWebSocketConfig;

/**
 * Per-server configuration
 */
export interface MCPServerConfig {
  /** Transport configuration */
  transport: MCPTransportConfig;
  /** Whether connectConfigured() should connect this server */
  enabled?: boolean;
  /** Request timeout in milliseconds (falls back to settings.defaultTimeout) */
  timeout?: number;
  /** Description of the server's capabilities */
  description?: string;
}

// =============================================================================
// Protocol Capabilities
// =============================================================================

/**
 * Server-declared capabilities
 */
export interface MCPServerCapabilities {
  /** Prompt templates support */
  prompts?: {
    listChanged?: boolean;
  };
  /** Resource access support */
  resources?: {
    subscribe?: boolean;
    listChanged?: boolean;
  };
  /** Tool execution support */
  tools?: {
    listChanged?: boolean;
  };
  /** Logging support */
  logging?: Record<string, unknown>;
  /** Experimental features */
  experimental?: Record<string, unknown>;
}

/**
 * Client-declared capabilities
 */
export interface MCPClientCapabilities {
  /** Filesystem roots support */
  roots?: {
    listChanged?: boolean;
  };
  /** LLM sampling support */
  sampling?: Record<string, unknown>;
  /** Experimental features */
  experimental?: Record<string, unknown>;
}

/**
 * Categories a server may advertise and a client may discover
 */
export type MCPCapabilityCategory = 'tools' | 'resources' | 'prompts';

// =============================================================================
// Protocol Messages
// =============================================================================

/**
 * Server information from initialization
 */
export interface MCPServerInfo {
  name: string;
  version: string;
}

/**
 * Client information for initialization
 */
export interface MCPClientInfo {
  name: string;
  version: string;
}

/**
 * `initialize` request params
 */
export interface MCPInitializeParams {
  protocolVersion: string;
  clientInfo: MCPClientInfo;
  capabilities: MCPClientCapabilities;
}

/**
 * `initialize` result
 */
export interface MCPInitializeResult {
  protocolVersion: string;
  serverInfo: MCPServerInfo;
  capabilities: MCPServerCapabilities;
  instructions?: string;
}

// =============================================================================
// Resources
// =============================================================================

/**
 * Resource definition
 */
export interface MCPResource {
  /** Unique URI for the resource */
  uri: string;
  /** Resource name */
  name: string;
  /** Description */
  description?: string;
  /** MIME type */
  mimeType?: string;
}

/**
 * Resource template for parameterized resources
 */
export interface MCPResourceTemplate {
  /** URI template (RFC 6570) */
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/**
 * Resource content (text or binary)
 */
export interface MCPResourceContent {
  uri: string;
  mimeType?: string;
  /** Text content */
  text?: string;
  /** Binary content (base64 encoded) */
  blob?: string;
}

/**
 * `resources/read` result
 */
export interface MCPReadResourceResult {
  contents: MCPResourceContent[];
}

// =============================================================================
// Prompts
// =============================================================================

/**
 * Prompt argument definition
 */
export interface MCPPromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

/**
 * Prompt definition
 */
export interface MCPPrompt {
  name: string;
  description?: string;
  arguments?: MCPPromptArgument[];
}

/**
 * Text content in prompt message or tool result
 */
export interface MCPTextContent {
  type: 'text';
  text: string;
}

/**
 * Image content
 */
export interface MCPImageContent {
  type: 'image';
  data: string; // base64
  mimeType: string;
}

/**
 * Embedded resource content
 */
export interface MCPEmbeddedResourceContent {
  type: 'resource';
  resource: MCPResourceContent;
}

/**
 * Content item union used by prompts and tool results
 */
export type MCPContent = MCPTextContent | MCPImageContent | MCPEmbeddedResourceContent;

/**
 * Prompt message
 */
export interface MCPPromptMessage {
  role: 'user' | 'assistant';
  content: MCPContent;
}

/**
 * Resolved prompt result
 */
export interface MCPPromptResult {
  description?: string;
  messages: MCPPromptMessage[];
}

// =============================================================================
// Tools
// =============================================================================

/**
 * JSON Schema for tool input
 */
export interface MCPToolInputSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * Tool definition from MCP server
 */
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema: MCPToolInputSchema;
}

/**
 * Tool call result
 */
export interface MCPToolResult {
  content: MCPContent[];
  /** Whether the tool execution failed */
  isError?: boolean;
}

// =============================================================================
// Client State
// =============================================================================

/**
 * Copy-out view of one connection record
 */
export interface MCPServerState {
  serverName: string;
  transport: MCPTransportKind;
  state: MCPConnectionState;
  serverInfo?: MCPServerInfo;
  capabilities?: MCPServerCapabilities;
  protocolVersion?: string;
  toolCount: number;
  resourceCount: number;
  resourceTemplateCount: number;
  promptCount: number;
  pendingCalls: number;
  connectedAt?: number;
}

/**
 * Overall health across connected servers
 */
export type MCPHealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Result of pinging one server
 */
export interface MCPServerHealth {
  serverName: string;
  status: 'healthy' | 'unhealthy';
  /** Ping round trip in ms, present when the ping succeeded */
  responseTime?: number;
  state: MCPConnectionState;
  toolCount: number;
  error?: string;
}

export interface MCPHealthReport {
  /** healthy: every server answered; degraded: some did; unhealthy: none did */
  status: MCPHealthStatus;
  checkedAt: number;
  servers: MCPServerHealth[];
}

/**
 * Aggregate index entry, keyed by (serverName, item name)
 */
export interface MCPIndexedItem<T> {
  serverName: string;
  item: T;
}

// =============================================================================
// Settings
// =============================================================================

export type MCPLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Relay settings, typically loaded from a JSON file
 */
export interface MCPSettings {
  /** Identity sent in `initialize` */
  clientInfo: MCPClientInfo;
  /** Default request timeout (ms) */
  defaultTimeout: number;
  /** Handshake + discovery timeout (ms) */
  connectTimeout: number;
  /** Configured servers by name */
  servers: Record<string, MCPServerConfig>;
  /** Logging sinks */
  logging: {
    level: MCPLogLevel;
    dir?: string;
    stderr: boolean;
  };
}

/**
 * Default settings
 */
export const DEFAULT_MCP_SETTINGS: MCPSettings = {
  clientInfo: {
    name: 'mcp-relay',
    version: '1.0.0',
  },
  defaultTimeout: 30000,
  connectTimeout: 10000,
  servers: {},
  logging: {
    level: 'info',
    stderr: false,
  },
};
