/**
 * MCP error taxonomy
 *
 * Wire kinds mirror the JSON-RPC 2.0 codes plus the MCP domain extensions.
 * Local kinds describe failures of this process (teardown, timeouts, the
 * transport) and are never sent to a peer as-is.
 */

/**
 * JSON-RPC 2.0 Error
 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Error codes
 */
export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // MCP-specific
  TOOL_NOT_FOUND: -32000,
  RESOURCE_NOT_FOUND: -32001,
  PROMPT_NOT_FOUND: -32002,
  CAPABILITY_NOT_SUPPORTED: -32003,
  // Local only
  CONNECTION_CLOSED: -32010,
  TIMEOUT: -32011,
  TRANSPORT_CLOSED: -32012,
  CONNECT_FAILED: -32013,
} as const;

export type MCPWireErrorKind =
  | 'ParseError'
  | 'InvalidRequest'
  | 'MethodNotFound'
  | 'InvalidParams'
  | 'InternalError'
  | 'ToolNotFound'
  | 'ResourceNotFound'
  | 'PromptNotFound'
  | 'CapabilityNotSupported';

export type MCPLocalErrorKind =
  | 'ConnectionClosed'
  | 'Timeout'
  | 'TransportClosed'
  | 'ConnectFailed';

/** A peer answered with a code outside the known set */
export type MCPErrorKind = MCPWireErrorKind | MCPLocalErrorKind | 'ServerError';

const CODE_BY_KIND: Record<Exclude<MCPErrorKind, 'ServerError'>, number> = {
  ParseError: JSON_RPC_ERRORS.PARSE_ERROR,
  InvalidRequest: JSON_RPC_ERRORS.INVALID_REQUEST,
  MethodNotFound: JSON_RPC_ERRORS.METHOD_NOT_FOUND,
  InvalidParams: JSON_RPC_ERRORS.INVALID_PARAMS,
  InternalError: JSON_RPC_ERRORS.INTERNAL_ERROR,
  ToolNotFound: JSON_RPC_ERRORS.TOOL_NOT_FOUND,
  ResourceNotFound: JSON_RPC_ERRORS.RESOURCE_NOT_FOUND,
  PromptNotFound: JSON_RPC_ERRORS.PROMPT_NOT_FOUND,
  CapabilityNotSupported: JSON_RPC_ERRORS.CAPABILITY_NOT_SUPPORTED,
  ConnectionClosed: JSON_RPC_ERRORS.CONNECTION_CLOSED,
  Timeout: JSON_RPC_ERRORS.TIMEOUT,
  TransportClosed: JSON_RPC_ERRORS.TRANSPORT_CLOSED,
  ConnectFailed: JSON_RPC_ERRORS.CONNECT_FAILED,
};

const WIRE_KIND_BY_CODE = new Map<number, MCPWireErrorKind>([
  [JSON_RPC_ERRORS.PARSE_ERROR, 'ParseError'],
  [JSON_RPC_ERRORS.INVALID_REQUEST, 'InvalidRequest'],
  [JSON_RPC_ERRORS.METHOD_NOT_FOUND, 'MethodNotFound'],
  [JSON_RPC_ERRORS.INVALID_PARAMS, 'InvalidParams'],
  [JSON_RPC_ERRORS.INTERNAL_ERROR, 'InternalError'],
  [JSON_RPC_ERRORS.TOOL_NOT_FOUND, 'ToolNotFound'],
  [JSON_RPC_ERRORS.RESOURCE_NOT_FOUND, 'ResourceNotFound'],
  [JSON_RPC_ERRORS.PROMPT_NOT_FOUND, 'PromptNotFound'],
  [JSON_RPC_ERRORS.CAPABILITY_NOT_SUPPORTED, 'CapabilityNotSupported'],
]);

const LOCAL_KINDS: ReadonlySet<MCPErrorKind> = new Set<MCPErrorKind>([
  'ConnectionClosed',
  'Timeout',
  'TransportClosed',
  'ConnectFailed',
]);

export interface MCPErrorOptions {
  data?: unknown;
  cause?: unknown;
  /** Only for 'ServerError', which has no fixed code */
  code?: number;
}

export class MCPError extends Error {
  public readonly kind: MCPErrorKind;
  public readonly code: number;
  public readonly data?: unknown;

  constructor(kind: MCPErrorKind, message: string, options: MCPErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MCPError';
    this.kind = kind;
    this.code = kind === 'ServerError'
      ? options.code ?? JSON_RPC_ERRORS.INTERNAL_ERROR
      : CODE_BY_KIND[kind];
    this.data = options.data;
  }

  /**
   * Map a wire `error` object back onto the typed taxonomy.
   */
  static fromWireError(error: JsonRpcError): MCPError {
    const kind = WIRE_KIND_BY_CODE.get(error.code);
    if (kind) {
      return new MCPError(kind, error.message, { data: error.data });
    }
    return new MCPError('ServerError', error.message, { data: error.data, code: error.code });
  }

  get isLocal(): boolean {
    return LOCAL_KINDS.has(this.kind);
  }

  /**
   * Wire form. Local kinds are reported to a peer as InternalError.
   */
  toWireError(): JsonRpcError {
    const code = this.isLocal ? JSON_RPC_ERRORS.INTERNAL_ERROR : this.code;
    return this.data === undefined
      ? { code, message: this.message }
      : { code, message: this.message, data: this.data };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function isMCPError(error: unknown, kind?: MCPErrorKind): error is MCPError {
  return error instanceof MCPError && (kind === undefined || error.kind === kind);
}

/**
 * Outstanding call failed because its connection was torn down
 */
export class MCPConnectionClosedError extends MCPError {
  public readonly serverName: string;

  constructor(serverName: string, reason: string) {
    super('ConnectionClosed', `Connection to "${serverName}" closed: ${reason}`, { data: { reason } });
    this.name = 'MCPConnectionClosedError';
    this.serverName = serverName;
  }
}

/**
 * No response arrived within the caller's deadline
 */
export class MCPTimeoutError extends MCPError {
  public readonly method: string;
  public readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number) {
    super('Timeout', `Request timeout for ${method} after ${timeoutMs}ms`, { data: { method, timeoutMs } });
    this.name = 'MCPTimeoutError';
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Send on a transport whose peer is gone
 */
export class MCPTransportError extends MCPError {
  constructor(message: string, cause?: unknown) {
    super('TransportClosed', message, { cause });
    this.name = 'MCPTransportError';
  }
}

/**
 * connectServer() failed: transport open, handshake, or its deadline
 */
export class MCPConnectError extends MCPError {
  public readonly serverName: string;

  constructor(serverName: string, message: string, cause?: unknown) {
    super('ConnectFailed', `Failed to connect to "${serverName}": ${message}`, { cause });
    this.name = 'MCPConnectError';
    this.serverName = serverName;
  }
}
