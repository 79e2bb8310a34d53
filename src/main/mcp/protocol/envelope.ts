/**
 * JSON-RPC 2.0 envelope: the one wire message shape for requests,
 * notifications and responses.
 *
 * Decoding is total. Malformed input comes back as a DecodeError value so a
 * reader can drop one frame and keep going.
 */

import { JSONRPC_VERSION } from './methods';
import { MCPError, type JsonRpcError } from './errors';

export type JsonRpcId = string | number;

/**
 * JSON-RPC 2.0 Request
 */
export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 Notification (never answered)
 */
export interface JsonRpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  result: unknown;
}

/**
 * `id` is null only when the offending request could not be read.
 */
export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * MCP message types
 */
export type MCPMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export interface EnvelopeValidationError {
  message: string;
  field?: string;
}

export interface DecodeError {
  kind: 'parse' | 'invalid';
  message: string;
  raw: string;
  /** Request id, when the frame was JSON and carried a usable one */
  id?: JsonRpcId;
}

export type DecodeResult =
  | { ok: true; message: MCPMessage }
  | { ok: false; error: DecodeError };

// =============================================================================
// Builders
// =============================================================================

export function createRequest(id: JsonRpcId, method: string, params?: Record<string, unknown>): JsonRpcRequest {
  return params === undefined
    ? { jsonrpc: JSONRPC_VERSION, id, method }
    : { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createNotification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
  return params === undefined
    ? { jsonrpc: JSONRPC_VERSION, method }
    : { jsonrpc: JSONRPC_VERSION, method, params };
}

export function createSuccessResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  // `undefined` would vanish from the JSON text and leave an invalid response
  return { jsonrpc: JSONRPC_VERSION, id, result: result === undefined ? null : result };
}

export function createErrorResponse(id: JsonRpcId | null, error: JsonRpcError | MCPError): JsonRpcErrorResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error: error instanceof MCPError ? error.toWireError() : error,
  };
}

// =============================================================================
// Classification
// =============================================================================

export function isRequest(message: MCPMessage): message is JsonRpcRequest {
  return 'method' in message && 'id' in message;
}

export function isNotification(message: MCPMessage): message is JsonRpcNotification {
  return 'method' in message && !('id' in message);
}

export function isResponse(message: MCPMessage): message is JsonRpcResponse {
  return 'result' in message || 'error' in message;
}

export function isErrorResponse(message: MCPMessage): message is JsonRpcErrorResponse {
  return 'error' in message;
}

// =============================================================================
// Validation
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function invalid(message: string, field?: string): { error: EnvelopeValidationError } {
  return { error: field === undefined ? { message } : { message, field } };
}

/**
 * Validate and rebuild a typed message from an untyped value. Unknown fields
 * are not carried over.
 */
function checkEnvelope(value: unknown): { message: MCPMessage } | { error: EnvelopeValidationError } {
  if (!isRecord(value)) {
    return invalid('Envelope must be a JSON object');
  }

  if (value.jsonrpc !== JSONRPC_VERSION) {
    return invalid(`Unsupported protocol version tag: ${String(value.jsonrpc)}`, 'jsonrpc');
  }

  const id = value.id;
  const hasId = id !== undefined;
  if (hasId && id !== null && !isId(id)) {
    return invalid('id must be a string or a number', 'id');
  }

  const method = value.method;
  const hasMethod = method !== undefined;
  const hasResult = 'result' in value;
  const hasError = value.error !== undefined;
  const shapeCount = Number(hasMethod) + Number(hasResult) + Number(hasError);

  if (shapeCount !== 1) {
    return invalid(
      shapeCount === 0
        ? 'Message must be either request or response'
        : 'Message must carry exactly one of method, result or error'
    );
  }

  if (hasMethod) {
    if (typeof method !== 'string' || method.length === 0) {
      return invalid('method must be a non-empty string', 'method');
    }
    let params: Record<string, unknown> | undefined;
    if (value.params !== undefined) {
      if (!isRecord(value.params)) {
        return invalid('params must be an object', 'params');
      }
      params = value.params;
    }
    if (!hasId) {
      return { message: createNotification(method, params) };
    }
    if (!isId(id)) {
      return invalid('Request id must not be null', 'id');
    }
    return { message: createRequest(id, method, params) };
  }

  if (hasResult) {
    if (!isId(id)) {
      return invalid('Response must have id', 'id');
    }
    return { message: { jsonrpc: JSONRPC_VERSION, id, result: value.result } };
  }

  const error = value.error;
  if (!isRecord(error)) {
    return invalid('error must be an object', 'error');
  }
  const { code, message, data } = error;
  if (typeof code !== 'number' || !Number.isInteger(code) || typeof message !== 'string') {
    return invalid('error must carry an integer code and a string message', 'error');
  }
  if (!hasId) {
    return invalid('Error response must have id (or null)', 'id');
  }
  const wireError: JsonRpcError = data === undefined ? { code, message } : { code, message, data };
  return {
    message: {
      jsonrpc: JSONRPC_VERSION,
      id: isId(id) ? id : null,
      error: wireError,
    },
  };
}

/**
 * Check an envelope against the wire invariants. Returns null when valid.
 */
export function validateEnvelope(value: unknown): EnvelopeValidationError | null {
  const checked = checkEnvelope(value);
  return 'error' in checked ? checked.error : null;
}

// =============================================================================
// Codec
// =============================================================================

export function encodeEnvelope(message: MCPMessage): string {
  return JSON.stringify(message);
}

export function decodeEnvelope(data: string | Uint8Array): DecodeResult {
  const raw = typeof data === 'string' ? data : Buffer.from(data).toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: 'parse',
        message: error instanceof Error ? error.message : String(error),
        raw,
      },
    };
  }

  const checked = checkEnvelope(parsed);
  if ('error' in checked) {
    const candidate = isRecord(parsed) ? parsed.id : undefined;
    const id = isId(candidate) ? candidate : undefined;
    return {
      ok: false,
      error: id === undefined
        ? { kind: 'invalid', message: checked.error.message, raw }
        : { kind: 'invalid', message: checked.error.message, raw, id },
    };
  }

  return { ok: true, message: checked.message };
}
