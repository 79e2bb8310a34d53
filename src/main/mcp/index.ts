/**
 * MCP (Model Context Protocol) Module
 *
 * Client side (connections, aggregate indices), server side (dispatcher,
 * registries, hosting) and the protocol and transport layers they share.
 *
 * @module main/mcp
 */

export { MCPClient } from './MCPClient';
export type {
  MCPClientEvents,
  MCPClientOptions,
  MCPConnectOutcome,
  MCPNotificationHandler,
  MCPTransportFactory,
} from './MCPClient';
export {
  MCPServerConnection,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_REQUEST_TIMEOUT,
  MAX_REQUEST_TIMEOUT,
  type MCPConnectionEvents,
  type MCPConnectionOptions,
} from './MCPServerConnection';
export { CorrelationTable, type CallOutcome, type PendingCall } from './CorrelationTable';

export * from './protocol/envelope';
export * from './protocol/errors';
export * from './protocol/methods';
export * from './protocol/descriptors';

export * from './transports';
export * from './server';
