import type { MCPTransportConfig } from '../../../shared/types/mcp';
import { MCPStdioTransport } from './MCPStdioTransport';
import { MCPWebSocketTransport } from './MCPWebSocketTransport';
import type { MCPTransport } from './types';

export type { MCPTransport } from './types';
export { MessageQueue } from './MessageQueue';
export { MCPStreamTransport, type StreamTransportOptions } from './MCPStreamTransport';
export { MCPStdioTransport } from './MCPStdioTransport';
export { MCPWebSocketTransport } from './MCPWebSocketTransport';

export function createTransport(config: MCPTransportConfig): MCPTransport {
  switch (config.type) {
    case 'stdio':
      return new MCPStdioTransport(config);
    case 'websocket':
      return new MCPWebSocketTransport(config);
  }
}
