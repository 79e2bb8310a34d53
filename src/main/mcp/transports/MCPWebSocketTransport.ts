/**
 * MCP WebSocket Transport
 *
 * One JSON-RPC message per text frame. Works as the dialing side (from a
 * config) or wraps an accepted server-side socket.
 */

import WebSocket, { type RawData } from 'ws';
import type { MCPTransportKind, MCPWebSocketConfig } from '../../../shared/types/mcp';
import { decodeEnvelope, encodeEnvelope, type DecodeResult, type MCPMessage } from '../protocol/envelope';
import { MCPTransportError } from '../protocol/errors';
import { createLogger } from '../../logger';
import { MessageQueue } from './MessageQueue';
import type { MCPTransport } from './types';

const logger = createLogger('MCPWebSocketTransport');

const CLOSE_GRACE_MS = 1000;

function frameToBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

export class MCPWebSocketTransport implements MCPTransport {
  readonly type: MCPTransportKind = 'websocket';

  private readonly config: MCPWebSocketConfig;
  private socket: WebSocket | null = null;
  private readonly queue = new MessageQueue<DecodeResult>();

  constructor(config: MCPWebSocketConfig) {
    this.config = config;
  }

  /**
   * Wrap a socket that is already open, e.g. one accepted by a WebSocketServer.
   */
  static fromSocket(socket: WebSocket): MCPWebSocketTransport {
    const transport = new MCPWebSocketTransport({ type: 'websocket', url: socket.url });
    transport.attach(socket);
    return transport;
  }

  get isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  async connect(): Promise<void> {
    if (this.socket) {
      return;
    }
    const config = this.config;
    logger.info('Connecting to MCP server via WebSocket', { url: config.url });

    const socket = new WebSocket(config.url, { headers: config.headers });
    await new Promise<void>((resolve, reject) => {
      const onOpen = (): void => {
        socket.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        socket.off('open', onOpen);
        this.queue.end();
        reject(new MCPTransportError(`Failed to open ${config.url}: ${error.message}`, error));
      };
      socket.once('open', onOpen);
      socket.once('error', onError);
    });

    this.attach(socket);
  }

  private attach(socket: WebSocket): void {
    this.socket = socket;

    socket.on('message', (data: RawData) => {
      this.queue.push(decodeEnvelope(frameToBytes(data)));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      logger.debug('WebSocket closed', { code, reason: reason.toString() });
      this.queue.end();
    });

    socket.on('error', (error: Error) => {
      logger.warn('WebSocket error', { error: error.message });
    });
  }

  send(message: MCPMessage): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new MCPTransportError('Transport not connected'));
    }

    return new Promise<void>((resolve, reject) => {
      socket.send(encodeEnvelope(message), (error) => {
        if (error) {
          reject(new MCPTransportError(`Send failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): AsyncIterable<DecodeResult> {
    return this.queue;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.queue.end();
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(1000, 'Client closing');
      }
    });
    this.queue.end();
  }
}
