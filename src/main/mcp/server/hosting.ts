/**
 * Hosting helpers: put a dispatcher on a process's own stdio, or accept
 * clients on a WebSocket port.
 */

import type { Readable, Writable } from 'node:stream';
import { WebSocketServer } from 'ws';
import { getErrorMessage } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';
import { MCPStreamTransport } from '../transports/MCPStreamTransport';
import { MCPWebSocketTransport } from '../transports/MCPWebSocketTransport';
import type { MCPDispatcher } from './MCPDispatcher';

const logger = createLogger('MCPHosting');

export interface StdioServeOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Serve one client over stdin/stdout until stdin closes. Standard output
 * carries protocol frames only; log to stderr or a file.
 */
export async function serveStdio(dispatcher: MCPDispatcher, options: StdioServeOptions = {}): Promise<void> {
  const transport = new MCPStreamTransport(options.input ?? process.stdin, options.output ?? process.stdout, {
    endOutputOnClose: options.output !== undefined,
  });
  await transport.connect();
  logger.info('Serving MCP over stdio');
  try {
    await dispatcher.serve(transport);
  } finally {
    await transport.close();
  }
}

export interface WebSocketServeOptions {
  /** 0 picks a free port */
  port: number;
  host?: string;
}

export interface WebSocketServerHandle {
  readonly port: number;
  readonly clientCount: number;
  close(): Promise<void>;
}

/**
 * Accept clients on a WebSocket port. Every socket gets its own dispatcher,
 * so handshake state is per client.
 */
export async function serveWebSocket(
  createDispatcher: () => MCPDispatcher,
  options: WebSocketServeOptions
): Promise<WebSocketServerHandle> {
  const server = new WebSocketServer({ port: options.port, host: options.host });

  await new Promise<void>((resolve, reject) => {
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    server.once('listening', onListening);
    server.once('error', onError);
  });

  server.on('error', (error: Error) => {
    logger.error('WebSocket server error', { error: error.message });
  });

  const sessions = new Set<Promise<void>>();

  server.on('connection', (socket) => {
    const transport = MCPWebSocketTransport.fromSocket(socket);
    logger.debug('MCP client connected', { clients: server.clients.size });
    const session: Promise<void> = createDispatcher()
      .serve(transport)
      .catch((error: unknown) => logger.error('MCP session failed', { error: getErrorMessage(error) }))
      .finally(() => sessions.delete(session));
    sessions.add(session);
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;
  logger.info('Serving MCP over WebSocket', { port, host: options.host });

  let closing: Promise<void> | null = null;
  const shutdown = async (): Promise<void> => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await Promise.allSettled(sessions);
    logger.info('WebSocket server closed', { port });
  };

  return {
    port,
    get clientCount(): number {
      return server.clients.size;
    },
    close(): Promise<void> {
      if (!closing) {
        closing = shutdown();
      }
      return closing;
    },
  };
}
