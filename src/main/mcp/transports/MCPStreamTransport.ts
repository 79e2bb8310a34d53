/**
 * Newline-delimited JSON over a readable/writable pair.
 *
 * Used directly for a host's own stdin/stdout and for in-process pipes, and
 * as the base of the subprocess transport.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { MCPTransportKind } from '../../../shared/types/mcp';
import { decodeEnvelope, encodeEnvelope, type DecodeResult, type MCPMessage } from '../protocol/envelope';
import { MCPTransportError } from '../protocol/errors';
import { createLogger, type RelayLogger } from '../../logger';
import { MessageQueue } from './MessageQueue';
import type { MCPTransport } from './types';

export interface StreamTransportOptions {
  /** End the writable side on close(). Off for process.stdout. */
  endOutputOnClose?: boolean;
}

export class MCPStreamTransport implements MCPTransport {
  readonly type: MCPTransportKind = 'stream';

  protected readonly logger: RelayLogger;
  protected input: Readable | null;
  protected output: Writable | null;
  protected readonly queue = new MessageQueue<DecodeResult>();
  private readline: Interface | null = null;
  private writable = false;
  private readonly endOutputOnClose: boolean;

  constructor(input?: Readable, output?: Writable, options: StreamTransportOptions = {}, scope = 'MCPStreamTransport') {
    this.input = input ?? null;
    this.output = output ?? null;
    this.endOutputOnClose = options.endOutputOnClose ?? true;
    this.logger = createLogger(scope);
  }

  get isConnected(): boolean {
    return this.writable && !this.queue.isEnded;
  }

  async connect(): Promise<void> {
    if (this.readline) {
      return;
    }
    if (!this.input || !this.output) {
      throw new MCPTransportError('No streams to attach');
    }
    this.attach(this.input, this.output);
  }

  /**
   * Start framing on the given streams. Subclasses call this once their
   * streams exist.
   */
  protected attach(input: Readable, output: Writable): void {
    this.input = input;
    this.output = output;
    this.writable = true;

    this.readline = createInterface({ input, crlfDelay: Infinity });
    this.readline.on('line', (line) => {
      if (!line.trim()) {
        return;
      }
      this.queue.push(decodeEnvelope(line));
    });
    this.readline.on('close', () => {
      this.logger.debug('Input stream closed');
      this.markClosed();
    });

    output.on('error', (error: Error) => {
      this.logger.warn('Output stream error', { error: error.message });
      this.writable = false;
    });
  }

  send(message: MCPMessage): Promise<void> {
    const output = this.output;
    if (!this.writable || !output || output.writableEnded || output.destroyed) {
      return Promise.reject(new MCPTransportError('Transport not connected'));
    }

    const line = encodeEnvelope(message) + '\n';
    return new Promise<void>((resolve, reject) => {
      output.write(line, (error) => {
        if (error) {
          reject(new MCPTransportError(`Write failed: ${error.message}`, error));
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
    this.writable = false;
    if (this.readline) {
      this.readline.close();
      this.readline = null;
    }
    if (this.endOutputOnClose && this.output && !this.output.writableEnded) {
      this.output.end();
    }
    this.queue.end();
  }

  /**
   * Peer went away: no more writes, and the receive sequence finishes after
   * whatever was already read.
   */
  protected markClosed(): void {
    this.writable = false;
    this.queue.end();
  }

  protected markUnwritable(): void {
    this.writable = false;
  }
}
