/**
 * MCP stdio Transport Implementation
 *
 * The server runs as a subprocess and exchanges newline-delimited JSON-RPC
 * messages over its stdin/stdout. stderr is the server's log, not protocol.
 *
 * @see https://modelcontextprotocol.io/specification/2024-11-05/basic/transports#stdio
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { MCPStdioConfig, MCPTransportKind } from '../../../shared/types/mcp';
import { MCPTransportError } from '../protocol/errors';
import { MCPStreamTransport } from './MCPStreamTransport';

const GRACEFUL_EXIT_MS = 1000;
const TERMINATE_EXIT_MS = 1000;

export class MCPStdioTransport extends MCPStreamTransport {
  override readonly type: MCPTransportKind = 'stdio';

  private readonly config: MCPStdioConfig;
  private process: ChildProcess | null = null;
  private exited = false;

  constructor(config: MCPStdioConfig) {
    super(undefined, undefined, {}, 'MCPStdioTransport');
    this.config = config;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  override async connect(): Promise<void> {
    if (this.process) {
      return;
    }

    this.logger.info('Starting MCP server process', {
      command: this.config.command,
      args: this.config.args,
    });

    const child = spawn(this.config.command, this.config.args ?? [], {
      cwd: this.config.cwd,
      env: { ...process.env, ...this.config.env },
      stdio: ['pipe', 'pipe', 'pipe'],
      shell: process.platform === 'win32', // Use shell on Windows for command resolution
    });
    this.process = child;

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        this.process = null;
        this.markClosed();
        reject(new MCPTransportError(`Failed to start "${this.config.command}": ${error.message}`, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    child.on('error', (error) => {
      this.logger.error('MCP server process error', { error: error.message });
      this.markUnwritable();
    });

    child.on('exit', (code, signal) => {
      this.exited = true;
      this.logger.info('MCP server process exited', { code, signal });
      // stdout may still hold buffered lines; the receive sequence ends when it closes
      this.markUnwritable();
    });

    child.stderr?.on('data', (data: Buffer) => {
      const message = data.toString().trim();
      if (message) {
        this.logger.debug('MCP server stderr', { message });
      }
    });

    const { stdout, stdin } = child;
    if (!stdout || !stdin) {
      throw new MCPTransportError('Server process has no stdio pipes');
    }
    this.attach(stdout, stdin);
  }

  /**
   * Ends stdin, then escalates to SIGTERM and finally SIGKILL, giving the
   * process a bounded period to exit after each step.
   */
  override async close(): Promise<void> {
    const child = this.process;
    this.process = null;

    await super.close();

    if (!child || this.exited) {
      return;
    }
    if (await this.waitForExit(child, GRACEFUL_EXIT_MS)) {
      return;
    }

    this.logger.warn('MCP server still running after stdin closed; sending SIGTERM', { pid: child.pid });
    child.kill('SIGTERM');
    if (await this.waitForExit(child, TERMINATE_EXIT_MS)) {
      return;
    }

    this.logger.warn('MCP server ignored SIGTERM; sending SIGKILL', { pid: child.pid });
    child.kill('SIGKILL');
    await this.waitForExit(child, TERMINATE_EXIT_MS);
  }

  private waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
    if (this.exited) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      child.once('exit', onExit);
    });
  }
}
