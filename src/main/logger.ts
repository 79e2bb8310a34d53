import { promises as fs } from 'node:fs';
import path from 'node:path';
import { serializeError } from '../shared/utils/errorHandling';
import type { MCPLogLevel } from '../shared/types/mcp';

export type LogLevel = MCPLogLevel;

export { serializeError };

/** Detailed tool execution record */
export interface ToolExecutionRecord {
  id: string;
  timestamp: number;
  toolName: string;
  args: Record<string, unknown>;
  result: string;
  success: boolean;
  duration: number;
  clientName?: string;
}

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface ToolMetrics {
  count: number;
  totalDuration: number;
  errors: number;
  avgDuration: number;
}

export interface LogFilter {
  level?: LogLevel;
  scope?: string;
  startTime?: number;
  endTime?: number;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  startTimer(label: string): () => number;
  trackToolInvocation(toolName: string, duration: number, success: boolean, details?: { args?: Record<string, unknown>; result?: string; clientName?: string }): void;
  getRecentLogs(count?: number, filter?: LogFilter): LogEntry[];
  getToolExecutions(filter?: { toolName?: string; success?: boolean; limit?: number }): ToolExecutionRecord[];
  getToolMetrics(): Map<string, ToolMetrics>;
  searchLogs(query: string): LogEntry[];
  exportLogs(filter?: { startTime?: number; endTime?: number; levels?: LogLevel[] }): string;
}

export interface LoggingOptions {
  /** Entries below this level are dropped */
  minLevel?: LogLevel;
  /** Directory for JSON-lines log files; null disables the file sink */
  logDir?: string | null;
  /** Mirror entries to standard error (never standard output) */
  stderr?: boolean;
  maxBufferSize?: number;
}

class LogBuffer {
  private entries: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 5000) {
    this.maxSize = maxSize;
  }

  push(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxSize) {
      const removeCount = Math.floor(this.maxSize * 0.2);
      this.entries = this.entries.slice(removeCount);
    }
  }

  resize(maxSize: number): void {
    this.maxSize = maxSize;
    if (this.entries.length > maxSize) {
      this.entries = this.entries.slice(-maxSize);
    }
  }

  getAll(): LogEntry[] {
    return [...this.entries];
  }

  getRecent(count: number): LogEntry[] {
    return this.entries.slice(-count);
  }

  search(query: string): LogEntry[] {
    const lowerQuery = query.toLowerCase();
    return this.entries.filter(
      (entry) =>
        entry.message.toLowerCase().includes(lowerQuery) ||
        entry.scope.toLowerCase().includes(lowerQuery) ||
        JSON.stringify(entry.meta ?? {}).toLowerCase().includes(lowerQuery)
    );
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * State shared by a root logger and every child created from it, so that
 * configureLogging() reaches loggers created at module load.
 */
interface SharedLogState {
  buffer: LogBuffer;
  minLevel: LogLevel;
  logFilePath: string | null;
  stderr: boolean;
  fileSinkFailed: boolean;
  writeQueue: LogEntry[];
  isWriting: boolean;
  toolMetrics: Map<string, ToolMetrics>;
  toolExecutions: ToolExecutionRecord[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_TOOL_EXECUTIONS = 1000;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function resolveLogFilePath(logDir: string | null | undefined): string | null {
  if (!logDir) return null;
  const dateStr = new Date().toISOString().split('T')[0];
  return path.join(logDir, `mcp-relay-${dateStr}.log`);
}

export class RelayLogger implements Logger {
  private scope: string;
  private state: SharedLogState;

  constructor(scope: string, options?: LoggingOptions, state?: SharedLogState) {
    this.scope = scope;
    this.state = state ?? {
      buffer: new LogBuffer(options?.maxBufferSize ?? 5000),
      minLevel: options?.minLevel ?? 'info',
      logFilePath: resolveLogFilePath(options?.logDir),
      stderr: options?.stderr ?? false,
      fileSinkFailed: false,
      writeQueue: [],
      isWriting: false,
      toolMetrics: new Map(),
      toolExecutions: [],
    };
  }

  configure(options: LoggingOptions): void {
    if (options.minLevel) {
      this.state.minLevel = options.minLevel;
    }
    if (options.logDir !== undefined) {
      this.state.logFilePath = resolveLogFilePath(options.logDir);
      this.state.fileSinkFailed = false;
    }
    if (options.stderr !== undefined) {
      this.state.stderr = options.stderr;
    }
    if (options.maxBufferSize !== undefined) {
      this.state.buffer.resize(options.maxBufferSize);
    }
  }

  private generateId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.state.minLevel];
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: Date.now(),
      level,
      scope: this.scope,
      message,
      meta,
    };

    this.state.buffer.push(entry);

    if (this.state.stderr) {
      process.stderr.write(`${new Date(entry.timestamp).toISOString()} ${level.toUpperCase()} [${entry.scope}] ${message}${meta ? ' ' + JSON.stringify(meta) : ''}\n`);
    }

    if (this.state.logFilePath && !this.state.fileSinkFailed) {
      this.state.writeQueue.push(entry);
      void this.flushQueue();
    }
  }

  private async flushQueue(): Promise<void> {
    const state = this.state;
    if (state.isWriting) return;
    state.isWriting = true;

    while (state.writeQueue.length > 0 && state.logFilePath) {
      const batch = state.writeQueue.splice(0, 100);
      const lines = batch.map((e) => JSON.stringify(e)).join('\n') + '\n';

      try {
        await fs.mkdir(path.dirname(state.logFilePath), { recursive: true });
        await fs.appendFile(state.logFilePath, lines, 'utf-8');
      } catch (error) {
        state.fileSinkFailed = true;
        state.writeQueue = [];
        state.buffer.push({
          id: this.generateId(),
          timestamp: Date.now(),
          level: 'warn',
          scope: this.scope,
          message: 'File logging disabled after write failure',
          meta: { file: state.logFilePath, error: serializeError(error) },
        });
      }
    }

    state.isWriting = false;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  startTimer(label: string): () => number {
    const start = performance.now();
    return () => {
      const duration = Math.round(performance.now() - start);
      this.debug(`Timer [${label}] completed`, { duration, label });
      return duration;
    };
  }

  trackToolInvocation(
    toolName: string,
    duration: number,
    success: boolean,
    details?: { args?: Record<string, unknown>; result?: string; clientName?: string }
  ): void {
    const existing = this.state.toolMetrics.get(toolName) ?? { count: 0, totalDuration: 0, errors: 0, avgDuration: 0 };
    existing.count += 1;
    existing.totalDuration += duration;
    if (!success) existing.errors += 1;
    existing.avgDuration = Math.round(existing.totalDuration / existing.count);
    this.state.toolMetrics.set(toolName, existing);

    this.state.toolExecutions.push({
      id: this.generateId(),
      timestamp: Date.now(),
      toolName,
      args: details?.args ?? {},
      result: details?.result?.slice(0, 2000) ?? '', // Limit result size
      success,
      duration,
      clientName: details?.clientName,
    });

    if (this.state.toolExecutions.length > MAX_TOOL_EXECUTIONS) {
      this.state.toolExecutions = this.state.toolExecutions.slice(-MAX_TOOL_EXECUTIONS);
    }

    this.info('Tool invocation', {
      tool: toolName,
      duration,
      success,
      avgDuration: existing.avgDuration,
      totalCalls: existing.count,
      lifetimeErrorRate: ((existing.errors / existing.count) * 100).toFixed(1) + '%',
    });
  }

  getRecentLogs(count = 100, filter?: LogFilter): LogEntry[] {
    let logs = this.state.buffer.getAll();

    if (filter?.level) {
      const level = filter.level;
      logs = logs.filter((entry) => entry.level === level);
    }
    if (filter?.scope) {
      const scope = filter.scope;
      logs = logs.filter((entry) => entry.scope.includes(scope));
    }
    if (filter?.startTime !== undefined) {
      const startTime = filter.startTime;
      logs = logs.filter((entry) => entry.timestamp >= startTime);
    }
    if (filter?.endTime !== undefined) {
      const endTime = filter.endTime;
      logs = logs.filter((entry) => entry.timestamp <= endTime);
    }

    return logs.slice(-count);
  }

  getToolExecutions(filter?: { toolName?: string; success?: boolean; limit?: number }): ToolExecutionRecord[] {
    let records = [...this.state.toolExecutions];

    if (filter?.toolName) {
      records = records.filter(r => r.toolName === filter.toolName);
    }
    if (filter?.success !== undefined) {
      records = records.filter(r => r.success === filter.success);
    }

    const limit = filter?.limit ?? 100;
    return records.slice(-limit);
  }

  getToolMetrics(): Map<string, ToolMetrics> {
    return new Map(
      Array.from(this.state.toolMetrics, ([name, metrics]) => [name, { ...metrics }])
    );
  }

  searchLogs(query: string): LogEntry[] {
    return this.state.buffer.search(query);
  }

  exportLogs(filter?: { startTime?: number; endTime?: number; levels?: LogLevel[] }): string {
    let logs = this.state.buffer.getAll();

    if (filter?.startTime !== undefined) {
      const startTime = filter.startTime;
      logs = logs.filter(l => l.timestamp >= startTime);
    }
    if (filter?.endTime !== undefined) {
      const endTime = filter.endTime;
      logs = logs.filter(l => l.timestamp <= endTime);
    }
    if (filter?.levels && filter.levels.length > 0) {
      const levels = filter.levels;
      logs = logs.filter(l => levels.includes(l.level));
    }

    return JSON.stringify({
      exportedAt: new Date().toISOString(),
      summary: {
        totalLogs: logs.length,
        totalToolExecutions: this.state.toolExecutions.length,
        byLevel: {
          debug: logs.filter(l => l.level === 'debug').length,
          info: logs.filter(l => l.level === 'info').length,
          warn: logs.filter(l => l.level === 'warn').length,
          error: logs.filter(l => l.level === 'error').length,
        },
      },
      logs,
      toolExecutions: this.state.toolExecutions,
      toolMetrics: Object.fromEntries(this.state.toolMetrics),
    }, null, 2);
  }

  /**
   * Drop buffered entries and tool history (tests, long-running hosts)
   */
  reset(): void {
    this.state.buffer.clear();
    this.state.toolMetrics.clear();
    this.state.toolExecutions = [];
  }

  createChildLogger(childScope: string): RelayLogger {
    return new RelayLogger(`${this.scope}:${childScope}`, undefined, this.state);
  }
}

let globalLogger: RelayLogger | null = null;

function optionsFromEnv(): LoggingOptions {
  const level = process.env.MCP_RELAY_LOG_LEVEL;
  return {
    minLevel: isLogLevel(level) ? level : 'info',
    logDir: process.env.MCP_RELAY_LOG_DIR || null,
    stderr: process.env.MCP_RELAY_LOG_STDERR === '1' || process.env.MCP_RELAY_LOG_STDERR === 'true',
  };
}

export function getGlobalLogger(): RelayLogger {
  if (!globalLogger) {
    globalLogger = new RelayLogger('Relay', optionsFromEnv());
  }
  return globalLogger;
}

export function createLogger(scope: string): RelayLogger {
  return getGlobalLogger().createChildLogger(scope);
}

export function configureLogging(options: LoggingOptions): void {
  getGlobalLogger().configure(options);
}
