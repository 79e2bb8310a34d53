/**
 * Settings Loading and Validation
 *
 * Reads relay settings from a JSON file, checks every field, merges the
 * defaults and applies environment overrides. Validation collects all
 * problems before failing so a bad file is reported in one pass.
 */

import { promises as fs } from 'node:fs';
import { createLogger, isLogLevel } from './logger';
import type {
  MCPClientInfo,
  MCPServerConfig,
  MCPServerEnv,
  MCPSettings,
  MCPStdioConfig,
  MCPTransportConfig,
  MCPWebSocketConfig,
} from '../shared/types/mcp';
import { DEFAULT_MCP_SETTINGS } from '../shared/types/mcp';
import { getErrorMessage } from '../shared/utils/errorHandling';
import { isRecord } from './mcp/protocol/envelope';

const logger = createLogger('Config');

const MIN_TIMEOUT = 1;
const MAX_TIMEOUT = 10 * 60 * 1000;
const SHORT_TIMEOUT_WARNING = 1000;

const KNOWN_ROOT_FIELDS = new Set(['clientInfo', 'defaultTimeout', 'connectTimeout', 'servers', 'logging']);
const KNOWN_SERVER_FIELDS = new Set(['transport', 'enabled', 'timeout', 'description']);

// =============================================================================
// Validation Result Types
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

export class SettingsValidationError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[], source?: string) {
    const where = source ? ` in ${source}` : '';
    super(`Invalid settings${where}: ${errors.map((e) => `${e.field || '(root)'}: ${e.message}`).join('; ')}`);
    this.name = 'SettingsValidationError';
    this.errors = errors;
  }
}

interface Problems {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// =============================================================================
// Validation Helpers
// =============================================================================

function readTimeout(value: unknown, field: string, problems: Problems): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    problems.errors.push({ field, message: `${field} must be a valid number`, value });
    return undefined;
  }
  if (value < MIN_TIMEOUT || value > MAX_TIMEOUT) {
    problems.errors.push({ field, message: `${field} must be between ${MIN_TIMEOUT} and ${MAX_TIMEOUT}`, value });
    return undefined;
  }
  if (value < SHORT_TIMEOUT_WARNING) {
    problems.warnings.push({
      field,
      message: `${field} is under one second`,
      suggestion: 'Slow servers will time out; consider at least 1000ms',
    });
  }
  return value;
}

function readString(value: unknown, field: string, problems: Problems, options: { nonEmpty?: boolean } = {}): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || (options.nonEmpty && value.trim().length === 0)) {
    problems.errors.push({
      field,
      message: options.nonEmpty ? `${field} must be a non-empty string` : `${field} must be a string`,
      value,
    });
    return undefined;
  }
  return value;
}

function readBoolean(value: unknown, field: string, problems: Problems): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    problems.errors.push({ field, message: `${field} must be a boolean`, value });
    return undefined;
  }
  return value;
}

function readStringArray(value: unknown, field: string, problems: Problems): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    problems.errors.push({ field, message: `${field} must be an array`, value });
    return undefined;
  }
  const items: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item === 'string') {
      items.push(item);
    } else {
      problems.errors.push({ field: `${field}[${i}]`, message: `${field} items must be strings`, value: item });
    }
  });
  return items;
}

function readStringRecord(value: unknown, field: string, problems: Problems): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    problems.errors.push({ field, message: `${field} must be an object`, value });
    return undefined;
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      record[key] = entry;
    } else {
      problems.errors.push({ field: `${field}.${key}`, message: `${field} values must be strings`, value: entry });
    }
  }
  return record;
}

// =============================================================================
// Section readers
// =============================================================================

function readClientInfo(value: unknown, problems: Problems): MCPClientInfo {
  if (value === undefined) return { ...DEFAULT_MCP_SETTINGS.clientInfo };
  if (!isRecord(value)) {
    problems.errors.push({ field: 'clientInfo', message: 'clientInfo must be an object', value });
    return { ...DEFAULT_MCP_SETTINGS.clientInfo };
  }
  return {
    name: readString(value.name, 'clientInfo.name', problems, { nonEmpty: true }) ?? DEFAULT_MCP_SETTINGS.clientInfo.name,
    version: readString(value.version, 'clientInfo.version', problems) ?? DEFAULT_MCP_SETTINGS.clientInfo.version,
  };
}

function readTransport(value: unknown, field: string, problems: Problems): MCPTransportConfig | undefined {
  if (!isRecord(value)) {
    problems.errors.push({ field, message: `${field} must be an object`, value });
    return undefined;
  }

  switch (value.type) {
    case 'stdio': {
      const command = readString(value.command, `${field}.command`, problems, { nonEmpty: true });
      if (command === undefined) {
        if (value.command === undefined) {
          problems.errors.push({ field: `${field}.command`, message: 'stdio transport requires a command' });
        }
        return undefined;
      }
      const transport: MCPStdioConfig = { type: 'stdio', command };
      const args = readStringArray(value.args, `${field}.args`, problems);
      const cwd = readString(value.cwd, `${field}.cwd`, problems);
      const env: MCPServerEnv | undefined = readStringRecord(value.env, `${field}.env`, problems);
      if (args !== undefined) transport.args = args;
      if (cwd !== undefined) transport.cwd = cwd;
      if (env !== undefined) transport.env = env;
      return transport;
    }
    case 'websocket': {
      const url = readString(value.url, `${field}.url`, problems, { nonEmpty: true });
      if (url === undefined) {
        if (value.url === undefined) {
          problems.errors.push({ field: `${field}.url`, message: 'websocket transport requires a url' });
        }
        return undefined;
      }
      if (!isWebSocketUrl(url)) {
        problems.errors.push({ field: `${field}.url`, message: 'url must be a ws:// or wss:// URL', value: url });
        return undefined;
      }
      const transport: MCPWebSocketConfig = { type: 'websocket', url };
      const headers = readStringRecord(value.headers, `${field}.headers`, problems);
      if (headers !== undefined) transport.headers = headers;
      if (url.startsWith('ws://') && headers?.Authorization !== undefined) {
        problems.warnings.push({
          field: `${field}.url`,
          message: 'Credentials are sent over an unencrypted connection',
          suggestion: 'Use wss:// for servers that need an Authorization header',
        });
      }
      return transport;
    }
    default:
      problems.errors.push({ field: `${field}.type`, message: `${field}.type must be one of: stdio, websocket`, value: value.type });
      return undefined;
  }
}

function isWebSocketUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'ws:' || url.protocol === 'wss:';
  } catch {
    return false;
  }
}

function readServer(value: unknown, field: string, problems: Problems): MCPServerConfig | undefined {
  if (!isRecord(value)) {
    problems.errors.push({ field, message: `${field} must be an object`, value });
    return undefined;
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_SERVER_FIELDS.has(key)) {
      problems.warnings.push({ field: `${field}.${key}`, message: `Unknown field ${key} is ignored` });
    }
  }

  const transport = readTransport(value.transport, `${field}.transport`, problems);
  const enabled = readBoolean(value.enabled, `${field}.enabled`, problems);
  const timeout = readTimeout(value.timeout, `${field}.timeout`, problems);
  const description = readString(value.description, `${field}.description`, problems);
  if (!transport) {
    return undefined;
  }

  const server: MCPServerConfig = { transport };
  if (enabled !== undefined) server.enabled = enabled;
  if (timeout !== undefined) server.timeout = timeout;
  if (description !== undefined) server.description = description;
  return server;
}

function readServers(value: unknown, problems: Problems): Record<string, MCPServerConfig> {
  const servers: Record<string, MCPServerConfig> = {};
  if (value === undefined) return servers;
  if (!isRecord(value)) {
    problems.errors.push({ field: 'servers', message: 'servers must be an object keyed by server name', value });
    return servers;
  }
  for (const [name, entry] of Object.entries(value)) {
    if (name.trim().length === 0) {
      problems.errors.push({ field: 'servers', message: 'Server names must be non-empty' });
      continue;
    }
    const server = readServer(entry, `servers.${name}`, problems);
    if (server) {
      servers[name] = server;
    }
  }
  return servers;
}

function readLogging(value: unknown, problems: Problems): MCPSettings['logging'] {
  const logging: MCPSettings['logging'] = { ...DEFAULT_MCP_SETTINGS.logging };
  if (value === undefined) return logging;
  if (!isRecord(value)) {
    problems.errors.push({ field: 'logging', message: 'logging must be an object', value });
    return logging;
  }
  if (value.level !== undefined) {
    if (isLogLevel(value.level)) {
      logging.level = value.level;
    } else {
      problems.errors.push({ field: 'logging.level', message: 'logging.level must be one of: debug, info, warn, error', value: value.level });
    }
  }
  const dir = readString(value.dir, 'logging.dir', problems, { nonEmpty: true });
  const stderr = readBoolean(value.stderr, 'logging.stderr', problems);
  if (dir !== undefined) logging.dir = dir;
  if (stderr !== undefined) logging.stderr = stderr;
  return logging;
}

function checkSettings(value: unknown): { settings: MCPSettings } & ValidationResult {
  const problems: Problems = { errors: [], warnings: [] };
  const input = value ?? {};

  if (!isRecord(input)) {
    problems.errors.push({ field: '', message: 'Settings must be a JSON object', value });
    return { settings: structuredClone(DEFAULT_MCP_SETTINGS), valid: false, ...problems };
  }

  for (const key of Object.keys(input)) {
    if (!KNOWN_ROOT_FIELDS.has(key)) {
      problems.warnings.push({ field: key, message: `Unknown field ${key} is ignored` });
    }
  }

  const settings: MCPSettings = {
    clientInfo: readClientInfo(input.clientInfo, problems),
    defaultTimeout: readTimeout(input.defaultTimeout, 'defaultTimeout', problems) ?? DEFAULT_MCP_SETTINGS.defaultTimeout,
    connectTimeout: readTimeout(input.connectTimeout, 'connectTimeout', problems) ?? DEFAULT_MCP_SETTINGS.connectTimeout,
    servers: readServers(input.servers, problems),
    logging: readLogging(input.logging, problems),
  };

  return { settings, valid: problems.errors.length === 0, ...problems };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check a settings value without building it.
 */
export function validateSettings(value: unknown): ValidationResult {
  const { valid, errors, warnings } = checkSettings(value);
  return { valid, errors, warnings };
}

/**
 * Environment overrides: MCP_RELAY_TIMEOUT (ms) and MCP_RELAY_LOG_LEVEL.
 * Unusable values are ignored with a warning.
 */
export function applyEnvOverrides(settings: MCPSettings, env: NodeJS.ProcessEnv = process.env): MCPSettings {
  const result: MCPSettings = structuredClone(settings);

  const timeout = env.MCP_RELAY_TIMEOUT;
  if (timeout !== undefined && timeout !== '') {
    const parsed = Number(timeout);
    if (Number.isInteger(parsed) && parsed >= MIN_TIMEOUT && parsed <= MAX_TIMEOUT) {
      result.defaultTimeout = parsed;
    } else {
      logger.warn('Ignoring invalid MCP_RELAY_TIMEOUT', { value: timeout });
    }
  }

  const level = env.MCP_RELAY_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) {
      result.logging.level = level;
    } else {
      logger.warn('Ignoring invalid MCP_RELAY_LOG_LEVEL', { value: level });
    }
  }

  return result;
}

/**
 * Validate, merge defaults and apply environment overrides. Throws
 * SettingsValidationError listing every problem found.
 */
export function parseSettings(value: unknown, env: NodeJS.ProcessEnv = process.env, source?: string): MCPSettings {
  const { settings, valid, errors, warnings } = checkSettings(value);
  if (!valid) {
    throw new SettingsValidationError(errors, source);
  }
  for (const warning of warnings) {
    logger.warn('Settings warning', { field: warning.field, message: warning.message, suggestion: warning.suggestion });
  }
  return applyEnvOverrides(settings, env);
}

/**
 * Load settings from a JSON file. A missing file yields the defaults.
 */
export async function loadSettings(path: string, env: NodeJS.ProcessEnv = process.env): Promise<MCPSettings> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      logger.info('No settings file; using defaults', { path });
      return applyEnvOverrides(DEFAULT_MCP_SETTINGS, env);
    }
    throw new Error(`Failed to read settings from ${path}: ${getErrorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SettingsValidationError([{ field: '', message: `Invalid JSON: ${getErrorMessage(error)}` }], path);
  }

  const settings = parseSettings(raw, env, path);
  logger.info('Settings loaded', { path, servers: Object.keys(settings.servers).length });
  return settings;
}
