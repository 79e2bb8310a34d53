/**
 * mcp-relay public surface
 */

export * from './mcp';
export {
  applyEnvOverrides,
  loadSettings,
  parseSettings,
  validateSettings,
  SettingsValidationError,
  type ValidationError,
  type ValidationResult,
  type ValidationWarning,
} from './config';
export {
  configureLogging,
  createLogger,
  getGlobalLogger,
  RelayLogger,
  type LogEntry,
  type LogFilter,
  type Logger,
  type LoggingOptions,
  type LogLevel,
  type ToolExecutionRecord,
  type ToolMetrics,
} from './logger';
export { serializeError, getErrorMessage, toError } from '../shared/utils/errorHandling';
export type * from '../shared/types/mcp';
export { DEFAULT_MCP_SETTINGS } from '../shared/types/mcp';
