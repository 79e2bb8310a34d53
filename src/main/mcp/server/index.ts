export { MCPDispatcher, normalizeToolResult, type DispatcherState, type MCPDispatcherOptions } from './MCPDispatcher';
export { ToolRegistry, type ToolDefinition, type ToolHandler } from './ToolRegistry';
export { ResourceRegistry, type ResourceDefinition, type ResourceReadResult } from './ResourceRegistry';
export { PromptRegistry, type PromptDefinition, type PromptRenderResult } from './PromptRegistry';
export { createBasicServer, type BasicServerOptions } from './basicServer';
export {
  serveStdio,
  serveWebSocket,
  type StdioServeOptions,
  type WebSocketServeOptions,
  type WebSocketServerHandle,
} from './hosting';
