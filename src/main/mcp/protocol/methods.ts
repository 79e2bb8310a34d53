/**
 * Protocol constants and method names
 */

export const JSONRPC_VERSION = '2.0' as const;

/**
 * MCP protocol revision requested during `initialize`
 */
export const MCP_PROTOCOL_VERSION = '2024-11-05';

export const MCP_METHODS = {
  INITIALIZE: 'initialize',
  INITIALIZED: 'initialized',
  PING: 'ping',
  LIST_TOOLS: 'tools/list',
  CALL_TOOL: 'tools/call',
  LIST_RESOURCES: 'resources/list',
  LIST_RESOURCE_TEMPLATES: 'resources/templates/list',
  READ_RESOURCE: 'resources/read',
  LIST_PROMPTS: 'prompts/list',
  GET_PROMPT: 'prompts/get',
} as const;

export const MCP_NOTIFICATIONS = {
  INITIALIZED: 'notifications/initialized',
  PROGRESS: 'notifications/progress',
  LEGACY_PROGRESS: 'progress',
  TOOLS_LIST_CHANGED: 'notifications/tools/list_changed',
  RESOURCES_LIST_CHANGED: 'notifications/resources/list_changed',
  PROMPTS_LIST_CHANGED: 'notifications/prompts/list_changed',
} as const;

/**
 * Request methods the dispatcher answers itself. Closed set: anything else
 * is MethodNotFound.
 */
export type BuiltinRequestMethod =
  | typeof MCP_METHODS.INITIALIZE
  | typeof MCP_METHODS.PING
  | typeof MCP_METHODS.LIST_TOOLS
  | typeof MCP_METHODS.CALL_TOOL
  | typeof MCP_METHODS.LIST_RESOURCES
  | typeof MCP_METHODS.LIST_RESOURCE_TEMPLATES
  | typeof MCP_METHODS.READ_RESOURCE
  | typeof MCP_METHODS.LIST_PROMPTS
  | typeof MCP_METHODS.GET_PROMPT;

const BUILTIN_REQUEST_METHODS: ReadonlySet<string> = new Set<BuiltinRequestMethod>([
  MCP_METHODS.INITIALIZE,
  MCP_METHODS.PING,
  MCP_METHODS.LIST_TOOLS,
  MCP_METHODS.CALL_TOOL,
  MCP_METHODS.LIST_RESOURCES,
  MCP_METHODS.LIST_RESOURCE_TEMPLATES,
  MCP_METHODS.READ_RESOURCE,
  MCP_METHODS.LIST_PROMPTS,
  MCP_METHODS.GET_PROMPT,
]);

export function isBuiltinRequestMethod(method: string): method is BuiltinRequestMethod {
  return BUILTIN_REQUEST_METHODS.has(method);
}

/**
 * Both spellings complete the handshake.
 */
export function isInitializedNotification(method: string): boolean {
  return method === MCP_METHODS.INITIALIZED || method === MCP_NOTIFICATIONS.INITIALIZED;
}
