/**
 * Server module exports
 */

export { MCPProtocolHandler, toMcpError } from './MCPProtocolHandler.js';
export { ToolRegistry, type ToolHandler, type ValidationResult } from './ToolRegistry.js';
export { HTTPBridge, redactConfig, type BridgeConfig, type StatusUpdate } from './HTTPBridge.js';
export {
  SYNC_EVENTS_TOOL,
  LIST_EVENTS_TOOL,
  SEARCH_EVENTS_TOOL,
  CLEAR_EVENTS_TOOL,
  REPUBLISH_CALENDAR_TOOL,
  ALL_TOOLS,
  type ToolDefinition,
  type ToolInputSchema
} from './tools/ToolDefinitions.js';
export {
  handleSyncEvents,
  handleListEvents,
  handleSearchEvents,
  handleClearEvents,
  handleRepublishCalendar,
  toEventView,
  toMCPError
} from './tools/ToolHandlers.js';
