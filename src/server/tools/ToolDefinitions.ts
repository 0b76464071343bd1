/**
 * MCP Tool Definitions - Defines the schema and metadata for all MCP tools
 */

/**
 * Input schemas double as ajv schemas in the ToolRegistry, so they are plain
 * object types rather than the SDK's passthrough Tool type
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export const SYNC_EVENTS_TOOL: ToolDefinition = {
  name: 'sync_events',
  description: 'Reconcile the stored events against a CSV schedule and republish the calendar',
  inputSchema: {
    type: 'object',
    properties: {
      csv: {
        type: 'string',
        minLength: 1,
        description: 'CSV text with the columns Subject, Start Date, Start Time, End Date, End Time, Location, Description'
      }
    },
    required: ['csv'],
    additionalProperties: false
  }
};

export const LIST_EVENTS_TOOL: ToolDefinition = {
  name: 'list_events',
  description: 'List every stored event ordered by start',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

export const SEARCH_EVENTS_TOOL: ToolDefinition = {
  name: 'search_events',
  description: 'Find stored events whose subject or description contains the query text',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Text to look for in event subjects and descriptions'
      }
    },
    required: ['query'],
    additionalProperties: false
  }
};

export const CLEAR_EVENTS_TOOL: ToolDefinition = {
  name: 'clear_events',
  description: 'Remove every stored event. The published calendar is left as it is until the next publication',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

export const REPUBLISH_CALENDAR_TOOL: ToolDefinition = {
  name: 'republish_calendar',
  description: 'Regenerate the calendar documents from the stored events and publish them',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

export const ALL_TOOLS: ToolDefinition[] = [
  SYNC_EVENTS_TOOL,
  LIST_EVENTS_TOOL,
  SEARCH_EVENTS_TOOL,
  CLEAR_EVENTS_TOOL,
  REPUBLISH_CALENDAR_TOOL
];
