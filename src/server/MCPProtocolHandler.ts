/**
 * MCP Protocol Handler - Implements standard MCP server interface
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CallToolResult,
  ErrorCode,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry } from './ToolRegistry.js';
import { MCPError } from '../types/mcp.js';
import { SyncError, errorMessage } from '../utils/errors.js';

// reported as InvalidParams, everything else as InternalError
const CALLER_ERROR_CODES = new Set(['VALIDATION_ERROR', 'PARSE_ERROR']);

export class MCPProtocolHandler {
  private server: Server;
  private toolRegistry: ToolRegistry;

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      { capabilities: { tools: {} } }
    );

    this.toolRegistry = new ToolRegistry();
    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Handle list_tools requests
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.toolRegistry.getTools();
      console.error(`Returning ${tools.length} tools`);
      return {
        tools,
      };
    });

    // Handle call_tool requests
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name } = request.params;
      const args = request.params.arguments ?? {};

      console.error(`Executing tool: ${name}`);

      try {
        if (!this.toolRegistry.hasTool(name)) {
          throw new McpError(
            ErrorCode.MethodNotFound,
            `Tool '${name}' not found`
          );
        }

        const validationResult = this.toolRegistry.validateToolParameters(name, args);
        if (!validationResult.valid) {
          throw new McpError(
            ErrorCode.InvalidParams,
            `Invalid parameters for tool '${name}': ${validationResult.errors.join(', ')}`
          );
        }

        const result = await this.toolRegistry.executeTool(name, args);

        if (result.error) {
          throw toMcpError(result.error);
        }

        const response: CallToolResult = {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result.content ?? null, null, 2),
            },
          ],
        };

        console.error(`Tool ${name} executed successfully`);
        return response;

      } catch (error) {
        if (error instanceof McpError) {
          throw error;
        }

        // Convert internal errors to MCP errors
        if (error instanceof SyncError) {
          throw toMcpError({ code: error.code, message: error.message, details: error.details });
        }
        throw new McpError(ErrorCode.InternalError, errorMessage(error));
      }
    });
  }

  /**
   * Get the underlying MCP server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Get the tool registry for registering tools
   */
  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  /**
   * Connect the server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Close the server connection
   */
  async close(): Promise<void> {
    await this.server.close();
  }
}

export function toMcpError(error: MCPError): McpError {
  const code = CALLER_ERROR_CODES.has(error.code) ? ErrorCode.InvalidParams : ErrorCode.InternalError;
  return new McpError(code, error.message, { code: error.code, ...error.details });
}
