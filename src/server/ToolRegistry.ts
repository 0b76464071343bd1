/**
 * Tool Registry - Manages available MCP tools and their execution
 */

import Ajv, { type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { SyncService } from '../services/SyncService.js';
import { MCPResponse } from '../types/mcp.js';
import { ToolDefinition } from './tools/ToolDefinitions.js';

export type ToolHandler<P> = (params: P, syncService: SyncService) => Promise<MCPResponse>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

interface RegisteredTool {
  definition: ToolDefinition;
  validate: ValidateFunction;
  execute(params: unknown, syncService: SyncService): Promise<MCPResponse>;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private syncService: SyncService | null = null;
  private ajv: InstanceType<typeof Ajv.default>;

  constructor() {
    this.ajv = new Ajv.default({ allErrors: true });
    addFormats.default(this.ajv);
  }

  /**
   * Set the service passed to all tool handlers
   */
  setDependencies(syncService: SyncService): void {
    this.syncService = syncService;
  }

  /**
   * Register a new tool with its handler; the handler only ever sees
   * parameters that passed the tool's input schema
   */
  registerTool<P>(tool: ToolDefinition, handler: ToolHandler<P>): void {
    const validate = this.ajv.compile<P>(tool.inputSchema);

    this.tools.set(tool.name, {
      definition: tool,
      validate,
      execute: async (params, syncService) => {
        if (!validate(params)) {
          throw new Error(`Invalid parameters for tool '${tool.name}': ${formatErrors(validate).join(', ')}`);
        }
        return handler(params, syncService);
      }
    });
  }

  /**
   * Check if a tool is registered
   */
  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get a specific tool definition
   */
  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  /**
   * Get all registered tools
   */
  getTools(): ToolDefinition[] {
    return Array.from(this.tools.values(), tool => tool.definition);
  }

  /**
   * Validate tool parameters against JSON schema
   */
  validateToolParameters(toolName: string, params: unknown): ValidationResult {
    const tool = this.tools.get(toolName);

    if (!tool) {
      return { valid: false, errors: [`Unknown tool '${toolName}'`] };
    }

    if (tool.validate(params)) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: formatErrors(tool.validate) };
  }

  /**
   * Execute a tool with the given parameters
   */
  async executeTool(name: string, params: unknown): Promise<MCPResponse> {
    const tool = this.tools.get(name);

    if (!tool) {
      throw new Error(`No handler registered for tool '${name}'`);
    }
    if (!this.syncService) {
      throw new Error('Tool dependencies not set. Call setDependencies() first.');
    }

    return tool.execute(params, this.syncService);
  }

  /**
   * Unregister a tool
   */
  unregisterTool(name: string): void {
    this.tools.delete(name);
  }

  /**
   * Get the number of registered tools
   */
  getToolCount(): number {
    return this.tools.size;
  }
}

function formatErrors(validate: ValidateFunction): string[] {
  return validate.errors?.map(error => {
    const path = error.instancePath || 'root';
    return `${path}: ${error.message}`;
  }) || ['Unknown validation error'];
}
