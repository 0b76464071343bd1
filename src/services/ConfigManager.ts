import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import Ajv, { type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { AppConfig, ConfigValidationError, PublishConfig } from '../types/config.js';
import { isValidZone } from '../utils/timezone.js';
import { errorMessage } from '../utils/errors.js';

const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    server: {
      type: 'object',
      properties: {
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        host: { type: 'string', minLength: 1 },
        autoStart: { type: 'boolean' }
      },
      required: ['port', 'host', 'autoStart'],
      additionalProperties: false
    },
    database: {
      type: 'object',
      properties: {
        path: { type: 'string', minLength: 1 }
      },
      required: ['path'],
      additionalProperties: false
    },
    time: {
      type: 'object',
      properties: {
        mode: { enum: ['naive', 'naive_with_declared_zone', 'zoned'] },
        zone: { type: 'string', minLength: 1 },
        dateOrder: { enum: ['month-first', 'day-first'] }
      },
      required: ['mode'],
      additionalProperties: false
    },
    calendar: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        allDayDetection: { enum: ['strict', 'threshold'] },
        thresholdHours: { type: 'number', exclusiveMinimum: 0 },
        documents: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            properties: {
              fileName: { type: 'string', pattern: '^[^/\\\\]+$' },
              transparency: { enum: ['free', 'busy'] }
            },
            required: ['fileName'],
            additionalProperties: false
          }
        }
      },
      required: ['allDayDetection', 'thresholdHours', 'documents'],
      additionalProperties: false
    },
    publish: {
      type: 'object',
      properties: {
        gistId: { type: 'string', minLength: 1 },
        token: { type: 'string' },
        apiUrl: { type: 'string', format: 'uri' },
        timeout: { type: 'integer', minimum: 1 }
      },
      required: ['gistId', 'apiUrl', 'timeout'],
      additionalProperties: false
    }
  },
  required: ['server', 'database', 'time', 'calendar'],
  additionalProperties: false
};

export interface ResolvedPublishConfig extends PublishConfig {
  token: string;
}

export class ConfigManager {
  private configPath: string;
  private config: AppConfig | null = null;
  private listeners: Array<(config: AppConfig) => void> = [];
  private validateSchema: ValidateFunction<AppConfig>;

  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.defaultConfigPath();

    const ajv = new Ajv.default({ allErrors: true });
    addFormats.default(ajv);
    this.validateSchema = ajv.compile<AppConfig>(CONFIG_SCHEMA);
  }

  static defaultConfigPath(): string {
    return join(homedir(), '.config', 'calendar-sync', 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk, writing the defaults when no file exists
   */
  async loadConfig(): Promise<AppConfig> {
    try {
      await this.ensureConfigDirectory();

      let configData: string;
      try {
        configData = await fs.readFile(this.configPath, 'utf-8');
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          this.config = this.getDefaultConfig();
          await this.saveConfig();
          return this.getConfig();
        }
        throw error;
      }

      const parsedConfig: unknown = JSON.parse(configData);
      const validationErrors = this.validateConfig(parsedConfig);
      if (validationErrors.length > 0 || !this.validateSchema(parsedConfig)) {
        throw new Error(`Configuration validation failed: ${validationErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`);
      }

      this.config = parsedConfig;
      return this.getConfig();
    } catch (error) {
      throw new Error(`Failed to load configuration: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Save configuration to disk
   */
  async saveConfig(): Promise<void> {
    if (!this.config) {
      throw new Error('No configuration to save');
    }

    try {
      await this.ensureConfigDirectory();

      const validationErrors = this.validateConfig(this.config);
      if (validationErrors.length > 0) {
        throw new Error(`Configuration validation failed: ${validationErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`);
      }

      const configData = JSON.stringify(this.config, null, 2);
      await fs.writeFile(this.configPath, configData, 'utf-8');

      this.notifyListeners();
    } catch (error) {
      throw new Error(`Failed to save configuration: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return structuredClone(this.config);
  }

  /**
   * Replace top-level sections and persist
   */
  async updateConfig(updates: Partial<AppConfig>): Promise<AppConfig> {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }

    const previous = this.config;
    this.config = { ...this.config, ...updates };
    try {
      await this.saveConfig();
    } catch (error) {
      this.config = previous;
      throw error;
    }
    return this.getConfig();
  }

  /**
   * Publish settings with the token resolved from the environment when the
   * file does not carry one. Null when publishing is not configured.
   */
  getPublishConfig(env: NodeJS.ProcessEnv = process.env): ResolvedPublishConfig | null {
    const publish = this.getConfig().publish;
    const gistId = env.CALENDAR_SYNC_GIST_ID ?? publish?.gistId;
    const token = env.CALENDAR_SYNC_GITHUB_TOKEN ?? publish?.token ?? env.GITHUB_TOKEN;

    if (!gistId || !token) {
      return null;
    }

    return {
      gistId,
      token,
      apiUrl: publish?.apiUrl ?? 'https://api.github.com',
      timeout: publish?.timeout ?? 30000
    };
  }

  addConfigListener(listener: (config: AppConfig) => void): void {
    this.listeners.push(listener);
  }

  removeConfigListener(listener: (config: AppConfig) => void): void {
    const index = this.listeners.indexOf(listener);
    if (index > -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Validate configuration object: schema first, then the rules a schema cannot express
   */
  validateConfig(config: unknown): ConfigValidationError[] {
    if (!this.validateSchema(config)) {
      return (this.validateSchema.errors ?? []).map(error => ({
        field: error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : 'root',
        message: error.message ?? 'is invalid',
        value: error.params
      }));
    }

    const errors: ConfigValidationError[] = [];
    const { time, calendar } = config;

    if (time.mode !== 'naive' && !time.zone) {
      errors.push({ field: 'time.zone', message: `zone is required for time mode '${time.mode}'` });
    }
    if (time.zone && !isValidZone(time.zone)) {
      errors.push({ field: 'time.zone', message: 'zone must be a valid IANA time zone', value: time.zone });
    }

    const fileNames = calendar.documents.map(document => document.fileName);
    const duplicates = fileNames.filter((name, index) => fileNames.indexOf(name) !== index);
    if (duplicates.length > 0) {
      errors.push({ field: 'calendar.documents', message: 'document file names must be unique', value: duplicates });
    }

    return errors;
  }

  private getDefaultConfig(): AppConfig {
    return {
      server: {
        port: 3001,
        host: 'localhost',
        autoStart: true
      },
      database: {
        path: join(dirname(this.configPath), 'events.db')
      },
      time: {
        mode: 'naive',
        dateOrder: 'month-first'
      },
      calendar: {
        allDayDetection: 'strict',
        thresholdHours: 23,
        documents: [{ fileName: 'events.ics' }]
      }
    };
  }

  private async ensureConfigDirectory(): Promise<void> {
    await fs.mkdir(dirname(this.configPath), { recursive: true });
  }

  private notifyListeners(): void {
    if (this.config) {
      const snapshot = this.getConfig();
      this.listeners.forEach(listener => {
        try {
          listener(snapshot);
        } catch (error) {
          console.error('[ConfigManager] Error in config listener:', error);
        }
      });
    }
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
