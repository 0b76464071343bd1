import { AllDayDetection, CalendarDocumentProfile, TimeConfig } from './calendar.js';

/**
 * Configuration types for the sync server
 */

export interface ServerConfig {
  port: number;
  host: string;
  autoStart: boolean;
}

export interface DatabaseConfig {
  path: string;
}

export interface CalendarConfig {
  name?: string;
  allDayDetection: AllDayDetection;
  thresholdHours: number;
  documents: CalendarDocumentProfile[];
}

export interface PublishConfig {
  gistId: string;
  token?: string;
  apiUrl: string;
  timeout: number;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  time: TimeConfig;
  calendar: CalendarConfig;
  publish?: PublishConfig;
}

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}
