/**
 * MCP-specific types and interfaces
 */

import { ChangeSummary, PublishedDocument } from './calendar.js';

export interface SyncEventsParams {
  csv: string;
}

export interface SearchEventsParams {
  query: string;
}

export type EmptyParams = Record<string, never>;

export interface MCPError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface MCPResponse<T = unknown> {
  content?: T;
  error?: MCPError;
}

export interface EventView {
  uid: string;
  subject: string;
  start: string;
  end: string;
  timeZone: string | null;
  location: string;
  description: string;
}

export interface SyncEventsResponse {
  summary: string;
  changes: ChangeSummary;
  duplicate_keys: string[];
  published: boolean;
  documents: PublishedDocument[];
}

export interface EventListResponse {
  total: number;
  events: EventView[];
}

export interface ClearEventsResponse {
  removed: number;
}

export interface RepublishResponse {
  published: boolean;
  documents: PublishedDocument[];
}
