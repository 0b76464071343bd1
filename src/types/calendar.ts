/**
 * Core calendar interfaces and types for the sync server
 */

export type TimeMode = 'naive' | 'naive_with_declared_zone' | 'zoned';

export type DateOrder = 'month-first' | 'day-first';

/**
 * How parsed date-times are interpreted and rendered. Threaded explicitly into
 * parser and serializer calls; one value per sync/generation cycle.
 */
export interface TimeConfig {
  mode: TimeMode;
  /** IANA zone; required for naive_with_declared_zone and zoned */
  zone?: string;
  dateOrder?: DateOrder;
}

export interface EventTime {
  /** Wall-clock value formatted as yyyy-MM-dd'T'HH:mm:ss */
  local: string;
  /** Zone the wall clock belongs to, null for floating times */
  zone: string | null;
}

export const REQUIRED_COLUMNS = [
  'Subject',
  'Start Date',
  'Start Time',
  'End Date',
  'End Time',
  'Location',
  'Description'
] as const;

export type ColumnName = typeof REQUIRED_COLUMNS[number];

export type EventRow = Record<ColumnName, string>;

export interface EventTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface EventFields {
  subject: string;
  start: EventTime;
  end: EventTime;
  location: string;
  description: string;
}

export interface NormalizedEvent extends EventFields {
  naturalKey: string;
  startDateText: string;
  startTimeText: string;
}

export interface PersistedEvent extends EventFields {
  id: number;
  naturalKey: string;
  createdAt: Date;
  updatedAt: Date;
}

export type AllDayDetection = 'strict' | 'threshold';

export type TransparencyPolicy = 'free' | 'busy';

export type Transparency = 'TRANSPARENT' | 'OPAQUE';

export interface CalendarDocumentProfile {
  fileName: string;
  transparency?: TransparencyPolicy;
}

export interface ChangeSummary {
  added: string[];
  updated: string[];
  deleted: string[];
}

export interface PublishedDocument {
  fileName: string;
  url: string;
}

export interface SyncOutcome {
  changes: ChangeSummary;
  duplicateKeys: string[];
  documents: PublishedDocument[];
  published: boolean;
}
