/**
 * Error taxonomy for sync cycles. Every error carries a stable code that the
 * tool handlers and the HTTP bridge report to callers.
 */

import { ChangeSummary } from '../types/calendar.js';

export type SyncErrorCode =
  | 'VALIDATION_ERROR'
  | 'PARSE_ERROR'
  | 'STORE_ERROR'
  | 'PUBLISH_ERROR'
  | 'SERIALIZATION_ERROR';

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: SyncErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  /**
   * The same failure, reported after a sync cycle already committed its changes
   */
  withChanges(changes: ChangeSummary): SyncError {
    return new SyncError(this.code, this.message, { ...this.details, committed_changes: changes }, { cause: this });
  }
}

/**
 * The input table is missing required columns or is not a well-formed table
 */
export class ValidationError extends SyncError {
  readonly reasons: string[];

  constructor(reasons: string[], options?: ErrorOptions) {
    super('VALIDATION_ERROR', `Invalid event table: ${reasons.join('; ')}`, { reasons }, options);
    this.reasons = reasons;
  }
}

export class ParseError extends SyncError {
  readonly rowNumber: number;
  readonly text: string;

  constructor(rowNumber: number, field: string, text: string) {
    super('PARSE_ERROR', `Row ${rowNumber}: cannot parse ${field} '${text}'`, { row: rowNumber, field, text });
    this.rowNumber = rowNumber;
    this.text = text;
  }
}

export class StoreError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super('STORE_ERROR', message, {}, options);
  }
}

/**
 * Remote publication failed. When raised at the end of a sync cycle the local
 * changes are already committed and travel with the error.
 */
export class PublishError extends SyncError {
  readonly status?: number;
  readonly changes?: ChangeSummary;

  constructor(message: string, status?: number, options?: ErrorOptions & { changes?: ChangeSummary }) {
    super('PUBLISH_ERROR', message, {
      ...(status !== undefined ? { status } : {}),
      ...(options?.changes ? { committed_changes: options.changes } : {})
    }, options);
    this.status = status;
    this.changes = options?.changes;
  }

  withChanges(changes: ChangeSummary): PublishError {
    return new PublishError(this.message, this.status, { cause: this.cause, changes });
  }
}

export class SerializationError extends SyncError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('SERIALIZATION_ERROR', message, details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
