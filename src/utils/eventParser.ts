/**
 * Event parser that turns uploaded schedule tables into normalized events
 */

import { parse } from 'csv-parse/sync';
import { EventRow, EventTable, NormalizedEvent, REQUIRED_COLUMNS, TimeConfig } from '../types/calendar.js';
import { ParseError, ValidationError, errorMessage } from './errors.js';
import { parseDateTime, toEventTime } from './timezone.js';

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

/**
 * Parses CSV text into a header plus one record per data row
 */
export function parseTable(csvText: string): EventTable {
  let records: unknown;
  try {
    records = parse(csvText, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: false
    });
  } catch (error) {
    throw new ValidationError([`Malformed CSV: ${errorMessage(error)}`], { cause: error });
  }

  if (!isStringMatrix(records) || records.length === 0) {
    throw new ValidationError(['CSV file has no header row']);
  }

  const [header, ...body] = records;
  const columns = header.map(column => column.trim());
  const rows = body.map(cells => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Returns one human-readable reason per missing required column
 */
export function validateColumns(columns: readonly string[]): string[] {
  return REQUIRED_COLUMNS
    .filter(column => !columns.includes(column))
    .map(column => `Missing required column: ${column}`);
}

/**
 * Narrows validated table rows to event rows
 */
export function toEventRows(table: EventTable): EventRow[] {
  const reasons = validateColumns(table.columns);
  if (reasons.length > 0) {
    throw new ValidationError(reasons);
  }

  return table.rows.map(row => ({
    'Subject': row['Subject'] ?? '',
    'Start Date': row['Start Date'] ?? '',
    'Start Time': row['Start Time'] ?? '',
    'End Date': row['End Date'] ?? '',
    'End Time': row['End Time'] ?? '',
    'Location': row['Location'] ?? '',
    'Description': row['Description'] ?? ''
  }));
}

/**
 * Natural key from the raw, unreformatted column text
 */
export function createNaturalKey(row: Pick<EventRow, 'Subject' | 'Start Date' | 'Start Time'>): string {
  return `${row['Subject']}|${row['Start Date']}|${row['Start Time']}`;
}

/**
 * Parses one row under the active time representation. Row numbers are 1-based
 * data rows, the header not counted.
 */
export function parseEventRow(row: EventRow, timeConfig: TimeConfig, rowNumber: number): NormalizedEvent {
  const zone = timeConfig.mode === 'zoned' ? timeConfig.zone : undefined;
  const startText = `${row['Start Date']} ${row['Start Time']}`;
  const endText = `${row['End Date']} ${row['End Time']}`;

  const start = parseDateTime(startText, { dateOrder: timeConfig.dateOrder, zone });
  if (!start) {
    throw new ParseError(rowNumber, 'start', startText.trim());
  }

  const end = parseDateTime(endText, { dateOrder: timeConfig.dateOrder, zone });
  if (!end) {
    throw new ParseError(rowNumber, 'end', endText.trim());
  }

  return {
    subject: row['Subject'],
    start: toEventTime(start, timeConfig),
    end: toEventTime(end, timeConfig),
    location: row['Location'],
    description: row['Description'],
    naturalKey: createNaturalKey(row),
    startDateText: row['Start Date'],
    startTimeText: row['Start Time']
  };
}

/**
 * Parses a whole batch; the first unparseable row aborts it
 */
export function parseEventRows(rows: EventRow[], timeConfig: TimeConfig): NormalizedEvent[] {
  return rows.map((row, index) => parseEventRow(row, timeConfig, index + 1));
}
