/**
 * Timezone and date/time utilities for calendar event processing
 */

import { DateTime, IANAZone } from 'luxon';
import { DateOrder, EventTime, TimeConfig } from '../types/calendar.js';

export const LOCAL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
export const ICS_DATE_TIME_FORMAT = "yyyyMMdd'T'HHmmss";
export const ICS_DATE_FORMAT = 'yyyyMMdd';

// Floating values are carried in UTC so that arithmetic on them never meets a DST transition
const FLOATING_CARRIER = 'UTC';

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const TIME_FORMATS = ['H:mm', 'H:mm:ss', 'h:mm a', 'h:mm:ss a', 'h a', 'ha'];

const SHARED_DATE_FORMATS = [
  'yyyy-M-d',
  'yyyy/M/d',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'EEE, MMM d, yyyy',
  'EEEE, MMMM d, yyyy'
];

const NUMERIC_DATE_FORMATS: Record<DateOrder, string[]> = {
  'month-first': ['M/d/yyyy', 'M/d/yy', 'M-d-yyyy', 'M.d.yyyy'],
  'day-first': ['d/M/yyyy', 'd/M/yy', 'd-M-yyyy', 'd.M.yyyy']
};

function candidateFormats(dateOrder: DateOrder): string[] {
  const dateFormats = [...SHARED_DATE_FORMATS, ...NUMERIC_DATE_FORMATS[dateOrder]];
  const formats: string[] = [];
  for (const dateFormat of dateFormats) {
    formats.push(dateFormat);
    for (const timeFormat of TIME_FORMATS) {
      formats.push(`${dateFormat} ${timeFormat}`);
    }
  }
  return formats;
}

const FORMATS_BY_ORDER: Record<DateOrder, string[]> = {
  'month-first': candidateFormats('month-first'),
  'day-first': candidateFormats('day-first')
};

export interface ParseOptions {
  dateOrder?: DateOrder;
  /** Zone to interpret the wall clock in; floating when omitted */
  zone?: string;
}

/**
 * Parses free-form date-time text such as "2024-01-10 09:00", "1/10/2024 9:00 AM"
 * or "Jan 10, 2024 14:30". ISO text carrying its own offset is converted into
 * the target zone.
 * Returns null when no known layout matches.
 */
export function parseDateTime(text: string, options: ParseOptions = {}): DateTime | null {
  const input = text.trim().replace(/\s+/g, ' ');
  if (!input) {
    return null;
  }

  const zone = options.zone ?? FLOATING_CARRIER;
  const opts = { zone, locale: 'en-US' };

  // ISO and SQL layouts only when a full calendar date leads; a bare time is not a date
  if (ISO_DATE_PREFIX.test(input)) {
    const iso = DateTime.fromISO(input, opts);
    if (iso.isValid) {
      return iso;
    }

    const sql = DateTime.fromSQL(input, opts);
    if (sql.isValid) {
      return sql;
    }
  }

  for (const format of FORMATS_BY_ORDER[options.dateOrder ?? 'month-first']) {
    const parsed = DateTime.fromFormat(input, format, opts);
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
}

/**
 * Converts a parsed value into the stored representation for the given mode
 */
export function toEventTime(value: DateTime, config: TimeConfig): EventTime {
  if (config.mode === 'zoned') {
    const zone = requireZone(config);
    return { local: value.setZone(zone).toFormat(LOCAL_FORMAT), zone };
  }
  return { local: value.toFormat(LOCAL_FORMAT), zone: null };
}

/**
 * Returns the wall clock of a stored time in the active representation, carried
 * as a floating value. Zoned times are converted into the configured zone;
 * floating times are taken as they are.
 */
export function toWallClock(time: EventTime, config: TimeConfig): DateTime {
  if (config.mode === 'zoned' && time.zone) {
    const converted = DateTime.fromISO(time.local, { zone: time.zone }).setZone(requireZone(config));
    return DateTime.fromISO(converted.toFormat(LOCAL_FORMAT), { zone: FLOATING_CARRIER });
  }
  return DateTime.fromISO(time.local, { zone: FLOATING_CARRIER });
}

/**
 * Wall-clock value of an instant in the active representation: the configured
 * zone when there is one, otherwise the host's local clock
 */
export function wallClockNow(now: Date, config: TimeConfig): DateTime {
  const instant = DateTime.fromJSDate(now);
  const local = config.mode === 'naive' ? instant.toLocal() : instant.setZone(requireZone(config));
  return DateTime.fromISO(local.toFormat(LOCAL_FORMAT), { zone: FLOATING_CARRIER });
}

export function sameEventTime(a: EventTime, b: EventTime): boolean {
  return a.local === b.local && a.zone === b.zone;
}

export function isMidnight(value: DateTime): boolean {
  return value.hour === 0 && value.minute === 0 && value.second === 0 && value.millisecond === 0;
}

export function isValidZone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

export function requireZone(config: TimeConfig): string {
  if (!config.zone) {
    throw new Error(`Time mode '${config.mode}' requires a zone`);
  }
  return config.zone;
}

export function formatIcsDateTime(value: DateTime): string {
  return value.toFormat(ICS_DATE_TIME_FORMAT);
}

export function formatIcsDate(value: DateTime): string {
  return value.toFormat(ICS_DATE_FORMAT);
}
