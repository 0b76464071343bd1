/**
 * Calendar serializer - renders persisted events as an iCalendar document
 *
 * Every event is first projected onto the wall clock of the active time
 * representation. Classification (timed, all-day, multi-day all-day) and
 * transparency are decided on that wall clock, so zoned events spanning a DST
 * change still line up with calendar days.
 */

import { readFileSync } from 'fs';
import { DateTime } from 'luxon';
import ical from 'node-ical';
import {
  AllDayDetection,
  EventFields,
  PersistedEvent,
  TimeConfig,
  Transparency,
  TransparencyPolicy
} from '../types/calendar.js';
import {
  formatIcsDate,
  formatIcsDateTime,
  isMidnight,
  requireZone,
  toWallClock,
  wallClockNow
} from '../utils/timezone.js';

export const PRODUCT_ID = '-//calendar-sync//Calendar Sync Server//EN';
export const DEFAULT_THRESHOLD_HOURS = 23;

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const MAX_LINE_OCTETS = 75;
const MINUTE_MS = 60 * 1000;
const ICS_UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'";
const ICS_WEEKDAYS = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'];

export interface SerializerOptions {
  allDayDetection?: AllDayDetection;
  thresholdHours?: number;
  transparency?: TransparencyPolicy;
  calendarName?: string;
  now?: () => Date;
}

export type EventClassification =
  | { kind: 'timed'; start: DateTime; end: DateTime }
  | { kind: 'all-day'; start: DateTime; end: DateTime; startDate: DateTime; endDate: DateTime; transparency?: Transparency };

interface ZoneObservance {
  type: 'STANDARD' | 'DAYLIGHT';
  name: string;
  offsetFrom: string;
  offsetTo: string;
  start: string;
  rrule?: string;
}

function isObservance(value: unknown): value is ZoneObservance {
  if (!value || typeof value !== 'object') return false;
  const entry: Record<string, unknown> = { ...value };
  return (entry.type === 'STANDARD' || entry.type === 'DAYLIGHT') &&
    typeof entry.name === 'string' &&
    typeof entry.offsetFrom === 'string' &&
    typeof entry.offsetTo === 'string' &&
    typeof entry.start === 'string' &&
    (entry.rrule === undefined || typeof entry.rrule === 'string');
}

function loadZoneRules(): Map<string, ZoneObservance[]> {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/timezones.json', import.meta.url), 'utf-8'));
  const rules = new Map<string, ZoneObservance[]>();
  if (raw && typeof raw === 'object') {
    for (const [zone, observances] of Object.entries(raw)) {
      if (Array.isArray(observances) && observances.every(isObservance)) {
        rules.set(zone, observances);
      }
    }
  }
  return rules;
}

let zoneRules: Map<string, ZoneObservance[]> | null = null;
const derivedRules = new Map<string, ZoneObservance[]>();

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const absolute = Math.abs(minutes);
  return `${sign}${String(Math.floor(absolute / 60)).padStart(2, '0')}${String(absolute % 60).padStart(2, '0')}`;
}

function offsetAt(epochMinutes: number, zone: string): number {
  return DateTime.fromMillis(epochMinutes * MINUTE_MS, { zone }).offset;
}

/**
 * Instants (in epoch minutes) at which the zone's offset changes during the year
 */
function findTransitions(zone: string, year: number): number[] {
  const transitions: number[] = [];
  const first = DateTime.utc(year, 1, 1).toMillis() / MINUTE_MS;
  const last = DateTime.utc(year + 1, 1, 1).toMillis() / MINUTE_MS;

  for (let from = first; from < last; from += 24 * 60) {
    let lo = from;
    let hi = Math.min(from + 24 * 60, last);
    const before = offsetAt(lo, zone);
    if (offsetAt(hi, zone) === before) {
      continue;
    }
    while (hi - lo > 1) {
      const mid = Math.floor((lo + hi) / 2);
      if (offsetAt(mid, zone) === before) {
        lo = mid;
      } else {
        hi = mid;
      }
    }
    transitions.push(hi);
  }

  return transitions;
}

/**
 * First date in 1970 matching the yearly rule, so the observance covers every event date
 */
function ruleStartIn1970(month: number, weekday: number, ordinal: number): DateTime {
  const firstOfMonth = DateTime.utc(1970, month, 1);
  if (ordinal > 0) {
    const first = firstOfMonth.plus({ days: (weekday - firstOfMonth.weekday + 7) % 7 });
    return first.plus({ weeks: ordinal - 1 });
  }
  const lastOfMonth = firstOfMonth.endOf('month').startOf('day');
  return lastOfMonth.minus({ days: (lastOfMonth.weekday - weekday + 7) % 7 });
}

/**
 * Observances for a zone absent from the rule table, read off the zone's
 * transitions in the given year. Each transition becomes a yearly rule on the
 * same weekday of the same week of its month.
 */
function deriveObservances(zone: string, year: number): ZoneObservance[] {
  const cacheKey = `${zone}@${year}`;
  const cached = derivedRules.get(cacheKey);
  if (cached) {
    return cached;
  }

  const transitions = findTransitions(zone, year);
  let observances: ZoneObservance[];

  if (transitions.length === 0) {
    const sample = DateTime.utc(year, 1, 1).setZone(zone);
    const offset = formatOffset(sample.offset);
    observances = [{
      type: 'STANDARD',
      name: sample.offsetNameShort ?? offset,
      offsetFrom: offset,
      offsetTo: offset,
      start: '19700101T000000'
    }];
  } else {
    observances = transitions.map((minutes): ZoneObservance => {
      const offsetFrom = offsetAt(minutes - 1, zone);
      const after = DateTime.fromMillis(minutes * MINUTE_MS, { zone });
      // observance starts are written in the offset in force before the change
      const local = DateTime.fromMillis((minutes + offsetFrom) * MINUTE_MS, { zone: 'utc' });
      const ordinal = local.day + 7 > local.endOf('month').day ? -1 : Math.ceil(local.day / 7);
      const start = ruleStartIn1970(local.month, local.weekday, ordinal).set({ hour: local.hour, minute: local.minute });
      const dayOfWeek = ICS_WEEKDAYS[local.weekday - 1];

      return {
        type: after.offset > offsetFrom ? 'DAYLIGHT' : 'STANDARD',
        name: after.offsetNameShort ?? formatOffset(after.offset),
        offsetFrom: formatOffset(offsetFrom),
        offsetTo: formatOffset(after.offset),
        start: start.toFormat("yyyyMMdd'T'HHmmss"),
        rrule: `FREQ=YEARLY;BYMONTH=${local.month};BYDAY=${ordinal}${dayOfWeek}`
      };
    });
  }

  derivedRules.set(cacheKey, observances);
  return observances;
}

/**
 * Builds the VTIMEZONE block for a zone. Zones missing from the rule table get
 * rules derived from their transitions in the given year.
 */
export function generateVtimezone(zone: string, year: number = DateTime.utc().year): string[] {
  zoneRules ??= loadZoneRules();

  let observances = zoneRules.get(zone);
  if (!observances) {
    console.error(`[CalendarSerializer] No transition table entry for ${zone}, deriving rules from ${year}`);
    observances = deriveObservances(zone, year);
  }

  const lines = ['BEGIN:VTIMEZONE', `TZID:${zone}`, `X-LIC-LOCATION:${zone}`];
  for (const observance of observances) {
    lines.push(
      `BEGIN:${observance.type}`,
      `TZOFFSETFROM:${observance.offsetFrom}`,
      `TZOFFSETTO:${observance.offsetTo}`,
      `TZNAME:${observance.name}`,
      `DTSTART:${observance.start}`
    );
    if (observance.rrule) {
      lines.push(`RRULE:${observance.rrule}`);
    }
    lines.push(`END:${observance.type}`);
  }
  lines.push('END:VTIMEZONE');
  return lines;
}

/**
 * Decides how an event is rendered. Zero and negative durations stay timed.
 */
export function classifyEvent(
  event: Pick<EventFields, 'start' | 'end'>,
  timeConfig: TimeConfig,
  options: SerializerOptions = {}
): EventClassification {
  const start = toWallClock(event.start, timeConfig);
  const end = toWallClock(event.end, timeConfig);
  const duration = end.toMillis() - start.toMillis();

  const allDay = (options.allDayDetection ?? 'strict') === 'threshold'
    ? duration >= (options.thresholdHours ?? DEFAULT_THRESHOLD_HOURS) * HOUR_MS
    : duration > 0 && duration % DAY_MS === 0 && isMidnight(start) && isMidnight(end);

  if (!allDay) {
    return { kind: 'timed', start, end };
  }

  // DTEND of a date-only event is exclusive
  const endDate = isMidnight(end) ? end : end.startOf('day').plus({ days: 1 });

  return {
    kind: 'all-day',
    start,
    end,
    startDate: start.startOf('day'),
    endDate,
    transparency: options.transparency ? transparencyFor(options.transparency) : undefined
  };
}

export function transparencyFor(policy: TransparencyPolicy): Transparency {
  return policy === 'free' ? 'TRANSPARENT' : 'OPAQUE';
}

export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Folds a content line so no physical line exceeds 75 octets
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const chunks: string[] = [];
  let current = '';
  let currentOctets = 0;
  // continuation lines spend one octet on the leading space
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8');
    if (currentOctets + octets > limit) {
      chunks.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  chunks.push(current);

  return chunks.join('\r\n ');
}

export class CalendarSerializer {
  private timeConfig: TimeConfig;
  private options: SerializerOptions;

  constructor(timeConfig: TimeConfig, options: SerializerOptions = {}) {
    if (timeConfig.mode !== 'naive') {
      requireZone(timeConfig);
    }
    this.timeConfig = timeConfig;
    this.options = options;
  }

  /**
   * Render the complete document text
   */
  serialize(events: PersistedEvent[]): string {
    const zone = this.timeConfig.mode === 'naive' ? null : requireZone(this.timeConfig);
    const generatedAt = this.options.now ? this.options.now() : new Date();
    const stamp = wallClockNow(generatedAt, this.timeConfig);
    // DTSTAMP is UTC wherever the document references a zone; naive documents stay zone-free
    const dtstamp = zone
      ? `DTSTAMP:${DateTime.fromJSDate(generatedAt, { zone: 'utc' }).toFormat(ICS_UTC_FORMAT)}`
      : dateTimeProperty('DTSTAMP', stamp, null);

    const lines = ['BEGIN:VCALENDAR'];
    if (zone) {
      lines.push(`X-WR-TIMEZONE:${zone}`);
    }
    lines.push('VERSION:2.0', `PRODID:${PRODUCT_ID}`, 'CALSCALE:GREGORIAN', 'METHOD:PUBLISH');
    if (this.options.calendarName) {
      lines.push(`X-WR-CALNAME:${escapeText(this.options.calendarName)}`);
    }

    const classified = events
      .map(event => ({ event, classification: classifyEvent(event, this.timeConfig, this.options) }))
      .sort((a, b) =>
        a.classification.start.toMillis() - b.classification.start.toMillis() ||
        a.event.naturalKey.localeCompare(b.event.naturalKey));

    for (const { event, classification } of classified) {
      lines.push(...this.renderEvent(event, classification, dtstamp, stamp, zone));
    }

    if (zone) {
      lines.push(...generateVtimezone(zone, DateTime.fromJSDate(generatedAt, { zone }).year));
    }
    lines.push('END:VCALENDAR');

    return lines.map(foldLine).join('\r\n') + '\r\n';
  }

  private renderEvent(
    event: PersistedEvent,
    classification: EventClassification,
    dtstamp: string,
    stamp: DateTime,
    zone: string | null
  ): string[] {
    const lines = [
      'BEGIN:VEVENT',
      `UID:${escapeText(event.naturalKey)}`,
      dtstamp,
      dateTimeProperty('CREATED', stamp, zone),
      `SUMMARY:${escapeText(event.subject)}`
    ];

    if (classification.kind === 'all-day') {
      lines.push(
        `DTSTART;VALUE=DATE:${formatIcsDate(classification.startDate)}`,
        `DTEND;VALUE=DATE:${formatIcsDate(classification.endDate)}`
      );
    } else {
      lines.push(
        dateTimeProperty('DTSTART', classification.start, zone),
        dateTimeProperty('DTEND', classification.end, zone)
      );
    }

    if (event.location) {
      lines.push(`LOCATION:${escapeText(event.location)}`);
    }
    if (event.description) {
      lines.push(`DESCRIPTION:${escapeText(event.description)}`);
    }
    if (classification.kind === 'all-day' && classification.transparency) {
      lines.push(`TRANSP:${classification.transparency}`);
    }

    lines.push('END:VEVENT');
    return lines;
  }
}

/**
 * Floating values never carry a UTC marker; declared and zoned values reference the zone
 */
function dateTimeProperty(name: string, value: DateTime, zone: string | null): string {
  return zone
    ? `${name};TZID=${zone}:${formatIcsDateTime(value)}`
    : `${name}:${formatIcsDateTime(value)}`;
}

export interface CalendarIdentity {
  uid: string;
  summary: string;
}

export interface CalendarReadBack {
  eventBlocks: number;
  parsedEvents: number;
  identities: CalendarIdentity[];
}

/**
 * Inverse of escapeText
 */
export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_match, escaped: string) =>
    escaped === 'n' || escaped === 'N' ? '\n' : escaped);
}

/**
 * Reads a rendered document back: VEVENT blocks counted in the text, events
 * recognised by node-ical, and the UID and SUMMARY of every block decoded from
 * the unfolded content lines
 */
export function readCalendarIdentities(document: string): CalendarReadBack {
  const unfolded = document.replace(/\r?\n[ \t]/g, '').split(/\r?\n/);

  const identities: CalendarIdentity[] = [];
  let eventBlocks = 0;
  let current: CalendarIdentity | null = null;
  for (const line of unfolded) {
    if (line === 'BEGIN:VEVENT') {
      eventBlocks++;
      current = { uid: '', summary: '' };
    } else if (line === 'END:VEVENT' && current) {
      identities.push(current);
      current = null;
    } else if (current && line.startsWith('UID:')) {
      current.uid = unescapeText(line.slice('UID:'.length));
    } else if (current && line.startsWith('SUMMARY:')) {
      current.summary = unescapeText(line.slice('SUMMARY:'.length));
    }
  }

  const parsedEvents = Object.values(ical.sync.parseICS(document))
    .filter(component => component && component.type === 'VEVENT')
    .length;

  return { eventBlocks, parsedEvents, identities };
}
