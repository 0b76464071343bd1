/**
 * Reconciler - diffs an incoming snapshot against persisted events by natural key
 */

import { ChangeSummary, EventFields, NormalizedEvent, PersistedEvent } from '../types/calendar.js';
import { sameEventTime } from '../utils/timezone.js';
import { EventWriter } from './EventStore.js';

export interface IncomingIndex {
  events: Map<string, NormalizedEvent>;
  /** Keys seen more than once in the batch; the last row for each won */
  duplicateKeys: string[];
}

export interface ReconciliationPlan {
  toAdd: NormalizedEvent[];
  toUpdate: Array<{ existing: PersistedEvent; incoming: NormalizedEvent }>;
  toRemove: PersistedEvent[];
  unchanged: number;
}

/**
 * Indexes a batch by natural key. Rows sharing a key collapse to the last one.
 */
export function indexIncoming(events: NormalizedEvent[]): IncomingIndex {
  const index = new Map<string, NormalizedEvent>();
  const duplicates = new Set<string>();

  for (const event of events) {
    if (index.has(event.naturalKey)) {
      duplicates.add(event.naturalKey);
    }
    index.set(event.naturalKey, event);
  }

  return { events: index, duplicateKeys: Array.from(duplicates) };
}

export function indexExisting(events: PersistedEvent[]): Map<string, PersistedEvent> {
  return new Map(events.map(event => [event.naturalKey, event]));
}

/**
 * Exact field-by-field comparison of the five mutable fields
 */
export function eventsDiffer(existing: EventFields, incoming: EventFields): boolean {
  return existing.subject !== incoming.subject ||
    !sameEventTime(existing.start, incoming.start) ||
    !sameEventTime(existing.end, incoming.end) ||
    existing.location !== incoming.location ||
    existing.description !== incoming.description;
}

export function planReconciliation(
  existing: Map<string, PersistedEvent>,
  incoming: Map<string, NormalizedEvent>
): ReconciliationPlan {
  const plan: ReconciliationPlan = { toAdd: [], toUpdate: [], toRemove: [], unchanged: 0 };

  for (const [key, event] of incoming) {
    const current = existing.get(key);
    if (!current) {
      plan.toAdd.push(event);
    } else if (eventsDiffer(current, event)) {
      plan.toUpdate.push({ existing: current, incoming: event });
    } else {
      plan.unchanged++;
    }
  }

  for (const [key, event] of existing) {
    if (!incoming.has(key)) {
      plan.toRemove.push(event);
    }
  }

  return plan;
}

/**
 * Applies a plan through the writer. Updates overwrite all five fields, changed
 * or not. Must run inside the caller's transaction for the plan to be atomic.
 */
export async function applyReconciliation(plan: ReconciliationPlan, writer: EventWriter): Promise<ChangeSummary> {
  const summary: ChangeSummary = { added: [], updated: [], deleted: [] };

  for (const event of plan.toAdd) {
    await writer.insert(event);
    summary.added.push(event.subject);
  }

  for (const { incoming } of plan.toUpdate) {
    await writer.upsert(incoming);
    summary.updated.push(incoming.subject);
  }

  for (const event of plan.toRemove) {
    await writer.deleteByKey(event.naturalKey);
    summary.deleted.push(event.subject);
  }

  return summary;
}

export function isEmptySummary(summary: ChangeSummary): boolean {
  return summary.added.length === 0 && summary.updated.length === 0 && summary.deleted.length === 0;
}

export function describeChanges(summary: ChangeSummary): string {
  const line = (label: string, subjects: string[]) =>
    subjects.length > 0 ? `${label}: ${subjects.length} (${subjects.join(', ')})` : `${label}: 0`;

  return [
    line('Added events', summary.added),
    line('Updated events', summary.updated),
    line('Deleted events', summary.deleted)
  ].join('\n');
}
