import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  applyReconciliation,
  describeChanges,
  eventsDiffer,
  indexExisting,
  indexIncoming,
  isEmptySummary,
  planReconciliation
} from '../Reconciler.js';
import { EventStore } from '../EventStore.js';
import { ChangeSummary, EventRow, NormalizedEvent } from '../../types/calendar.js';
import { parseEventRows } from '../../utils/eventParser.js';

const NAIVE = { mode: 'naive' } as const;

function meeting(overrides: Partial<EventRow> = {}): EventRow {
  return {
    'Subject': 'Meeting',
    'Start Date': '2024-01-10',
    'Start Time': '09:00',
    'End Date': '2024-01-10',
    'End Time': '10:00',
    'Location': 'Room1',
    'Description': '',
    ...overrides
  };
}

function parse(rows: EventRow[]): NormalizedEvent[] {
  return parseEventRows(rows, NAIVE);
}

describe('Reconciler', () => {
  describe('indexIncoming', () => {
    it('should collapse duplicate keys to the last row and report them', () => {
      const index = indexIncoming(parse([
        meeting({ 'Location': 'First' }),
        meeting({ 'Subject': 'Other' }),
        meeting({ 'Location': 'Last' })
      ]));

      expect(index.events.size).toBe(2);
      expect(index.events.get('Meeting|2024-01-10|09:00')?.location).toBe('Last');
      expect(index.duplicateKeys).toEqual(['Meeting|2024-01-10|09:00']);
    });
  });

  describe('eventsDiffer', () => {
    it('should compare the five mutable fields exactly', () => {
      const [base] = parse([meeting()]);

      expect(eventsDiffer(base, { ...base })).toBe(false);
      expect(eventsDiffer(base, { ...base, location: 'room1' })).toBe(true);
      expect(eventsDiffer(base, { ...base, description: ' ' })).toBe(true);
      expect(eventsDiffer(base, { ...base, end: { local: '2024-01-10T10:00:01', zone: null } })).toBe(true);
      expect(eventsDiffer(base, { ...base, start: { local: base.start.local, zone: 'UTC' } })).toBe(true);
    });
  });

  describe('planReconciliation', () => {
    it('should split keys into additions, updates and removals', async () => {
      const store = new EventStore(':memory:');
      try {
        const [kept, changed, removed] = parse([
          meeting({ 'Subject': 'Kept' }),
          meeting({ 'Subject': 'Changed' }),
          meeting({ 'Subject': 'Removed' })
        ]);
        await store.insert(kept);
        await store.insert(changed);
        await store.insert(removed);

        const incoming = indexIncoming(parse([
          meeting({ 'Subject': 'Kept' }),
          meeting({ 'Subject': 'Changed', 'Description': 'Agenda' }),
          meeting({ 'Subject': 'New' })
        ])).events;

        const plan = planReconciliation(indexExisting(await store.listAll()), incoming);

        expect(plan.toAdd.map(e => e.subject)).toEqual(['New']);
        expect(plan.toUpdate.map(pair => pair.incoming.description)).toEqual(['Agenda']);
        expect(plan.toRemove.map(e => e.subject)).toEqual(['Removed']);
        expect(plan.unchanged).toBe(1);
      } finally {
        await store.close();
      }
    });
  });

  describe('applyReconciliation against the store', () => {
    let store: EventStore;

    async function sync(rows: EventRow[]): Promise<ChangeSummary> {
      return store.transaction(async tx => {
        const plan = planReconciliation(indexExisting(await tx.listAll()), indexIncoming(parse(rows)).events);
        return applyReconciliation(plan, tx);
      });
    }

    beforeEach(() => {
      store = new EventStore(':memory:');
    });

    afterEach(async () => {
      await store.close();
    });

    it('should add a new event to an empty store', async () => {
      expect(await sync([meeting()])).toEqual({ added: ['Meeting'], updated: [], deleted: [] });
    });

    it('should report nothing when the same batch is synced again', async () => {
      await sync([meeting()]);
      expect(await sync([meeting()])).toEqual({ added: [], updated: [], deleted: [] });
    });

    it('should update an event whose location changed', async () => {
      await sync([meeting()]);

      expect(await sync([meeting({ 'Location': 'Room2' })])).toEqual({ added: [], updated: ['Meeting'], deleted: [] });
      expect((await store.getByKey('Meeting|2024-01-10|09:00'))?.location).toBe('Room2');
    });

    it('should delete everything when the batch is empty', async () => {
      await sync([meeting()]);

      expect(await sync([])).toEqual({ added: [], updated: [], deleted: ['Meeting'] });
      expect(await store.count()).toBe(0);
    });

    it('should be idempotent for larger batches', async () => {
      const batch = [
        meeting(),
        meeting({ 'Subject': 'Review', 'Start Time': '13:00', 'End Time': '14:00' }),
        meeting({ 'Subject': 'Offsite', 'Start Date': '2024-01-12', 'Start Time': '', 'End Date': '2024-01-13', 'End Time': '' })
      ];

      const first = await sync(batch);
      expect(first.added).toHaveLength(3);
      expect(isEmptySummary(await sync(batch))).toBe(true);
    });

    it('should treat a rewritten start time as a different event', async () => {
      await sync([meeting()]);

      const summary = await sync([meeting({ 'Start Time': '9:00 AM' })]);
      expect(summary).toEqual({ added: ['Meeting'], updated: [], deleted: ['Meeting'] });
    });
  });

  describe('describeChanges', () => {
    it('should list counts and subjects per change type', () => {
      expect(describeChanges({ added: ['A', 'B'], updated: [], deleted: ['C'] })).toBe(
        'Added events: 2 (A, B)\nUpdated events: 0\nDeleted events: 1 (C)'
      );
    });
  });
});
