import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SyncService, SyncServiceConfig, syncSettingsFrom } from '../SyncService.js';
import { EventStore } from '../EventStore.js';
import { ParseError, PublishError, StoreError, SyncError, ValidationError } from '../../utils/errors.js';
import { FakePublisher, MEETING_ROW as MEETING, csv } from '../../__tests__/fixtures.js';

const MEETING_ROOM2 = 'Meeting,2024-01-10,09:00,2024-01-10,10:00,Room2,';

function settings(overrides: Partial<SyncServiceConfig> = {}): SyncServiceConfig {
  return {
    time: { mode: 'naive' },
    allDayDetection: 'strict',
    thresholdHours: 23,
    documents: [{ fileName: 'events.ics' }],
    now: () => new Date('2024-01-05T12:00:00Z'),
    ...overrides
  };
}

describe('SyncService', () => {
  let store: EventStore;
  let publisher: FakePublisher;
  let service: SyncService;

  beforeEach(() => {
    store = new EventStore(':memory:');
    publisher = new FakePublisher();
    service = new SyncService(store, settings(), publisher);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await store.close();
  });

  describe('syncCsv', () => {
    it('should add, keep, update and delete across successive uploads', async () => {
      const added = await service.syncCsv(csv(MEETING));
      expect(added.changes).toEqual({ added: ['Meeting'], updated: [], deleted: [] });

      const unchanged = await service.syncCsv(csv(MEETING));
      expect(unchanged.changes).toEqual({ added: [], updated: [], deleted: [] });

      const updated = await service.syncCsv(csv(MEETING_ROOM2));
      expect(updated.changes).toEqual({ added: [], updated: ['Meeting'], deleted: [] });
      expect((await service.listAll())[0].location).toBe('Room2');

      const deleted = await service.syncCsv(csv());
      expect(deleted.changes).toEqual({ added: [], updated: [], deleted: ['Meeting'] });
      expect(await service.count()).toBe(0);
    });

    it('should publish the regenerated document after every cycle', async () => {
      const outcome = await service.syncCsv(csv(MEETING));

      expect(outcome.published).toBe(true);
      expect(outcome.documents).toEqual([
        { fileName: 'events.ics', url: 'https://gist.example.test/octo/g1/raw/events.ics' }
      ]);
      expect(publisher.batches).toHaveLength(1);
      expect(publisher.batches[0][0].content).toContain('UID:Meeting|2024-01-10|09:00');
      expect(service.getLastPublished()).toEqual(outcome.documents);
      expect(service.getLastSyncAt()).toEqual(new Date('2024-01-05T12:00:00Z'));
    });

    it('should report duplicate keys and keep the last row', async () => {
      const outcome = await service.syncCsv(csv(MEETING, MEETING_ROOM2));

      expect(outcome.duplicateKeys).toEqual(['Meeting|2024-01-10|09:00']);
      expect(outcome.changes.added).toEqual(['Meeting']);
      expect((await service.listAll())[0].location).toBe('Room2');
    });

    it('should leave the store untouched when a column is missing', async () => {
      await service.syncCsv(csv(MEETING));

      await expect(service.syncCsv('Subject,Start Date\nOther,2024-01-11\n')).rejects.toBeInstanceOf(ValidationError);
      expect((await service.listAll()).map(event => event.subject)).toEqual(['Meeting']);
      expect(publisher.batches).toHaveLength(1);
    });

    it('should leave the store untouched when a row cannot be parsed', async () => {
      await service.syncCsv(csv(MEETING));

      await expect(service.syncCsv(csv('Other,soon,09:00,2024-01-11,10:00,,'))).rejects.toBeInstanceOf(ParseError);
      expect((await service.listAll()).map(event => event.subject)).toEqual(['Meeting']);
    });

    it('should keep committed changes and report them when publication fails', async () => {
      publisher.failure = new PublishError('Gist update failed: HTTP 502 Bad Gateway', 502);

      try {
        await service.syncCsv(csv(MEETING));
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(PublishError);
        if (error instanceof PublishError) {
          expect(error.changes).toEqual({ added: ['Meeting'], updated: [], deleted: [] });
          expect(error.details).toEqual({
            status: 502,
            committed_changes: { added: ['Meeting'], updated: [], deleted: [] }
          });
        }
      }

      expect(await service.count()).toBe(1);
    });

    it('should publish subjects carrying backslashes, separators and line breaks', async () => {
      const outcome = await service.syncCsv(csv(
        '"Review C:\\notes",2024-01-10,09:00,2024-01-10,10:00,,',
        '"Plan; budget, Q1",2024-01-11,09:00,2024-01-11,10:00,,',
        '"Path a\\\\b",2024-01-12,09:00,2024-01-12,10:00,,',
        '"Two\nlines",2024-01-13,09:00,2024-01-13,10:00,,'
      ));

      expect(outcome.changes.added).toEqual(['Review C:\\notes', 'Plan; budget, Q1', 'Path a\\\\b', 'Two\nlines']);
      expect(outcome.published).toBe(true);
      expect(await service.regenerateAndRepublish()).toEqual(outcome.documents);
    });

    it('should report committed changes when regeneration fails after the commit', async () => {
      const listAll = store.listAll.bind(store);
      vi.spyOn(store, 'listAll')
        .mockImplementationOnce(listAll)
        .mockRejectedValueOnce(new StoreError('Failed to read events: disk I/O error'));

      try {
        await service.syncCsv(csv(MEETING));
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(SyncError);
        if (error instanceof SyncError) {
          expect(error.code).toBe('STORE_ERROR');
          expect(error.message).toBe('Failed to read events: disk I/O error');
          expect(error.details).toEqual({ committed_changes: { added: ['Meeting'], updated: [], deleted: [] } });
        }
      }

      expect(await service.count()).toBe(1);
      expect(publisher.batches).toHaveLength(0);
    });

    it('should only render when no publisher is configured', async () => {
      service.configure(settings(), null);

      const outcome = await service.syncCsv(csv(MEETING));

      expect(outcome.published).toBe(false);
      expect(outcome.documents).toEqual([]);
      expect(service.isPublishingEnabled()).toBe(false);
    });
  });

  describe('regenerateAndRepublish', () => {
    it('should publish the persisted set without new input', async () => {
      await service.syncCsv(csv(MEETING));

      const documents = await service.regenerateAndRepublish();

      expect(documents).toEqual([{ fileName: 'events.ics', url: 'https://gist.example.test/octo/g1/raw/events.ics' }]);
      expect(publisher.batches).toHaveLength(2);
      expect(publisher.batches[1]).toEqual(publisher.batches[0]);
    });
  });

  describe('renderDocuments', () => {
    it('should render one document per profile with its own transparency', async () => {
      service.configure(settings({
        documents: [
          { fileName: 'free.ics', transparency: 'free' },
          { fileName: 'busy.ics', transparency: 'busy' }
        ]
      }), publisher);
      await service.syncCsv(csv('Offsite,2024-01-01,,2024-01-03,,,'));

      const documents = await service.renderDocuments();

      expect(documents.map(document => document.fileName)).toEqual(['free.ics', 'busy.ics']);
      expect(documents[0].content).toContain('TRANSP:TRANSPARENT');
      expect(documents[1].content).toContain('TRANSP:OPAQUE');
      expect(publisher.batches[0].map(document => document.fileName)).toEqual(['free.ics', 'busy.ics']);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await service.syncCsv(csv(
        MEETING,
        'Lunch,2024-01-10,12:00,2024-01-10,13:00,Cafe,Meeting notes follow',
        'Gym,2024-01-10,18:00,2024-01-10,19:00,,'
      ));
    });

    it('should list events in start order', async () => {
      expect((await service.listAll()).map(event => event.subject)).toEqual(['Meeting', 'Lunch', 'Gym']);
    });

    it('should search subjects and descriptions', async () => {
      expect((await service.search('meeting')).map(event => event.subject)).toEqual(['Meeting', 'Lunch']);
    });

    it('should clear every event', async () => {
      expect(await service.clearAll()).toBe(3);
      expect(await service.listAll()).toEqual([]);
    });
  });

  describe('ordering', () => {
    it('should run operations one at a time in arrival order', async () => {
      const sync = service.syncCsv(csv(MEETING));
      const listed = service.listAll();
      const cleared = service.clearAll();
      const after = service.count();

      await sync;
      expect((await listed).map(event => event.subject)).toEqual(['Meeting']);
      expect(await cleared).toBe(1);
      expect(await after).toBe(0);
    });

    it('should keep serving after a failed operation', async () => {
      await expect(service.syncCsv('')).rejects.toBeInstanceOf(ValidationError);
      expect(await service.count()).toBe(0);
    });
  });

  describe('syncSettingsFrom', () => {
    it('should take the calendar and time sections of the application configuration', () => {
      expect(syncSettingsFrom({
        server: { port: 3001, host: 'localhost', autoStart: false },
        database: { path: ':memory:' },
        time: { mode: 'zoned', zone: 'Europe/Berlin' },
        calendar: { name: 'Team', allDayDetection: 'threshold', thresholdHours: 20, documents: [{ fileName: 'team.ics' }] }
      })).toEqual({
        time: { mode: 'zoned', zone: 'Europe/Berlin' },
        calendarName: 'Team',
        allDayDetection: 'threshold',
        thresholdHours: 20,
        documents: [{ fileName: 'team.ics' }]
      });
    });
  });
});
