/**
 * Tests for the HTTP bridge, served on an ephemeral local port
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HTTPBridge, redactConfig } from '../HTTPBridge.js';
import { ConfigManager } from '../../services/ConfigManager.js';
import { SyncService } from '../../services/SyncService.js';
import { EventStore } from '../../services/EventStore.js';
import { PublishError } from '../../utils/errors.js';
import { AppConfig } from '../../types/config.js';
import { FakePublisher, MEETING_ROW, csv } from '../../__tests__/fixtures.js';

describe('HTTPBridge', () => {
  let dir: string;
  let configManager: ConfigManager;
  let store: EventStore;
  let publisher: FakePublisher;
  let syncService: SyncService;
  let bridge: HTTPBridge;
  let baseUrl: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'calendar-sync-bridge-'));
    configManager = new ConfigManager(join(dir, 'config.json'));
    await configManager.loadConfig();

    store = new EventStore(':memory:');
    publisher = new FakePublisher();
    syncService = new SyncService(store, {
      time: { mode: 'naive' },
      allDayDetection: 'strict',
      thresholdHours: 23,
      documents: [{ fileName: 'events.ics' }],
      now: () => new Date('2024-01-05T12:00:00Z')
    }, publisher);

    bridge = new HTTPBridge(configManager, syncService, { port: 0, host: '127.0.0.1', maxBodyBytes: 1024 });
    await bridge.start();
    baseUrl = `http://127.0.0.1:${bridge.getAddress()?.port}`;
  });

  afterEach(async () => {
    await bridge.stop();
    await store.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function sync(body: string): Promise<Response> {
    return fetch(`${baseUrl}/api/sync`, { method: 'POST', headers: { 'Content-Type': 'text/csv' }, body });
  }

  describe('lifecycle', () => {
    it('should report its bound address while running', () => {
      expect(bridge.isRunning()).toBe(true);
      expect(bridge.getAddress()?.port).toBeGreaterThan(0);
    });

    it('should refuse to start twice', async () => {
      await expect(bridge.start()).rejects.toThrow('HTTP bridge is already running');
    });

    it('should release the address when stopped', async () => {
      await bridge.stop();

      expect(bridge.isRunning()).toBe(false);
      expect(bridge.getAddress()).toBeNull();
    });
  });

  describe('POST /api/sync', () => {
    it('should reconcile the uploaded table and publish', async () => {
      const response = await sync(csv(MEETING_ROW));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        summary: 'Added events: 1 (Meeting)\nUpdated events: 0\nDeleted events: 0',
        changes: { added: ['Meeting'], updated: [], deleted: [] },
        duplicate_keys: [],
        published: true,
        documents: [{ fileName: 'events.ics', url: 'https://gist.example.test/octo/g1/raw/events.ics' }]
      });
    });

    it('should reject an empty body', async () => {
      const response = await sync('  \n');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Request body must contain CSV text' });
    });

    it('should answer 400 with the reasons for an invalid table', async () => {
      const response = await sync('Subject,Start Date,Start Time,End Date,End Time,Location\n');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Invalid event table: Missing required column: Description',
        code: 'VALIDATION_ERROR',
        details: { reasons: ['Missing required column: Description'] }
      });
    });

    it('should answer 502 with the committed changes when publication fails', async () => {
      publisher.failure = new PublishError('Gist update failed: HTTP 502 Bad Gateway', 502);

      const response = await sync(csv(MEETING_ROW));

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: 'Gist update failed: HTTP 502 Bad Gateway',
        code: 'PUBLISH_ERROR',
        details: { status: 502, committed_changes: { added: ['Meeting'], updated: [], deleted: [] } }
      });
      expect(await syncService.count()).toBe(1);
    });

    it('should answer 413 for a body over the limit', async () => {
      const response = await sync(csv(...Array.from({ length: 40 }, () => MEETING_ROW)));

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({ error: 'Request body exceeds 1024 bytes' });
      expect(await syncService.count()).toBe(0);
    });
  });

  describe('events', () => {
    beforeEach(async () => {
      await syncService.syncCsv(csv(MEETING_ROW, 'Lunch,2024-01-10,12:00,2024-01-10,13:00,Cafe,Bring slides'));
    });

    it('should list every event', async () => {
      const response = await fetch(`${baseUrl}/api/events`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        total: 2,
        events: [
          { subject: 'Meeting' },
          {
            uid: 'Lunch|2024-01-10|12:00',
            subject: 'Lunch',
            start: '2024-01-10T12:00:00',
            end: '2024-01-10T13:00:00',
            timeZone: null,
            location: 'Cafe',
            description: 'Bring slides'
          }
        ]
      });
    });

    it('should search when a query is given', async () => {
      const response = await fetch(`${baseUrl}/api/events?q=${encodeURIComponent('SLIDES')}`);

      expect(await response.json()).toMatchObject({ total: 1, events: [{ subject: 'Lunch' }] });
    });

    it('should clear every event', async () => {
      const response = await fetch(`${baseUrl}/api/events`, { method: 'DELETE' });

      expect(await response.json()).toEqual({ removed: 2 });
      expect(await syncService.count()).toBe(0);
    });

    it('should report status', async () => {
      const response = await fetch(`${baseUrl}/api/status`);

      expect(await response.json()).toMatchObject({
        serverStatus: 'running',
        events: 2,
        publishing: true,
        lastSyncAt: '2024-01-05T12:00:00.000Z',
        documents: [{ fileName: 'events.ics', url: 'https://gist.example.test/octo/g1/raw/events.ics' }]
      });
    });
  });

  describe('POST /api/publish', () => {
    it('should republish the stored events', async () => {
      const response = await fetch(`${baseUrl}/api/publish`, { method: 'POST' });

      expect(await response.json()).toEqual({
        published: true,
        documents: [{ fileName: 'events.ics', url: 'https://gist.example.test/octo/g1/raw/events.ics' }]
      });
      expect(publisher.batches).toHaveLength(1);
    });

    it('should render only when publishing is disabled', async () => {
      syncService.configure({
        time: { mode: 'naive' },
        allDayDetection: 'strict',
        thresholdHours: 23,
        documents: [{ fileName: 'events.ics' }]
      }, null);

      const response = await fetch(`${baseUrl}/api/publish`, { method: 'POST' });

      expect(await response.json()).toEqual({ published: false, documents: [] });
    });
  });

  describe('GET /calendar/<file>', () => {
    it('should serve the rendered document', async () => {
      await syncService.syncCsv(csv(MEETING_ROW));

      const response = await fetch(`${baseUrl}/calendar/events.ics`);
      const text = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/calendar; charset=utf-8');
      expect(text.startsWith('BEGIN:VCALENDAR\r\n')).toBe(true);
      expect(text).toContain('\r\nUID:Meeting|2024-01-10|09:00\r\n');
    });

    it('should answer 404 for an unknown document', async () => {
      const response = await fetch(`${baseUrl}/calendar/other.ics`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'No calendar document named other.ics' });
    });
  });

  describe('GET /api/config', () => {
    it('should hide the publish token', async () => {
      await configManager.updateConfig({
        publish: { gistId: 'abc123', token: 'test-secret', apiUrl: 'https://api.github.com', timeout: 5000 }
      });

      const response = await fetch(`${baseUrl}/api/config`);

      expect(await response.json()).toMatchObject({
        publish: { gistId: 'abc123', token: '***', apiUrl: 'https://api.github.com', timeout: 5000 }
      });
    });
  });

  describe('routing', () => {
    it('should answer preflight requests', async () => {
      const response = await fetch(`${baseUrl}/api/sync`, { method: 'OPTIONS' });

      expect(response.status).toBe(200);
      expect(response.headers.get('access-control-allow-origin')).toBe('*');
    });

    it('should answer 404 for unknown routes', async () => {
      const response = await fetch(`${baseUrl}/api/unknown`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Not found' });
    });
  });
});

describe('redactConfig', () => {
  it('should leave a configuration without a token unchanged', () => {
    const config: AppConfig = {
      server: { port: 3001, host: 'localhost', autoStart: true },
      database: { path: ':memory:' },
      time: { mode: 'naive' },
      calendar: { allDayDetection: 'strict', thresholdHours: 23, documents: [{ fileName: 'events.ics' }] }
    };

    expect(redactConfig(config)).toBe(config);
  });
});
