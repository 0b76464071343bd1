/**
 * Persistent event store backed by sqlite3
 */

import sqlite3 from 'sqlite3';
const { Database } = sqlite3;
type Database = sqlite3.Database;
import { EventFields, NormalizedEvent, PersistedEvent } from '../types/calendar.js';
import { StoreError, errorMessage } from '../utils/errors.js';

type SqlParam = string | number | null;

interface EventRecordRow {
  id: number;
  natural_key: string;
  subject: string;
  start_local: string;
  end_local: string;
  time_zone: string | null;
  location: string;
  description: string;
  created_at: number;
  updated_at: number;
}

interface RunResult {
  changes: number;
  lastID: number;
}

/**
 * Write operations the reconciler needs inside a transaction
 */
export interface EventWriter {
  insert(event: NormalizedEvent): Promise<PersistedEvent>;
  upsert(event: NormalizedEvent): Promise<PersistedEvent>;
  deleteByKey(naturalKey: string): Promise<boolean>;
}

export interface EventReader {
  listAll(): Promise<PersistedEvent[]>;
  getByKey(naturalKey: string): Promise<PersistedEvent | null>;
  search(text: string): Promise<PersistedEvent[]>;
  count(): Promise<number>;
}

export class EventStore implements EventReader, EventWriter {
  private db: Database;
  private inTransaction = false;
  private initPromise: Promise<void>;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.initPromise = this.initializeDatabase();
  }

  private async initializeDatabase(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        natural_key TEXT NOT NULL UNIQUE,
        subject TEXT NOT NULL,
        start_local TEXT NOT NULL,
        end_local TEXT NOT NULL,
        time_zone TEXT,
        location TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    await this.run(`CREATE INDEX IF NOT EXISTS idx_events_start_local ON events(start_local)`);
  }

  private run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) {
          reject(err);
        } else {
          resolve({ changes: this.changes, lastID: this.lastID });
        }
      });
    });
  }

  private all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all<T>(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(err);
        } else {
          resolve(rows);
        }
      });
    });
  }

  private get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get<T>(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(err);
        } else {
          resolve(row);
        }
      });
    });
  }

  private async ready(): Promise<void> {
    try {
      await this.initPromise;
    } catch (error) {
      throw new StoreError(`Failed to initialize event store: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Runs the work inside one transaction: everything it writes commits together
   * or is rolled back when it throws
   */
  async transaction<T>(work: (writer: EventWriter & EventReader) => Promise<T>): Promise<T> {
    await this.ready();

    if (this.inTransaction) {
      throw new StoreError('A transaction is already open on this store');
    }

    this.inTransaction = true;
    try {
      await this.run('BEGIN IMMEDIATE');
      let result: T;
      try {
        result = await work(this);
        await this.run('COMMIT');
      } catch (error) {
        try {
          await this.run('ROLLBACK');
        } catch (rollbackError) {
          console.error('[EventStore] Rollback failed:', rollbackError);
        }
        throw error;
      }
      return result;
    } catch (error) {
      if (error instanceof StoreError || !(error instanceof Error) || !isSqliteError(error)) {
        throw error;
      }
      throw new StoreError(`Transaction failed: ${error.message}`, { cause: error });
    } finally {
      this.inTransaction = false;
    }
  }

  async insert(event: NormalizedEvent): Promise<PersistedEvent> {
    await this.ready();
    const now = Date.now();

    try {
      const result = await this.run(`
        INSERT INTO events (
          natural_key, subject, start_local, end_local, time_zone,
          location, description, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [event.naturalKey, ...fieldParams(event), now, now]);

      return {
        id: result.lastID,
        naturalKey: event.naturalKey,
        ...copyFields(event),
        createdAt: new Date(now),
        updatedAt: new Date(now)
      };
    } catch (error) {
      throw new StoreError(`Failed to insert event '${event.naturalKey}': ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Inserts the event or overwrites every mutable field of the event holding its key
   */
  async upsert(event: NormalizedEvent): Promise<PersistedEvent> {
    await this.ready();
    const now = Date.now();

    try {
      await this.run(`
        INSERT INTO events (
          natural_key, subject, start_local, end_local, time_zone,
          location, description, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(natural_key) DO UPDATE SET
          subject = excluded.subject,
          start_local = excluded.start_local,
          end_local = excluded.end_local,
          time_zone = excluded.time_zone,
          location = excluded.location,
          description = excluded.description,
          updated_at = excluded.updated_at
      `, [event.naturalKey, ...fieldParams(event), now, now]);
    } catch (error) {
      throw new StoreError(`Failed to write event '${event.naturalKey}': ${errorMessage(error)}`, { cause: error });
    }

    const stored = await this.getByKey(event.naturalKey);
    if (!stored) {
      throw new StoreError(`Event '${event.naturalKey}' missing after write`);
    }
    return stored;
  }

  async deleteByKey(naturalKey: string): Promise<boolean> {
    await this.ready();

    try {
      const result = await this.run('DELETE FROM events WHERE natural_key = ?', [naturalKey]);
      return result.changes > 0;
    } catch (error) {
      throw new StoreError(`Failed to delete event '${naturalKey}': ${errorMessage(error)}`, { cause: error });
    }
  }

  async getByKey(naturalKey: string): Promise<PersistedEvent | null> {
    await this.ready();
    const row = await this.query(() => this.get<EventRecordRow>('SELECT * FROM events WHERE natural_key = ?', [naturalKey]));
    return row ? this.rowToEvent(row) : null;
  }

  async listAll(): Promise<PersistedEvent[]> {
    await this.ready();
    const rows = await this.query(() => this.all<EventRecordRow>('SELECT * FROM events ORDER BY start_local ASC, id ASC'));
    return rows.map(row => this.rowToEvent(row));
  }

  /**
   * Substring match over subject or description. Matching follows SQLite LIKE,
   * which ignores case for ASCII letters only.
   */
  async search(text: string): Promise<PersistedEvent[]> {
    await this.ready();
    const pattern = `%${escapeLike(text)}%`;
    const rows = await this.query(() => this.all<EventRecordRow>(`
      SELECT * FROM events
      WHERE subject LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\'
      ORDER BY start_local ASC, id ASC
    `, [pattern, pattern]));
    return rows.map(row => this.rowToEvent(row));
  }

  async count(): Promise<number> {
    await this.ready();
    const result = await this.query(() => this.get<{ count: number }>('SELECT COUNT(*) AS count FROM events'));
    return result?.count ?? 0;
  }

  /**
   * Remove every persisted event; returns how many were removed
   */
  async clearAll(): Promise<number> {
    await this.ready();

    try {
      const result = await this.run('DELETE FROM events');
      return result.changes;
    } catch (error) {
      throw new StoreError(`Failed to clear events: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async query<T>(read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw new StoreError(`Failed to read events: ${errorMessage(error)}`, { cause: error });
    }
  }

  private rowToEvent(row: EventRecordRow): PersistedEvent {
    return {
      id: row.id,
      naturalKey: row.natural_key,
      subject: row.subject,
      start: { local: row.start_local, zone: row.time_zone },
      end: { local: row.end_local, zone: row.time_zone },
      location: row.location,
      description: row.description,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }

  async close(): Promise<void> {
    try {
      await this.initPromise;
    } catch (error) {
      console.error('[EventStore] Closing store that failed to initialize:', error);
    }

    return new Promise((resolve, reject) => {
      this.db.close((err: Error | null) => {
        if (err && !isMisuse(err)) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}

function fieldParams(event: EventFields): SqlParam[] {
  return [
    event.subject,
    event.start.local,
    event.end.local,
    event.start.zone,
    event.location,
    event.description
  ];
}

function copyFields(event: EventFields): EventFields {
  return {
    subject: event.subject,
    start: { ...event.start },
    end: { ...event.end },
    location: event.location,
    description: event.description
  };
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, match => `\\${match}`);
}

function isSqliteError(error: Error): boolean {
  return 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_');
}

function isMisuse(error: Error): boolean {
  return 'code' in error && error.code === 'SQLITE_MISUSE';
}
