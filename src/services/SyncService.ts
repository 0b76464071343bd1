/**
 * Sync Service - runs sync cycles, regeneration and queries against the event store
 * Operations run one at a time in arrival order.
 */

import { DocumentContent, Publisher } from '../interfaces/Publisher.js';
import {
  AllDayDetection,
  CalendarDocumentProfile,
  EventTable,
  PersistedEvent,
  PublishedDocument,
  SyncOutcome,
  TimeConfig
} from '../types/calendar.js';
import { AppConfig } from '../types/config.js';
import { parseEventRows, parseTable, toEventRows } from '../utils/eventParser.js';
import { SerializationError, SyncError, errorMessage } from '../utils/errors.js';
import { CalendarSerializer, escapeText, readCalendarIdentities, unescapeText } from './CalendarSerializer.js';
import { EventStore } from './EventStore.js';
import {
  applyReconciliation,
  describeChanges,
  indexExisting,
  indexIncoming,
  isEmptySummary,
  planReconciliation
} from './Reconciler.js';

export interface SyncServiceConfig {
  time: TimeConfig;
  calendarName?: string;
  allDayDetection: AllDayDetection;
  thresholdHours: number;
  documents: CalendarDocumentProfile[];
  now?: () => Date;
}

export class SyncService {
  private store: EventStore;
  private publisher: Publisher | null;
  private config: SyncServiceConfig;
  private queue: Promise<unknown> = Promise.resolve();
  private lastPublished: PublishedDocument[] = [];
  private lastSyncAt: Date | null = null;

  constructor(store: EventStore, config: SyncServiceConfig, publisher: Publisher | null = null) {
    this.store = store;
    this.config = config;
    this.publisher = publisher;
  }

  /**
   * Swap settings between cycles, e.g. after the configuration file changed
   */
  configure(config: SyncServiceConfig, publisher: Publisher | null): void {
    this.config = config;
    this.publisher = publisher;
  }

  isPublishingEnabled(): boolean {
    return this.publisher !== null;
  }

  getLastPublished(): PublishedDocument[] {
    return [...this.lastPublished];
  }

  getLastSyncAt(): Date | null {
    return this.lastSyncAt;
  }

  /**
   * Full sync cycle from CSV text
   */
  async syncCsv(csvText: string): Promise<SyncOutcome> {
    return this.syncTable(parseTable(csvText));
  }

  /**
   * Validate, parse, reconcile in one transaction, then regenerate and publish.
   * Validation and parse failures leave the store untouched. A publish failure
   * leaves this cycle's changes committed and reports them on the error.
   */
  async syncTable(table: EventTable): Promise<SyncOutcome> {
    return this.exclusive(async () => {
      const timeConfig = this.config.time;
      const events = parseEventRows(toEventRows(table), timeConfig);
      const { events: incoming, duplicateKeys } = indexIncoming(events);

      if (duplicateKeys.length > 0) {
        console.error(`[SyncService] ${duplicateKeys.length} duplicate keys collapsed to their last row: ${duplicateKeys.join(', ')}`);
      }

      const changes = await this.store.transaction(async (tx) => {
        const existing = indexExisting(await tx.listAll());
        const plan = planReconciliation(existing, incoming);
        return applyReconciliation(plan, tx);
      });

      this.lastSyncAt = this.now();
      console.error(isEmptySummary(changes)
        ? '[SyncService] Sync committed with no changes'
        : `[SyncService] Sync committed\n${describeChanges(changes)}`);

      try {
        const documents = await this.regenerate();
        return { changes, duplicateKeys, documents, published: this.publisher !== null };
      } catch (error) {
        // the store already holds this cycle's changes; every failure from here on reports them
        const failure = error instanceof SyncError
          ? error
          : new SerializationError(`Failed to regenerate documents: ${errorMessage(error)}`);
        throw failure.withChanges(changes);
      }
    });
  }

  /**
   * Rebuild every document from the persisted set and publish it; no new input needed
   */
  async regenerateAndRepublish(): Promise<PublishedDocument[]> {
    return this.exclusive(() => this.regenerate());
  }

  /**
   * Render every configured document without publishing
   */
  async renderDocuments(): Promise<DocumentContent[]> {
    return this.exclusive(async () => this.render(await this.store.listAll()));
  }

  async listAll(): Promise<PersistedEvent[]> {
    return this.exclusive(() => this.store.listAll());
  }

  async search(text: string): Promise<PersistedEvent[]> {
    return this.exclusive(() => this.store.search(text));
  }

  async clearAll(): Promise<number> {
    return this.exclusive(async () => {
      const removed = await this.store.clearAll();
      console.error(`[SyncService] Cleared ${removed} events`);
      return removed;
    });
  }

  async count(): Promise<number> {
    return this.exclusive(() => this.store.count());
  }

  private async regenerate(): Promise<PublishedDocument[]> {
    const events = await this.store.listAll();
    const documents = this.render(events);

    for (const document of documents) {
      this.verifyDocument(document, events);
    }

    if (!this.publisher) {
      return [];
    }

    const published = await this.publisher.publishAll(documents);
    this.lastPublished = published;
    for (const document of published) {
      console.error(`[SyncService] Published ${document.fileName} at ${document.url}`);
    }
    return published;
  }

  private render(events: PersistedEvent[]): DocumentContent[] {
    return this.config.documents.map(profile => {
      const serializer = new CalendarSerializer(this.config.time, {
        allDayDetection: this.config.allDayDetection,
        thresholdHours: this.config.thresholdHours,
        transparency: profile.transparency,
        calendarName: this.config.calendarName,
        now: this.config.now
      });
      return { fileName: profile.fileName, content: serializer.serialize(events) };
    });
  }

  /**
   * Every persisted event must come back out of the document exactly once
   */
  private verifyDocument(document: DocumentContent, events: PersistedEvent[]): void {
    const readBack = readCalendarIdentities(document.content);
    const subjects = new Map(readBack.identities.map(identity => [identity.uid, identity.summary]));
    // keys as the document can carry them: line breaks in any form come back as \n
    const missing = events
      .filter(event => subjects.get(asCarried(event.naturalKey)) !== asCarried(event.subject))
      .map(event => event.naturalKey);

    if (readBack.eventBlocks !== events.length || readBack.parsedEvents !== events.length || missing.length > 0) {
      throw new SerializationError(`Document ${document.fileName} does not round-trip the persisted events`, {
        expected: events.length,
        event_blocks: readBack.eventBlocks,
        parsed_events: readBack.parsedEvents,
        missing
      });
    }
  }

  private now(): Date {
    return this.config.now ? this.config.now() : new Date();
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // failures reach the caller through result; the queue only keeps the order
    this.queue = result.catch(() => undefined);
    return result;
  }
}

/**
 * Sync settings carried by the application configuration
 */
export function syncSettingsFrom(config: AppConfig): SyncServiceConfig {
  return {
    time: config.time,
    calendarName: config.calendar.name,
    allDayDetection: config.calendar.allDayDetection,
    thresholdHours: config.calendar.thresholdHours,
    documents: config.calendar.documents
  };
}

function asCarried(text: string): string {
  return unescapeText(escapeText(text));
}
