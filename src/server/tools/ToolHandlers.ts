/**
 * MCP Tool Handlers - Implementation of tool logic
 */

import {
  ClearEventsResponse,
  EmptyParams,
  EventListResponse,
  EventView,
  MCPError,
  MCPResponse,
  RepublishResponse,
  SearchEventsParams,
  SyncEventsParams,
  SyncEventsResponse
} from '../../types/mcp.js';
import { PersistedEvent } from '../../types/calendar.js';
import { SyncService } from '../../services/SyncService.js';
import { describeChanges } from '../../services/Reconciler.js';
import { SyncError, errorMessage } from '../../utils/errors.js';

/**
 * Handler for sync_events tool
 * Reconciles the store against the CSV and republishes
 */
export async function handleSyncEvents(
  params: SyncEventsParams,
  syncService: SyncService
): Promise<MCPResponse<SyncEventsResponse>> {
  try {
    console.error(`Handling sync_events with ${params.csv.length} characters of CSV`);
    const outcome = await syncService.syncCsv(params.csv);

    return {
      content: {
        summary: describeChanges(outcome.changes),
        changes: outcome.changes,
        duplicate_keys: outcome.duplicateKeys,
        published: outcome.published,
        documents: outcome.documents
      }
    };
  } catch (error) {
    console.error('Error in handleSyncEvents:', error);
    return { error: toMCPError(error, 'SYNC_FAILED') };
  }
}

/**
 * Handler for list_events tool
 */
export async function handleListEvents(
  _params: EmptyParams,
  syncService: SyncService
): Promise<MCPResponse<EventListResponse>> {
  try {
    const events = await syncService.listAll();
    return { content: { total: events.length, events: events.map(toEventView) } };
  } catch (error) {
    console.error('Error in handleListEvents:', error);
    return { error: toMCPError(error, 'LIST_FAILED') };
  }
}

/**
 * Handler for search_events tool
 * An empty query matches every event
 */
export async function handleSearchEvents(
  params: SearchEventsParams,
  syncService: SyncService
): Promise<MCPResponse<EventListResponse>> {
  try {
    const events = await syncService.search(params.query);
    return { content: { total: events.length, events: events.map(toEventView) } };
  } catch (error) {
    console.error('Error in handleSearchEvents:', error);
    return { error: toMCPError(error, 'SEARCH_FAILED') };
  }
}

/**
 * Handler for clear_events tool
 */
export async function handleClearEvents(
  _params: EmptyParams,
  syncService: SyncService
): Promise<MCPResponse<ClearEventsResponse>> {
  try {
    const removed = await syncService.clearAll();
    return { content: { removed } };
  } catch (error) {
    console.error('Error in handleClearEvents:', error);
    return { error: toMCPError(error, 'CLEAR_FAILED') };
  }
}

/**
 * Handler for republish_calendar tool
 */
export async function handleRepublishCalendar(
  _params: EmptyParams,
  syncService: SyncService
): Promise<MCPResponse<RepublishResponse>> {
  try {
    const documents = await syncService.regenerateAndRepublish();
    return { content: { published: syncService.isPublishingEnabled(), documents } };
  } catch (error) {
    console.error('Error in handleRepublishCalendar:', error);
    return { error: toMCPError(error, 'REPUBLISH_FAILED') };
  }
}

export function toEventView(event: PersistedEvent): EventView {
  return {
    uid: event.naturalKey,
    subject: event.subject,
    start: event.start.local,
    end: event.end.local,
    timeZone: event.start.zone,
    location: event.location,
    description: event.description
  };
}

/**
 * Known failures keep their own code; anything else is reported under the fallback code
 */
export function toMCPError(error: unknown, fallbackCode: string): MCPError {
  if (error instanceof SyncError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return { code: fallbackCode, message: errorMessage(error) };
}
