/**
 * HTTP Bridge for local front ends
 * Provides REST endpoints for syncing, browsing and publishing, plus a local
 * preview of every rendered calendar document
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { URL } from 'url';
import { ConfigManager } from '../services/ConfigManager.js';
import { SyncService } from '../services/SyncService.js';
import { describeChanges } from '../services/Reconciler.js';
import { PublishedDocument } from '../types/calendar.js';
import { AppConfig } from '../types/config.js';
import { SyncError, SyncErrorCode, errorMessage } from '../utils/errors.js';
import { toEventView } from './tools/ToolHandlers.js';

export interface BridgeConfig {
  port: number;
  host: string;
  maxBodyBytes?: number;
}

export interface StatusUpdate {
  timestamp: Date;
  serverStatus: 'running' | 'error' | 'starting' | 'stopped';
  events: number;
  publishing: boolean;
  lastSyncAt: Date | null;
  documents: PublishedDocument[];
}

const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;

const STATUS_BY_CODE: Record<SyncErrorCode, number> = {
  VALIDATION_ERROR: 400,
  PARSE_ERROR: 400,
  STORE_ERROR: 500,
  SERIALIZATION_ERROR: 500,
  PUBLISH_ERROR: 502
};

class HttpError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export class HTTPBridge {
  private server: ReturnType<typeof createServer> | null = null;
  private configManager: ConfigManager;
  private syncService: SyncService;
  private config: BridgeConfig;

  constructor(
    configManager: ConfigManager,
    syncService: SyncService,
    config: BridgeConfig = { port: 3001, host: 'localhost' }
  ) {
    this.configManager = configManager;
    this.syncService = syncService;
    this.config = config;
  }

  /**
   * Start the HTTP bridge server. Port 0 picks a free port; see getAddress()
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('HTTP bridge is already running');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        console.error('Error handling HTTP bridge request:', error);
        this.sendErrorResponse(res, 500, 'Internal server error');
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', error => {
        this.server = null;
        reject(error);
      });
      server.listen(this.config.port, this.config.host, () => {
        const address = this.getAddress();
        console.error(`HTTP bridge listening on ${address?.address}:${address?.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP bridge server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close(error => {
        this.server = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Bound address while running
   */
  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Handle incoming HTTP requests
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Enable CORS for local development
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    try {
      // Route requests to appropriate handlers
      if (path === '/api/status' && method === 'GET') {
        await this.handleGetStatus(res);
      } else if (path === '/api/events' && method === 'GET') {
        await this.handleGetEvents(res, url.searchParams.get('q'));
      } else if (path === '/api/events' && method === 'DELETE') {
        await this.handleClearEvents(res);
      } else if (path === '/api/sync' && method === 'POST') {
        await this.handleSync(req, res);
      } else if (path === '/api/publish' && method === 'POST') {
        await this.handlePublish(res);
      } else if (path === '/api/config' && method === 'GET') {
        this.handleGetConfig(res);
      } else if (path.startsWith('/calendar/') && method === 'GET') {
        await this.handleGetCalendar(res, decodeURIComponent(path.slice('/calendar/'.length)));
      } else {
        this.sendErrorResponse(res, 404, 'Not found');
      }
    } catch (error) {
      this.sendFailure(res, error);
    }
  }

  /**
   * Handle GET /api/status - store size and the last publication
   */
  private async handleGetStatus(res: ServerResponse): Promise<void> {
    const status: StatusUpdate = {
      timestamp: new Date(),
      serverStatus: 'running',
      events: await this.syncService.count(),
      publishing: this.syncService.isPublishingEnabled(),
      lastSyncAt: this.syncService.getLastSyncAt(),
      documents: this.syncService.getLastPublished()
    };

    this.sendJsonResponse(res, 200, status);
  }

  /**
   * Handle GET /api/events[?q=] - list all events, or those matching q
   */
  private async handleGetEvents(res: ServerResponse, query: string | null): Promise<void> {
    const events = query === null
      ? await this.syncService.listAll()
      : await this.syncService.search(query);

    this.sendJsonResponse(res, 200, { total: events.length, events: events.map(toEventView) });
  }

  /**
   * Handle DELETE /api/events - remove every stored event
   */
  private async handleClearEvents(res: ServerResponse): Promise<void> {
    const removed = await this.syncService.clearAll();
    this.sendJsonResponse(res, 200, { removed });
  }

  /**
   * Handle POST /api/sync - body is the CSV table
   */
  private async handleSync(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const csv = await this.readRequestBody(req);
    if (csv.trim() === '') {
      throw new HttpError(400, 'Request body must contain CSV text');
    }

    const outcome = await this.syncService.syncCsv(csv);
    this.sendJsonResponse(res, 200, {
      summary: describeChanges(outcome.changes),
      changes: outcome.changes,
      duplicate_keys: outcome.duplicateKeys,
      published: outcome.published,
      documents: outcome.documents
    });
  }

  /**
   * Handle POST /api/publish - regenerate and republish without new input
   */
  private async handlePublish(res: ServerResponse): Promise<void> {
    const documents = await this.syncService.regenerateAndRepublish();
    this.sendJsonResponse(res, 200, { published: this.syncService.isPublishingEnabled(), documents });
  }

  /**
   * Handle GET /api/config - current configuration without the publish token
   */
  private handleGetConfig(res: ServerResponse): void {
    this.sendJsonResponse(res, 200, redactConfig(this.configManager.getConfig()));
  }

  /**
   * Handle GET /calendar/<file> - the document as it would be published
   */
  private async handleGetCalendar(res: ServerResponse, fileName: string): Promise<void> {
    const documents = await this.syncService.renderDocuments();
    const document = documents.find(candidate => candidate.fileName === fileName);

    if (!document) {
      this.sendErrorResponse(res, 404, `No calendar document named ${fileName}`);
      return;
    }

    res.setHeader('Content-Type', 'text/calendar; charset=utf-8');
    res.writeHead(200);
    res.end(document.content);
  }

  /**
   * Read request body as string
   */
  private async readRequestBody(req: IncomingMessage): Promise<string> {
    const limit = this.config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size <= limit) {
          chunks.push(chunk);
        }
      });
      req.on('end', () => {
        if (size > limit) {
          reject(new HttpError(413, `Request body exceeds ${limit} bytes`));
          return;
        }
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      req.on('error', reject);
    });
  }

  private sendFailure(res: ServerResponse, error: unknown): void {
    if (error instanceof HttpError) {
      this.sendErrorResponse(res, error.statusCode, error.message);
      return;
    }

    if (error instanceof SyncError) {
      console.error(`Request failed with ${error.code}: ${error.message}`);
      this.sendJsonResponse(res, STATUS_BY_CODE[error.code], {
        error: error.message,
        code: error.code,
        details: error.details
      });
      return;
    }

    console.error('Request handler error:', error);
    this.sendErrorResponse(res, 500, errorMessage(error));
  }

  /**
   * Send JSON response
   */
  private sendJsonResponse(res: ServerResponse, statusCode: number, data: unknown): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    res.setHeader('Content-Type', 'application/json');
    res.writeHead(statusCode);
    res.end(JSON.stringify(data, null, 2));
  }

  /**
   * Send error response
   */
  private sendErrorResponse(res: ServerResponse, statusCode: number, message: string): void {
    this.sendJsonResponse(res, statusCode, { error: message });
  }
}

export function redactConfig(config: AppConfig): AppConfig {
  if (!config.publish?.token) {
    return config;
  }
  return { ...config, publish: { ...config.publish, token: '***' } };
}
