import { DocumentContent, Publisher } from '../interfaces/Publisher.js';
import { PublishedDocument } from '../types/calendar.js';
import { PublishError, errorMessage } from '../utils/errors.js';

export interface GistPublisherConfig {
  gistId: string;
  token: string;
  apiUrl?: string;
  timeout?: number;
}

/**
 * Publishes calendar documents as files of a GitHub Gist
 *
 * EXTERNAL SETUP REQUIRED:
 * - An existing gist to overwrite
 * - A token with the gist scope
 */
export class GistPublisher implements Publisher {
  private readonly apiUrl: string;
  private readonly httpTimeout: number;

  constructor(private readonly config: GistPublisherConfig) {
    this.apiUrl = (config.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.httpTimeout = config.timeout ?? 30000;
  }

  async publish(fileName: string, content: string): Promise<string> {
    const [published] = await this.publishAll([{ fileName, content }]);
    return published.url;
  }

  async publishAll(documents: DocumentContent[]): Promise<PublishedDocument[]> {
    if (documents.length === 0) {
      return [];
    }

    const files: Record<string, { content: string }> = {};
    for (const document of documents) {
      files[document.fileName] = { content: document.content };
    }

    const body = await this.patchGist(files);

    return documents.map(document => {
      const rawUrl = extractRawUrl(body, document.fileName);
      if (!rawUrl) {
        throw new PublishError(`Gist response has no raw_url for ${document.fileName}`);
      }
      return { fileName: document.fileName, url: deriveStableUrl(rawUrl, document.fileName) };
    });
  }

  private async patchGist(files: Record<string, { content: string }>): Promise<unknown> {
    const url = `${this.apiUrl}/gists/${encodeURIComponent(this.config.gistId)}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.httpTimeout);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'PATCH',
        signal: controller.signal,
        headers: {
          'Authorization': `token ${this.config.token}`,
          'Accept': 'application/vnd.github.v3+json',
          'Content-Type': 'application/json',
          'User-Agent': 'CalendarSync/1.0'
        },
        body: JSON.stringify({ files })
      });
    } catch (error) {
      throw new PublishError(`Failed to reach gist host: ${errorMessage(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const detail = await response.text().catch((error: unknown) => errorMessage(error));
      throw new PublishError(`Gist update failed: HTTP ${response.status} ${response.statusText} ${detail}`.trim(), response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new PublishError(`Gist host returned an unreadable response: ${errorMessage(error)}`, response.status, { cause: error });
    }
  }
}

function extractRawUrl(body: unknown, fileName: string): string | null {
  if (!body || typeof body !== 'object' || !('files' in body)) return null;
  const files = body.files;
  if (!files || typeof files !== 'object' || !(fileName in files)) return null;
  const file: unknown = Object.getOwnPropertyDescriptor(files, fileName)?.value;
  if (!file || typeof file !== 'object' || !('raw_url' in file)) return null;
  return typeof file.raw_url === 'string' ? file.raw_url : null;
}

/**
 * Drops the revision segment from a raw URL of the form
 * <host>/<owner>/<gist-id>/raw/<revision>/<file>, giving a URL that always
 * serves the latest revision
 */
export function deriveStableUrl(rawUrl: string, fileName: string): string {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch (error) {
    throw new PublishError(`Invalid raw URL from gist host: ${rawUrl}`, undefined, { cause: error });
  }

  const [owner, gistId] = parsed.pathname.split('/').filter(Boolean);
  if (!owner || !gistId) {
    throw new PublishError(`Unexpected raw URL layout: ${rawUrl}`);
  }

  return `${parsed.origin}/${owner}/${gistId}/raw/${encodeURIComponent(fileName)}`;
}
