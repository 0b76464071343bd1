/**
 * Shared test doubles and CSV builders
 */

import { DocumentContent, Publisher } from '../interfaces/Publisher.js';
import { PublishedDocument } from '../types/calendar.js';
import { PublishError } from '../utils/errors.js';

export const CSV_HEADER = 'Subject,Start Date,Start Time,End Date,End Time,Location,Description';

export const MEETING_ROW = 'Meeting,2024-01-10,09:00,2024-01-10,10:00,Room1,';

export function csv(...rows: string[]): string {
  return [CSV_HEADER, ...rows].join('\n') + '\n';
}

/**
 * Records every batch instead of calling a host
 */
export class FakePublisher implements Publisher {
  batches: DocumentContent[][] = [];
  failure: PublishError | null = null;

  async publish(fileName: string, content: string): Promise<string> {
    const [published] = await this.publishAll([{ fileName, content }]);
    return published.url;
  }

  async publishAll(documents: DocumentContent[]): Promise<PublishedDocument[]> {
    if (this.failure) {
      throw this.failure;
    }
    this.batches.push(documents);
    return documents.map(document => ({
      fileName: document.fileName,
      url: `https://gist.example.test/octo/g1/raw/${document.fileName}`
    }));
  }
}
