import { PublishedDocument } from '../types/calendar.js';

export interface DocumentContent {
  fileName: string;
  content: string;
}

/**
 * Interface for hosts that serve rendered calendar documents
 */
export interface Publisher {
  /**
   * Overwrite one named slot and return its stable retrieval URL
   */
  publish(fileName: string, content: string): Promise<string>;

  /**
   * Overwrite several slots in one request
   */
  publishAll(documents: DocumentContent[]): Promise<PublishedDocument[]>;
}
