/**
 * Document Search Adapter
 * Read-only façade over the semantic document index
 */

import { logger } from '../utils/logger.js';
import { AppError, UnknownChunkError, UpstreamUnavailableError } from '../utils/errors.js';
import type { DocumentIndex, IndexedChunk, ScoredChunk } from '../providers/types.js';

export interface DocumentPassage {
  readonly chunkId: string;
  readonly documentId: string;
  readonly title?: string;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly score?: number;
}

function toPassage(chunk: IndexedChunk, score?: number): DocumentPassage {
  return Object.freeze({
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    ...(chunk.title !== undefined && { title: chunk.title }),
    text: chunk.text,
    start: chunk.start,
    end: chunk.end,
    ...(score !== undefined && { score }),
  });
}

export class DocumentSearchAdapter {
  constructor(private readonly index: DocumentIndex) {}

  /**
   * At most `topK` passages, best first. Equal scores order by chunk id.
   */
  async search(query: string, topK: number): Promise<DocumentPassage[]> {
    let results: ScoredChunk[];
    try {
      results = await this.index.search(query, topK);
    } catch (error) {
      throw this.upstream('Document search failed', error);
    }

    return [...results]
      .sort((a, b) => b.score - a.score || a.chunkId.localeCompare(b.chunkId))
      .slice(0, topK)
      .map((chunk) => toPassage(chunk, chunk.score));
  }

  /**
   * Passage for a chunk id previously returned by search
   */
  async resolve(chunkId: string): Promise<DocumentPassage> {
    let chunk: IndexedChunk | null;
    try {
      chunk = await this.index.getChunk(chunkId);
    } catch (error) {
      throw this.upstream('Document lookup failed', error);
    }

    if (!chunk) {
      throw new UnknownChunkError(chunkId);
    }
    return toPassage(chunk);
  }

  private upstream(message: string, error: unknown): AppError {
    if (error instanceof AppError) return error;
    logger.error({ err: error, index: this.index.name }, message);
    return new UpstreamUnavailableError(message, `document-index:${this.index.name}`, error);
  }
}
