/**
 * In-memory document index
 * Fixed-size character chunks with overlap, scored by query term overlap.
 * Re-adding a document replaces its chunks under a new version, so chunk
 * ids handed out earlier stop resolving.
 */

import type { SourceDocument } from './fixtures.js';
import type { DocumentIndex, IndexedChunk, ScoredChunk } from './types.js';

export interface ChunkingOptions {
  chunkSize?: number;
  overlap?: number;
}

interface StoredChunk extends IndexedChunk {
  terms: Set<string>;
}

const DEFAULT_CHUNK_SIZE = 400;
const DEFAULT_OVERLAP = 80;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Split text into [start, end) windows. A window ends at the last
 * whitespace inside it when there is one, so words stay whole.
 */
export function chunkOffsets(text: string, chunkSize: number, overlap: number): Array<[number, number]> {
  const windows: Array<[number, number]> = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      const lastSpace = text.lastIndexOf(' ', end);
      if (lastSpace > start) end = lastSpace;
    }
    windows.push([start, end]);
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
    while (start < end && text[start] === ' ') start += 1;
  }
  return windows;
}

export class InMemoryDocumentIndex implements DocumentIndex {
  readonly name = 'in-memory';
  private chunks = new Map<string, StoredChunk>();
  private versions = new Map<string, number>();
  private readonly chunkSize: number;
  private readonly overlap: number;

  constructor(options: ChunkingOptions = {}) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.overlap = Math.min(options.overlap ?? DEFAULT_OVERLAP, this.chunkSize - 1);
  }

  get chunkCount(): number {
    return this.chunks.size;
  }

  /**
   * Index a document, returning the ids of its chunks
   */
  addDocument(document: SourceDocument): string[] {
    this.removeDocument(document.id);
    const version = (this.versions.get(document.id) ?? 0) + 1;
    this.versions.set(document.id, version);

    const ids: string[] = [];
    chunkOffsets(document.text, this.chunkSize, this.overlap).forEach(([start, end], index) => {
      const chunkId = `${document.id}:v${version}:${index}`;
      const text = document.text.slice(start, end);
      this.chunks.set(chunkId, {
        chunkId,
        documentId: document.id,
        title: document.title,
        text,
        start,
        end,
        terms: new Set(tokenize(text)),
      });
      ids.push(chunkId);
    });
    return ids;
  }

  removeDocument(documentId: string): number {
    let removed = 0;
    for (const [chunkId, chunk] of this.chunks) {
      if (chunk.documentId === documentId) {
        this.chunks.delete(chunkId);
        removed += 1;
      }
    }
    return removed;
  }

  async search(text: string, topK: number): Promise<ScoredChunk[]> {
    const queryTerms = Array.from(new Set(tokenize(text)));
    if (queryTerms.length === 0) return [];

    const scored: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      const matched = queryTerms.filter((term) => chunk.terms.has(term)).length;
      if (matched === 0) continue;
      scored.push({ ...toIndexed(chunk), score: Math.round((matched / queryTerms.length) * 10000) / 10000 });
    }

    return scored
      .sort((a, b) => b.score - a.score || a.chunkId.localeCompare(b.chunkId))
      .slice(0, topK);
  }

  async getChunk(chunkId: string): Promise<IndexedChunk | null> {
    const chunk = this.chunks.get(chunkId);
    return chunk ? toIndexed(chunk) : null;
  }
}

function toIndexed(chunk: StoredChunk): IndexedChunk {
  return {
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    title: chunk.title,
    text: chunk.text,
    start: chunk.start,
    end: chunk.end,
  };
}
