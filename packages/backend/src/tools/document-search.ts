/**
 * document_search
 * Passages from the report library relevant to a question
 */

import { config } from '../config/index.js';
import { optionalNumber, requireString } from './args.js';
import type { DocumentPassage } from '../services/document-search.js';
import type { ReadOnlyTool } from './types.js';

export const DEFAULT_TOP_K = 5;

export function toWirePassage(passage: DocumentPassage) {
  return {
    chunk_id: passage.chunkId,
    document_id: passage.documentId,
    title: passage.title ?? null,
    text: passage.text,
    start: passage.start,
    end: passage.end,
    ...(passage.score !== undefined && { score: passage.score }),
  };
}

export const documentSearchTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.documentSearchMs,
  definition: {
    name: 'document_search',
    description: 'Search the air-quality report library. Returns the best matching passages with their chunk ids.',
    role: 'none',
    sideEffect: 'read-only',
    parameters: [
      { name: 'query', type: 'string', required: true, description: 'Search text', minLength: 1, maxLength: 500 },
      {
        name: 'top_k',
        type: 'integer',
        required: false,
        description: 'Maximum passages to return',
        min: 1,
        max: 20,
        default: DEFAULT_TOP_K,
      },
    ],
  },

  async execute(args, context) {
    const query = requireString(args, 'query');
    const topK = optionalNumber(args, 'top_k') ?? DEFAULT_TOP_K;
    const passages = await context.services.documents.search(query, topK);
    context.log.debug({ topK, found: passages.length }, 'Document search complete');
    return passages.map(toWirePassage);
  },
};
