/**
 * resolve_document_passage
 * Full passage for a chunk id returned by document_search
 */

import { config } from '../config/index.js';
import { requireString } from './args.js';
import { toWirePassage } from './document-search.js';
import type { ReadOnlyTool } from './types.js';

export const resolveDocumentPassageTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.documentSearchMs,
  definition: {
    name: 'resolve_document_passage',
    description: 'Fetch the passage behind a chunk id from a previous document search, with its source offsets.',
    role: 'none',
    sideEffect: 'read-only',
    parameters: [{ name: 'chunk_id', type: 'string', required: true, description: 'Chunk id', minLength: 1 }],
  },

  async execute(args, context) {
    const passage = await context.services.documents.resolve(requireString(args, 'chunk_id'));
    return toWirePassage(passage);
  },
};
