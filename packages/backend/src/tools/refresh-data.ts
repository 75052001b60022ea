/**
 * refresh_data
 * Drops cached aggregates so the next read goes to the sensor store.
 * Admin only.
 */

import { config } from '../config/index.js';
import { oneOf, requireString } from './args.js';
import { ROW_QUERIES, UNIQUE_VALUES_QUERY } from './query.js';
import type { EngineServices, ReadOnlyTool } from './types.js';

const SCOPES = ['all', 'aggregates', 'filter_options'] as const;
type RefreshScope = (typeof SCOPES)[number];

function invalidate(cache: EngineServices['cache'], scope: RefreshScope): number {
  switch (scope) {
    case 'all':
      return cache.invalidateAll();
    case 'aggregates':
      return cache.invalidateWhere((key) => ROW_QUERIES.some((query) => key.startsWith(`${query}:`)));
    case 'filter_options':
      return cache.invalidateWhere((key) => key.startsWith(`${UNIQUE_VALUES_QUERY}:`));
  }
}

export const refreshDataTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.cacheFetchMs,
  definition: {
    name: 'refresh_data',
    description: 'Discard cached sensor aggregates and filter options.',
    role: 'admin',
    sideEffect: 'read-only',
    parameters: [{ name: 'scope', type: 'string', required: false, description: 'What to refresh', enum: SCOPES, default: 'all' }],
  },

  async execute(args, context) {
    const scope = oneOf(requireString(args, 'scope'), SCOPES) ?? 'all';
    const invalidated = invalidate(context.services.cache, scope);

    context.log.info({ scope, invalidated }, 'Cached data refreshed');
    return { scope, invalidated };
  },
};
