/**
 * list_filter_options
 * Values a filter can take, as found in the sensor data
 */

import { config } from '../config/index.js';
import { oneOf, requireString } from './args.js';
import { fetchUniqueValues } from './query.js';
import type { UniqueValueField } from '../providers/types.js';
import type { ReadOnlyTool } from './types.js';

const FIELDS: readonly UniqueValueField[] = ['borough', 'pollutant', 'sensor_type', 'year'];

export const listFilterOptionsTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.cacheFetchMs,
  definition: {
    name: 'list_filter_options',
    description: 'List the values available for a filter (boroughs, pollutants, sensor types or years).',
    role: 'none',
    sideEffect: 'read-only',
    parameters: [{ name: 'field', type: 'string', required: true, description: 'Filter to list', enum: FIELDS }],
  },

  async execute(args, context) {
    const field = oneOf(requireString(args, 'field'), FIELDS) ?? 'borough';
    const values = await fetchUniqueValues(context, field);
    return { field, values };
  },
};
