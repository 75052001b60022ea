/**
 * update_filters
 * Narrows or clears the dashboard filter selection. Filters accumulate:
 * fields not mentioned keep their value.
 */

import { AVERAGING_PERIODS, BOROUGHS, MAX_YEAR, MIN_YEAR, SENSOR_TYPES } from '../config/dashboard.js';
import { POLLUTANTS } from '../config/air-quality.js';
import { applyDelta } from '../services/context-delta.js';
import { FILTER_FIELDS, type ContextDelta, type FilterField } from '../types/session.js';
import { toWireFilters } from '../utils/wire.js';
import { oneOf, optionalNumber, optionalString, optionalStringList } from './args.js';
import type { StateMutatingTool } from './types.js';

const CLEARABLE = ['borough', 'pollutant', 'sensor_type', 'year', 'month', 'averaging', 'all'] as const;

const CLEAR_TARGETS: Record<Exclude<(typeof CLEARABLE)[number], 'all'>, FilterField> = {
  borough: 'boroughs',
  pollutant: 'pollutant',
  sensor_type: 'sensorTypes',
  year: 'year',
  month: 'month',
  averaging: 'averaging',
};

function sorted(values: string[]): string[] {
  return [...values].sort();
}

export const updateFiltersTool: StateMutatingTool = {
  kind: 'state-mutating',
  definition: {
    name: 'update_filters',
    description:
      'Set or clear dashboard filters. Only the filters given change; others keep their current value. ' +
      'Use "clear" to remove filters ("all" clears every filter).',
    role: 'none',
    sideEffect: 'state-mutating',
    parameters: [
      {
        name: 'borough',
        type: 'string-list',
        required: false,
        description: 'Boroughs to show',
        enum: BOROUGHS,
        maxItems: BOROUGHS.length,
      },
      { name: 'pollutant', type: 'string', required: false, description: 'Pollutant to show', enum: POLLUTANTS },
      {
        name: 'sensor_type',
        type: 'string-list',
        required: false,
        description: 'Sensor types to show',
        enum: SENSOR_TYPES,
        maxItems: SENSOR_TYPES.length,
      },
      { name: 'year', type: 'integer', required: false, description: 'Year of measurements', min: MIN_YEAR, max: MAX_YEAR },
      { name: 'month', type: 'integer', required: false, description: 'Month (1-12), used with monthly averaging', min: 1, max: 12 },
      { name: 'averaging', type: 'string', required: false, description: 'Averaging period', enum: AVERAGING_PERIODS },
      { name: 'clear', type: 'string-list', required: false, description: 'Filters to remove', enum: CLEARABLE },
    ],
  },

  computeChange(args, state) {
    const filters: NonNullable<ContextDelta['filters']> = {};

    const clear = optionalStringList(args, 'clear') ?? [];
    for (const target of clear) {
      if (target === 'all') {
        for (const field of FILTER_FIELDS) filters[field] = null;
        continue;
      }
      const name = oneOf(target, CLEARABLE);
      if (name && name !== 'all') filters[CLEAR_TARGETS[name]] = null;
    }

    const boroughs = optionalStringList(args, 'borough');
    if (boroughs !== undefined) filters.boroughs = boroughs.length > 0 ? sorted(boroughs) : null;

    const sensorTypes = optionalStringList(args, 'sensor_type');
    if (sensorTypes !== undefined) filters.sensorTypes = sensorTypes.length > 0 ? sorted(sensorTypes) : null;

    const pollutant = optionalString(args, 'pollutant');
    if (pollutant !== undefined) filters.pollutant = pollutant;

    const year = optionalNumber(args, 'year');
    if (year !== undefined) filters.year = year;

    const month = optionalNumber(args, 'month');
    if (month !== undefined) filters.month = month;

    const averaging = optionalString(args, 'averaging');
    if (averaging !== undefined) {
      filters.averaging = oneOf(averaging, AVERAGING_PERIODS) ?? null;
    }

    const delta: ContextDelta = { filters };
    const next = applyDelta(state, delta);
    return { delta, payload: { filters: toWireFilters(next.filters) } };
  },
};
