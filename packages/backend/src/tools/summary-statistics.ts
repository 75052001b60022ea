/**
 * summary_statistics
 * Mean/min/max of the current view, grouped and classified against a
 * guideline scale, with the sites above the WHO and UK limits
 */

import {
  POLLUTANTS,
  SCALES,
  UK_LIMITS,
  WHO_LIMITS,
  classifyValue,
  isPollutant,
  type Classification,
  type ScaleName,
} from '../config/air-quality.js';
import { config } from '../config/index.js';
import { oneOf, optionalString, requireString } from './args.js';
import { fetchRows, queryFromFilters } from './query.js';
import type { SensorRow } from '../providers/types.js';
import type { ReadOnlyTool } from './types.js';

const GROUP_BY = ['borough', 'sensor_type', 'site'] as const;
type GroupBy = (typeof GROUP_BY)[number];

const DEFAULT_POLLUTANT = 'NO2';

export interface ValueSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  band: Classification;
}

export interface GroupSummary extends ValueSummary {
  key: string;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarize(values: number[], pollutant: string, scale: ScaleName): ValueSummary {
  const totals = values.reduce(
    (acc, v) => ({ sum: acc.sum + v, min: Math.min(acc.min, v), max: Math.max(acc.max, v) }),
    { sum: 0, min: Infinity, max: -Infinity }
  );
  const mean = totals.sum / values.length;
  return {
    count: values.length,
    mean: round(mean),
    min: round(totals.min),
    max: round(totals.max),
    band: classifyValue(pollutant, scale, mean),
  };
}

function groupKey(row: SensorRow, groupBy: GroupBy): string {
  switch (groupBy) {
    case 'borough':
      return row.borough;
    case 'sensor_type':
      return row.sensorType;
    case 'site':
      return row.siteId;
  }
}

function collect(rows: SensorRow[], key: (row: SensorRow) => string): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const row of rows) {
    const k = key(row);
    const values = groups.get(k);
    if (values) {
      values.push(row.value);
    } else {
      groups.set(k, [row.value]);
    }
  }
  return groups;
}

/**
 * Sites whose mean over the selection exceeds `limit`, sorted
 */
function sitesAbove(siteMeans: Map<string, number>, limit: number | undefined): string[] {
  if (limit === undefined) return [];
  return Array.from(siteMeans)
    .filter(([, mean]) => mean > limit)
    .map(([siteId]) => siteId)
    .sort();
}

export const summaryStatisticsTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.cacheFetchMs,
  definition: {
    name: 'summary_statistics',
    description:
      'Summarise measurements for the current filters: overall and grouped mean, min and max, ' +
      'banded against a guideline scale, plus the sites exceeding the WHO and UK limits.',
    role: 'none',
    sideEffect: 'read-only',
    parameters: [
      { name: 'group_by', type: 'string', required: false, description: 'Grouping', enum: GROUP_BY, default: 'borough' },
      { name: 'scale', type: 'string', required: false, description: 'Guideline scale', enum: SCALES, default: 'WHO' },
      {
        name: 'pollutant',
        type: 'string',
        required: false,
        description: 'Pollutant to summarise; defaults to the filtered pollutant',
        enum: POLLUTANTS,
      },
    ],
  },

  async execute(args, context) {
    const groupBy = oneOf(requireString(args, 'group_by'), GROUP_BY) ?? 'borough';
    const scale = oneOf(requireString(args, 'scale'), SCALES) ?? 'WHO';
    const pollutant = optionalString(args, 'pollutant') ?? context.filters.pollutant ?? DEFAULT_POLLUTANT;

    const query = queryFromFilters(context.filters, pollutant);
    const rows = await fetchRows(context, query);
    context.log.debug({ rowCount: rows.length, pollutant, groupBy }, 'Summarising rows');

    const siteMeans = new Map<string, number>();
    for (const [siteId, values] of collect(rows, (r) => r.siteId)) {
      siteMeans.set(siteId, values.reduce((sum, v) => sum + v, 0) / values.length);
    }

    const whoLimit = isPollutant(pollutant) ? WHO_LIMITS[pollutant] : undefined;
    const ukLimit = isPollutant(pollutant) ? UK_LIMITS[pollutant] : undefined;

    const groups: GroupSummary[] = Array.from(collect(rows, (r) => groupKey(r, groupBy)))
      .map(([key, values]) => ({ key, ...summarize(values, pollutant, scale) }))
      .sort((a, b) => a.key.localeCompare(b.key));

    return {
      pollutant,
      scale,
      group_by: groupBy,
      averaging: query.averaging,
      row_count: rows.length,
      site_count: siteMeans.size,
      overall: rows.length > 0 ? summarize(rows.map((r) => r.value), pollutant, scale) : null,
      groups,
      exceedances: {
        who_limit: whoLimit ?? null,
        uk_limit: ukLimit ?? null,
        sites_above_who: sitesAbove(siteMeans, whoLimit),
        sites_above_uk: sitesAbove(siteMeans, ukLimit),
      },
    };
  },
};
