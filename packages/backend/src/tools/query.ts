/**
 * Cached sensor queries shared by the read-only tools
 */

import { canonicalKey } from '../services/aggregation-cache.js';
import { InternalError } from '../utils/errors.js';
import type { FilterSelection } from '../types/session.js';
import type { AggregateQuery, SensorRow, UniqueValue, UniqueValueField } from '../providers/types.js';
import type { CachedResult, ToolExecutionContext } from './types.js';

export const AGGREGATE_QUERY = 'aggregate';
export const UNIQUE_VALUES_QUERY = 'unique-values';
export const EXPORT_ROWS_QUERY = 'export-rows';

/**
 * Query types derived from sensor rows, as opposed to filter options
 */
export const ROW_QUERIES = [AGGREGATE_QUERY, EXPORT_ROWS_QUERY] as const;

/**
 * Aggregate query for a filter selection; averaging defaults to Annual
 */
export function queryFromFilters(filters: Readonly<FilterSelection>, pollutant?: string): AggregateQuery {
  const selected = pollutant ?? filters.pollutant;
  return {
    pollutants: selected !== undefined ? [selected] : [],
    boroughs: [...(filters.boroughs ?? [])],
    sensorTypes: [...(filters.sensorTypes ?? [])],
    year: filters.year,
    month: filters.month,
    averaging: filters.averaging ?? 'Annual',
  };
}

function queryParams(query: AggregateQuery) {
  return {
    pollutants: query.pollutants,
    boroughs: query.boroughs,
    sensorTypes: query.sensorTypes,
    year: query.year,
    month: query.averaging === 'Month' ? query.month : undefined,
    averaging: query.averaging,
  };
}

export function aggregateKey(query: AggregateQuery): string {
  return canonicalKey(AGGREGATE_QUERY, queryParams(query));
}

export function exportRowsKey(query: AggregateQuery, maxRows: number): string {
  return canonicalKey(EXPORT_ROWS_QUERY, { ...queryParams(query), maxRows });
}

export async function fetchRows(context: ToolExecutionContext, query: AggregateQuery): Promise<SensorRow[]> {
  const { cache, sensors } = context.services;
  const result = await cache.fetch(aggregateKey(query), async (): Promise<CachedResult> => ({
    kind: 'rows',
    rows: await sensors.aggregate(query),
  }));
  if (result.kind !== 'rows') {
    throw new InternalError('Cached value has the wrong shape for an aggregate query');
  }
  return result.rows;
}

/**
 * Rows for an export, read from the sensor stream once and capped at
 * `maxRows`
 */
export async function fetchExportRows(
  context: ToolExecutionContext,
  query: AggregateQuery,
  maxRows: number
): Promise<SensorRow[]> {
  const { cache, sensors } = context.services;
  const result = await cache.fetch(exportRowsKey(query, maxRows), async (): Promise<CachedResult> => {
    const rows: SensorRow[] = [];
    for await (const row of sensors.streamRows(query)) {
      rows.push(row);
      if (rows.length >= maxRows) break;
    }
    return { kind: 'rows', rows };
  });
  if (result.kind !== 'rows') {
    throw new InternalError('Cached value has the wrong shape for an export query');
  }
  return result.rows;
}

export async function fetchUniqueValues(
  context: ToolExecutionContext,
  field: UniqueValueField
): Promise<UniqueValue[]> {
  const { cache, sensors } = context.services;
  const result = await cache.fetch(canonicalKey(UNIQUE_VALUES_QUERY, { field }), async (): Promise<CachedResult> => ({
    kind: 'values',
    values: await sensors.listUniqueValues(field),
  }));
  if (result.kind !== 'values') {
    throw new InternalError('Cached value has the wrong shape for a unique-values query');
  }
  return result.values;
}
