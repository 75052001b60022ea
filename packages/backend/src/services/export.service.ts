/**
 * Export service
 * Issues download handles bound to a frozen filter snapshot and the rows
 * read for it, and streams those rows as CSV
 */

import { Readable } from 'stream';
import { config } from '../config/index.js';
import { generateId } from '../utils/crypto.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { FilterSelection } from '../types/session.js';
import type { AggregateQuery, SensorRow } from '../providers/types.js';

export type ExportFormat = 'csv';

export interface ExportHandle {
  readonly handle: string;
  readonly sessionId: string;
  readonly format: ExportFormat;
  readonly filename: string;
  readonly filters: Readonly<FilterSelection>;
  readonly query: Readonly<AggregateQuery>;
  readonly rows: readonly SensorRow[];
  readonly rowCount: number;
  readonly createdAt: number;
  readonly expiresAt: number;
}

export interface CreateExportInput {
  sessionId: string;
  format: ExportFormat;
  filters: FilterSelection;
  query: AggregateQuery;
  rows: readonly SensorRow[];
}

export interface ExportServiceOptions {
  maxRows?: number;
  handleTtlMs?: number;
  now?: () => number;
}

export const CSV_COLUMNS = [
  'site_id',
  'site_name',
  'borough',
  'sensor_type',
  'lat',
  'lon',
  'pollutant',
  'year',
  'month',
  'averaging',
  'value',
] as const;

export function formatCsvValue(value: string | number | null): string {
  const safe = value === null ? '' : String(value);
  if (safe.includes(',') || safe.includes('"') || safe.includes('\n')) {
    return `"${safe.replace(/"/g, '""')}"`;
  }
  return safe;
}

export function toCsvLine(row: SensorRow): string {
  return [
    row.siteId,
    row.siteName,
    row.borough,
    row.sensorType,
    row.lat,
    row.lon,
    row.pollutant,
    row.year,
    row.month,
    row.averaging,
    row.value,
  ]
    .map(formatCsvValue)
    .join(',');
}

function freezeFilters(filters: FilterSelection): Readonly<FilterSelection> {
  return Object.freeze({
    ...filters,
    ...(filters.boroughs && { boroughs: [...filters.boroughs] }),
    ...(filters.sensorTypes && { sensorTypes: [...filters.sensorTypes] }),
  });
}

export class ExportService {
  private handles = new Map<string, ExportHandle>();
  private readonly maxRows: number;
  private readonly handleTtlMs: number;
  private readonly now: () => number;

  constructor(options: ExportServiceOptions = {}) {
    this.maxRows = options.maxRows ?? config.exports.maxRows;
    this.handleTtlMs = options.handleTtlMs ?? config.exports.handleTtlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.handles.size;
  }

  /**
   * Row cap for an export: the requested cap, never above the configured one
   */
  resolveMaxRows(requested?: number): number {
    return Math.min(requested ?? this.maxRows, this.maxRows);
  }

  /**
   * Register a download for rows that have already been read
   */
  create(input: CreateExportInput): ExportHandle {
    this.purgeExpired();
    const now = this.now();
    const handle = generateId('exp');
    const rows = Object.freeze(input.rows.slice(0, this.maxRows));
    const entry: ExportHandle = Object.freeze({
      handle,
      sessionId: input.sessionId,
      format: input.format,
      filename: `air-quality-${input.query.averaging.toLowerCase()}-${handle}.${input.format}`,
      filters: freezeFilters(input.filters),
      query: Object.freeze({
        ...input.query,
        pollutants: [...input.query.pollutants],
        boroughs: [...input.query.boroughs],
        sensorTypes: [...input.query.sensorTypes],
      }),
      rows,
      rowCount: rows.length,
      createdAt: now,
      expiresAt: now + this.handleTtlMs,
    });
    this.handles.set(handle, entry);
    logger.info({ handle, sessionId: input.sessionId, rowCount: entry.rowCount }, 'Export created');
    return entry;
  }

  get(handle: string): ExportHandle | undefined {
    const entry = this.handles.get(handle);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.handles.delete(handle);
      return undefined;
    }
    return entry;
  }

  /**
   * CSV stream for a live handle: header line, then one line per row
   */
  openStream(handle: string): Readable {
    const entry = this.get(handle);
    if (!entry) {
      throw new NotFoundError('Export');
    }
    return Readable.from(csvLines(entry));
  }

  purgeExpired(now: number = this.now()): number {
    let removed = 0;
    for (const [handle, entry] of this.handles) {
      if (entry.expiresAt <= now) {
        this.handles.delete(handle);
        removed += 1;
      }
    }
    return removed;
  }
}

function* csvLines(entry: ExportHandle): Generator<string> {
  yield `${CSV_COLUMNS.join(',')}\n`;
  for (const row of entry.rows) {
    yield `${toCsvLine(row)}\n`;
  }
  logger.debug({ handle: entry.handle, rows: entry.rowCount }, 'Export stream finished');
}
