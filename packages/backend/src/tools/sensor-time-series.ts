/**
 * sensor_time_series
 * Per-site history and a single-period comparison for selected sensors,
 * with the WHO and UK limits to draw against them
 */

import { UK_LIMITS, WHO_LIMITS, POLLUTANTS, isPollutant } from '../config/air-quality.js';
import { AVERAGING_PERIODS, MAX_SELECTED_SITES } from '../config/dashboard.js';
import { config } from '../config/index.js';
import { oneOf, optionalString, optionalStringList } from './args.js';
import { fetchRows } from './query.js';
import type { AveragingPeriod } from '../types/session.js';
import type { SensorRow } from '../providers/types.js';
import type { ReadOnlyTool } from './types.js';

const DEFAULT_POLLUTANT = 'NO2';

export interface SeriesPoint {
  year: number;
  month: number | null;
  value: number;
}

export interface SiteSeries {
  site_id: string;
  site_name: string;
  points: SeriesPoint[];
}

export interface SiteComparison {
  year: number;
  month: number | null;
  values: { site_id: string; value: number }[];
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function byPeriod(a: SeriesPoint, b: SeriesPoint): number {
  return a.year - b.year || (a.month ?? 0) - (b.month ?? 0);
}

function seriesFor(sites: string[], rows: SensorRow[]): SiteSeries[] {
  const series: SiteSeries[] = [];
  for (const siteId of sites) {
    const siteRows = rows.filter((row) => row.siteId === siteId);
    if (siteRows.length === 0) continue;
    series.push({
      site_id: siteId,
      site_name: siteRows[0].siteName,
      points: siteRows.map((row) => ({ year: row.year, month: row.month, value: row.value })).sort(byPeriod),
    });
  }
  return series;
}

/**
 * Mean per site for one period: the filtered year (and month), or the
 * latest period with data when the filters leave it open
 */
function compare(
  rows: SensorRow[],
  averaging: AveragingPeriod,
  year: number | undefined,
  month: number | undefined
): SiteComparison | null {
  if (rows.length === 0) return null;

  const period = year ?? Math.max(...new Set(rows.map((row) => row.year)));
  const inYear = rows.filter((row) => row.year === period);
  let periodMonth: number | null = null;
  if (averaging === 'Month') {
    const months = inYear.flatMap((row) => (row.month === null ? [] : [row.month]));
    periodMonth = month ?? (months.length > 0 ? Math.max(...new Set(months)) : null);
  }
  const inPeriod = periodMonth === null ? inYear : inYear.filter((row) => row.month === periodMonth);

  const totals = new Map<string, { sum: number; count: number }>();
  for (const row of inPeriod) {
    const total = totals.get(row.siteId) ?? { sum: 0, count: 0 };
    total.sum += row.value;
    total.count += 1;
    totals.set(row.siteId, total);
  }

  const values = Array.from(totals, ([siteId, total]) => ({ site_id: siteId, value: round(total.sum / total.count) })).sort(
    (a, b) => b.value - a.value || a.site_id.localeCompare(b.site_id)
  );
  return { year: period, month: periodMonth, values };
}

export const sensorTimeSeriesTool: ReadOnlyTool = {
  kind: 'read-only',
  timeoutMs: config.timeouts.cacheFetchMs,
  definition: {
    name: 'sensor_time_series',
    description:
      'Time series and a same-period comparison for individual sensors. ' +
      'Defaults to the sensors selected on the map and the filtered pollutant and averaging period.',
    role: 'none',
    sideEffect: 'read-only',
    parameters: [
      { name: 'sites', type: 'string-list', required: false, description: 'Site ids; defaults to the current selection', maxItems: MAX_SELECTED_SITES },
      { name: 'pollutant', type: 'string', required: false, description: 'Pollutant', enum: POLLUTANTS },
      { name: 'averaging', type: 'string', required: false, description: 'Averaging period', enum: AVERAGING_PERIODS },
    ],
  },

  async execute(args, context) {
    const sites = Array.from(new Set(optionalStringList(args, 'sites') ?? context.selectedSites)).sort();
    const pollutant = optionalString(args, 'pollutant') ?? context.filters.pollutant ?? DEFAULT_POLLUTANT;
    const requested = optionalString(args, 'averaging');
    const averaging =
      (requested !== undefined ? oneOf(requested, AVERAGING_PERIODS) : undefined) ?? context.filters.averaging ?? 'Annual';

    const limits = {
      who_limit: isPollutant(pollutant) ? WHO_LIMITS[pollutant] : null,
      uk_limit: isPollutant(pollutant) ? UK_LIMITS[pollutant] : null,
    };
    if (sites.length === 0) {
      return { pollutant, averaging, sites, series: [], comparison: null, ...limits };
    }

    // Every year and site for the pollutant, so any selection shares one cache entry
    const rows = await fetchRows(context, { pollutants: [pollutant], boroughs: [], sensorTypes: [], averaging });
    const wanted = new Set(sites);
    const selected = rows.filter((row) => wanted.has(row.siteId));
    context.log.debug({ sites: sites.length, rowCount: selected.length, pollutant }, 'Building sensor series');

    return {
      pollutant,
      averaging,
      sites,
      series: seriesFor(sites, selected),
      comparison: compare(selected, averaging, context.filters.year, context.filters.month),
      ...limits,
    };
  },
};
