/**
 * In-memory sensor data service
 * Monthly readings held in process; annual figures are the mean of a
 * site's monthly values for the year.
 */

import type { SensorReading } from './fixtures.js';
import type {
  AggregateQuery,
  SensorDataService,
  SensorRow,
  UniqueValue,
  UniqueValueField,
} from './types.js';

/**
 * Collapse spelling variants ("Richmond upon Thames", "richmond") to one label
 */
export function normalizeBorough(borough: string): string {
  const trimmed = borough.trim();
  return /^richmond/i.test(trimmed) ? 'Richmond' : trimmed;
}

function matches(list: string[], value: string): boolean {
  return list.length === 0 || list.includes(value);
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function compareRows(a: SensorRow, b: SensorRow): number {
  return (
    a.siteId.localeCompare(b.siteId) ||
    a.pollutant.localeCompare(b.pollutant) ||
    a.year - b.year ||
    (a.month ?? 0) - (b.month ?? 0)
  );
}

export class InMemorySensorDataService implements SensorDataService {
  readonly name = 'in-memory';
  private readonly readings: SensorReading[];

  constructor(readings: SensorReading[]) {
    this.readings = readings.map((r) => ({ ...r, borough: normalizeBorough(r.borough) }));
  }

  async aggregate(query: AggregateQuery): Promise<SensorRow[]> {
    return this.compute(query);
  }

  async listUniqueValues(field: UniqueValueField): Promise<UniqueValue[]> {
    switch (field) {
      case 'borough':
        return Array.from(new Set(this.readings.map((r) => r.borough))).sort();
      case 'pollutant':
        return Array.from(new Set(this.readings.map((r) => r.pollutant))).sort();
      case 'sensor_type':
        return Array.from(new Set(this.readings.map((r) => r.sensor_type))).sort();
      case 'year':
        return Array.from(new Set(this.readings.map((r) => r.year))).sort((a, b) => a - b);
    }
  }

  async *streamRows(query: AggregateQuery): AsyncIterable<SensorRow> {
    for (const row of this.compute(query)) {
      yield row;
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private compute(query: AggregateQuery): SensorRow[] {
    const selected = this.readings.filter(
      (r) =>
        matches(query.pollutants, r.pollutant) &&
        matches(query.boroughs, r.borough) &&
        matches(query.sensorTypes, r.sensor_type) &&
        (query.year === undefined || r.year === query.year)
    );

    if (query.averaging === 'Month') {
      return selected
        .filter((r) => query.month === undefined || r.month === query.month)
        .map((r) => toRow(r, r.month, r.value, 'Month'))
        .sort(compareRows);
    }

    const groups = new Map<string, SensorReading[]>();
    for (const reading of selected) {
      const key = `${reading.site_id}|${reading.pollutant}|${reading.year}`;
      const group = groups.get(key);
      if (group) {
        group.push(reading);
      } else {
        groups.set(key, [reading]);
      }
    }

    const rows: SensorRow[] = [];
    for (const group of groups.values()) {
      const [first] = group;
      const mean = group.reduce((sum, r) => sum + r.value, 0) / group.length;
      rows.push(toRow(first, null, round(mean), 'Annual'));
    }
    return rows.sort(compareRows);
  }
}

function toRow(
  reading: SensorReading,
  month: number | null,
  value: number,
  averaging: SensorRow['averaging']
): SensorRow {
  return {
    siteId: reading.site_id,
    siteName: reading.site_name,
    borough: reading.borough,
    sensorType: reading.sensor_type,
    lat: reading.lat,
    lon: reading.lon,
    pollutant: reading.pollutant,
    year: reading.year,
    month,
    averaging,
    value,
  };
}
