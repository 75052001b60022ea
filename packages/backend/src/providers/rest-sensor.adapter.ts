/**
 * REST sensor data service
 * Reads the sensor tables through a PostgREST-style HTTP API:
 * - active_sensors: site metadata
 * - annual_averages: one value per site, pollutant and year
 * - map_monthly_data: one value per site, pollutant, year and month
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { UpstreamUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { normalizeBorough } from './in-memory-sensor.adapter.js';
import type {
  AggregateQuery,
  SensorDataService,
  SensorRow,
  UniqueValue,
  UniqueValueField,
} from './types.js';

const SensorSchema = z.object({
  id_site: z.string(),
  site_name: z.string().nullable().optional(),
  borough: z.string().nullable().optional(),
  sensor_type: z.string().nullable().optional(),
  lat: z.number().nullable().optional(),
  lon: z.number().nullable().optional(),
  pollutants_measured: z.array(z.string()).nullable().optional(),
});

const MeasurementSchema = z.object({
  id_site: z.string(),
  pollutant: z.string(),
  year: z.number().int(),
  month: z.number().int().nullable().optional(),
  value: z.number(),
});

const YearSchema = z.object({ year: z.number().int() });

type Sensor = z.infer<typeof SensorSchema>;
type Measurement = z.infer<typeof MeasurementSchema>;

export interface RestSensorOptions {
  baseUrl: string;
  apiKey: string;
  requestTimeoutMs?: number;
  pageSize?: number;
  fetchImpl?: typeof fetch;
}

function inList(values: readonly (string | number)[]): string {
  return `in.(${values.map((v) => String(v).replace(/[(),]/g, '')).join(',')})`;
}

export class RestSensorDataService implements SensorDataService {
  readonly name = 'rest';
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RestSensorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.requestTimeoutMs ?? config.sensorApi.requestTimeoutMs;
    this.pageSize = options.pageSize ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async aggregate(query: AggregateQuery): Promise<SensorRow[]> {
    const rows: SensorRow[] = [];
    for await (const row of this.streamRows(query)) {
      rows.push(row);
    }
    return rows;
  }

  async listUniqueValues(field: UniqueValueField): Promise<UniqueValue[]> {
    if (field === 'year') {
      const years = await this.get('annual_averages', { select: 'year' }, YearSchema);
      return Array.from(new Set(years.map((y) => y.year))).sort((a, b) => a - b);
    }

    const sensors = await this.get('active_sensors', { select: '*' }, SensorSchema);
    const values = new Set<string>();
    for (const sensor of sensors) {
      if (field === 'borough' && sensor.borough) values.add(normalizeBorough(sensor.borough));
      if (field === 'sensor_type' && sensor.sensor_type) values.add(sensor.sensor_type);
      if (field === 'pollutant') {
        for (const pollutant of sensor.pollutants_measured ?? []) values.add(pollutant);
      }
    }
    return Array.from(values).sort();
  }

  async *streamRows(query: AggregateQuery): AsyncIterable<SensorRow> {
    const sensors = await this.loadSensors(query);
    if (sensors.size === 0) return;

    const table = query.averaging === 'Annual' ? 'annual_averages' : 'map_monthly_data';
    const params: Record<string, string> = {
      select: 'id_site,pollutant,year,month,value',
      id_site: inList(Array.from(sensors.keys())),
      order: 'id_site.asc,pollutant.asc,year.asc',
    };
    if (query.averaging === 'Annual') params.select = 'id_site,pollutant,year,value';
    if (query.pollutants.length > 0) params.pollutant = inList(query.pollutants);
    if (query.year !== undefined) params.year = `eq.${query.year}`;
    if (query.averaging === 'Month' && query.month !== undefined) params.month = `eq.${query.month}`;

    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.get(
        table,
        { ...params, limit: String(this.pageSize), offset: String(offset) },
        MeasurementSchema
      );
      for (const measurement of page) {
        const sensor = sensors.get(measurement.id_site);
        if (sensor) yield toRow(sensor, measurement, query.averaging);
      }
      if (page.length < this.pageSize) break;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.get('active_sensors', { select: 'id_site', limit: '1' }, SensorSchema.pick({ id_site: true }));
      return true;
    } catch (error) {
      logger.warn({ err: error }, 'Sensor API health check failed');
      return false;
    }
  }

  private async loadSensors(query: AggregateQuery): Promise<Map<string, Sensor>> {
    const params: Record<string, string> = { select: '*' };
    if (query.sensorTypes.length > 0) params.sensor_type = inList(query.sensorTypes);
    const sensors = await this.get('active_sensors', params, SensorSchema);

    const selected = new Map<string, Sensor>();
    for (const sensor of sensors) {
      const borough = normalizeBorough(sensor.borough ?? 'Unknown');
      if (query.boroughs.length > 0 && !query.boroughs.includes(borough)) continue;
      selected.set(sensor.id_site, { ...sensor, borough });
    }
    return selected;
  }

  private async get<T>(
    resource: string,
    params: Record<string, string>,
    schema: z.ZodType<T>
  ): Promise<T[]> {
    const url = new URL(`${this.baseUrl}/rest/v1/${resource}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          apikey: this.apiKey,
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Sensor API request to ${resource} failed`, 'sensor-api', error);
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(
        `Sensor API returned ${response.status} for ${resource}`,
        'sensor-api'
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError(`Sensor API returned invalid JSON for ${resource}`, 'sensor-api', error);
    }

    const parsed = z.array(schema).safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(
        `Sensor API returned an unexpected ${resource} payload`,
        'sensor-api',
        parsed.error
      );
    }
    return parsed.data;
  }
}

function toRow(sensor: Sensor, measurement: Measurement, averaging: SensorRow['averaging']): SensorRow {
  return {
    siteId: sensor.id_site,
    siteName: sensor.site_name ?? sensor.id_site,
    borough: sensor.borough ?? 'Unknown',
    sensorType: sensor.sensor_type ?? 'Unknown',
    lat: sensor.lat ?? 0,
    lon: sensor.lon ?? 0,
    pollutant: measurement.pollutant,
    year: measurement.year,
    month: averaging === 'Month' ? measurement.month ?? null : null,
    averaging,
    value: measurement.value,
  };
}
