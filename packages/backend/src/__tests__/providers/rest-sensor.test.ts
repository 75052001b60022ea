/**
 * REST sensor data service tests
 * The HTTP layer is replaced by an in-process fetch stand-in
 */

import { describe, it, expect } from 'vitest';
import { RestSensorDataService } from '../../providers/rest-sensor.adapter.js';
import { UpstreamUnavailableError } from '../../utils/errors.js';
import type { AggregateQuery } from '../../providers/types.js';

type Route = (url: URL) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function fakeFetch(route: Route) {
  const requests: URL[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    const url = input instanceof URL ? input : new URL(typeof input === 'string' ? input : input.url);
    requests.push(url);
    return route(url);
  };
  return { fetchImpl, requests };
}

const SENSORS = [
  { id_site: 'a', site_name: 'Kew Road', borough: 'Richmond upon Thames', sensor_type: 'Clarity', lat: 51.47, lon: -0.29, pollutants_measured: ['NO2', 'PM2.5'] },
  { id_site: 'b', site_name: null, borough: 'Merton', sensor_type: 'DT', lat: null, lon: null, pollutants_measured: ['NO2'] },
  { id_site: 'c', borough: null, sensor_type: null },
];

function query(overrides: Partial<AggregateQuery> = {}): AggregateQuery {
  return { pollutants: [], boroughs: [], sensorTypes: [], averaging: 'Annual', ...overrides };
}

function service(route: Route, pageSize = 1000) {
  const fake = fakeFetch(route);
  const rest = new RestSensorDataService({
    baseUrl: 'http://sensors.test/',
    apiKey: 'test-secret',
    pageSize,
    fetchImpl: fake.fetchImpl,
  });
  return { rest, requests: fake.requests };
}

describe('RestSensorDataService', () => {
  it('should list normalized unique boroughs', async () => {
    const { rest, requests } = service(() => json(SENSORS));

    expect(await rest.listUniqueValues('borough')).toEqual(['Merton', 'Richmond']);
    expect(await rest.listUniqueValues('pollutant')).toEqual(['NO2', 'PM2.5']);
    expect(requests[0].pathname).toBe('/rest/v1/active_sensors');
  });

  it('should list years from the annual table', async () => {
    const { rest, requests } = service(() => json([{ year: 2023 }, { year: 2022 }, { year: 2023 }]));

    expect(await rest.listUniqueValues('year')).toEqual([2022, 2023]);
    expect(requests[0].pathname).toBe('/rest/v1/annual_averages');
    expect(requests[0].searchParams.get('select')).toBe('year');
  });

  it('should join measurements with sensor metadata', async () => {
    const { rest, requests } = service((url) =>
      url.pathname.endsWith('/active_sensors')
        ? json(SENSORS)
        : json([
            { id_site: 'b', pollutant: 'NO2', year: 2022, value: 31.5 },
            { id_site: 'zzz', pollutant: 'NO2', year: 2022, value: 99 },
          ])
    );

    const rows = await rest.aggregate(query({ pollutants: ['NO2'], boroughs: ['Merton'], year: 2022 }));

    expect(rows).toEqual([
      {
        siteId: 'b',
        siteName: 'b',
        borough: 'Merton',
        sensorType: 'DT',
        lat: 0,
        lon: 0,
        pollutant: 'NO2',
        year: 2022,
        month: null,
        averaging: 'Annual',
        value: 31.5,
      },
    ]);
    const measurements = requests[1];
    expect(measurements.pathname).toBe('/rest/v1/annual_averages');
    expect(measurements.searchParams.get('id_site')).toBe('in.(b)');
    expect(measurements.searchParams.get('pollutant')).toBe('in.(NO2)');
    expect(measurements.searchParams.get('year')).toBe('eq.2022');
  });

  it('should page through monthly measurements', async () => {
    const pages = [
      [
        { id_site: 'a', pollutant: 'NO2', year: 2022, month: 1, value: 20 },
        { id_site: 'a', pollutant: 'NO2', year: 2022, month: 2, value: 24 },
      ],
      [{ id_site: 'a', pollutant: 'NO2', year: 2022, month: 3, value: 22 }],
    ];
    let page = 0;
    const { rest, requests } = service(
      (url) => (url.pathname.endsWith('/active_sensors') ? json(SENSORS) : json(pages[page++] ?? [])),
      2
    );

    const rows = await rest.aggregate(query({ averaging: 'Month', boroughs: ['Richmond'] }));

    expect(rows.map((r) => [r.month, r.value])).toEqual([
      [1, 20],
      [2, 24],
      [3, 22],
    ]);
    expect(requests.map((r) => r.searchParams.get('offset'))).toEqual([null, '0', '2']);
    expect(requests[1].pathname).toBe('/rest/v1/map_monthly_data');
  });

  it('should skip the measurement query when no sensor matches', async () => {
    const { rest, requests } = service(() => json(SENSORS));
    expect(await rest.aggregate(query({ boroughs: ['Wandsworth'] }))).toEqual([]);
    expect(requests).toHaveLength(1);
  });

  it('should report error statuses as upstream failures', async () => {
    const { rest } = service(() => json({ message: 'boom' }, 500));
    const failure = rest.listUniqueValues('borough');

    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toThrow('Sensor API returned 500 for active_sensors');
  });

  it('should reject unexpected payloads', async () => {
    const { rest } = service(() => json([{ nope: true }]));
    await expect(rest.listUniqueValues('sensor_type')).rejects.toThrow(
      'Sensor API returned an unexpected active_sensors payload'
    );
  });

  it('should wrap network failures', async () => {
    const { rest } = service(() => {
      throw new TypeError('fetch failed');
    });
    await expect(rest.listUniqueValues('borough')).rejects.toThrow('Sensor API request to active_sensors failed');
    expect(await rest.healthCheck()).toBe(false);
  });

  it('should report healthy when the sensor table answers', async () => {
    const { rest, requests } = service(() => json([{ id_site: 'a' }]));
    expect(await rest.healthCheck()).toBe(true);
    expect(requests[0].searchParams.get('limit')).toBe('1');
  });
});
