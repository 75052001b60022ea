/**
 * Shared test data
 */

import { AggregationCache } from '../services/aggregation-cache.js';
import { DocumentSearchAdapter } from '../services/document-search.js';
import { ExportService } from '../services/export.service.js';
import { InMemoryDocumentIndex } from '../providers/in-memory-index.adapter.js';
import { InMemorySensorDataService } from '../providers/in-memory-sensor.adapter.js';
import { logger } from '../utils/logger.js';
import type { SensorReading, SourceDocument } from '../providers/fixtures.js';
import type { SensorDataService } from '../providers/types.js';
import type { CachedResult, EngineServices, ToolExecutionContext } from '../tools/types.js';
import type { FilterSelection } from '../types/session.js';

function reading(
  site: Pick<SensorReading, 'site_id' | 'site_name' | 'borough' | 'sensor_type' | 'lat' | 'lon'>,
  pollutant: string,
  year: number,
  month: number,
  value: number
): SensorReading {
  return { ...site, pollutant, year, month, value };
}

const WANDSWORTH = {
  site_id: 'WAN-01',
  site_name: 'Putney High St, SW15',
  borough: 'Wandsworth',
  sensor_type: 'DT',
  lat: 51.46,
  lon: -0.216,
};

const RICHMOND = {
  site_id: 'RIC-01',
  site_name: 'Kew Road',
  borough: 'Richmond upon Thames',
  sensor_type: 'Clarity',
  lat: 51.47,
  lon: -0.29,
};

const MERTON = {
  site_id: 'MER-01',
  site_name: 'Morden Hall',
  borough: 'Merton',
  sensor_type: 'Automatic',
  lat: 51.4,
  lon: -0.19,
};

/**
 * Annual NO2 2022 means: MER-01 10, RIC-01 22, WAN-01 42
 */
export const TEST_READINGS: SensorReading[] = [
  reading(WANDSWORTH, 'NO2', 2022, 1, 40),
  reading(WANDSWORTH, 'NO2', 2022, 2, 44),
  reading(WANDSWORTH, 'NO2', 2023, 1, 30),
  reading(RICHMOND, 'NO2', 2022, 1, 20),
  reading(RICHMOND, 'NO2', 2022, 2, 24),
  reading(RICHMOND, 'PM2.5', 2022, 1, 8),
  reading(RICHMOND, 'PM2.5', 2022, 2, 10),
  reading(MERTON, 'NO2', 2022, 1, 9),
  reading(MERTON, 'NO2', 2022, 2, 11),
  reading(MERTON, 'PM10', 2022, 1, 14),
  reading(MERTON, 'PM10', 2022, 2, 18),
];

export const TEST_DOCUMENTS: SourceDocument[] = [
  {
    id: 'annual-report',
    title: 'Annual Report',
    text: 'Nitrogen dioxide fell across the borough. Diffusion tubes recorded lower roadside values.',
  },
  {
    id: 'health-note',
    title: 'Health Note',
    text: 'Fine particulate matter affects the lungs and heart.',
  },
];

export function createTestIndex(documents: SourceDocument[] = TEST_DOCUMENTS): InMemoryDocumentIndex {
  const index = new InMemoryDocumentIndex({ chunkSize: 400, overlap: 80 });
  for (const document of documents) {
    index.addDocument(document);
  }
  return index;
}

export function createTestServices(
  sensors: SensorDataService = new InMemorySensorDataService(TEST_READINGS)
): EngineServices {
  return {
    cache: new AggregationCache<CachedResult>({ retryLoaderOnce: false }),
    sensors,
    documents: new DocumentSearchAdapter(createTestIndex()),
    exports: new ExportService(),
  };
}

export function createTestContext(
  filters: FilterSelection = {},
  services: EngineServices = createTestServices(),
  selectedSites: string[] = []
): ToolExecutionContext {
  return {
    sessionId: 'session-1',
    callerId: 'user-1',
    filters,
    selectedSites,
    services,
    log: logger,
    signal: new AbortController().signal,
  };
}
