/**
 * Engine assembly
 * Wires the registry, session store, gate, cache and collaborators into a
 * dispatcher
 */

import { config } from './config/index.js';
import { OVERLAYS } from './config/dashboard.js';
import { logger } from './utils/logger.js';
import { AggregationCache } from './services/aggregation-cache.js';
import { DocumentSearchAdapter } from './services/document-search.js';
import { ExportService } from './services/export.service.js';
import { RateAccessGate } from './services/rate-gate.js';
import { SessionContextStore } from './services/session.service.js';
import { SessionSweeper } from './services/session-sweeper.js';
import { ToolDispatcher } from './services/tool-dispatcher.js';
import { createToolRegistry } from './tools/catalogue.js';
import { loadDocuments, loadSensorReadings } from './providers/fixtures.js';
import { InMemoryDocumentIndex } from './providers/in-memory-index.adapter.js';
import { InMemorySensorDataService } from './providers/in-memory-sensor.adapter.js';
import { RestSensorDataService } from './providers/rest-sensor.adapter.js';
import type { SchemaRegistry } from './tools/registry.js';
import type { CachedResult } from './tools/types.js';
import type { DocumentIndex, SensorDataService } from './providers/types.js';

export interface Engine {
  registry: SchemaRegistry;
  sessions: SessionContextStore;
  gate: RateAccessGate;
  cache: AggregationCache<CachedResult>;
  sensors: SensorDataService;
  documents: DocumentSearchAdapter;
  exports: ExportService;
  dispatcher: ToolDispatcher;
  sweeper: SessionSweeper;
}

export interface EngineOptions {
  sensors: SensorDataService;
  index: DocumentIndex;
  registry?: SchemaRegistry;
  sessions?: SessionContextStore;
  gate?: RateAccessGate;
  cache?: AggregationCache<CachedResult>;
  exports?: ExportService;
  now?: () => number;
}

export function createEngine(options: EngineOptions): Engine {
  const now = options.now ?? Date.now;
  const registry = options.registry ?? createToolRegistry();
  const sessions = options.sessions ?? new SessionContextStore({ overlays: OVERLAYS, now });
  const gate = options.gate ?? new RateAccessGate({ now });
  const cache = options.cache ?? new AggregationCache<CachedResult>({ now });
  const documents = new DocumentSearchAdapter(options.index);
  const exports = options.exports ?? new ExportService({ now });

  const dispatcher = new ToolDispatcher({
    registry,
    sessions,
    gate,
    services: { cache, sensors: options.sensors, documents, exports },
    now,
  });

  return {
    registry,
    sessions,
    gate,
    cache,
    sensors: options.sensors,
    documents,
    exports,
    dispatcher,
    sweeper: new SessionSweeper(sessions, config.session.sweepIntervalMs, now, { gate, exports }),
  };
}

/**
 * Collaborators from configuration: the REST sensor API when a URL is set,
 * the bundled readings otherwise
 */
export async function createEngineFromConfig(): Promise<Engine> {
  let sensors: SensorDataService;
  if (config.sensorApi.url) {
    sensors = new RestSensorDataService({
      baseUrl: config.sensorApi.url,
      apiKey: config.sensorApi.key,
      requestTimeoutMs: config.sensorApi.requestTimeoutMs,
    });
  } else {
    const readings = await loadSensorReadings(config.data.sensorReadingsPath);
    sensors = new InMemorySensorDataService(readings);
  }

  const index = new InMemoryDocumentIndex();
  const documents = await loadDocuments(config.data.documentsPath);
  for (const document of documents) {
    index.addDocument(document);
  }

  logger.info(
    { sensors: sensors.name, documents: documents.length, chunks: index.chunkCount },
    'Engine collaborators loaded'
  );
  return createEngine({ sensors, index });
}
