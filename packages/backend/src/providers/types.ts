/**
 * Collaborator interfaces
 * Narrow contracts for the sensor data service and the document index
 */

import type { AveragingPeriod } from '../types/session.js';

/**
 * One averaged measurement joined with its sensor metadata
 */
export interface SensorRow {
  siteId: string;
  siteName: string;
  borough: string;
  sensorType: string;
  lat: number;
  lon: number;
  pollutant: string;
  year: number;
  /** Null for annual averages */
  month: number | null;
  averaging: AveragingPeriod;
  value: number;
}

/**
 * Empty lists mean "no constraint"
 */
export interface AggregateQuery {
  pollutants: string[];
  boroughs: string[];
  sensorTypes: string[];
  year?: number;
  month?: number;
  averaging: AveragingPeriod;
}

export type UniqueValueField = 'borough' | 'pollutant' | 'sensor_type' | 'year';

export type UniqueValue = string | number;

export interface SensorDataService {
  readonly name: string;

  aggregate(query: AggregateQuery): Promise<SensorRow[]>;

  listUniqueValues(field: UniqueValueField): Promise<UniqueValue[]>;

  /**
   * Rows for an export, produced incrementally
   */
  streamRows(query: AggregateQuery): AsyncIterable<SensorRow>;

  healthCheck(): Promise<boolean>;
}

/**
 * An indexed text chunk with its exact position in the source document
 */
export interface IndexedChunk {
  chunkId: string;
  documentId: string;
  title?: string;
  text: string;
  start: number;
  end: number;
}

export interface ScoredChunk extends IndexedChunk {
  score: number;
}

export interface DocumentIndex {
  readonly name: string;

  search(text: string, topK: number): Promise<ScoredChunk[]>;

  getChunk(chunkId: string): Promise<IndexedChunk | null>;
}
