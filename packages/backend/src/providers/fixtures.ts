/**
 * Loading of bundled JSON data files
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// src/providers -> package root
const packageRoot = fileURLToPath(new URL('../../', import.meta.url));

export function resolveDataPath(relativePath: string): string {
  return path.isAbsolute(relativePath) ? relativePath : path.resolve(packageRoot, relativePath);
}

export const SensorReadingSchema = z.object({
  site_id: z.string().min(1),
  site_name: z.string(),
  borough: z.string(),
  sensor_type: z.string(),
  lat: z.number(),
  lon: z.number(),
  pollutant: z.string(),
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  value: z.number(),
});

export type SensorReading = z.infer<typeof SensorReadingSchema>;

export const DocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  text: z.string(),
});

export type SourceDocument = z.infer<typeof DocumentSchema>;

async function readJson<T>(relativePath: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await readFile(resolveDataPath(relativePath), 'utf-8');
  return schema.parse(JSON.parse(raw));
}

export function loadSensorReadings(relativePath: string): Promise<SensorReading[]> {
  return readJson(relativePath, z.array(SensorReadingSchema));
}

export function loadDocuments(relativePath: string): Promise<SourceDocument[]> {
  return readJson(relativePath, z.array(DocumentSchema));
}
