/**
 * Air-quality guideline scales
 * Banded colour scales per pollutant and standard, plus annual limits.
 * Bands are half-open: min <= value < max; a null max is unbounded.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const POLLUTANTS = ['NO2', 'PM2.5', 'PM10'] as const;
export const SCALES = ['WHO', 'Borough', 'UK'] as const;

export type Pollutant = (typeof POLLUTANTS)[number];
export type ScaleName = (typeof SCALES)[number];

const BandSchema = z.object({
  min: z.number(),
  max: z.number().nullable(),
  label: z.string(),
  colour: z.string(),
});

const ScaleSchema = z.object({
  name: z.string(),
  bands: z.array(BandSchema).min(1),
});

const LimitsSchema = z.object({ NO2: z.number(), 'PM2.5': z.number(), PM10: z.number() });
const PollutantScalesSchema = z.object({ WHO: ScaleSchema, Borough: ScaleSchema, UK: ScaleSchema });

const ScalesFileSchema = z.object({
  limits: z.object({ WHO: LimitsSchema, UK: LimitsSchema }),
  scales: z.object({
    NO2: PollutantScalesSchema,
    'PM2.5': PollutantScalesSchema,
    PM10: PollutantScalesSchema,
  }),
});

export type ScaleBand = z.infer<typeof BandSchema>;
export type GuidelineScale = z.infer<typeof ScaleSchema>;

const scalesPath = fileURLToPath(new URL('../../data/air-quality-scales.json', import.meta.url));
const data = ScalesFileSchema.parse(JSON.parse(readFileSync(scalesPath, 'utf-8')));

export const WHO_LIMITS: Readonly<Record<Pollutant, number>> = Object.freeze(data.limits.WHO);
export const UK_LIMITS: Readonly<Record<Pollutant, number>> = Object.freeze(data.limits.UK);

export const UNCLASSIFIED_COLOUR = '#cccccc';

export interface Classification {
  label: string;
  colour: string;
}

export function isPollutant(value: string): value is Pollutant {
  return POLLUTANTS.some((p) => p === value);
}

export function getScale(pollutant: Pollutant, scale: ScaleName): GuidelineScale {
  return data.scales[pollutant][scale];
}

/**
 * Band a value falls in, or "Unclassified" when the pollutant has no scale
 * or the value lies below every band
 */
export function classifyValue(pollutant: string, scale: ScaleName, value: number): Classification {
  if (!isPollutant(pollutant)) {
    return { label: 'Unclassified', colour: UNCLASSIFIED_COLOUR };
  }
  const band = getScale(pollutant, scale).bands.find(
    (b) => value >= b.min && (b.max === null || value < b.max)
  );
  return band
    ? { label: band.label, colour: band.colour }
    : { label: 'Unclassified', colour: UNCLASSIFIED_COLOUR };
}

/**
 * Marker diameter for a zoom level; grows 20% per zoom step above 12
 */
export function markerSize(zoom: number): number {
  return Math.max(7, Math.floor(20 * 1.2 ** (zoom - 12)));
}
