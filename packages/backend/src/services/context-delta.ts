/**
 * Context deltas
 * Pure helpers for computing and applying minimal state changes
 */

import {
  FILTER_FIELDS,
  type ContextDelta,
  type ContextState,
  type FilterField,
  type FilterSelection,
  type MapViewport,
} from '../types/session.js';

const VIEWPORT_FIELDS: readonly (keyof MapViewport)[] = ['lat', 'lon', 'zoom'];

type FilterValue = FilterSelection[FilterField];

function sameValue(a: FilterValue | null, b: FilterValue | null): boolean {
  const left = a ?? null;
  const right = b ?? null;
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, i) => item === right[i]);
  }
  return left === right;
}

function setFilter<K extends FilterField>(
  filters: FilterSelection,
  field: K,
  value: FilterSelection[K] | null | undefined
): void {
  if (value === null || value === undefined) {
    delete filters[field];
    return;
  }
  // Stored lists never alias the delta they came from
  filters[field] = structuredClone(value);
}

function copyFilter<K extends FilterField>(
  target: NonNullable<ContextDelta['filters']>,
  field: K,
  value: FilterSelection[K] | null
): void {
  target[field] = value;
}

/**
 * Reduce a proposed change to the fields that actually differ from `state`
 */
export function minimalDelta(state: ContextState, proposed: ContextDelta): ContextDelta {
  const delta: ContextDelta = {};

  if (proposed.filters) {
    const filters: NonNullable<ContextDelta['filters']> = {};
    for (const field of FILTER_FIELDS) {
      if (!(field in proposed.filters)) continue;
      const next = proposed.filters[field];
      if (next === undefined) continue;
      if (!sameValue(state.filters[field], next)) {
        copyFilter(filters, field, next);
      }
    }
    if (Object.keys(filters).length > 0) delta.filters = filters;
  }

  if (proposed.viewport) {
    const viewport: Partial<MapViewport> = {};
    for (const field of VIEWPORT_FIELDS) {
      const next = proposed.viewport[field];
      if (next !== undefined && next !== state.viewport[field]) {
        viewport[field] = next;
      }
    }
    if (Object.keys(viewport).length > 0) delta.viewport = viewport;
  }

  if (proposed.overlays) {
    const overlays: Record<string, boolean> = {};
    for (const [name, visible] of Object.entries(proposed.overlays)) {
      if ((state.overlays[name] ?? false) !== visible) overlays[name] = visible;
    }
    if (Object.keys(overlays).length > 0) delta.overlays = overlays;
  }

  if (proposed.selectedSites && !sameValue(state.selectedSites, proposed.selectedSites)) {
    delta.selectedSites = [...proposed.selectedSites];
  }

  return delta;
}

/**
 * Apply a delta, returning a new state. Applying the same delta twice
 * yields the same state as applying it once.
 */
export function applyDelta(state: ContextState, delta: ContextDelta): ContextState {
  const filters: FilterSelection = { ...state.filters };
  if (delta.filters) {
    for (const field of FILTER_FIELDS) {
      if (field in delta.filters) setFilter(filters, field, delta.filters[field]);
    }
  }

  return {
    filters,
    viewport: { ...state.viewport, ...delta.viewport },
    overlays: { ...state.overlays, ...delta.overlays },
    selectedSites: [...(delta.selectedSites ?? state.selectedSites)],
  };
}

export function isEmptyDelta(delta: ContextDelta): boolean {
  return !delta.filters && !delta.viewport && !delta.overlays && !delta.selectedSites;
}
