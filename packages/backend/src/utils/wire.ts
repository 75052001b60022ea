/**
 * Wire format
 * snake_case views of session state for envelopes and HTTP responses
 */

import type {
  AveragingPeriod,
  ContextDelta,
  FilterSelection,
  HistoryTurn,
  MapViewport,
  SessionSnapshot,
} from '../types/session.js';
import type { ErrorEnvelope } from './errors.js';
import type { DispatchOutcome } from '../services/tool-dispatcher.js';

export interface WireFilters {
  boroughs?: string[];
  pollutant?: string;
  sensor_types?: string[];
  year?: number;
  month?: number;
  averaging?: AveragingPeriod;
}

export interface WireDelta {
  filters?: { [K in keyof WireFilters]?: WireFilters[K] | null };
  viewport?: Partial<MapViewport>;
  overlays?: Record<string, boolean>;
  selected_sites?: string[];
}

export interface WireTurn {
  at: string;
  message?: string;
  tool: string;
  arguments: Record<string, unknown>;
  caller_id: string;
  result: unknown;
  context_delta: WireDelta;
}

export interface WireSnapshot {
  session_id: string;
  filters: WireFilters;
  viewport: MapViewport;
  overlays: Record<string, boolean>;
  selected_sites: string[];
  history: WireTurn[];
  created_at: string;
  last_activity_at: string;
}

export function toWireFilters(filters: Readonly<FilterSelection>): WireFilters {
  const wire: WireFilters = {};
  if (filters.boroughs !== undefined) wire.boroughs = [...filters.boroughs];
  if (filters.pollutant !== undefined) wire.pollutant = filters.pollutant;
  if (filters.sensorTypes !== undefined) wire.sensor_types = [...filters.sensorTypes];
  if (filters.year !== undefined) wire.year = filters.year;
  if (filters.month !== undefined) wire.month = filters.month;
  if (filters.averaging !== undefined) wire.averaging = filters.averaging;
  return wire;
}

export function toWireDelta(delta: ContextDelta): WireDelta {
  const wire: WireDelta = {};
  if (delta.filters) {
    const f = delta.filters;
    const filters: NonNullable<WireDelta['filters']> = {};
    if (f.boroughs !== undefined) filters.boroughs = f.boroughs === null ? null : [...f.boroughs];
    if (f.pollutant !== undefined) filters.pollutant = f.pollutant;
    if (f.sensorTypes !== undefined) filters.sensor_types = f.sensorTypes === null ? null : [...f.sensorTypes];
    if (f.year !== undefined) filters.year = f.year;
    if (f.month !== undefined) filters.month = f.month;
    if (f.averaging !== undefined) filters.averaging = f.averaging;
    wire.filters = filters;
  }
  if (delta.viewport) wire.viewport = { ...delta.viewport };
  if (delta.overlays) wire.overlays = { ...delta.overlays };
  if (delta.selectedSites) wire.selected_sites = [...delta.selectedSites];
  return wire;
}

function toWireTurn(turn: HistoryTurn): WireTurn {
  return {
    at: new Date(turn.at).toISOString(),
    ...(turn.message !== undefined && { message: turn.message }),
    tool: turn.call.tool,
    arguments: turn.call.arguments,
    caller_id: turn.call.callerId,
    result: turn.result,
    context_delta: toWireDelta(turn.delta),
  };
}

export function toWireSnapshot(snapshot: SessionSnapshot): WireSnapshot {
  return {
    session_id: snapshot.sessionId,
    filters: toWireFilters(snapshot.filters),
    viewport: { ...snapshot.viewport },
    overlays: { ...snapshot.overlays },
    selected_sites: [...snapshot.selectedSites],
    history: snapshot.history.map(toWireTurn),
    created_at: new Date(snapshot.createdAt).toISOString(),
    last_activity_at: new Date(snapshot.lastActivityAt).toISOString(),
  };
}

export interface OutboundEnvelope {
  status: 'ok' | 'error';
  result: unknown;
  error: ErrorEnvelope | null;
  context_delta: WireDelta;
  context_snapshot: WireSnapshot;
}

export function toOutboundEnvelope(outcome: DispatchOutcome): OutboundEnvelope {
  return {
    status: outcome.status,
    result: outcome.result,
    error: outcome.error,
    context_delta: toWireDelta(outcome.delta),
    context_snapshot: toWireSnapshot(outcome.snapshot),
  };
}
