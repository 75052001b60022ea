/**
 * Session context types
 */

export type AveragingPeriod = 'Annual' | 'Month';

/**
 * Dashboard filter selection. An absent field means "no constraint".
 */
export interface FilterSelection {
  boroughs?: string[];
  pollutant?: string;
  sensorTypes?: string[];
  year?: number;
  month?: number;
  averaging?: AveragingPeriod;
}

export type FilterField = keyof FilterSelection;

export const FILTER_FIELDS: readonly FilterField[] = [
  'boroughs',
  'pollutant',
  'sensorTypes',
  'year',
  'month',
  'averaging',
];

export interface MapViewport {
  lat: number;
  lon: number;
  zoom: number;
}

/**
 * The mutable part of a session that tools act on
 */
export interface ContextState {
  filters: FilterSelection;
  viewport: MapViewport;
  overlays: Record<string, boolean>;
  /** Site ids picked on the map, sorted; empty when nothing is selected */
  selectedSites: string[];
}

/**
 * Minimal change set. A filter set to null was cleared; an empty site list
 * cleared the selection.
 */
export interface ContextDelta {
  filters?: { [K in FilterField]?: FilterSelection[K] | null };
  viewport?: Partial<MapViewport>;
  overlays?: Record<string, boolean>;
  selectedSites?: string[];
}

export interface HistoryTurn {
  /** Admission order within the session */
  seq: number;
  at: number;
  message?: string;
  call: {
    tool: string;
    arguments: Record<string, unknown>;
    callerId: string;
  };
  result: unknown;
  delta: ContextDelta;
}

/**
 * A turn as the dispatcher describes it, before the store orders it
 */
export type TurnRecord = Omit<HistoryTurn, 'seq' | 'delta'>;

export interface SessionContext extends ContextState {
  sessionId: string;
  history: HistoryTurn[];
  nextTurnSeq: number;
  createdAt: number;
  lastActivityAt: number;
}

export type SessionSnapshot = Readonly<SessionContext>;
