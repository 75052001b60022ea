/**
 * Tool framework types
 */

import type { Logger } from '../utils/logger.js';
import type { ContextDelta, ContextState, FilterSelection } from '../types/session.js';
import type { AggregationCache } from '../services/aggregation-cache.js';
import type { DocumentSearchAdapter } from '../services/document-search.js';
import type { ExportService } from '../services/export.service.js';
import type { SensorDataService, SensorRow, UniqueValue } from '../providers/types.js';

export type SideEffectClass = 'state-mutating' | 'read-only' | 'export';

export type RoleRequirement = 'none' | 'admin';

export type CallerRole = 'user' | 'admin';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'string-list';

export type ArgumentValue = string | number | boolean | string[];

export type ToolArguments = Record<string, ArgumentValue>;

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  required: boolean;
  description: string;
  /** Allowed values; for string-list parameters this constrains each item */
  enum?: readonly string[];
  min?: number;
  max?: number;
  minLength?: number;
  maxLength?: number;
  maxItems?: number;
  default?: ArgumentValue;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: readonly ParameterSpec[];
  role: RoleRequirement;
  sideEffect: SideEffectClass;
}

export interface ToolCall {
  sessionId: string;
  callerId: string;
  tool: string;
  arguments: Record<string, unknown>;
  message?: string;
  correlationId?: string;
}

/**
 * Values held by the aggregation cache, tagged by query type
 */
export type CachedResult =
  | { kind: 'rows'; rows: SensorRow[] }
  | { kind: 'values'; values: UniqueValue[] };

/**
 * Collaborators a tool may reach while executing
 */
export interface EngineServices {
  cache: AggregationCache<CachedResult>;
  sensors: SensorDataService;
  documents: DocumentSearchAdapter;
  exports: ExportService;
}

export interface ToolExecutionContext {
  sessionId: string;
  callerId: string;
  /** Filters captured under the session lock when the call was authorized */
  filters: Readonly<FilterSelection>;
  /** Sensor selection captured alongside the filters */
  selectedSites: readonly string[];
  services: EngineServices;
  log: Logger;
  /** Aborted once the dispatcher has given up on the call */
  signal: AbortSignal;
}

export interface StateChange {
  delta: ContextDelta;
  payload: unknown;
}

interface ToolBase<S extends SideEffectClass> {
  definition: ToolDefinition & { sideEffect: S };
}

/**
 * Pure: computes the proposed change from the current state and arguments
 */
export interface StateMutatingTool extends ToolBase<'state-mutating'> {
  kind: 'state-mutating';
  computeChange(args: ToolArguments, state: ContextState): StateChange;
}

export interface ReadOnlyTool extends ToolBase<'read-only'> {
  kind: 'read-only';
  timeoutMs: number;
  execute(args: ToolArguments, context: ToolExecutionContext): Promise<unknown>;
}

export interface ExportTool extends ToolBase<'export'> {
  kind: 'export';
  timeoutMs: number;
  execute(args: ToolArguments, context: ToolExecutionContext): Promise<unknown>;
}

export type ToolHandler = StateMutatingTool | ReadOnlyTool | ExportTool;
