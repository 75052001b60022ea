/**
 * Tool Dispatcher
 * Runs one tool call through the invocation state machine:
 *
 *   Received -> Validated -> Authorized -> Executed -> Succeeded
 *        \__________\____________\___________\______-> Failed
 *
 * 1. Validate arguments against the registry (under the session lock)
 * 2. Consult the rate & access gate
 * 3. State-mutating tools: compute the change, reduce it to a minimal delta
 *    and apply it before the lock is released
 * 4. Read-only and export tools: capture the filters and reserve a history
 *    position, release the lock, run the I/O with a timeout, then re-take the
 *    lock to record the turn in its reserved position
 *
 * A call that fails never applies a delta and leaves no history entry. A
 * timed-out call has its signal aborted so late work commits nothing.
 */

import { generateCorrelationId } from '../utils/crypto.js';
import {
  AppError,
  InternalError,
  RateLimitError,
  UnknownToolError,
  UpstreamUnavailableError,
  isAppError,
  type ErrorEnvelope,
} from '../utils/errors.js';
import { createRequestLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { minimalDelta } from './context-delta.js';
import { SessionLock } from './session-lock.js';
import { getHandler } from '../tools/catalogue.js';
import type { RateAccessGate } from './rate-gate.js';
import type { SessionContextStore } from './session.service.js';
import type { SchemaRegistry } from '../tools/registry.js';
import type {
  EngineServices,
  ExportTool,
  ReadOnlyTool,
  ToolArguments,
  ToolCall,
  ToolExecutionContext,
  ToolHandler,
} from '../tools/types.js';
import type { ContextDelta, FilterSelection, SessionSnapshot, TurnRecord } from '../types/session.js';

export type InvocationState = 'Received' | 'Validated' | 'Authorized' | 'Executed' | 'Succeeded' | 'Failed';

export interface TraceEntry {
  state: InvocationState;
  at: number;
}

export interface DispatchOutcome {
  status: 'ok' | 'error';
  correlationId: string;
  statusCode: number;
  result: unknown;
  error: ErrorEnvelope | null;
  /** Set for rate-limited calls */
  retryAfterMs?: number;
  delta: ContextDelta;
  snapshot: SessionSnapshot;
  trace: TraceEntry[];
}

export interface DispatcherDeps {
  registry: SchemaRegistry;
  sessions: SessionContextStore;
  gate: RateAccessGate;
  services: EngineServices;
  lock?: SessionLock;
  handlers?: (name: string) => ToolHandler | undefined;
  now?: () => number;
}

/**
 * Ordered record of the states one invocation passed through
 */
export class InvocationTrace {
  readonly entries: TraceEntry[] = [];

  constructor(
    private readonly log: Logger,
    private readonly now: () => number
  ) {}

  get current(): InvocationState | undefined {
    return this.entries[this.entries.length - 1]?.state;
  }

  reached(state: InvocationState): boolean {
    return this.entries.some((entry) => entry.state === state);
  }

  enter(state: InvocationState, fields: Record<string, unknown> = {}): void {
    const from = this.current;
    this.entries.push({ state, at: this.now() });
    this.log.debug({ from, to: state, ...fields }, 'Invocation transition');
  }
}

type IoTool = ReadOnlyTool | ExportTool;

type Admission =
  | { kind: 'committed'; result: unknown; delta: ContextDelta }
  | {
      kind: 'pending';
      handler: IoTool;
      args: ToolArguments;
      filters: FilterSelection;
      selectedSites: string[];
      seq: number;
      admittedAt: number;
    };

export class ToolDispatcher {
  private readonly lock: SessionLock;
  private readonly handlers: (name: string) => ToolHandler | undefined;
  private readonly now: () => number;

  constructor(private readonly deps: DispatcherDeps) {
    this.lock = deps.lock ?? new SessionLock();
    this.handlers = deps.handlers ?? getHandler;
    this.now = deps.now ?? Date.now;
  }

  async dispatch(call: ToolCall): Promise<DispatchOutcome> {
    const correlationId = call.correlationId ?? generateCorrelationId();
    const log = createRequestLogger({
      correlationId,
      sessionId: call.sessionId,
      callerId: call.callerId,
      toolName: call.tool,
    });
    const trace = new InvocationTrace(log, this.now);
    trace.enter('Received');

    try {
      const { result, delta } = await this.run(call, trace, log);
      trace.enter('Succeeded');
      log.info({ changed: Object.keys(delta) }, 'Tool call succeeded');
      return {
        status: 'ok',
        correlationId,
        statusCode: 200,
        result,
        error: null,
        delta,
        snapshot: this.deps.sessions.snapshot(call.sessionId),
        trace: trace.entries,
      };
    } catch (error) {
      const appError = this.classify(error, call.tool, trace, log);
      trace.enter('Failed', { kind: appError.kind });
      log.warn({ kind: appError.kind, message: appError.message }, 'Tool call failed');
      return {
        status: 'error',
        correlationId,
        statusCode: appError.statusCode,
        result: null,
        error: appError.toEnvelope(),
        ...(appError instanceof RateLimitError && { retryAfterMs: appError.retryAfterMs }),
        delta: {},
        snapshot: this.deps.sessions.snapshot(call.sessionId),
        trace: trace.entries,
      };
    }
  }

  private async run(
    call: ToolCall,
    trace: InvocationTrace,
    log: Logger
  ): Promise<{ result: unknown; delta: ContextDelta }> {
    const { sessions } = this.deps;
    const admission = await this.lock.run(call.sessionId, () => this.admit(call, trace));

    if (admission.kind === 'committed') {
      return { result: admission.result, delta: admission.delta };
    }

    const { handler, args, filters, selectedSites, seq, admittedAt } = admission;
    const abort = new AbortController();
    const context: ToolExecutionContext = {
      sessionId: call.sessionId,
      callerId: call.callerId,
      filters,
      selectedSites,
      services: this.deps.services,
      log,
      signal: abort.signal,
    };
    const result = await withTimeout(
      handler.execute(args, context),
      handler.timeoutMs,
      `Tool '${call.tool}' did not finish within ${handler.timeoutMs}ms`,
      (error) => abort.abort(error)
    );
    trace.enter('Executed');

    await this.lock.run(call.sessionId, () => {
      sessions.recordTurn(call.sessionId, this.turn(call, args, result, admittedAt), seq);
    });
    return { result, delta: {} };
  }

  /**
   * Everything that must happen while holding the session lock
   */
  private admit(call: ToolCall, trace: InvocationTrace): Admission {
    const { registry, gate, sessions } = this.deps;

    const args = registry.validate(call.tool, call.arguments);
    const definition = registry.get(call.tool);
    const handler = this.handlers(call.tool);
    if (!definition) {
      throw new UnknownToolError(call.tool);
    }
    if (!handler) {
      throw new InternalError(`No handler for tool '${call.tool}'`);
    }
    trace.enter('Validated');

    gate.check(call.callerId, call.tool, definition.role);
    trace.enter('Authorized');

    const state = sessions.state(call.sessionId);
    if (handler.kind !== 'state-mutating') {
      return {
        kind: 'pending',
        handler,
        args,
        filters: state.filters,
        selectedSites: state.selectedSites,
        seq: sessions.reserveTurn(call.sessionId),
        admittedAt: this.now(),
      };
    }

    const change = handler.computeChange(args, state);
    const delta = minimalDelta(state, change.delta);
    trace.enter('Executed');
    sessions.applyDelta(call.sessionId, delta, this.turn(call, args, change.payload, this.now()));
    return { kind: 'committed', result: change.payload, delta };
  }

  private turn(call: ToolCall, args: ToolArguments, result: unknown, at: number): TurnRecord {
    return {
      at,
      ...(call.message !== undefined && { message: call.message }),
      call: { tool: call.tool, arguments: { ...args }, callerId: call.callerId },
      result,
    };
  }

  /**
   * Failures inside tool execution that are not already classified come
   * from a backing service
   */
  private classify(error: unknown, toolName: string, trace: InvocationTrace, log: Logger): AppError {
    if (isAppError(error)) return error;

    if (trace.reached('Authorized')) {
      log.error({ err: error }, 'Backing service failed during tool execution');
      return new UpstreamUnavailableError(
        `Tool '${toolName}' failed: ${error instanceof Error ? error.message : String(error)}`,
        `tool:${toolName}`,
        error
      );
    }

    log.error({ err: error }, 'Unexpected error before execution');
    return new InternalError();
  }
}
