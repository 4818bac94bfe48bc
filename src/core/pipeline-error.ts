/**
 * PipelineError: structured error classes raised by Phaseline.
 *
 * Install-time errors (phase lookup, plugin dependencies, ordering) fail
 * fast while plugins are being installed. Request-time errors carry a
 * kind from the closed hierarchy in `types/errors.ts` so that boundary
 * interceptors can dispatch on them.
 *
 * Anything thrown by an interceptor that is not a PipelineError is a
 * plain handler error; `kindOf()` reports it as `HANDLER`.
 */

import type { ErrorKindValue, ErrorPayload } from '../types/errors.js';
import { ErrorKind } from '../types/errors.js';
import type { PipelinePhase } from './pipeline/phase.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Brands PipelineError instances so that errors crossing module copies
 * (two installed versions of the package) are still recognised.
 */
const PIPELINE_ERROR_BRAND = Symbol.for('phaseline.PipelineError');

// ---------------------------------------------------------------------------
// PipelineError base class
// ---------------------------------------------------------------------------

export class PipelineError extends Error {
  /** Position of this error in the kind hierarchy. */
  readonly kind: ErrorKindValue;
  /** Status code a response rendering this error should use, if any. */
  readonly status?: number;

  /** @internal Brand for safe checks across module boundaries. */
  readonly [PIPELINE_ERROR_BRAND] = true as const;

  constructor(kind: ErrorKindValue, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.kind = kind;
    if (options?.status !== undefined) {
      this.status = options.status;
    }
  }

  /** Sanitized payload without stack traces. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = { kind: this.kind, message: this.message };
    if (this.status !== undefined) {
      payload.status = this.status;
    }
    return payload;
  }
}

// ---------------------------------------------------------------------------
// Install-time errors
// ---------------------------------------------------------------------------

export class PhaseNotFoundError extends PipelineError {
  readonly phase: PipelinePhase;

  constructor(phase: PipelinePhase) {
    super(ErrorKind.PHASE_NOT_FOUND, `Phase ${phase.name} was not registered for this pipeline`);
    this.name = 'PhaseNotFoundError';
    this.phase = phase;
  }
}

export class PipelineFrozenError extends PipelineError {
  constructor(operation: string) {
    super(
      ErrorKind.PIPELINE_FROZEN,
      `Cannot ${operation}: pipeline registration is closed once the application has started`,
    );
    this.name = 'PipelineFrozenError';
  }
}

export class MissingDependencyError extends PipelineError {
  /** Key of the plugin that was referenced but is not installed. */
  readonly pluginKey: string;

  constructor(pluginKey: string) {
    super(
      ErrorKind.MISSING_DEPENDENCY,
      `Plugin "${pluginKey}" is not installed in this pipeline; install it first`,
    );
    this.name = 'MissingDependencyError';
    this.pluginKey = pluginKey;
  }
}

export class DuplicatePluginError extends PipelineError {
  readonly pluginKey: string;

  constructor(pluginKey: string) {
    super(ErrorKind.DUPLICATE_PLUGIN, `Plugin "${pluginKey}" is already installed`);
    this.name = 'DuplicatePluginError';
    this.pluginKey = pluginKey;
  }
}

export class PluginOrderingCycleError extends PipelineError {
  /** Plugin keys forming the cycle, first key repeated at the end. */
  readonly cycle: readonly string[];

  constructor(category: string, cycle: string[]) {
    super(
      ErrorKind.ORDERING_CYCLE,
      `Conflicting ${category} ordering between plugins: ${cycle.join(' -> ')}`,
    );
    this.name = 'PluginOrderingCycleError';
    this.cycle = cycle;
  }
}

// ---------------------------------------------------------------------------
// Execution errors
// ---------------------------------------------------------------------------

export class ExecutionStateError extends PipelineError {
  constructor(message: string) {
    super(ErrorKind.EXECUTION_STATE, message);
    this.name = 'ExecutionStateError';
  }
}

/**
 * Raised into the interceptor chain when a run is aborted. Boundary
 * interceptors must rethrow it rather than render it.
 */
export class CancellationError extends PipelineError {
  constructor(reason?: unknown) {
    super(ErrorKind.CANCELLED, describeReason(reason), { cause: reason });
    this.name = 'CancellationError';
  }
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error && reason.message.length > 0) {
    return `Pipeline execution cancelled: ${reason.message}`;
  }
  if (typeof reason === 'string' && reason.length > 0) {
    return `Pipeline execution cancelled: ${reason}`;
  }
  return 'Pipeline execution cancelled';
}

// ---------------------------------------------------------------------------
// Handler errors
// ---------------------------------------------------------------------------

/** Base for errors application handlers throw on purpose. */
export class HandlerError extends PipelineError {
  constructor(message: string, options?: { kind?: ErrorKindValue; status?: number; cause?: unknown }) {
    super(options?.kind ?? ErrorKind.HANDLER, message, {
      status: options?.status ?? 500,
      cause: options?.cause,
    });
    this.name = 'HandlerError';
  }
}

export class BadRequestError extends HandlerError {
  constructor(message: string, options?: { kind?: ErrorKindValue; cause?: unknown }) {
    super(message, { kind: options?.kind ?? ErrorKind.BAD_REQUEST, status: 400, cause: options?.cause });
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends HandlerError {
  constructor(message = 'Resource not found') {
    super(message, { kind: ErrorKind.NOT_FOUND, status: 404 });
    this.name = 'NotFoundError';
  }
}

export class CannotTransformContentError extends BadRequestError {
  /** Name of the receive type that could not be produced. */
  readonly typeName: string;

  constructor(typeName: string, options?: { cause?: unknown }) {
    super(`Cannot transform this request's content to ${typeName}`, {
      kind: ErrorKind.CANNOT_TRANSFORM,
      cause: options?.cause,
    });
    this.name = 'CannotTransformContentError';
    this.typeName = typeName;
  }
}

export class RequestAlreadyConsumedError extends BadRequestError {
  constructor() {
    super('Request body has already been consumed', { kind: ErrorKind.REQUEST_ALREADY_CONSUMED });
    this.name = 'RequestAlreadyConsumedError';
  }
}

export class ResponseAlreadySentError extends HandlerError {
  constructor() {
    super('Response has already been sent', { kind: ErrorKind.RESPONSE_ALREADY_SENT });
    this.name = 'ResponseAlreadySentError';
  }
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

/**
 * Safe type guard for PipelineError instances, including ones created by
 * another copy of this module.
 */
export function isPipelineError(value: unknown): value is PipelineError {
  if (value instanceof PipelineError) {
    return true;
  }

  if (
    typeof value === 'object' &&
    value !== null &&
    PIPELINE_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[PIPELINE_ERROR_BRAND] === true
  ) {
    return true;
  }

  return false;
}

/** Whether the value is a cancellation raised by the engine. */
export function isCancellation(value: unknown): value is CancellationError {
  return isPipelineError(value) && value.kind === ErrorKind.CANCELLED;
}

/** Kind of any thrown value; non-framework errors are `HANDLER` errors. */
export function kindOf(value: unknown): ErrorKindValue {
  return isPipelineError(value) ? value.kind : ErrorKind.HANDLER;
}
