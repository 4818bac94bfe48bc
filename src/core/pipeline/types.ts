/**
 * Shared types for the phased interception pipeline.
 */

import type { PipelineContext } from './context.js';
import type { PipelinePhase } from './phase.js';

// ---------------------------------------------------------------------------
// Interceptor
// ---------------------------------------------------------------------------

/**
 * A handler bound to one phase. It receives the run's context and the
 * current subject, and must call `context.proceed()` (or `proceedWith()`)
 * for the rest of the chain to run.
 */
export type Interceptor<TSubject, TCall> = (
  context: PipelineContext<TSubject, TCall>,
  subject: TSubject,
) => Promise<void> | void;

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Lifecycle of a single run. Terminal states are never left. */
export type PipelineState = 'not-started' | 'running' | 'finished' | 'failed';

/** Per-run execution options. */
export interface ExecuteOptions {
  /** External cancellation (client disconnect, parent run, shutdown). */
  signal?: AbortSignal;
  /** Abort the run when it has not settled after this many milliseconds. */
  timeoutMs?: number;
}

/** Cleanup registered with `context.defer()`. */
export type Cleanup = () => void | Promise<void>;

// ---------------------------------------------------------------------------
// Phase relations
// ---------------------------------------------------------------------------

/** How a phase was placed in its pipeline; consulted when merging. */
export type PhaseRelation =
  | { type: 'last' }
  | { type: 'before'; reference: PipelinePhase }
  | { type: 'after'; reference: PipelinePhase };
