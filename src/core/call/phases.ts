/**
 * Default phase sets of the call, receive and send pipelines.
 *
 * The order is a fixed contract plugins rely on:
 *
 *   call     Setup → Monitoring → Plugins → Call → Fallback
 *   receive  Before → Transform → After
 *   send     Before → Transform → Render → ContentEncoding →
 *            TransferEncoding → After → Engine
 */

import { Pipeline, PipelinePhase } from '../pipeline/index.js';
import type { ApplicationCall } from './application-call.js';
import type { ReceiveRequest } from './content.js';

// ---------------------------------------------------------------------------
// Call pipeline
// ---------------------------------------------------------------------------

export const CallPhases = {
  /** Prepare the call: attributes, call-scoped state. */
  Setup: new PipelinePhase('Setup'),
  /** Observe the rest of the call: tracing, logging, error boundaries. */
  Monitoring: new PipelinePhase('Monitoring'),
  /** Plugin hooks registered with `onCall`. */
  Plugins: new PipelinePhase('Plugins'),
  /** Application handlers. */
  Call: new PipelinePhase('Call'),
  /** Runs when nothing responded. */
  Fallback: new PipelinePhase('Fallback'),
} as const;

/** The call pipeline carries no subject; everything lives on the call. */
export type CallPipeline = Pipeline<undefined, ApplicationCall>;

export function createCallPipeline(): CallPipeline {
  return new Pipeline<undefined, ApplicationCall>(
    CallPhases.Setup,
    CallPhases.Monitoring,
    CallPhases.Plugins,
    CallPhases.Call,
    CallPhases.Fallback,
  );
}

// ---------------------------------------------------------------------------
// Receive pipeline
// ---------------------------------------------------------------------------

export const ReceivePhases = {
  Before: new PipelinePhase('Before'),
  /** Raw body → requested type. */
  Transform: new PipelinePhase('Transform'),
  After: new PipelinePhase('After'),
} as const;

export type ReceivePipeline = Pipeline<ReceiveRequest, ApplicationCall>;

export function createReceivePipeline(): ReceivePipeline {
  return new Pipeline<ReceiveRequest, ApplicationCall>(
    ReceivePhases.Before,
    ReceivePhases.Transform,
    ReceivePhases.After,
  );
}

// ---------------------------------------------------------------------------
// Send pipeline
// ---------------------------------------------------------------------------

export const SendPhases = {
  Before: new PipelinePhase('Before'),
  /** Domain values → content-like values (plugin `onCallRespond`). */
  Transform: new PipelinePhase('Transform'),
  /** Remaining plain values → OutgoingContent. */
  Render: new PipelinePhase('Render'),
  ContentEncoding: new PipelinePhase('ContentEncoding'),
  TransferEncoding: new PipelinePhase('TransferEncoding'),
  /** Final content is known (plugin `onCallRespond.afterTransform`). */
  After: new PipelinePhase('After'),
  /** Hands the content to the response writer. */
  Engine: new PipelinePhase('Engine'),
} as const;

export type SendPipeline = Pipeline<unknown, ApplicationCall>;

export function createSendPipeline(): SendPipeline {
  return new Pipeline<unknown, ApplicationCall>(
    SendPhases.Before,
    SendPhases.Transform,
    SendPhases.Render,
    SendPhases.ContentEncoding,
    SendPhases.TransferEncoding,
    SendPhases.After,
    SendPhases.Engine,
  );
}
