/**
 * Hook targets and the contexts plugin handlers receive.
 *
 * A hook handler does not have to call `proceed()`: when it returns
 * without advancing the chain, the adapter proceeds for it. Calling
 * `finish()` ends the run as usual.
 */

import type { ApplicationCall } from '../call/application-call.js';
import type { ReceiveRequest, ReceiveType } from '../call/content.js';
import { CallPhases, ReceivePhases, SendPhases } from '../call/phases.js';
import type { Cleanup, Interceptor, Pipeline, PipelineContext, PipelinePhase } from '../pipeline/index.js';
import type { HookCategory, HookPipelines } from './types.js';

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

export interface HookTarget<TSubject> {
  readonly category: HookCategory;
  /** Where a plain (non-relative) registration goes. */
  readonly defaultPhase: PipelinePhase;
  pipeline(host: HookPipelines): Pipeline<TSubject, ApplicationCall>;
}

export const CALL_HOOK: HookTarget<undefined> = {
  category: 'call',
  defaultPhase: CallPhases.Plugins,
  pipeline: (host) => host.callPipeline,
};

export const RECEIVE_HOOK: HookTarget<ReceiveRequest> = {
  category: 'receive',
  defaultPhase: ReceivePhases.Transform,
  pipeline: (host) => host.receivePipeline,
};

export const RESPOND_HOOK: HookTarget<unknown> = {
  category: 'respond',
  defaultPhase: SendPhases.Transform,
  pipeline: (host) => host.sendPipeline,
};

export const AFTER_TRANSFORM_HOOK: HookTarget<unknown> = {
  category: 'afterTransform',
  defaultPhase: SendPhases.After,
  pipeline: (host) => host.sendPipeline,
};

// ---------------------------------------------------------------------------
// Contexts
// ---------------------------------------------------------------------------

export class CallHandlingContext<TSubject> {
  constructor(protected readonly context: PipelineContext<TSubject, ApplicationCall>) {}

  get call(): ApplicationCall {
    return this.context.call;
  }

  get subject(): TSubject {
    return this.context.subject;
  }

  get signal(): AbortSignal {
    return this.context.signal;
  }

  proceed(): Promise<TSubject> {
    return this.context.proceed();
  }

  proceedWith(subject: TSubject): Promise<TSubject> {
    return this.context.proceedWith(subject);
  }

  /** End the whole run; nothing after this handler runs. */
  finish(): void {
    this.context.finish();
  }

  defer(cleanup: Cleanup): void {
    this.context.defer(cleanup);
  }
}

export class OnCallContext extends CallHandlingContext<undefined> {}

export class OnCallReceiveContext extends CallHandlingContext<ReceiveRequest> {
  /** Replace the received value and continue with the result. */
  async transformBody(
    transform: (value: unknown, type: ReceiveType<unknown>) => unknown,
  ): Promise<void> {
    const { type, value } = this.context.subject;
    const transformed: unknown = await transform(value, type);
    await this.context.proceedWith({ type, value: transformed });
  }
}

export class OnCallRespondContext extends CallHandlingContext<unknown> {
  /** Replace the outgoing message and continue with the result. */
  async transformBody(transform: (body: unknown) => unknown): Promise<void> {
    const transformed: unknown = await transform(this.context.subject);
    await this.context.proceedWith(transformed);
  }
}

export class OnCallRespondAfterTransformContext extends CallHandlingContext<unknown> {}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

type HandlerResult = Promise<void> | void;

export type CallHandler = (context: OnCallContext, call: ApplicationCall) => HandlerResult;
export type ReceiveHandler = (context: OnCallReceiveContext, call: ApplicationCall) => HandlerResult;
export type RespondHandler = (
  context: OnCallRespondContext,
  call: ApplicationCall,
  body: unknown,
) => HandlerResult;
export type AfterTransformHandler = (
  context: OnCallRespondAfterTransformContext,
  call: ApplicationCall,
  content: unknown,
) => HandlerResult;

/**
 * Wrap a hook handler as an interceptor that proceeds on the handler's
 * behalf when it did not advance the chain itself.
 */
export function hookInterceptor<TSubject, TContext>(
  createContext: (context: PipelineContext<TSubject, ApplicationCall>) => TContext,
  run: (hookContext: TContext, subject: TSubject, call: ApplicationCall) => HandlerResult,
): Interceptor<TSubject, ApplicationCall> {
  return async (context, subject) => {
    const position = context.position;
    await run(createContext(context), subject, context.call);
    if (context.position === position) {
      await context.proceed();
    }
  };
}
