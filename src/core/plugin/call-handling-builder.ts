/**
 * Registration surface shared by the default and the relative plugin
 * builders. Subclasses decide where a registration lands.
 */

import type { ApplicationCall } from '../call/application-call.js';
import type { Interceptor } from '../pipeline/index.js';
import {
  AFTER_TRANSFORM_HOOK,
  CALL_HOOK,
  hookInterceptor,
  OnCallContext,
  OnCallReceiveContext,
  OnCallRespondAfterTransformContext,
  OnCallRespondContext,
  RECEIVE_HOOK,
  RESPOND_HOOK,
} from './hooks.js';
import type {
  AfterTransformHandler,
  CallHandler,
  HookTarget,
  ReceiveHandler,
  RespondHandler,
} from './hooks.js';

export type BuilderVariant = 'default' | 'before' | 'after';

export interface OnCallRespond {
  (handler: RespondHandler): void;
  /** Runs on the final content, after every transformation. */
  afterTransform(handler: AfterTransformHandler): void;
}

export interface CallHandlingBuilder {
  readonly variant: BuilderVariant;
  onCall(handler: CallHandler): void;
  onCallReceive(handler: ReceiveHandler): void;
  readonly onCallRespond: OnCallRespond;
}

export abstract class CallHandlingBuilderBase implements CallHandlingBuilder {
  abstract readonly variant: BuilderVariant;
  readonly onCallRespond: OnCallRespond;

  constructor() {
    const respond = (handler: RespondHandler): void => {
      this.register(
        RESPOND_HOOK,
        hookInterceptor(
          (context) => new OnCallRespondContext(context),
          (hookContext, body, call) => handler(hookContext, call, body),
        ),
      );
    };
    const afterTransform = (handler: AfterTransformHandler): void => {
      this.register(
        AFTER_TRANSFORM_HOOK,
        hookInterceptor(
          (context) => new OnCallRespondAfterTransformContext(context),
          (hookContext, content, call) => handler(hookContext, call, content),
        ),
      );
    };
    this.onCallRespond = Object.assign(respond, { afterTransform });
  }

  onCall(handler: CallHandler): void {
    this.register(
      CALL_HOOK,
      hookInterceptor(
        (context) => new OnCallContext(context),
        (hookContext, _subject, call) => handler(hookContext, call),
      ),
    );
  }

  onCallReceive(handler: ReceiveHandler): void {
    this.register(
      RECEIVE_HOOK,
      hookInterceptor(
        (context) => new OnCallReceiveContext(context),
        (hookContext, _subject, call) => handler(hookContext, call),
      ),
    );
  }

  protected abstract register<TSubject>(
    target: HookTarget<TSubject>,
    interceptor: Interceptor<TSubject, ApplicationCall>,
  ): void;
}
