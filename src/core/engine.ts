/**
 * Engine: hosts an Application and hands it calls.
 *
 * The engine owns its own receive and send pipelines; on every start
 * they are merged into the fresh application, whose send pipeline then
 * ends with the engine's response writer. Default transformations and
 * interceptors are installed before the configured modules run, and the
 * application's pipelines are frozen once the modules are done.
 *
 * Connectors (sockets, HTTP parsing) live outside the engine and talk to
 * it through two collaborators: a body reader and a response writer.
 */

import { randomUUID } from 'node:crypto';
import { Application } from './application.js';
import { ApplicationCall } from './call/application-call.js';
import type { BodyReader, IncomingRequest, ResponseWriter } from './call/application-call.js';
import { AttributeKey } from './call/attributes.js';
import { isOutgoingContent, statusContent, textContent } from './call/content.js';
import {
  installDefaultReceiveTransformations,
  installDefaultSendTransformations,
} from './call/default-transformations.js';
import {
  CallPhases,
  createReceivePipeline,
  createSendPipeline,
  SendPhases,
} from './call/phases.js';
import type { ReceivePipeline, SendPipeline } from './call/phases.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ErrorKind } from '../types/errors.js';
import {
  ExecutionStateError,
  HandlerError,
  isCancellation,
  isPipelineError,
  kindOf,
} from './pipeline-error.js';
import { defaultConfig } from '../types/config.js';
import type { PhaselineConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// Attributes
// ---------------------------------------------------------------------------

/** Status a router stores when no route matched; used by the fallback. */
export const RoutingFailureStatus = new AttributeKey<number>('RoutingFailureStatus');

/** Set once the send pipeline ran for a call. */
const SendPipelineExecuted = new AttributeKey<true>('SendPipelineExecuted');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configures a freshly created application: installs plugins, routes. */
export type EngineModule = (application: Application) => void;

export interface EngineCollaborators {
  writeResponse: ResponseWriter;
  /** Defaults to returning the request's raw body (or an empty string). */
  readBody?: BodyReader;
}

export interface EngineOptions {
  config?: PhaselineConfig;
  collaborators: EngineCollaborators;
  modules?: readonly EngineModule[];
  /** Milliseconds clock used for startup timing. */
  clock?: () => number;
}

export interface HandleOptions {
  /** Cancels the call, e.g. when the client disconnected. */
  signal?: AbortSignal;
}

const readRawBody: BodyReader = async (request) => request.body ?? '';

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class Engine {
  /** Engine-level pipelines, merged into every application on start. */
  readonly receivePipeline: ReceivePipeline = createReceivePipeline();
  readonly sendPipeline: SendPipeline = createSendPipeline();

  readonly config: PhaselineConfig;

  private readonly collaborators: EngineCollaborators;
  private readonly modules: readonly EngineModule[];
  private readonly clock: () => number;
  private readonly logger = createLogger('engine');

  private current: Application | null = null;
  private firstLoad = true;
  private stopped = false;

  constructor(options: EngineOptions) {
    this.config = options.config ?? defaultConfig();
    this.collaborators = options.collaborators;
    this.modules = options.modules ?? [];
    this.clock = options.clock ?? Date.now;

    this.sendPipeline.intercept(SendPhases.Engine, async (context, content) => {
      if (!isOutgoingContent(content)) {
        throw new HandlerError(`Response for call ${context.call.id} was not rendered to content`);
      }
      await this.collaborators.writeResponse(context.call, content);
      context.call.response.markSent(content);
      await context.proceed();
    });
  }

  /** The running application. */
  get application(): Application {
    if (!this.current) {
      throw new ExecutionStateError('Engine has not been started');
    }
    return this.current;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  start(): Application {
    if (this.stopped) {
      throw new ExecutionStateError('Engine has been stopped');
    }
    return this.load();
  }

  /** Replace the application with a fresh one built by the same modules. */
  reload(): Application {
    return this.start();
  }

  stop(): void {
    this.stopped = true;
    this.current = null;
    this.logger.info('engine stopped');
  }

  private load(): Application {
    const startedAt = this.clock();
    const application = new Application();

    application.receivePipeline.merge(this.receivePipeline);
    application.sendPipeline.merge(this.sendPipeline);
    installDefaultReceiveTransformations(application.receivePipeline);
    installDefaultSendTransformations(application.sendPipeline);
    this.installDefaultInterceptors(application);
    this.installTransformationChecker(application);

    for (const module of this.modules) {
      module(application);
    }
    application.freeze();
    this.current = application;

    const seconds = (this.clock() - startedAt) / 1000;
    if (this.firstLoad) {
      this.firstLoad = false;
      this.logger.info(`Application started in ${seconds}s.`);
    } else {
      this.logger.info(`Application reloaded in ${seconds}s.`);
    }
    return application;
  }

  private installDefaultInterceptors(application: Application): void {
    application.sendPipeline.intercept(SendPhases.Before, async (context) => {
      context.call.attributes.put(SendPipelineExecuted, true);
      await context.proceed();
    });

    application.intercept(CallPhases.Call, async (context) => {
      const { call } = context;
      if (call.request.headerValues('host').length > 1) {
        await call.respond(400);
        context.finish();
        return;
      }
      await context.proceed();
    });

    application.intercept(CallPhases.Fallback, async (context) => {
      const { call } = context;
      if (call.attributes.contains(SendPipelineExecuted)) {
        context.finish();
        return;
      }
      await call.respond(this.fallbackStatus(call));
      await context.proceed();
    });
  }

  private installTransformationChecker(application: Application): void {
    application.intercept(CallPhases.Plugins, async (context) => {
      try {
        await context.proceed();
      } catch (error: unknown) {
        if (!isPipelineError(error) || error.kind !== ErrorKind.CANNOT_TRANSFORM) {
          throw error;
        }
        if (!context.call.response.isSent) {
          await context.call.respond(415);
        }
      }
    });

    application.sendPipeline.intercept(SendPhases.After, async (context, subject) => {
      if (isOutgoingContent(subject)) {
        await context.proceed();
      } else {
        await context.proceedWith(statusContent(406));
      }
    });
  }

  private fallbackStatus(call: ApplicationCall): number {
    return (
      call.response.status ??
      call.attributes.getOrNull(RoutingFailureStatus) ??
      this.config.fallback.status
    );
  }

  // -------------------------------------------------------------------------
  // Calls
  // -------------------------------------------------------------------------

  /**
   * Run one request through the application.
   *
   * An uncaught error becomes a response with the error's status (500
   * when it carries none) when nothing was sent yet.
   * Cancellation (signal or call timeout) sends nothing and is rethrown.
   */
  async handle(request: IncomingRequest, options: HandleOptions = {}): Promise<ApplicationCall> {
    if (this.stopped) {
      throw new ExecutionStateError('Engine has been stopped');
    }
    const application = this.application;

    const controller = new AbortController();
    const detach = this.linkSignal(controller, options.signal);

    const call = new ApplicationCall({
      id: randomUUID(),
      request,
      pipelines: application,
      readBody: this.collaborators.readBody ?? readRawBody,
      signal: controller.signal,
    });
    const log = this.logger.withContext({ call: call.id });

    try {
      await application.handle(call, { signal: controller.signal });
    } catch (error: unknown) {
      if (isCancellation(error)) {
        log.warn('call cancelled', { error_kind: error.kind, reason: error.message });
        throw error;
      }
      await this.respondWithError(call, error, log);
      return call;
    } finally {
      detach();
    }

    if (!call.response.isSent) {
      log.warn('call finished without a response', { path: call.request.path });
      await call.respond(this.fallbackStatus(call));
    }
    return call;
  }

  private async respondWithError(call: ApplicationCall, error: unknown, log: Logger): Promise<void> {
    log.error('unhandled error while handling call', { error, error_kind: kindOf(error) });
    if (call.response.isSent) {
      return;
    }

    const status = isPipelineError(error) && error.status !== undefined ? error.status : 500;
    const message = error instanceof Error ? error.message : String(error);
    await call.respond(
      this.config.engine.development ? textContent(message, { status }) : statusContent(status),
    );
  }

  /** Abort `controller` with `signal` or after the configured call timeout. */
  private linkSignal(controller: AbortController, signal: AbortSignal | undefined): () => void {
    const teardown: Array<() => void> = [];

    if (signal) {
      if (signal.aborted) {
        controller.abort(signal.reason);
      } else {
        const onAbort = (): void => controller.abort(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        teardown.push(() => signal.removeEventListener('abort', onAbort));
      }
    }

    const timeoutMs = this.config.engine.call_timeout_ms;
    if (timeoutMs > 0) {
      const timer = setTimeout(() => {
        controller.abort(new Error(`call timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      teardown.push(() => clearTimeout(timer));
    }

    return () => {
      for (const fn of teardown) fn();
    };
  }
}
