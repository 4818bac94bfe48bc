/**
 * Status pages: render errors and bare status codes into responses.
 *
 * Exception handlers are keyed by error kind. A thrown error is handled
 * by the handler of its own kind or, failing that, of the closest
 * ancestor kind, so a `BAD_REQUEST` handler also covers
 * `CANNOT_TRANSFORM`. Errors that are not framework errors are `HANDLER`
 * errors. Cancellation is never handled.
 *
 * Status handlers run on the final content of a response whose status
 * has a handler, at most once per call.
 */

import type { ApplicationCall } from '../../core/call/application-call.js';
import { AttributeKey } from '../../core/call/attributes.js';
import { contentStatus, isOutgoingContent } from '../../core/call/content.js';
import { CallPhases } from '../../core/call/phases.js';
import { createLogger } from '../../core/logger.js';
import { isCancellation, kindOf } from '../../core/pipeline-error.js';
import { createConfigurablePlugin } from '../../core/plugin/create-plugin.js';
import { ErrorKind, kindLineage } from '../../types/errors.js';
import type { ErrorKindValue } from '../../types/errors.js';

const logger = createLogger('plugin:status-pages');

export type ExceptionHandler = (call: ApplicationCall, error: unknown) => Promise<void> | void;
export type StatusHandler = (call: ApplicationCall, status: number) => Promise<void> | void;

/** Set once a status handler ran for a call. */
const StatusHandled = new AttributeKey<true>('StatusPagesHandled');

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class StatusPagesConfig {
  readonly exceptions = new Map<ErrorKindValue, ExceptionHandler>();
  readonly statuses = new Map<number, StatusHandler>();

  /** Handle errors of `kind` and of every kind below it. */
  exception(kind: ErrorKindValue, handler: ExceptionHandler): void {
    if (kind === ErrorKind.CANCELLED) {
      throw new TypeError('Cancellation cannot be handled by status pages');
    }
    this.exceptions.set(kind, handler);
  }

  status(codes: readonly number[], handler: StatusHandler): void {
    for (const code of codes) {
      this.statuses.set(code, handler);
    }
  }

  /** Handler for the most specific registered kind in `kind`'s lineage. */
  findExceptionHandler(kind: ErrorKindValue): ExceptionHandler | undefined {
    for (const candidate of kindLineage(kind)) {
      const handler = this.exceptions.get(candidate);
      if (handler) return handler;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export const StatusPages = createConfigurablePlugin(
  'StatusPages',
  () => new StatusPagesConfig(),
  (plugin) => {
    const config = plugin.pluginConfig;

    if (config.exceptions.size > 0) {
      plugin.intercept(CallPhases.Monitoring, async (context) => {
        try {
          await context.proceed();
        } catch (error: unknown) {
          if (isCancellation(error)) throw error;

          const { call } = context;
          const handler = config.findExceptionHandler(kindOf(error));
          if (!handler || call.response.isSent) throw error;

          logger.debug('rendering error', { call: call.id, error_kind: kindOf(error) });
          await handler(call, error);
          if (call.response.isSent) {
            context.finish();
          }
        }
      });
    }

    if (config.statuses.size > 0) {
      plugin.onCallRespond.afterTransform(async (context, call, content) => {
        if (call.attributes.contains(StatusHandled) || !isOutgoingContent(content)) return;

        const status = contentStatus(content);
        const handler = status === undefined ? undefined : config.statuses.get(status);
        if (status === undefined || !handler) return;

        call.attributes.put(StatusHandled, true);
        await handler(call, status);
        if (call.response.isSent) {
          context.finish();
        }
      });
    }
  },
);
