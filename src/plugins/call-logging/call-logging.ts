/**
 * Call logging: one log entry per call with method, path, status and
 * duration, written once the final response content is known.
 */

import type { ApplicationCall } from '../../core/call/application-call.js';
import { AttributeKey } from '../../core/call/attributes.js';
import { contentStatus, isOutgoingContent } from '../../core/call/content.js';
import { createLogger } from '../../core/logger.js';
import type { LogLevel } from '../../core/logger.js';
import { createConfigurablePlugin } from '../../core/plugin/create-plugin.js';

const logger = createLogger('plugin:call-logging');

const CallStartTime = new AttributeKey<number>('CallStartTime');
const CallLogged = new AttributeKey<true>('CallLogged');

export class CallLoggingConfig {
  level: LogLevel = 'info';
  /** Milliseconds clock for durations. */
  clock: () => number = Date.now;
  /** Only calls accepted by every filter are logged. */
  readonly filters: Array<(call: ApplicationCall) => boolean> = [];

  filter(predicate: (call: ApplicationCall) => boolean): void {
    this.filters.push(predicate);
  }
}

export const CallLogging = createConfigurablePlugin(
  'CallLogging',
  () => new CallLoggingConfig(),
  (plugin) => {
    const config = plugin.pluginConfig;

    plugin.onCall((_context, call) => {
      call.attributes.put(CallStartTime, config.clock());
    });

    plugin.onCallRespond.afterTransform((_context, call, content) => {
      if (call.attributes.contains(CallLogged)) return;
      if (!config.filters.every((accept) => accept(call))) return;
      call.attributes.put(CallLogged, true);

      const startedAt = call.attributes.getOrNull(CallStartTime);
      const status = (isOutgoingContent(content) ? contentStatus(content) : undefined) ?? call.response.status ?? 200;

      const meta: Record<string, unknown> = {
        call: call.id,
        method: call.request.method,
        path: call.request.path,
        status,
      };
      if (startedAt !== null) {
        meta['duration_ms'] = config.clock() - startedAt;
      }
      logger[config.level](`${status}: ${call.request.method} - ${call.request.path}`, meta);
    });
  },
);
