import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Application } from './application.js';
import { ApplicationCall } from './call/application-call.js';
import { CallPhases } from './call/phases.js';
import {
  DuplicatePluginError,
  MissingDependencyError,
  PipelineFrozenError,
} from './pipeline-error.js';
import { createConfigurablePlugin, createPlugin } from './plugin/create-plugin.js';
import { captureLogs } from '../testing/log-capture.js';
import type { LogCapture } from '../testing/log-capture.js';

const Counter = createConfigurablePlugin(
  'Counter',
  () => ({ start: 0 }),
  (plugin) => {
    plugin.onCall(() => undefined);
  },
);

const Empty = createPlugin('Empty', () => undefined);

describe('Application plugins', () => {
  let logs: LogCapture;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  it('returns the installed plugin with its configuration', () => {
    const app = new Application();

    const installed = app.install(Counter, (config) => {
      config.start = 5;
    });

    expect(installed.key).toBe('Counter');
    expect(installed.config).toEqual({ start: 5 });
    expect(app.plugin(Counter)).toBe(installed);
    expect(app.installedPlugin('Counter')).toBe(installed);
  });

  it('creates a fresh configuration for every application', () => {
    const first = new Application();
    const second = new Application();

    first.install(Counter, (config) => {
      config.start = 9;
    });
    second.install(Counter);

    expect(second.plugin(Counter).config).toEqual({ start: 0 });
  });

  it('rejects a second plugin with the same key', () => {
    const app = new Application();
    app.install(Empty);

    expect(() => app.install(Empty)).toThrow(DuplicatePluginError);
    expect(() => app.install(createPlugin('Empty', () => undefined))).toThrow(
      'Plugin "Empty" is already installed',
    );
  });

  it('throws from plugin() and returns null from pluginOrNull() when absent', () => {
    const app = new Application();

    expect(() => app.plugin(Counter)).toThrow(MissingDependencyError);
    expect(app.pluginOrNull(Counter)).toBeNull();
    expect(app.installedPlugin('Counter')).toBeNull();
  });

  it('lists plugin keys in install order', () => {
    const app = new Application();
    app.install(Empty);
    app.install(Counter);

    expect(app.pluginKeys).toEqual(['Empty', 'Counter']);
  });

  it('stores the plugin in the application attributes', () => {
    const app = new Application();
    const installed = app.install(Counter);

    expect(app.attributes.get(Counter.instanceKey)).toBe(installed);
  });

  it('logs each install at debug level', () => {
    const app = new Application();
    app.install(Counter);

    const entry = logs.of('application', 'plugin installed')[0];
    expect(entry?.level).toBe('debug');
    expect(entry?.plugin).toBe('Counter');
    expect(entry?.meta).toEqual({ interceptions: 1 });
  });
});

describe('Application freezing', () => {
  it('refuses installs and interceptors once frozen', () => {
    const app = new Application();
    app.freeze();

    expect(app.isFrozen).toBe(true);
    expect(() => app.install(Empty)).toThrow(PipelineFrozenError);
    expect(() => app.install(Empty)).toThrow(
      'Cannot install plugin "Empty": pipeline registration is closed once the application has started',
    );
    expect(() => app.intercept(CallPhases.Call, async (context) => context.proceed())).toThrow(
      PipelineFrozenError,
    );
    expect(app.receivePipeline.isFrozen).toBe(true);
    expect(app.sendPipeline.isFrozen).toBe(true);
  });

  it('still handles calls once frozen', async () => {
    const app = new Application();
    const seen: string[] = [];
    app.intercept(CallPhases.Call, async (context) => {
      seen.push(context.call.request.path);
      await context.proceed();
    });
    app.freeze();

    await app.handle(
      new ApplicationCall({
        id: 'call-1',
        request: { method: 'get', path: '/frozen' },
        pipelines: app,
        readBody: async () => '',
      }),
    );

    expect(seen).toEqual(['/frozen']);
  });
});
