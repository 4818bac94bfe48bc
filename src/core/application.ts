/**
 * Application: owns the call, receive and send pipelines and the
 * registry of installed plugins.
 *
 * Plugins are installed while the application is being configured.
 * Once the engine has started it the pipelines are frozen and shared by
 * every call.
 */

import type { ApplicationCall } from './call/application-call.js';
import { Attributes } from './call/attributes.js';
import {
  createCallPipeline,
  createReceivePipeline,
  createSendPipeline,
} from './call/phases.js';
import type { CallPipeline, ReceivePipeline, SendPipeline } from './call/phases.js';
import { createLogger } from './logger.js';
import {
  DuplicatePluginError,
  MissingDependencyError,
  PipelineFrozenError,
} from './pipeline-error.js';
import type { ExecuteOptions, Interceptor, PipelinePhase } from './pipeline/index.js';
import { OrderingConstraints } from './plugin/ordering.js';
import { PluginBuilder } from './plugin/plugin-builder.js';
import type { InstalledPlugin, PluginDefinition, PluginHost } from './plugin/types.js';

const logger = createLogger('application');

export class Application implements PluginHost {
  readonly callPipeline: CallPipeline = createCallPipeline();
  readonly receivePipeline: ReceivePipeline = createReceivePipeline();
  readonly sendPipeline: SendPipeline = createSendPipeline();

  /** Application-scoped storage; installed plugins live here too. */
  readonly attributes = new Attributes();
  readonly ordering = new OrderingConstraints();

  private readonly installed = new Map<string, InstalledPlugin<unknown>>();
  private frozen = false;

  // -------------------------------------------------------------------------
  // Plugins
  // -------------------------------------------------------------------------

  /**
   * Install a plugin: create its configuration, let `configure` adjust
   * it, run the plugin body and apply what it registered.
   *
   * @throws DuplicatePluginError when a plugin with the same key is installed.
   * @throws MissingDependencyError when a relative registration names a
   *   plugin that is not installed.
   * @throws PluginOrderingCycleError when the plugin's ordering contradicts
   *   an existing one. Nothing is applied when any registration fails.
   */
  install<TConfig>(
    definition: PluginDefinition<TConfig>,
    configure?: (config: TConfig) => void,
  ): InstalledPlugin<TConfig> {
    if (this.frozen) {
      throw new PipelineFrozenError(`install plugin "${definition.key}"`);
    }
    if (this.installed.has(definition.key)) {
      throw new DuplicatePluginError(definition.key);
    }

    const config = definition.createConfiguration();
    configure?.(config);

    const builder = new PluginBuilder(definition.key, config, this);
    definition.body(builder);

    const trial = this.ordering.copy();
    for (const interception of builder.interceptions) {
      interception.check(this, trial);
    }
    for (const interception of builder.interceptions) {
      interception.apply(this);
    }

    const plugin: InstalledPlugin<TConfig> = {
      key: definition.key,
      config,
      interceptions: [...builder.interceptions],
    };
    this.installed.set(definition.key, plugin);
    this.attributes.put(definition.instanceKey, plugin);

    logger.debug('plugin installed', {
      plugin: definition.key,
      interceptions: plugin.interceptions.length,
    });
    return plugin;
  }

  /** @throws MissingDependencyError when the plugin is not installed. */
  plugin<TConfig>(definition: PluginDefinition<TConfig>): InstalledPlugin<TConfig> {
    const plugin = this.pluginOrNull(definition);
    if (!plugin) {
      throw new MissingDependencyError(definition.key);
    }
    return plugin;
  }

  pluginOrNull<TConfig>(definition: PluginDefinition<TConfig>): InstalledPlugin<TConfig> | null {
    return this.attributes.getOrNull(definition.instanceKey);
  }

  installedPlugin(key: string): InstalledPlugin<unknown> | null {
    return this.installed.get(key) ?? null;
  }

  /** Keys of installed plugins, in install order. */
  get pluginKeys(): string[] {
    return [...this.installed.keys()];
  }

  // -------------------------------------------------------------------------
  // Pipelines
  // -------------------------------------------------------------------------

  intercept(phase: PipelinePhase, interceptor: Interceptor<undefined, ApplicationCall>): void {
    this.callPipeline.intercept(phase, interceptor);
  }

  /** Close registration on every pipeline. */
  freeze(): void {
    this.frozen = true;
    this.callPipeline.freeze();
    this.receivePipeline.freeze();
    this.sendPipeline.freeze();
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Run the call pipeline for one call. */
  async handle(call: ApplicationCall, options?: ExecuteOptions): Promise<void> {
    await this.callPipeline.execute(call, undefined, options);
  }
}
