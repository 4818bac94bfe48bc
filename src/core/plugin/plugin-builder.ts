/**
 * Builder handed to a plugin body while the plugin is installed.
 *
 * Registrations are recorded first, then checked and applied once the
 * body returned; a failing body or check leaves the application untouched.
 */

import type { ApplicationCall } from '../call/application-call.js';
import { PhaseNotFoundError } from '../pipeline-error.js';
import { PipelinePhase } from '../pipeline/index.js';
import type { Interceptor } from '../pipeline/index.js';
import { CallHandlingBuilderBase } from './call-handling-builder.js';
import type { HookTarget } from './hooks.js';
import { AfterPluginsBuilder, BeforePluginsBuilder } from './relative-builder.js';
import type { Interception, InterceptionOwner, PluginHost, PluginReference } from './types.js';

export class PluginBuilder<TConfig> extends CallHandlingBuilderBase implements InterceptionOwner {
  readonly variant = 'default' as const;

  private readonly recorded: Interception[] = [];
  private phaseCount = 0;

  constructor(
    readonly key: string,
    readonly pluginConfig: TConfig,
    readonly application: PluginHost,
  ) {
    super();
  }

  get interceptions(): readonly Interception[] {
    return this.recorded;
  }

  /** A phase no other plugin knows about, named after this plugin. */
  newPhase(): PipelinePhase {
    this.phaseCount += 1;
    return new PipelinePhase(`${this.key}Phase${this.phaseCount}`);
  }

  /**
   * Register a raw call interceptor at `phase`. Unlike hook handlers it
   * must advance the chain itself.
   */
  intercept(phase: PipelinePhase, interceptor: Interceptor<undefined, ApplicationCall>): void {
    this.record({
      category: 'call',
      phase,
      check: (host) => {
        if (!host.callPipeline.contains(phase)) throw new PhaseNotFoundError(phase);
      },
      apply: (host) => host.callPipeline.intercept(phase, interceptor),
    });
  }

  /** Handlers registered in `build` run before those of `plugins`. */
  before(plugins: readonly PluginReference[], build: (builder: BeforePluginsBuilder) => void): void {
    build(new BeforePluginsBuilder(this, plugins));
  }

  /** Handlers registered in `build` run after those of `plugins`. */
  after(plugins: readonly PluginReference[], build: (builder: AfterPluginsBuilder) => void): void {
    build(new AfterPluginsBuilder(this, plugins));
  }

  /** @internal */
  record(interception: Interception): void {
    this.recorded.push(interception);
  }

  protected register<TSubject>(
    target: HookTarget<TSubject>,
    interceptor: Interceptor<TSubject, ApplicationCall>,
  ): void {
    const phase = target.defaultPhase;
    this.record({
      category: target.category,
      phase,
      check: () => undefined,
      apply: (host) => target.pipeline(host).intercept(phase, interceptor),
    });
  }
}
