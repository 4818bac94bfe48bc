/**
 * Builders that place a plugin's handlers relative to other plugins.
 *
 * Each registration gets a phase of its own. For every referenced plugin
 * the builder looks up the phases that plugin registered in the same
 * category and picks a boundary: its last phase for `after`, its first
 * for `before`. The new phase goes next to the strictest boundary over
 * all referenced plugins. A referenced plugin without registrations in
 * the category puts no constraint on the placement; when none has any,
 * the phase goes next to the category's default phase.
 */

import type { ApplicationCall } from '../call/application-call.js';
import { MissingDependencyError } from '../pipeline-error.js';
import type { Interceptor, Pipeline, PipelinePhase } from '../pipeline/index.js';
import { CallHandlingBuilderBase } from './call-handling-builder.js';
import type { HookTarget } from './hooks.js';
import type { OrderingConstraints } from './ordering.js';
import type { HookCategory, InterceptionOwner, PluginHost, PluginReference } from './types.js';

export abstract class RelativePluginBuilder extends CallHandlingBuilderBase {
  constructor(
    private readonly owner: InterceptionOwner,
    private readonly otherPlugins: readonly PluginReference[],
  ) {
    super();
  }

  /** Boundary among phases sorted by pipeline position. */
  protected abstract select(sorted: readonly PipelinePhase[]): PipelinePhase | undefined;

  protected abstract insert<TSubject>(
    pipeline: Pipeline<TSubject, ApplicationCall>,
    reference: PipelinePhase,
    phase: PipelinePhase,
  ): void;

  /** Ordering edge between this plugin and another, as [earlier, later]. */
  protected abstract edge(current: string, other: string): [string, string];

  protected register<TSubject>(
    target: HookTarget<TSubject>,
    interceptor: Interceptor<TSubject, ApplicationCall>,
  ): void {
    const phase = this.owner.newPhase();

    this.owner.record({
      category: target.category,
      phase,
      check: (host, ordering) => {
        this.findBoundary(host, target.pipeline(host), target.category);
        this.requireOrdering(ordering, target.category);
      },
      apply: (host) => {
        const pipeline = target.pipeline(host);
        const boundary = this.findBoundary(host, pipeline, target.category);
        this.requireOrdering(host.ordering, target.category);

        this.insert(pipeline, boundary ?? target.defaultPhase, phase);
        pipeline.intercept(phase, interceptor);
      },
    });
  }

  private requireOrdering(ordering: OrderingConstraints, category: HookCategory): void {
    for (const other of this.otherPlugins) {
      const [earlier, later] = this.edge(this.owner.key, other.key);
      ordering.require(category, earlier, later);
    }
  }

  private findBoundary<TSubject>(
    host: PluginHost,
    pipeline: Pipeline<TSubject, ApplicationCall>,
    category: HookCategory,
  ): PipelinePhase | null {
    const boundaries: PipelinePhase[] = [];

    for (const other of this.otherPlugins) {
      const installed = host.installedPlugin(other.key);
      if (!installed) {
        throw new MissingDependencyError(other.key);
      }

      const phases = installed.interceptions
        .filter((interception) => interception.category === category)
        .map((interception) => interception.phase);
      const selected = this.select(sortByPosition(pipeline, phases, other.key));
      if (selected) boundaries.push(selected);
    }

    return this.select(sortByPosition(pipeline, boundaries, this.owner.key)) ?? null;
  }
}

function sortByPosition<TSubject>(
  pipeline: Pipeline<TSubject, ApplicationCall>,
  phases: readonly PipelinePhase[],
  pluginKey: string,
): PipelinePhase[] {
  const positioned = phases.map((phase) => {
    const index = pipeline.indexOf(phase);
    if (index === -1) {
      throw new MissingDependencyError(pluginKey);
    }
    return { phase, index };
  });
  positioned.sort((a, b) => a.index - b.index);
  return positioned.map(({ phase }) => phase);
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

/** Registrations run before every referenced plugin's handlers. */
export class BeforePluginsBuilder extends RelativePluginBuilder {
  readonly variant = 'before' as const;

  protected select(sorted: readonly PipelinePhase[]): PipelinePhase | undefined {
    return sorted[0];
  }

  protected insert<TSubject>(
    pipeline: Pipeline<TSubject, ApplicationCall>,
    reference: PipelinePhase,
    phase: PipelinePhase,
  ): void {
    pipeline.insertPhaseBefore(reference, phase);
  }

  protected edge(current: string, other: string): [string, string] {
    return [current, other];
  }
}

/** Registrations run after every referenced plugin's handlers. */
export class AfterPluginsBuilder extends RelativePluginBuilder {
  readonly variant = 'after' as const;

  protected select(sorted: readonly PipelinePhase[]): PipelinePhase | undefined {
    return sorted.at(-1);
  }

  protected insert<TSubject>(
    pipeline: Pipeline<TSubject, ApplicationCall>,
    reference: PipelinePhase,
    phase: PipelinePhase,
  ): void {
    pipeline.insertPhaseAfter(reference, phase);
  }

  protected edge(current: string, other: string): [string, string] {
    return [other, current];
  }
}
