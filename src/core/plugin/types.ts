/**
 * Types shared by plugin builders and the application that hosts them.
 */

import type { AttributeKey } from '../call/attributes.js';
import type { CallPipeline, ReceivePipeline, SendPipeline } from '../call/phases.js';
import type { PipelinePhase } from '../pipeline/index.js';
import type { OrderingConstraints } from './ordering.js';
import type { PluginBuilder } from './plugin-builder.js';

// ---------------------------------------------------------------------------
// Hook categories
// ---------------------------------------------------------------------------

/**
 * Groups of phases a plugin can register into. Relative ordering only
 * compares interceptions of the same category.
 */
export type HookCategory = 'call' | 'receive' | 'respond' | 'afterTransform';

// ---------------------------------------------------------------------------
// Interception
// ---------------------------------------------------------------------------

/**
 * One registration recorded by a plugin builder.
 *
 * Installation checks every registration of a plugin before it applies
 * any: `check` throws what `apply` would, without touching the host, and
 * records its ordering edges into `ordering`, a scratch copy of the
 * host's constraints.
 */
export interface Interception {
  readonly category: HookCategory;
  readonly phase: PipelinePhase;
  check(host: PluginHost, ordering: OrderingConstraints): void;
  apply(host: PluginHost): void;
}

/** What relative builders need from the plugin they register for. */
export interface InterceptionOwner {
  readonly key: string;
  newPhase(): PipelinePhase;
  record(interception: Interception): void;
}

// ---------------------------------------------------------------------------
// Installed plugins
// ---------------------------------------------------------------------------

/** Anything that names a plugin, such as its definition. */
export interface PluginReference {
  readonly key: string;
}

export interface InstalledPlugin<TConfig> {
  readonly key: string;
  readonly config: TConfig;
  /** Every registration the plugin made, in declaration order. */
  readonly interceptions: readonly Interception[];
}

export interface PluginDefinition<TConfig> extends PluginReference {
  /** Where the installed instance is stored on the application. */
  readonly instanceKey: AttributeKey<InstalledPlugin<TConfig>>;
  createConfiguration(): TConfig;
  readonly body: (plugin: PluginBuilder<TConfig>) => void;
}

// ---------------------------------------------------------------------------
// Host
// ---------------------------------------------------------------------------

export interface HookPipelines {
  readonly callPipeline: CallPipeline;
  readonly receivePipeline: ReceivePipeline;
  readonly sendPipeline: SendPipeline;
}

/** The application surface plugin installation works against. */
export interface PluginHost extends HookPipelines {
  readonly ordering: OrderingConstraints;
  installedPlugin(key: string): InstalledPlugin<unknown> | null;
}
