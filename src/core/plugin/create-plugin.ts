/**
 * Plugin definitions.
 *
 * ```ts
 * const Timing = createPlugin('Timing', (plugin) => {
 *   plugin.onCall((ctx, call) => { call.attributes.put(StartedAt, Date.now()); });
 * });
 * app.install(Timing);
 * ```
 */

import { AttributeKey } from '../call/attributes.js';
import type { PluginBuilder } from './plugin-builder.js';
import type { InstalledPlugin, PluginDefinition } from './types.js';

export type NoConfiguration = Record<string, never>;

export function createPlugin(
  key: string,
  body: (plugin: PluginBuilder<NoConfiguration>) => void,
): PluginDefinition<NoConfiguration> {
  return createConfigurablePlugin(key, () => ({}), body);
}

/**
 * A plugin whose configuration is created fresh for every install and
 * handed to the `configure` callback passed to `install()`.
 */
export function createConfigurablePlugin<TConfig>(
  key: string,
  createConfiguration: () => TConfig,
  body: (plugin: PluginBuilder<TConfig>) => void,
): PluginDefinition<TConfig> {
  return {
    key,
    instanceKey: new AttributeKey<InstalledPlugin<TConfig>>(key),
    createConfiguration,
    body,
  };
}
