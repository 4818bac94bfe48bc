/**
 * TOML-based configuration loader.
 *
 * Reads `engine.toml`, parses it with smol-toml, validates it against
 * the engine config schema and returns a fully typed `PhaselineConfig`.
 * `initialize()` also applies the logging level.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { configureLogging } from './logger.js';
import { defaultConfig, parseConfig, resolveConfigPath } from '../types/config.js';
import type { PhaselineConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate an engine configuration file.
 *
 * A missing or empty file yields the defaults. Throws on invalid TOML
 * syntax or schema violations.
 */
export function loadConfig(path: string): PhaselineConfig {
  if (!existsSync(path)) {
    return defaultConfig();
  }

  const content = readFileSync(path, 'utf-8');
  if (content.trim().length === 0) {
    return defaultConfig();
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

export interface InitResult {
  config: PhaselineConfig;
  /** File the configuration was read from (it may not exist). */
  path: string;
}

/**
 * Load the configuration from `path` (default: `resolveConfigPath()`)
 * and configure the global logging level from it.
 */
export function initialize(path: string = resolveConfigPath()): InitResult {
  const config = loadConfig(path);
  configureLogging({ level: config.logging.level });
  return { config, path };
}
