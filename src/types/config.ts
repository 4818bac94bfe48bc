/**
 * Engine configuration types, defaults and validation.
 *
 * `engine.toml` sections:
 *
 * ```toml
 * [engine]
 * development = false
 * call_timeout_ms = 30000   # 0 disables the per-call timeout
 *
 * [logging]
 * level = "info"
 *
 * [fallback]
 * status = 404              # status sent when nothing responded
 * ```
 */

import _Ajv from 'ajv';
// ajv is CommonJS: under NodeNext the default import is module.exports
const Ajv = _Ajv.default;

import { join } from 'node:path';
import type { LogLevel } from '../core/logger.js';
import { CONFIG_JSON_SCHEMA } from './config-schema.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[engine]` section. */
export interface EngineSection {
  /** Include error messages in 500 responses. */
  development: boolean;
  /** Per-call timeout; 0 disables it. */
  call_timeout_ms: number;
}

/** `[logging]` section. */
export interface LoggingSection {
  level: LogLevel;
}

/** `[fallback]` section. */
export interface FallbackSection {
  status: number;
}

/**
 * Full engine configuration. Unknown top-level sections are kept for
 * modules that read their own settings.
 */
export interface PhaselineConfig {
  engine: EngineSection;
  logging: LoggingSection;
  fallback: FallbackSection;
  [section: string]: unknown;
}

/** Shape accepted by the schema, before defaults are applied. */
interface RawConfig {
  engine?: Partial<EngineSection>;
  logging?: Partial<LoggingSection>;
  fallback?: Partial<FallbackSection>;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PhaselineConfig = {
  engine: { development: false, call_timeout_ms: 30_000 },
  logging: { level: 'info' },
  fallback: { status: 404 },
};

/** A copy of the defaults that callers may modify. */
export function defaultConfig(): PhaselineConfig {
  return {
    engine: { ...DEFAULT_CONFIG.engine },
    logging: { ...DEFAULT_CONFIG.logging },
    fallback: { ...DEFAULT_CONFIG.fallback },
  };
}

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Path of the engine configuration file.
 *
 * `$PHASELINE_CONFIG` wins when set and non-empty; otherwise
 * `engine.toml` in `cwd`.
 */
export function resolveConfigPath(cwd: string = process.cwd()): string {
  const envValue = process.env['PHASELINE_CONFIG'];
  if (envValue && envValue.length > 0) {
    return envValue;
  }
  return join(cwd, 'engine.toml');
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true });
const validateRaw = ajv.compile<RawConfig>(CONFIG_JSON_SCHEMA);

/**
 * Validate a raw config object (e.g. parsed TOML) and apply defaults for
 * every missing key.
 *
 * @throws Error listing every schema violation.
 */
export function parseConfig(raw: unknown): PhaselineConfig {
  if (!validateRaw(raw)) {
    throw new Error(`Invalid engine configuration: ${ajv.errorsText(validateRaw.errors, { dataVar: 'config' })}`);
  }

  const { engine, logging, fallback, ...rest } = raw;
  const defaults = defaultConfig();

  return {
    ...rest,
    engine: { ...defaults.engine, ...engine },
    logging: { ...defaults.logging, ...logging },
    fallback: { ...defaults.fallback, ...fallback },
  };
}
