import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { initialize, loadConfig } from './config-loader.js';
import { createLogger, resetLogging } from './logger.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { captureLogs } from '../testing/log-capture.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(tmpdir(), `phaseline-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(root, { recursive: true });
  return root;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let testRoot: string;
  let path: string;

  beforeEach(() => {
    testRoot = createTempRoot();
    path = join(testRoot, 'engine.toml');
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', () => {
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults for an empty file', () => {
    writeFileSync(path, '  \n');
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('reads every section', () => {
    writeFileSync(
      path,
      [
        '[engine]',
        'development = true',
        'call_timeout_ms = 500',
        '',
        '[logging]',
        'level = "warn"',
        '',
        '[fallback]',
        'status = 410',
        '',
      ].join('\n'),
    );

    expect(loadConfig(path)).toEqual({
      engine: { development: true, call_timeout_ms: 500 },
      logging: { level: 'warn' },
      fallback: { status: 410 },
    });
  });

  it('fills in keys a section leaves out', () => {
    writeFileSync(path, '[engine]\ncall_timeout_ms = 0\n');

    expect(loadConfig(path).engine).toEqual({ development: false, call_timeout_ms: 0 });
  });

  it('throws on invalid TOML', () => {
    writeFileSync(path, '[engine\n');
    expect(() => loadConfig(path)).toThrow();
  });

  it('throws on schema violations', () => {
    writeFileSync(path, '[fallback]\nstatus = "gone"\n');
    expect(() => loadConfig(path)).toThrow('config/fallback/status must be integer');
  });
});

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

describe('initialize', () => {
  let testRoot: string;

  beforeEach(() => {
    testRoot = createTempRoot();
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
    resetLogging();
  });

  it('returns the config with the path it was read from', () => {
    const path = join(testRoot, 'engine.toml');
    writeFileSync(path, '[fallback]\nstatus = 418\n');

    const result = initialize(path);

    expect(result.path).toBe(path);
    expect(result.config.fallback.status).toBe(418);
  });

  it('applies the configured logging level', () => {
    const logs = captureLogs('debug');
    const path = join(testRoot, 'engine.toml');
    writeFileSync(path, '[logging]\nlevel = "error"\n');

    initialize(path);
    const logger = createLogger('engine');
    logger.warn('hidden');
    logger.error('shown');

    expect(logs.entries.map((entry) => entry.msg)).toEqual(['shown']);
  });
});
