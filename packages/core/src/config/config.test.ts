import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  applyEnvOverrides,
  findConfigFile,
  loadConfigFile,
  loadEngineConfig,
  mergeRawConfig,
} from './loader.js';
import { parseConfig } from './schema.js';

describe('parseConfig', () => {
  it('fills defaults for an empty object', () => {
    const config = parseConfig({});
    expect(config.retentionDays).toBe(90);
    expect(config.renderTimeoutMs).toBe(30_000);
    expect(config.enableComputedContrast).toBe(true);
    expect(config.browserPoolSize).toBe(2);
    expect(config.dataDir).toBe('./accessaudit-data');
    expect(config.archiveDir).toBe(path.join('./accessaudit-data', 'archive'));
    expect(config.scoreScale).toEqual({ web: 1, pdf: 1 });
    expect(config.report.format).toBe('console');
  });

  it('maps the snake_case surface onto the engine config', () => {
    const config = parseConfig({
      retention_days: 30,
      render_timeout_seconds: 10,
      enable_computed_contrast: false,
      data_dir: '/var/lib/audits',
      browser_pool_size: 4,
      archive_dir: '/backups',
      score_scale: { pdf: 0.5 },
    });
    expect(config.retentionDays).toBe(30);
    expect(config.renderTimeoutMs).toBe(10_000);
    expect(config.enableComputedContrast).toBe(false);
    expect(config.dataDir).toBe('/var/lib/audits');
    expect(config.browserPoolSize).toBe(4);
    expect(config.archiveDir).toBe('/backups');
    expect(config.scoreScale).toEqual({ web: 1, pdf: 0.5 });
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ browser_pool_size: 0 })).toThrow();
    expect(() => parseConfig({ retention_days: 'ninety' })).toThrow();
    expect(() => parseConfig({ score_scale: { web: -1 } })).toThrow();
  });
});

describe('applyEnvOverrides', () => {
  it('coerces numbers and booleans', () => {
    const raw = applyEnvOverrides(
      { retention_days: 90 },
      {
        ACCESSAUDIT_RETENTION_DAYS: '7',
        ACCESSAUDIT_ENABLE_COMPUTED_CONTRAST: 'false',
        ACCESSAUDIT_DATA_DIR: '/tmp/x',
        ACCESSAUDIT_LOG_LEVEL: 'debug',
      },
    );
    expect(raw).toEqual({
      retention_days: 7,
      enable_computed_contrast: false,
      data_dir: '/tmp/x',
      logging: { level: 'debug' },
    });
  });

  it('rejects non-numeric values for numeric keys', () => {
    expect(() => applyEnvOverrides({}, { ACCESSAUDIT_BROWSER_POOL_SIZE: 'many' })).toThrow(
      'ACCESSAUDIT_BROWSER_POOL_SIZE must be a number',
    );
  });
});

describe('mergeRawConfig', () => {
  it('merges nested sections one level deep', () => {
    const merged = mergeRawConfig(
      { logging: { level: 'info', json: true }, retention_days: 90 },
      { logging: { level: 'debug' }, retention_days: undefined },
    );
    expect(merged).toEqual({ logging: { level: 'debug', json: true }, retention_days: 90 });
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'accessaudit-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds a config file in a parent directory', () => {
    const nested = path.join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    writeFileSync(path.join(dir, '.accessauditrc.json'), '{}');
    expect(findConfigFile(nested)).toBe(path.join(dir, '.accessauditrc.json'));
  });

  it('returns an empty object for a missing file', () => {
    expect(loadConfigFile(path.join(dir, 'missing.json'))).toEqual({});
  });

  it('rejects a file that is not a JSON object', () => {
    const file = path.join(dir, 'bad.json');
    writeFileSync(file, '[1, 2]');
    expect(() => loadConfigFile(file)).toThrow('must contain a JSON object');
  });

  it('applies overrides over env over file', () => {
    const file = path.join(dir, '.accessauditrc.json');
    writeFileSync(file, JSON.stringify({ retention_days: 10, browser_pool_size: 3, data_dir: '/from-file' }));

    const config = loadEngineConfig({
      configPath: file,
      env: { ACCESSAUDIT_RETENTION_DAYS: '20', ACCESSAUDIT_DATA_DIR: '/from-env' },
      overrides: { data_dir: '/from-flag' },
    });

    expect(config.retentionDays).toBe(20);
    expect(config.browserPoolSize).toBe(3);
    expect(config.dataDir).toBe('/from-flag');
  });
});
