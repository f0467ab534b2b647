import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'node:path';

// Helper to import config fresh per test case
async function importFreshConfig() {
  const mod = await import('../../config');
  return mod.config;
}

const KEYS = [
  'DATA_DIR',
  'DATASET_PATH',
  'CHECKPOINT_DIR',
  'METRICS_FILE',
  'BOOTSTRAP_SINCE',
  'RECHECK_DAYS',
  'KBO_SCHEDULE_URL',
  'NAV_SETTLE_MS',
  'NAV_MAX_RETRIES',
  'POLITENESS_DELAY_MS',
  'HEADLESS',
];

let originalEnv: NodeJS.ProcessEnv;

describe('Config Parsing', () => {
  beforeEach(() => {
    originalEnv = { ...process.env };
    vi.resetModules();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.NODE_ENV = 'test';
    for (const key of KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it('should use sane defaults when env vars are absent', async () => {
    const config = await importFreshConfig();

    expect(config.datasetPath).toBe(path.join(path.resolve('data'), 'kbo_latest.csv'));
    expect(config.checkpointDir).toBe(path.join(path.resolve('data'), 'checkpoints'));
    expect(config.metricsFile).toBeUndefined();
    expect(config.bootstrapSince).toBe('20250322');
    expect(config.recheckDays).toBe(3);
    expect(config.navigator.maxRetries).toBe(3);
    expect(config.navigator.politenessDelayMs).toBe(800);
    expect(config.navigator.headless).toBe(true);
    expect(config.sources.scheduleUrl).toContain('{date}');
    expect(config.sources.reviewUrl).toContain('{gameId}');
  });

  it('should place the dataset and checkpoints under DATA_DIR', async () => {
    process.env.DATA_DIR = '/tmp/kbo-data';

    const config = await importFreshConfig();

    expect(config.datasetPath).toBe('/tmp/kbo-data/kbo_latest.csv');
    expect(config.checkpointDir).toBe('/tmp/kbo-data/checkpoints');
  });

  it('should parse valid values within bounds', async () => {
    process.env.RECHECK_DAYS = '7';
    process.env.NAV_MAX_RETRIES = '5';
    process.env.HEADLESS = 'false';
    process.env.BOOTSTRAP_SINCE = '2024-03-23';

    const config = await importFreshConfig();

    expect(config.recheckDays).toBe(7);
    expect(config.navigator.maxRetries).toBe(5);
    expect(config.navigator.headless).toBe(false);
    expect(config.bootstrapSince).toBe('2024-03-23');
  });

  it('should clamp numeric values to min/max bounds', async () => {
    process.env.RECHECK_DAYS = '99';
    process.env.NAV_SETTLE_MS = '-5';
    process.env.POLITENESS_DELAY_MS = 'soon';

    const config = await importFreshConfig();

    expect(config.recheckDays).toBe(30);
    expect(config.navigator.settleMs).toBe(0);
    expect(config.navigator.politenessDelayMs).toBe(800);
  });

  it('should reject a malformed bootstrap date', async () => {
    process.env.BOOTSTRAP_SINCE = 'March 22';

    await expect(importFreshConfig()).rejects.toThrow('Invalid environment variables');
  });
});
