/**
 * Init Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { initWorkspace } from './init.js';
import { loadConfig } from './config.js';
import { loadContentPools } from './content.js';
import { findUnfittable } from './formatter.js';

let dir: string;
let home: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'promo-init-'));
  home = mkdtempSync(join(tmpdir(), 'promo-init-home-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  rmSync(home, { recursive: true, force: true });
});

describe('initWorkspace', () => {
  it('should create the config and content files', () => {
    const result = initWorkspace(dir);

    expect(result.created).toEqual(['.promo-tweeter.json', 'starter_packs.csv', 'feeds.csv', 'bluesky_reasons.txt']);
    expect(result.skipped).toEqual([]);
  });

  it('should never overwrite existing files', () => {
    writeFileSync(join(dir, 'feeds.csv'), 'mine');

    const result = initWorkspace(dir);

    expect(result.skipped).toEqual(['feeds.csv']);
    expect(readFileSync(join(dir, 'feeds.csv'), 'utf-8')).toBe('mine');
    expect(initWorkspace(dir).created).toEqual([]);
  });

  it('should produce a workspace that loads and fits', () => {
    initWorkspace(dir);

    const config = loadConfig(dir, { PROMO_TWEETER_HOME: home });
    const logger = { debug: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const pools = loadContentPools(config, logger);

    expect(config.dryRun).toBe(true);
    expect(config.twitter?.consumerKey).toBe('your-consumer-key');
    expect(pools.starterPacks).toHaveLength(2);
    expect(pools.feeds).toHaveLength(2);
    expect(pools.reasons).toHaveLength(3);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(findUnfittable(pools)).toEqual([]);
  });
});
