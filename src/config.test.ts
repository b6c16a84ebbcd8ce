/**
 * Config Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { applyEnv, loadConfig, mergeConfig, requireTwitterCredentials } from './config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_CONFIG } from './types.js';

let testDir: string;
let homeDir: string;
let env: NodeJS.ProcessEnv;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'promo-config-'));
  homeDir = mkdtempSync(join(tmpdir(), 'promo-home-'));
  env = { PROMO_TWEETER_HOME: homeDir };
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
  rmSync(homeDir, { recursive: true, force: true });
});

const writeJson = (path: string, value: unknown) => writeFileSync(path, JSON.stringify(value));

describe('loadConfig', () => {
  it('should return defaults with absolute contentDir when no config file exists', () => {
    const config = loadConfig(testDir, env);

    expect(config.contentDir).toBe(testDir);
    expect(config.starterPacksFile).toBe('starter_packs.csv');
    expect(config.feedsFile).toBe('feeds.csv');
    expect(config.reasonsFile).toBe('bluesky_reasons.txt');
    expect(config.dryRun).toBe(false);
    expect(config.twitter).toEqual({});
  });

  it('should load from .promo-tweeter.json with absolute contentDir', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { contentDir: './content', dryRun: true });

    const config = loadConfig(testDir, env);

    expect(config.contentDir).toBe(join(testDir, 'content'));
    expect(config.dryRun).toBe(true);
  });

  it('should prefer .promo-tweeter.json over config.json', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { feedsFile: 'first.csv' });
    writeJson(join(testDir, 'config.json'), { feedsFile: 'last.csv' });

    expect(loadConfig(testDir, env).feedsFile).toBe('first.csv');
  });

  it('should load from config.json', () => {
    writeJson(join(testDir, 'config.json'), {
      twitter: { consumerKey: 'test-key', consumerSecret: 'test-secret' },
    });

    const config = loadConfig(testDir, env);

    expect(config.twitter).toEqual({ consumerKey: 'test-key', consumerSecret: 'test-secret' });
  });

  it('should read the promo-tweeter key from package.json', () => {
    writeJson(join(testDir, 'package.json'), {
      name: 'my-bot',
      'promo-tweeter': { reasonsFile: 'why.txt' },
    });

    expect(loadConfig(testDir, env).reasonsFile).toBe('why.txt');
  });

  it('should ignore a package.json without the key', () => {
    writeJson(join(testDir, 'package.json'), { name: 'my-bot' });
    expect(loadConfig(testDir, env).reasonsFile).toBe('bluesky_reasons.txt');
  });

  it('should merge global and local credentials', () => {
    writeJson(join(homeDir, '.promo-tweeter.json'), {
      twitter: { consumerKey: 'global-key', accessToken: 'global-token' },
    });
    writeJson(join(testDir, '.promo-tweeter.json'), { twitter: { accessToken: 'local-token' } });

    const config = loadConfig(testDir, env);

    expect(config.twitter).toEqual({ consumerKey: 'global-key', accessToken: 'local-token' });
  });

  it('should use workspaceDir from the global config', () => {
    const workspace = join(testDir, 'workspace');
    mkdirSync(workspace);
    writeJson(join(homeDir, '.promo-tweeter.json'), { workspaceDir: workspace });
    writeJson(join(workspace, '.promo-tweeter.json'), { dryRun: true });

    const config = loadConfig(testDir, env);

    expect(config.contentDir).toBe(workspace);
    expect(config.dryRun).toBe(true);
  });

  it('should let environment variables override files', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { twitter: { consumerKey: 'file-key' } });

    const config = loadConfig(testDir, {
      ...env,
      TWITTER_CONSUMER_KEY: 'env-key',
      TWITTER_ACCESS_TOKEN_SECRET: 'env-token-secret',
      PROMO_TWEETER_DRY_RUN: 'true',
    });

    expect(config.twitter).toEqual({ consumerKey: 'env-key', accessTokenSecret: 'env-token-secret' });
    expect(config.dryRun).toBe(true);
  });

  it('should resolve a relative logFile against the workspace', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { logFile: 'logs/bot.log' });
    expect(loadConfig(testDir, env).logFile).toBe(join(testDir, 'logs', 'bot.log'));
  });

  it('should keep logFile false', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { logFile: false });
    expect(loadConfig(testDir, env).logFile).toBe(false);
  });

  it('should throw ConfigError for invalid JSON', () => {
    writeFileSync(join(testDir, '.promo-tweeter.json'), '{ not json');
    expect(() => loadConfig(testDir, env)).toThrow(ConfigError);
    expect(() => loadConfig(testDir, env)).toThrow(/Invalid JSON in config file/);
  });

  it('should throw ConfigError naming a field with the wrong type', () => {
    writeJson(join(testDir, '.promo-tweeter.json'), { dryRun: 'yes' });
    expect(() => loadConfig(testDir, env)).toThrow(/dryRun/);
  });
});

describe('mergeConfig', () => {
  it('should override scalars and keep the rest', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { feedsFile: 'other.csv' });
    expect(merged).toEqual({ ...DEFAULT_CONFIG, feedsFile: 'other.csv', twitter: undefined });
  });
});

describe('applyEnv', () => {
  it('should leave dryRun alone unless set to true', () => {
    expect(applyEnv({ ...DEFAULT_CONFIG, dryRun: true }, { PROMO_TWEETER_DRY_RUN: 'false' }).dryRun).toBe(true);
    expect(applyEnv(DEFAULT_CONFIG, {}).dryRun).toBe(false);
  });
});

describe('requireTwitterCredentials', () => {
  it('should return complete credentials', () => {
    const twitter = {
      consumerKey: 'test-key',
      consumerSecret: 'test-secret',
      accessToken: 'test-token',
      accessTokenSecret: 'test-token-secret',
    };
    expect(requireTwitterCredentials({ ...DEFAULT_CONFIG, twitter })).toEqual(twitter);
  });

  it('should list every missing key', () => {
    expect(() => requireTwitterCredentials({ ...DEFAULT_CONFIG, twitter: { consumerKey: 'test-key' } })).toThrow(
      'Missing required Twitter configuration: ' +
        'twitter.consumerSecret (TWITTER_CONSUMER_SECRET), ' +
        'twitter.accessToken (TWITTER_ACCESS_TOKEN), ' +
        'twitter.accessTokenSecret (TWITTER_ACCESS_TOKEN_SECRET)'
    );
  });
});
