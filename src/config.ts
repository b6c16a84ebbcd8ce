/**
 * Config loader
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { PromoConfig, TwitterCredentials } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

export const CONFIG_FILES = [
  '.promo-tweeter.json',
  'promo-tweeter.json',
  'config.json',
];

export const PACKAGE_KEY = 'promo-tweeter';

const twitterSchema = z
  .object({
    consumerKey: z.string(),
    consumerSecret: z.string(),
    accessToken: z.string(),
    accessTokenSecret: z.string(),
  })
  .partial();

const configFileSchema = z
  .object({
    contentDir: z.string(),
    starterPacksFile: z.string(),
    feedsFile: z.string(),
    reasonsFile: z.string(),
    dryRun: z.boolean(),
    logFile: z.union([z.string(), z.literal(false)]),
    twitter: twitterSchema,
    workspaceDir: z.string(),
  })
  .partial();

const packageSchema = z.object({ [PACKAGE_KEY]: configFileSchema.optional() }).passthrough();

export type ConfigFile = z.infer<typeof configFileSchema>;

const CREDENTIAL_ENV: Record<keyof TwitterCredentials, string> = {
  consumerKey: 'TWITTER_CONSUMER_KEY',
  consumerSecret: 'TWITTER_CONSUMER_SECRET',
  accessToken: 'TWITTER_ACCESS_TOKEN',
  accessTokenSecret: 'TWITTER_ACCESS_TOKEN_SECRET',
};

const CREDENTIAL_KEYS: ReadonlyArray<keyof TwitterCredentials> = [
  'consumerKey',
  'consumerSecret',
  'accessToken',
  'accessTokenSecret',
];

export function globalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(env.PROMO_TWEETER_HOME ?? homedir(), '.promo-tweeter.json');
}

function readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${path}: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): PromoConfig {
  // First check global config for workspaceDir
  let workspaceDir = cwd;
  let globalConfig: ConfigFile = {};

  const globalPath = globalConfigPath(env);
  if (existsSync(globalPath)) {
    globalConfig = readJson(globalPath, configFileSchema);
    if (globalConfig.workspaceDir && existsSync(globalConfig.workspaceDir)) {
      workspaceDir = globalConfig.workspaceDir;
    }
  }

  let localConfig: ConfigFile = {};
  const configPath = CONFIG_FILES.map((f) => join(workspaceDir, f)).find((p) => existsSync(p));

  if (configPath) {
    localConfig = readJson(configPath, configFileSchema);
  } else {
    // Fall back to a key in package.json
    const pkgPath = join(workspaceDir, 'package.json');
    if (existsSync(pkgPath)) {
      localConfig = readJson(pkgPath, packageSchema)[PACKAGE_KEY] ?? {};
    }
  }

  // Merge: defaults < global < local < env
  const config = applyEnv(mergeConfig(mergeConfig(DEFAULT_CONFIG, globalConfig), localConfig), env);

  // Ensure contentDir is absolute
  if (!isAbsolute(config.contentDir)) {
    config.contentDir = join(workspaceDir, config.contentDir);
  }
  if (typeof config.logFile === 'string' && !isAbsolute(config.logFile)) {
    config.logFile = join(workspaceDir, config.logFile);
  }
  return config;
}

export function mergeConfig(base: PromoConfig, override: ConfigFile): PromoConfig {
  return {
    ...base,
    ...override,
    // Credentials merge key by key
    twitter: override.twitter ? { ...base.twitter, ...override.twitter } : base.twitter,
  };
}

export function applyEnv(config: PromoConfig, env: NodeJS.ProcessEnv): PromoConfig {
  const twitter: Partial<TwitterCredentials> = { ...config.twitter };
  for (const key of CREDENTIAL_KEYS) {
    const value = env[CREDENTIAL_ENV[key]];
    if (value) {
      twitter[key] = value;
    }
  }

  return {
    ...config,
    twitter,
    dryRun: env.PROMO_TWEETER_DRY_RUN === 'true' ? true : config.dryRun,
  };
}

/**
 * Returns complete credentials or throws listing every missing key
 */
export function requireTwitterCredentials(config: PromoConfig): TwitterCredentials {
  const twitter = config.twitter ?? {};
  const { consumerKey, consumerSecret, accessToken, accessTokenSecret } = twitter;

  if (consumerKey && consumerSecret && accessToken && accessTokenSecret) {
    return { consumerKey, consumerSecret, accessToken, accessTokenSecret };
  }

  const missing = CREDENTIAL_KEYS
    .filter((key) => !twitter[key])
    .map((key) => `twitter.${key} (${CREDENTIAL_ENV[key]})`);
  throw new ConfigError(`Missing required Twitter configuration: ${missing.join(', ')}`);
}
