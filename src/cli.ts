#!/usr/bin/env node
/**
 * Bluesky Promo Tweeter CLI
 *
 * Meant to be started by launchd, systemd or cron every two hours.
 * Each invocation posts at most once and exits.
 */

import { program, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { release } from 'os';
import { reportConfigError, runOnce } from './bot.js';
import { loadConfig } from './config.js';
import { KIND_LABELS, loadContentPools, summarizePools } from './content.js';
import { ConfigError, errorMessage } from './errors.js';
import { charLength, composePost, createSeededRandom, findUnfittable } from './formatter.js';
import { initWorkspace } from './init.js';
import { createLogger, resolveLogFile, type Logger } from './logger.js';
import { getBuiltinPoster } from './posters/index.js';
import type { PromoConfig, RandomSource } from './types.js';

const VERSION = '1.0.0';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function randomFor(seed: number | undefined): RandomSource {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}

function startLogger(config: PromoConfig, verbose: boolean): Logger {
  const logger = createLogger({ logFile: resolveLogFile(config.logFile), verbose });
  logger.debug(`Logging initialized - Log file: ${logger.logFile ?? '(console only)'}`);
  logger.debug(`Platform: ${process.platform} ${release()}, Node ${process.version}`);
  return logger;
}

program
  .name('bsky-promo-tweeter')
  .description('Post Bluesky starter packs, feeds and reasons to join to X')
  .version(VERSION);

// Run command (default)
program
  .command('run', { isDefault: true })
  .description('Compose one post and publish it')
  .option('-n, --dry-run', 'Compose and log without posting', false)
  .option('-s, --seed <number>', 'Seed for a reproducible choice', parseInteger)
  .option('-p, --platform <platform>', 'Poster to use', 'x')
  .option('-c, --config <dir>', 'Workspace directory holding the config and content files')
  .option('-v, --verbose', 'Verbose output', false)
  .action(
    async (options: { dryRun: boolean; seed?: number; platform: string; config?: string; verbose: boolean }) => {
      let config: PromoConfig;
      try {
        config = loadConfig(options.config);
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        const logger = createLogger({ logFile: resolveLogFile(undefined), verbose: options.verbose });
        process.exit(reportConfigError(error, logger).exitCode);
      }

      const logger = startLogger(config, options.verbose);
      logger.info(`Bluesky Promo Tweeter v${VERSION}`);

      const poster = getBuiltinPoster(options.platform);
      if (!poster) {
        logger.error(`No poster found for platform: ${options.platform}`);
        process.exit(1);
      }

      const outcome = await runOnce({
        config,
        logger,
        poster,
        random: randomFor(options.seed),
        dryRun: options.dryRun || config.dryRun,
        verbose: options.verbose,
      });
      process.exit(outcome.exitCode);
    }
  );

// Preview command
program
  .command('preview')
  .description('Print composed posts without publishing anything')
  .option('--count <number>', 'How many posts to compose', parseInteger, 1)
  .option('-s, --seed <number>', 'Seed for a reproducible choice', parseInteger)
  .option('-c, --config <dir>', 'Workspace directory holding the config and content files')
  .action((options: { count: number; seed?: number; config?: string }) => {
    const config = loadConfig(options.config);
    const logger = createLogger({ logFile: false });
    const pools = loadContentPools(config, logger);
    const random = randomFor(options.seed);

    for (let i = 0; i < options.count; i++) {
      try {
        const post = composePost(pools, random);
        const details = `${KIND_LABELS[post.kind]}, ${charLength(post.text)} chars${post.truncated ? ', truncated' : ''}`;
        console.log(chalk.blue(`\n#${i + 1} (${details})`));
        console.log(chalk.gray('─'.repeat(50)));
        console.log(post.text);
      } catch (error) {
        console.error(chalk.red(`✗ ${errorMessage(error)}`));
        process.exit(1);
      }
    }
  });

// Check command
program
  .command('check')
  .description('Validate the content files')
  .option('-c, --config <dir>', 'Workspace directory holding the config and content files')
  .action((options: { config?: string }) => {
    const config = loadConfig(options.config);
    const logger = createLogger({ logFile: false });
    const pools = loadContentPools(config, logger);
    const counts = summarizePools(pools);

    console.log(chalk.gray(`Content dir: ${config.contentDir}`));
    console.log(`  Starter packs: ${counts.starterPacks}`);
    console.log(`  Feeds:         ${counts.feeds}`);
    console.log(`  Reasons:       ${counts.reasons}`);

    if (counts.total === 0) {
      console.error(chalk.red('✗ No content available to post'));
      process.exit(1);
    }

    const unfittable = findUnfittable(pools);
    if (unfittable.length > 0) {
      console.error(chalk.red(`✗ ${unfittable.length} record(s) cannot fit in a post:`));
      unfittable.forEach((u) => console.error(chalk.red(`  ${KIND_LABELS[u.kind]} "${u.label}": ${u.error.message}`)));
      process.exit(1);
    }

    console.log(chalk.green('✓ All content fits'));
  });

// Init command
program
  .command('init [dir]')
  .description('Create config and example content files')
  .action((dir: string | undefined) => {
    const target = dir ?? process.cwd();
    const { created, skipped } = initWorkspace(target);

    created.forEach((f) => console.log(chalk.green(`✓ Created ${f}`)));
    skipped.forEach((f) => console.log(chalk.gray(`  ${f} already exists, skipping`)));

    console.log(chalk.blue('\n✨ Workspace ready!'));
    console.log('\nNext steps:');
    console.log(chalk.gray('  1. Add your X API credentials to .promo-tweeter.json (or TWITTER_* env vars)'));
    console.log(chalk.gray('  2. Fill in starter_packs.csv, feeds.csv and bluesky_reasons.txt'));
    console.log(chalk.gray('  3. Try it: bsky-promo-tweeter preview --count 3'));
    console.log(chalk.gray('  4. Set dryRun to false and schedule `bsky-promo-tweeter run` every 2 hours'));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
  process.exit(1);
});
