/**
 * One bot iteration: load content, compose, post once, report.
 * The error taxonomy never throws out of runOnce; it comes back as exit code 1.
 */

import { KIND_LABELS, loadContentPools } from './content.js';
import {
  ConfigError,
  ContentTooLongError,
  EmptyContentPoolError,
  PromoError,
  SubmissionError,
  errorMessage,
} from './errors.js';
import { charLength, composePost, MAX_POST_LENGTH, sliceChars } from './formatter.js';
import type { Logger } from './logger.js';
import { xPoster } from './posters/index.js';
import type {
  ComposedPost,
  ContentPools,
  PosterPlugin,
  PostResult,
  PromoConfig,
  RandomSource,
} from './types.js';

export interface RunOptions {
  config: PromoConfig;
  logger: Logger;
  /** Defaults to the built-in X poster */
  poster?: PosterPlugin;
  random?: RandomSource;
  /** Pre-loaded pools; read from the content files when omitted */
  pools?: ContentPools;
  /** Overrides config.dryRun */
  dryRun?: boolean;
  verbose?: boolean;
}

export interface RunOutcome {
  ok: boolean;
  exitCode: 0 | 1;
  post?: ComposedPost;
  result?: PostResult;
  error?: PromoError;
}

function fail(
  logger: Logger,
  error: PromoError,
  extra: Pick<RunOutcome, 'post' | 'result'> = {}
): RunOutcome {
  logger.error(`${error.name}: ${error.message}`);
  if (error instanceof ContentTooLongError) {
    logger.error(
      `Truncation attempted for ${KIND_LABELS[error.details.kind]}: ` +
        `${error.details.budget} chars left for the description after ${error.details.overhead} fixed`
    );
  }
  logger.error('Bot iteration failed - tweet not posted');
  return { ok: false, exitCode: 1, error, ...extra };
}

/**
 * Log a config failure that happened before a run could start
 */
export function reportConfigError(error: ConfigError, logger: Logger): RunOutcome {
  return fail(logger, error);
}

export async function runOnce(options: RunOptions): Promise<RunOutcome> {
  const { config, logger } = options;
  const poster = options.poster ?? xPoster;
  const dryRun = options.dryRun ?? config.dryRun;
  const limit = poster.limits?.maxLength ?? MAX_POST_LENGTH;

  logger.info('Running bot iteration...');
  const pools = options.pools ?? loadContentPools(config, logger);

  let post: ComposedPost;
  try {
    post = composePost(pools, options.random ?? Math.random, limit);
  } catch (error) {
    if (error instanceof EmptyContentPoolError || error instanceof ContentTooLongError) {
      return fail(logger, error);
    }
    throw error;
  }

  logger.info(`Selected ${KIND_LABELS[post.kind]}: ${post.label}`);
  if (post.truncated) {
    logger.info(`Description truncated to fit ${limit} chars`);
  }
  logger.info(`Generated tweet (${charLength(post.text)} chars): ${sliceChars(post.text, 100)}`);

  if (poster.validate) {
    const validation = await poster.validate(post.text);
    validation.warnings.forEach((w) => logger.warn(`⚠ ${w}`));
    if (!validation.valid) {
      return fail(logger, new SubmissionError(poster.platform, validation.errors.join('; ')), { post });
    }
  }

  let result: PostResult;
  try {
    result = await poster.post(post.text, {
      dryRun,
      verbose: options.verbose ?? false,
      config,
    });
  } catch (error) {
    return fail(logger, new SubmissionError(poster.platform, errorMessage(error), { cause: error }), { post });
  }

  if (!result.success) {
    return fail(logger, new SubmissionError(poster.platform, result.error ?? 'unknown error'), { post, result });
  }

  if (dryRun) {
    logger.info(`🔸 DRY RUN - not posted to ${poster.platform}:\n${post.text}`);
  } else {
    logger.success(`✓ Tweet posted successfully${result.url ? `: ${result.url}` : ''}`);
  }
  logger.info('Bot iteration completed successfully');
  return { ok: true, exitCode: 0, post, result };
}
