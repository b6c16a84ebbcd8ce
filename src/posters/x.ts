/**
 * X/Twitter Poster (built-in)
 * Posts through the v2 API with OAuth 1.0a user credentials
 */

import { ApiResponseError, TwitterApi } from 'twitter-api-v2';
import { requireTwitterCredentials } from '../config.js';
import { errorMessage } from '../errors.js';
import { charLength, MAX_POST_LENGTH } from '../formatter.js';
import type { PosterPlugin, PostOptions, PostResult, ValidationResult } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

export const platform = 'x';

export const limits = {
  maxLength: MAX_POST_LENGTH,
};

const WARN_LENGTH = 250;

export async function validate(content: string): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];
  const length = charLength(content);

  if (length === 0) {
    errors.push('Tweet is empty');
  }
  if (length > limits.maxLength) {
    errors.push(`Tweet exceeds limit (${length}/${limits.maxLength} chars)`);
  } else if (length > WARN_LENGTH) {
    warnings.push(`Tweet is close to limit (${length}/${limits.maxLength})`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Human-readable reason for a failed API call
 */
export function describeApiError(error: unknown): string {
  if (error instanceof ApiResponseError) {
    const detail = error.data?.detail ?? error.data?.title ?? error.message;
    let reason = `HTTP ${error.code}: ${detail}`;
    if (error.code === 429 && error.rateLimit?.reset) {
      reason += ` (rate limit resets at ${new Date(error.rateLimit.reset * 1000).toISOString()})`;
    }
    return reason;
  }
  return errorMessage(error);
}

export async function post(content: string, options: PostOptions): Promise<PostResult> {
  const timestamp = new Date().toISOString();

  if (options.dryRun) {
    return {
      success: true,
      platform,
      timestamp,
      error: 'Dry run - would post 1 tweet',
    };
  }

  let client: TwitterApi;
  try {
    const credentials = requireTwitterCredentials(options.config ?? DEFAULT_CONFIG);
    client = new TwitterApi({
      appKey: credentials.consumerKey,
      appSecret: credentials.consumerSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessTokenSecret,
    });
  } catch (error) {
    return { success: false, error: errorMessage(error), platform, timestamp };
  }

  if (options.verbose) {
    console.log(`Posting tweet (${charLength(content)} chars)...`);
  }

  try {
    const { data } = await client.v2.tweet(content);
    return {
      success: true,
      id: data.id,
      url: `https://x.com/i/status/${data.id}`,
      platform,
      timestamp,
    };
  } catch (error) {
    return {
      success: false,
      error: describeApiError(error),
      platform,
      timestamp,
    };
  }
}

export const xPoster: PosterPlugin = {
  platform,
  limits,
  post,
  validate,
};

export default xPoster;
