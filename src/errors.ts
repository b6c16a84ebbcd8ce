/**
 * Error taxonomy. Every one of these ends the current run.
 */

import type { ContentKind } from './types.js';

export type PromoErrorCode =
  | 'EMPTY_CONTENT_POOL'
  | 'CONTENT_TOO_LONG'
  | 'SUBMISSION_FAILED'
  | 'CONFIG_INVALID';

export class PromoError extends Error {
  readonly code: PromoErrorCode;

  constructor(code: PromoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyContentPoolError extends PromoError {
  readonly kind: ContentKind | 'all';

  constructor(kind: ContentKind | 'all') {
    super(
      'EMPTY_CONTENT_POOL',
      kind === 'all' ? 'No content available to post' : `No ${kind} content available to post`
    );
    this.kind = kind;
  }
}

export interface TruncationDetails {
  kind: ContentKind;
  /** Length of the full, untruncated rendering */
  renderedLength: number;
  /** Characters the template, name, link and ellipsis need */
  overhead: number;
  /** Characters left for the description (negative when nothing fits) */
  budget: number;
  limit: number;
}

export class ContentTooLongError extends PromoError {
  readonly details: TruncationDetails;

  constructor(details: TruncationDetails) {
    super(
      'CONTENT_TOO_LONG',
      `${details.kind} cannot fit in ${details.limit} chars ` +
        `(rendered ${details.renderedLength}, fixed overhead ${details.overhead}, budget ${details.budget})`
    );
    this.details = details;
  }
}

export class SubmissionError extends PromoError {
  readonly platform: string;

  constructor(platform: string, reason: string, options?: { cause?: unknown }) {
    super('SUBMISSION_FAILED', `Failed to post to ${platform}: ${reason}`, options);
    this.platform = platform;
  }
}

export class ConfigError extends PromoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
