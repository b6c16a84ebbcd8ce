/**
 * Content formatter
 *
 * Picks one record from the content pools and renders it as a post that fits
 * the platform limit. Lengths are counted in code points.
 */

import { ContentTooLongError, EmptyContentPoolError } from './errors.js';
import type {
  ComposedPost,
  ContentKind,
  ContentPools,
  ListingEntry,
  RandomSource,
  ReasonEntry,
  SelectedRecord,
} from './types.js';

export const MAX_POST_LENGTH = 280;
export const ELLIPSIS = '...';

type ListingKind = Exclude<ContentKind, 'reason'>;

const LISTING_TEMPLATES: Record<ListingKind, (entry: ListingEntry) => string> = {
  starter_pack: (e) => `Check out my "${e.name}" starter pack:\n${e.description}\n${e.link}`,
  feed: (e) => `Feed to pin!: ${e.name}\n${e.description}\nPin here: ${e.link}`,
};

export interface RenderResult {
  text: string;
  truncated: boolean;
}

export function charLength(text: string): number {
  return Array.from(text).length;
}

/** First `count` code points of `text` */
export function sliceChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

/**
 * Shorten `text` to at most `budget` characters, cutting at the last
 * whitespace inside the budget. Falls back to a hard cut when the first word
 * alone is longer than the budget.
 */
export function truncateAtWord(text: string, budget: number): string {
  const chars = Array.from(text);
  if (chars.length <= budget) {
    return text;
  }

  const head = chars.slice(0, budget);
  // The cut already sits between two words
  if (/\s/.test(chars[budget])) {
    const clean = head.join('').trimEnd();
    if (clean.length > 0) return clean;
  }

  for (let i = head.length - 1; i > 0; i--) {
    if (/\s/.test(head[i])) {
      const clean = head.slice(0, i).join('').trimEnd();
      if (clean.length > 0) return clean;
      break;
    }
  }

  return head.join('');
}

export function renderListing(
  kind: ListingKind,
  entry: ListingEntry,
  limit: number = MAX_POST_LENGTH
): RenderResult {
  const template = LISTING_TEMPLATES[kind];
  const full = template(entry);
  const renderedLength = charLength(full);

  if (renderedLength <= limit) {
    return { text: full, truncated: false };
  }

  const overhead = charLength(template({ ...entry, description: '' })) + ELLIPSIS.length;
  const budget = limit - overhead;
  if (budget < 0) {
    throw new ContentTooLongError({ kind, renderedLength, overhead, budget, limit });
  }

  const description = truncateAtWord(entry.description, budget) + ELLIPSIS;
  const text = template({ ...entry, description });
  if (charLength(text) > limit) {
    throw new ContentTooLongError({ kind, renderedLength, overhead, budget, limit });
  }

  return { text, truncated: true };
}

export function renderReason(entry: ReasonEntry, limit: number = MAX_POST_LENGTH): RenderResult {
  const renderedLength = charLength(entry.text);
  if (renderedLength <= limit) {
    return { text: entry.text, truncated: false };
  }

  const overhead = ELLIPSIS.length;
  const budget = limit - overhead;
  if (budget < 0) {
    throw new ContentTooLongError({ kind: 'reason', renderedLength, overhead, budget, limit });
  }

  return { text: truncateAtWord(entry.text, budget) + ELLIPSIS, truncated: true };
}

export function renderRecord(selected: SelectedRecord, limit: number = MAX_POST_LENGTH): RenderResult {
  switch (selected.kind) {
    case 'starter_pack':
    case 'feed':
      return renderListing(selected.kind, selected.record, limit);
    case 'reason':
      return renderReason(selected.record, limit);
  }
}

/**
 * Deterministic PRNG (mulberry32) for reproducible selection
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pickIndex(length: number, random: RandomSource): number {
  return Math.min(Math.floor(random() * length), length - 1);
}

export function selectFrom<T>(pool: readonly T[], kind: ContentKind, random: RandomSource): T {
  if (pool.length === 0) {
    throw new EmptyContentPoolError(kind);
  }
  return pool[pickIndex(pool.length, random)];
}

/** Kinds that have at least one record, in a fixed order */
export function availableKinds(pools: ContentPools): ContentKind[] {
  const kinds: ContentKind[] = [];
  if (pools.starterPacks.length > 0) kinds.push('starter_pack');
  if (pools.feeds.length > 0) kinds.push('feed');
  if (pools.reasons.length > 0) kinds.push('reason');
  return kinds;
}

/**
 * Pick a kind uniformly among the non-empty pools, then a record uniformly
 * within that pool. Empty kinds are never drawn.
 */
export function selectRecord(pools: ContentPools, random: RandomSource): SelectedRecord {
  const kinds = availableKinds(pools);
  if (kinds.length === 0) {
    throw new EmptyContentPoolError('all');
  }

  const kind = kinds[pickIndex(kinds.length, random)];
  switch (kind) {
    case 'starter_pack':
      return { kind, record: selectFrom(pools.starterPacks, kind, random) };
    case 'feed':
      return { kind, record: selectFrom(pools.feeds, kind, random) };
    case 'reason':
      return { kind, record: selectFrom(pools.reasons, kind, random) };
  }
}

export function describeRecord(selected: SelectedRecord): string {
  return selected.kind === 'reason' ? sliceChars(selected.record.text, 50) : selected.record.name;
}

export function composePost(
  pools: ContentPools,
  random: RandomSource = Math.random,
  limit: number = MAX_POST_LENGTH
): ComposedPost {
  const selected = selectRecord(pools, random);
  const { text, truncated } = renderRecord(selected, limit);
  return { kind: selected.kind, text, truncated, label: describeRecord(selected) };
}

export interface UnfittableRecord {
  kind: ContentKind;
  label: string;
  error: ContentTooLongError;
}

/**
 * Every record that cannot be rendered within the limit, even truncated
 */
export function findUnfittable(pools: ContentPools, limit: number = MAX_POST_LENGTH): UnfittableRecord[] {
  const selections: SelectedRecord[] = [
    ...pools.starterPacks.map((record): SelectedRecord => ({ kind: 'starter_pack', record })),
    ...pools.feeds.map((record): SelectedRecord => ({ kind: 'feed', record })),
    ...pools.reasons.map((record): SelectedRecord => ({ kind: 'reason', record })),
  ];

  const unfittable: UnfittableRecord[] = [];
  for (const selected of selections) {
    try {
      renderRecord(selected, limit);
    } catch (error) {
      if (!(error instanceof ContentTooLongError)) throw error;
      unfittable.push({ kind: selected.kind, label: describeRecord(selected), error });
    }
  }
  return unfittable;
}
