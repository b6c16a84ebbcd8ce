/**
 * Content store loaders
 * Reads starter_packs.csv, feeds.csv and bluesky_reasons.txt into pools
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { parseCsv, rowsToRecords } from './csv.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ContentKind, ContentPools, ListingEntry, PromoConfig, ReasonEntry } from './types.js';

const LISTING_FIELDS = ['name', 'description', 'link'] as const;

export const KIND_LABELS: Record<ContentKind, string> = {
  starter_pack: 'starter pack',
  feed: 'feed',
  reason: 'Bluesky reason',
};

export function parseListings(
  text: string,
  kind: Exclude<ContentKind, 'reason'>,
  logger?: Pick<Logger, 'warn'>
): ListingEntry[] {
  const rows = parseCsv(text);
  const header = (rows[0] ?? []).map((h) => h.trim().toLowerCase());
  const missing = LISTING_FIELDS.filter((field) => !header.includes(field));

  if (rows.length > 1 && missing.length > 0) {
    logger?.warn(`Skipping all ${KIND_LABELS[kind]} rows: missing column(s) ${missing.join(', ')}`);
    return [];
  }

  const entries: ListingEntry[] = [];
  rowsToRecords(rows).forEach((row, i) => {
    const name = row.name?.trim() ?? '';
    const description = row.description?.trim() ?? '';
    const link = row.link?.trim() ?? '';

    if (!name || !description || !link) {
      logger?.warn(`Skipping invalid ${KIND_LABELS[kind]} at row ${i + 1}`);
      return;
    }
    entries.push({ name, description, link });
  });

  return entries;
}

export function parseReasons(text: string): ReasonEntry[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => ({ text: line }));
}

function readContentFile(path: string, kind: ContentKind, logger: Logger): string | undefined {
  if (!existsSync(path)) {
    logger.warn(`${KIND_LABELS[kind]} file not found: ${path}`);
    return undefined;
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    logger.error(`Error loading ${KIND_LABELS[kind]}s from ${path}: ${errorMessage(err)}`);
    return undefined;
  }
}

export function loadListingFile(
  path: string,
  kind: Exclude<ContentKind, 'reason'>,
  logger: Logger
): ListingEntry[] {
  const text = readContentFile(path, kind, logger);
  if (text === undefined) return [];

  const entries = parseListings(text, kind, logger);
  logger.debug(`Loaded ${entries.length} ${KIND_LABELS[kind]}s from ${path}`);
  return entries;
}

export function loadReasonsFile(path: string, logger: Logger): ReasonEntry[] {
  const text = readContentFile(path, 'reason', logger);
  if (text === undefined) return [];

  const reasons = parseReasons(text);
  logger.debug(`Loaded ${reasons.length} Bluesky reasons from ${path}`);
  return reasons;
}

export function contentPath(config: PromoConfig, file: string): string {
  return isAbsolute(file) ? file : join(config.contentDir, file);
}

export function loadContentPools(config: PromoConfig, logger: Logger): ContentPools {
  const pools: ContentPools = {
    starterPacks: loadListingFile(contentPath(config, config.starterPacksFile), 'starter_pack', logger),
    feeds: loadListingFile(contentPath(config, config.feedsFile), 'feed', logger),
    reasons: loadReasonsFile(contentPath(config, config.reasonsFile), logger),
  };

  const counts = summarizePools(pools);
  logger.info(
    `Content loaded - Starter packs: ${counts.starterPacks}, Feeds: ${counts.feeds}, Reasons: ${counts.reasons}`
  );
  return pools;
}

export function summarizePools(pools: ContentPools): {
  starterPacks: number;
  feeds: number;
  reasons: number;
  total: number;
} {
  const starterPacks = pools.starterPacks.length;
  const feeds = pools.feeds.length;
  const reasons = pools.reasons.length;
  return { starterPacks, feeds, reasons, total: starterPacks + feeds + reasons };
}
