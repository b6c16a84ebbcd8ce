/**
 * Bluesky Promo Tweeter
 *
 * Picks a starter pack, feed or reason to join Bluesky and posts it to X.
 */

export * from './types.js';
export * from './errors.js';
export {
  MAX_POST_LENGTH,
  ELLIPSIS,
  charLength,
  sliceChars,
  truncateAtWord,
  renderListing,
  renderReason,
  renderRecord,
  createSeededRandom,
  selectFrom,
  selectRecord,
  availableKinds,
  composePost,
  findUnfittable,
  type RenderResult,
  type UnfittableRecord,
} from './formatter.js';
export { parseCsv, rowsToRecords } from './csv.js';
export {
  parseListings,
  parseReasons,
  loadListingFile,
  loadReasonsFile,
  loadContentPools,
  summarizePools,
} from './content.js';
export { loadConfig, mergeConfig, applyEnv, requireTwitterCredentials } from './config.js';
export { createLogger, formatLogLine, defaultLogDir, resolveLogFile, type Logger } from './logger.js';
export { initWorkspace } from './init.js';
export { runOnce, reportConfigError, type RunOptions, type RunOutcome } from './bot.js';

// Built-in posters
export { builtinPosters, getBuiltinPoster, xPoster } from './posters/index.js';
