/**
 * Promo Tweeter Types
 * Shared interfaces for content, formatting and posters
 */

export type ContentKind = 'starter_pack' | 'feed' | 'reason';

/** A row from starter_packs.csv or feeds.csv */
export interface ListingEntry {
  name: string;
  description: string;
  link: string;
}

export type StarterPackEntry = ListingEntry;
export type FeedEntry = ListingEntry;

export interface ReasonEntry {
  text: string;
}

export interface ContentPools {
  starterPacks: readonly StarterPackEntry[];
  feeds: readonly FeedEntry[];
  reasons: readonly ReasonEntry[];
}

export type SelectedRecord =
  | { kind: 'starter_pack'; record: StarterPackEntry }
  | { kind: 'feed'; record: FeedEntry }
  | { kind: 'reason'; record: ReasonEntry };

export interface ComposedPost {
  kind: ContentKind;
  text: string;
  /** True when the description (or reason text) was shortened to fit */
  truncated: boolean;
  /** Short human-readable name of the chosen record, for logs */
  label: string;
}

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface TwitterCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface PromoConfig {
  contentDir: string;
  starterPacksFile: string;
  feedsFile: string;
  reasonsFile: string;
  dryRun: boolean;
  /** Explicit log file path, or false to log to the console only */
  logFile?: string | false;
  twitter?: Partial<TwitterCredentials>;
  /** Global workspace directory (set in ~/.promo-tweeter.json) */
  workspaceDir?: string;
}

export interface PostOptions {
  dryRun: boolean;
  verbose: boolean;
  config?: PromoConfig;
}

export interface PostResult {
  success: boolean;
  id?: string;
  url?: string;
  error?: string;
  platform: string;
  timestamp: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Poster interface - the submission side of a run
 */
export interface PosterPlugin {
  /** Platform identifier (e.g., 'x') */
  platform: string;

  /** Post content to the platform */
  post(content: string, options: PostOptions): Promise<PostResult>;

  /** Validate content before posting (optional) */
  validate?(content: string): Promise<ValidationResult>;

  /** Platform-specific content limits */
  limits?: {
    maxLength?: number;
  };
}

export const DEFAULT_CONFIG: PromoConfig = {
  contentDir: '.',
  starterPacksFile: 'starter_packs.csv',
  feedsFile: 'feeds.csv',
  reasonsFile: 'bluesky_reasons.txt',
  dryRun: false,
};
