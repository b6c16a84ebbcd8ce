/**
 * Workspace setup - copies starter config and content files into place
 */

import { copyFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';

export const TEMPLATES_DIR = fileURLToPath(new URL('../templates/', import.meta.url));

/** Template file name → file name created in the workspace */
export const WORKSPACE_FILES: ReadonlyArray<[template: string, target: string]> = [
  ['promo-tweeter.json', '.promo-tweeter.json'],
  ['starter_packs.csv', 'starter_packs.csv'],
  ['feeds.csv', 'feeds.csv'],
  ['bluesky_reasons.txt', 'bluesky_reasons.txt'],
];

export interface InitResult {
  created: string[];
  skipped: string[];
}

/**
 * Create any missing workspace files. Existing files are never overwritten.
 */
export function initWorkspace(dir: string, templatesDir: string = TEMPLATES_DIR): InitResult {
  const result: InitResult = { created: [], skipped: [] };
  mkdirSync(dir, { recursive: true });

  for (const [template, target] of WORKSPACE_FILES) {
    const targetPath = join(dir, target);
    if (existsSync(targetPath)) {
      result.skipped.push(target);
      continue;
    }
    copyFileSync(join(templatesDir, template), targetPath);
    result.created.push(target);
  }

  return result;
}
