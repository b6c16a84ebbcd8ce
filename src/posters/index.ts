/**
 * Built-in posters
 */

export { xPoster } from './x.js';

import { xPoster } from './x.js';
import type { PosterPlugin } from '../types.js';

export const builtinPosters: Map<string, PosterPlugin> = new Map([
  ['x', xPoster],
  ['twitter', xPoster], // Alias
]);

export function getBuiltinPoster(platform: string): PosterPlugin | undefined {
  return builtinPosters.get(platform.toLowerCase());
}
