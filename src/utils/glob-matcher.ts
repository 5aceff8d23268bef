import * as path from 'node:path';
import { minimatch } from 'minimatch';

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Match a path against a glob the way a relative pattern matches from the
 * right: patterns without a slash are tested against the basename, patterns
 * with a slash against the trailing path segments.
 */
export function globMatch(filePath: string, pattern: string): boolean {
  const normalized = toPosix(filePath);

  // Support negative patterns with ! prefix
  if (pattern.startsWith('!')) {
    return !globMatch(filePath, pattern.substring(1));
  }

  if (!pattern.includes('/')) {
    return minimatch(path.posix.basename(normalized), pattern, { dot: true });
  }

  const anchored = pattern.startsWith('/') || pattern.startsWith('**/') ? pattern : `**/${pattern}`;
  return minimatch(normalized, anchored, { dot: true });
}

export function globMatchMultiple(filePath: string, patterns: readonly string[]): boolean {
  // If any negative pattern matches, exclude the item
  for (const pattern of patterns) {
    if (pattern.startsWith('!') && globMatch(filePath, pattern.substring(1))) {
      return false;
    }
  }

  const positivePatterns = patterns.filter(p => !p.startsWith('!'));
  if (positivePatterns.length === 0) {
    return false;
  }

  return positivePatterns.some(pattern => globMatch(filePath, pattern));
}
