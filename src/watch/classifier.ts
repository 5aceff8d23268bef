import type { WatchPatterns } from '../types/watch.js';
import * as path from 'node:path';
import { WATCH_TARGETS, WatchTarget } from '../types/watch.js';
import { globMatchMultiple } from '../utils/glob-matcher.js';

export const DEFAULT_ROOT_MARKER = '.agentsync';

export const DEFAULT_WATCH_PATTERNS: Readonly<WatchPatterns> = Object.freeze({
  [WatchTarget.CONFIG]: ['*.toml', '*.json', '*.yaml', '*.yml'],
  [WatchTarget.AGENTS]: ['*.md', '*agent*.md', 'agents/*.md'],
  [WatchTarget.TOOLS]: ['.cursorrules', 'claude_*', 'cursor_*'],
  [WatchTarget.TEMPLATES]: ['template_*', 'templates/*.md'],
  [WatchTarget.INTEGRATIONS]: ['*integration*', '*adapter*'],
});

const DIRECTORY_TARGETS: ReadonlyMap<string, WatchTarget> = new Map([
  ['config', WatchTarget.CONFIG],
  ['agents', WatchTarget.AGENTS],
  ['templates', WatchTarget.TEMPLATES],
  ['tools', WatchTarget.TOOLS],
  ['integrations', WatchTarget.INTEGRATIONS],
]);

/**
 * Merge pattern overrides over a base table, target by target.
 */
export function resolvePatterns(
  overrides: Partial<WatchPatterns> = {},
  base: Readonly<WatchPatterns> = DEFAULT_WATCH_PATTERNS,
): WatchPatterns {
  return {
    [WatchTarget.CONFIG]: overrides[WatchTarget.CONFIG] ?? [...base[WatchTarget.CONFIG]],
    [WatchTarget.AGENTS]: overrides[WatchTarget.AGENTS] ?? [...base[WatchTarget.AGENTS]],
    [WatchTarget.TOOLS]: overrides[WatchTarget.TOOLS] ?? [...base[WatchTarget.TOOLS]],
    [WatchTarget.TEMPLATES]: overrides[WatchTarget.TEMPLATES] ?? [...base[WatchTarget.TEMPLATES]],
    [WatchTarget.INTEGRATIONS]: overrides[WatchTarget.INTEGRATIONS] ?? [...base[WatchTarget.INTEGRATIONS]],
  };
}

function classifyByAncestor(filePath: string, rootMarker: string): WatchTarget | null {
  const parts = path.normalize(filePath).split(path.sep);
  const markerIndex = parts.lastIndexOf(rootMarker);
  if (markerIndex === -1) {
    return null;
  }

  const child = parts[markerIndex + 1];
  // The child must be a directory, not the file itself
  if (child === undefined || markerIndex + 2 >= parts.length) {
    return null;
  }
  return DIRECTORY_TARGETS.get(child) ?? null;
}

/**
 * Decide which watch target a path belongs to, or `null` when it is not
 * interesting. Pattern tables are tried in target order before falling back
 * to the directory layout under the managed root.
 */
export function classifyPath(
  filePath: string,
  patterns: Readonly<WatchPatterns>,
  rootMarker: string = DEFAULT_ROOT_MARKER,
): WatchTarget | null {
  for (const target of WATCH_TARGETS) {
    if (globMatchMultiple(filePath, patterns[target])) {
      return target;
    }
  }

  return classifyByAncestor(filePath, rootMarker);
}
