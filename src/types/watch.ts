export enum WatchTarget {
  CONFIG = 'config',
  AGENTS = 'agents',
  TOOLS = 'tools',
  TEMPLATES = 'templates',
  INTEGRATIONS = 'integrations',
}

/** Classification order: the first target whose patterns match wins. */
export const WATCH_TARGETS: readonly WatchTarget[] = [
  WatchTarget.CONFIG,
  WatchTarget.AGENTS,
  WatchTarget.TOOLS,
  WatchTarget.TEMPLATES,
  WatchTarget.INTEGRATIONS,
];

export enum WatchEventType {
  CREATED = 'created',
  MODIFIED = 'modified',
  DELETED = 'deleted',
  MOVED = 'moved',
}

export interface WatchEvent {
  readonly eventType: WatchEventType;
  readonly path: string;
  readonly target: WatchTarget;
  readonly timestamp: Date;
  /** Source path, only set for moved events. */
  readonly oldPath?: string;
}

export type WatchCallback = (event: WatchEvent) => void;

export type WatchPatterns = Record<WatchTarget, string[]>;

/**
 * A low-level change as reported by the file system, before classification.
 */
export type RawFileEvent =
  | { kind: 'add' | 'change' | 'unlink'; path: string; root: string }
  | { kind: 'move'; path: string; oldPath: string; root: string };

export interface WatchPathOptions {
  recursive?: boolean;
  patterns?: Partial<WatchPatterns>;
}

export interface FileWatcherOptions {
  debounceMs?: number;
  usePolling?: boolean;
  pollIntervalMs?: number;
  /** Name of the managed root directory used by the ancestor heuristic. */
  rootMarker?: string;
  /** Overrides merged over the built-in patterns for every path. */
  patterns?: Partial<WatchPatterns>;
}
