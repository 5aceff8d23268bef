import type { FSWatcher } from 'chokidar';
import type {
  FileWatcherOptions,
  RawFileEvent,
  WatchCallback,
  WatchEvent,
  WatchPathOptions,
  WatchPatterns,
  WatchTarget,
} from '../types/watch.js';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import chokidar from 'chokidar';
import { WatchEventType } from '../types/watch.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { KeyedDebouncer } from '../utils/debounce.js';
import { CallbackError, errorMessage, toError, WatchIOError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { classifyPath, DEFAULT_ROOT_MARKER, resolvePatterns } from './classifier.js';

const log = logger.scoped('watcher');

/** How long the consumer waits on an empty channel before re-checking state. */
const CHANNEL_POLL_MS = 1000;

const RAW_EVENT_TYPES = {
  add: WatchEventType.CREATED,
  change: WatchEventType.MODIFIED,
  unlink: WatchEventType.DELETED,
} as const;

interface WatchRegistration {
  path: string;
  recursive: boolean;
  patterns: WatchPatterns;
  watcher: FSWatcher | null;
}

export function createWatchEvent(
  eventType: WatchEventType,
  filePath: string,
  target: WatchTarget,
  timestamp: Date = new Date(),
  oldPath?: string,
): WatchEvent {
  return Object.freeze({ eventType, path: filePath, target, timestamp, oldPath });
}

export function formatWatchEvent(event: WatchEvent): string {
  if (event.eventType === WatchEventType.MOVED && event.oldPath) {
    return `${event.eventType}: ${event.oldPath} -> ${event.path} [${event.target}]`;
  }
  return `${event.eventType}: ${event.path} [${event.target}]`;
}

/**
 * Watches a set of paths, classifies every change into a watch target and
 * delivers one event per (target, path) once the changes settle.
 *
 * chokidar callbacks only push raw events into a hand-off channel; a single
 * consumer task owned by the watcher drains it, so classification and debounce
 * state are touched from one place.
 *
 * chokidar has no rename event: a move on disk arrives as a `DELETED` event for
 * the old path and a `CREATED` event for the new one. `MOVED` is only produced
 * for `move` events handed to `ingest` directly.
 */
export class FileWatcher {
  private readonly registrations = new Map<string, WatchRegistration>();
  private readonly callbacks: WatchCallback[] = [];
  private readonly channel = new AsyncQueue<RawFileEvent>();
  private readonly debouncer: KeyedDebouncer<string, WatchEvent>;
  private readonly patterns: WatchPatterns;
  private readonly rootMarker: string;
  private readonly usePolling: boolean;
  private readonly pollIntervalMs: number;
  private consumer: Promise<void> | null = null;
  private active = false;

  constructor(options: FileWatcherOptions = {}) {
    this.patterns = resolvePatterns(options.patterns);
    this.rootMarker = options.rootMarker ?? DEFAULT_ROOT_MARKER;
    this.usePolling = options.usePolling ?? false;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.debouncer = new KeyedDebouncer(
      options.debounceMs ?? 1000,
      event => this.dispatch(event),
    );
  }

  addCallback(callback: WatchCallback): void {
    if (!this.callbacks.includes(callback)) {
      this.callbacks.push(callback);
    }
  }

  removeCallback(callback: WatchCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index !== -1) {
      this.callbacks.splice(index, 1);
    }
  }

  get callbackCount(): number {
    return this.callbacks.length;
  }

  /**
   * Register a file or directory. Adding a path that is already registered
   * replaces its settings and, while running, restarts its observation.
   */
  async addPath(target: string, options: WatchPathOptions = {}): Promise<void> {
    const resolved = path.resolve(target);
    const existing = this.registrations.get(resolved);
    if (existing) {
      await this.closeRegistration(existing);
    }

    const registration: WatchRegistration = {
      path: resolved,
      recursive: options.recursive ?? true,
      patterns: resolvePatterns(options.patterns, this.patterns),
      watcher: null,
    };
    this.registrations.set(resolved, registration);

    if (this.active) {
      this.openRegistration(registration);
    }
  }

  async removePath(target: string): Promise<boolean> {
    const resolved = path.resolve(target);
    const registration = this.registrations.get(resolved);
    if (!registration) {
      return false;
    }
    this.registrations.delete(resolved);
    await this.closeRegistration(registration);
    return true;
  }

  getWatchedPaths(): string[] {
    return Array.from(this.registrations.keys());
  }

  isWatching(): boolean {
    return this.active;
  }

  async start(): Promise<void> {
    if (this.active) {
      return;
    }

    this.active = true;
    this.consumer = this.consume();

    for (const registration of this.registrations.values()) {
      this.openRegistration(registration);
    }
    log.debug(`Watching ${this.registrations.size} path(s)`);
  }

  async stop(): Promise<void> {
    if (!this.active) {
      return;
    }

    this.active = false;
    this.channel.interrupt();
    this.debouncer.cancelAll();

    await Promise.all(
      Array.from(this.registrations.values()).map(registration => this.closeRegistration(registration)),
    );

    await this.consumer;
    this.consumer = null;
    this.channel.clear();
    log.debug('File watcher stopped');
  }

  /**
   * Hand a raw file-system change to the watcher. Events arriving while the
   * watcher is stopped are dropped.
   */
  ingest(event: RawFileEvent): void {
    if (!this.active) {
      return;
    }
    this.channel.push(event);
  }

  private async consume(): Promise<void> {
    while (this.active) {
      await this.channel.waitForItem(CHANNEL_POLL_MS);

      let raw = this.channel.tryPop();
      while (raw && this.active) {
        try {
          this.process(raw);
        }
        catch (error) {
          log.error(`Failed to process ${raw.kind} event for ${raw.path}: ${errorMessage(error)}`);
        }
        raw = this.channel.tryPop();
      }
    }
  }

  private process(raw: RawFileEvent): void {
    const patterns = this.registrations.get(raw.root)?.patterns ?? this.patterns;
    for (const event of this.classify(raw, patterns)) {
      this.debouncer.schedule(`${event.target}:${event.path}`, event);
    }
  }

  private classify(raw: RawFileEvent, patterns: WatchPatterns): WatchEvent[] {
    const now = new Date();

    if (raw.kind === 'move') {
      const sourceTarget = classifyPath(raw.oldPath, patterns, this.rootMarker);
      const destinationTarget = classifyPath(raw.path, patterns, this.rootMarker);

      if (sourceTarget && sourceTarget === destinationTarget) {
        return [createWatchEvent(WatchEventType.MOVED, raw.path, destinationTarget, now, raw.oldPath)];
      }

      const events: WatchEvent[] = [];
      if (sourceTarget) {
        events.push(createWatchEvent(WatchEventType.DELETED, raw.oldPath, sourceTarget, now));
      }
      if (destinationTarget) {
        events.push(createWatchEvent(WatchEventType.CREATED, raw.path, destinationTarget, now));
      }
      return events;
    }

    const target = classifyPath(raw.path, patterns, this.rootMarker);
    if (!target) {
      return [];
    }
    return [createWatchEvent(RAW_EVENT_TYPES[raw.kind], raw.path, target, now)];
  }

  private dispatch(event: WatchEvent): void {
    log.debug(formatWatchEvent(event));

    for (const callback of [...this.callbacks]) {
      try {
        callback(event);
      }
      catch (error) {
        const failure = new CallbackError(
          `Watch callback failed for ${event.path}: ${errorMessage(error)}`,
          toError(error),
        );
        log.error(failure.message);
      }
    }
  }

  private openRegistration(registration: WatchRegistration): void {
    if (!existsSync(registration.path)) {
      log.warn(`Skipping missing watch path: ${registration.path}`);
      return;
    }

    try {
      const watcher = chokidar.watch(registration.path, {
        persistent: true,
        ignoreInitial: true,
        depth: registration.recursive ? undefined : 0,
        usePolling: this.usePolling,
        interval: this.pollIntervalMs,
        awaitWriteFinish: {
          stabilityThreshold: 500,
          pollInterval: 100,
        },
      });

      watcher
        .on('add', filePath => this.ingest({ kind: 'add', path: filePath, root: registration.path }))
        .on('change', filePath => this.ingest({ kind: 'change', path: filePath, root: registration.path }))
        .on('unlink', filePath => this.ingest({ kind: 'unlink', path: filePath, root: registration.path }))
        .on('error', error => this.handleWatchError(registration.path, error));

      registration.watcher = watcher;
    }
    catch (error) {
      this.handleWatchError(registration.path, error);
    }
  }

  private async closeRegistration(registration: WatchRegistration): Promise<void> {
    const watcher = registration.watcher;
    if (!watcher) {
      return;
    }
    registration.watcher = null;

    try {
      await watcher.close();
    }
    catch (error) {
      this.handleWatchError(registration.path, error);
    }
  }

  private handleWatchError(root: string, error: unknown): void {
    const failure = new WatchIOError(`Watcher error on ${root}: ${errorMessage(error)}`, toError(error));
    log.error(failure.message);
  }
}
