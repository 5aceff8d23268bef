import type { IntegrationManager } from '../integrations/types.js';
import type { WatchEvent } from '../types/watch.js';
import type { FileWatcher } from '../watch/file-watcher.js';
import type { QueueStatus, SyncScheduler } from './scheduler.js';
import { WatchTarget } from '../types/watch.js';
import { KeyedDebouncer } from '../utils/debounce.js';
import { errorMessage, SchedulerNotRunningError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { clampTimerDelay, sleep } from '../utils/timing.js';
import { discoverWatchPaths } from '../watch/default-paths.js';
import { JobType } from './job.js';

const log = logger.scoped('coordinator');

export interface CoordinatorOptions {
  enabled?: boolean;
  syncDebounceMs?: number;
  /** Interval of the periodic full resync; 0 disables it. */
  fullSyncIntervalMs?: number;
  /** Managed root used to discover default watch paths. */
  rootDir: string;
}

export interface CoordinatorStats {
  jobsSubmitted: number;
  fileEventsProcessed: number;
  autoSyncsTriggered: number;
  lastAutoSync: Date | null;
  startedAt: Date | null;
}

export interface CoordinatorStatus {
  enabled: boolean;
  running: boolean;
  watcherActive: boolean;
  pendingTargets: WatchTarget[];
  lastTriggers: Partial<Record<WatchTarget, string>>;
  scheduler: QueueStatus;
  stats: CoordinatorStats;
}

export interface JobSummary {
  id: string;
  jobType: JobType;
  status: string;
  targetAdapter: string | null;
  createdAt: string;
  completedAt: string | null;
  durationMs: number | null;
  retryCount: number;
  errorMessage: string | null;
}

interface TargetJob {
  jobType: JobType;
  priority: number;
}

const TARGET_JOBS: Partial<Record<WatchTarget, TargetJob>> = {
  [WatchTarget.CONFIG]: { jobType: JobType.CONFIG_SYNC, priority: 2 },
  [WatchTarget.AGENTS]: { jobType: JobType.AGENT_SYNC, priority: 3 },
  [WatchTarget.TEMPLATES]: { jobType: JobType.AGENT_SYNC, priority: 3 },
};

const FALLBACK_JOB: TargetJob = { jobType: JobType.FULL_SYNC, priority: 4 };

export function jobForTarget(target: WatchTarget): TargetJob {
  return TARGET_JOBS[target] ?? FALLBACK_JOB;
}

/**
 * Turns watch events into scheduler jobs. Bursts of changes to the same
 * target collapse into one job once they stop for `syncDebounceMs`.
 */
export class AutoSyncCoordinator {
  private readonly syncDebounceMs: number;
  private readonly fullSyncIntervalMs: number;
  private readonly rootDir: string;
  private readonly debouncer: KeyedDebouncer<WatchTarget, WatchTarget>;
  private readonly pendingTargets = new Set<WatchTarget>();
  private readonly lastTriggers = new Map<WatchTarget, Date>();

  private enabled: boolean;
  private running = false;
  private initialized = false;
  private periodicAbort: AbortController | null = null;
  private periodicLoop: Promise<void> | null = null;

  private stats: CoordinatorStats = {
    jobsSubmitted: 0,
    fileEventsProcessed: 0,
    autoSyncsTriggered: 0,
    lastAutoSync: null,
    startedAt: null,
  };

  private readonly onWatchEvent = (event: WatchEvent): void => this.handleWatchEvent(event);

  constructor(
    private readonly watcher: FileWatcher,
    private readonly scheduler: SyncScheduler,
    private readonly integrations: IntegrationManager,
    options: CoordinatorOptions,
  ) {
    this.enabled = options.enabled ?? true;
    this.syncDebounceMs = clampTimerDelay(options.syncDebounceMs ?? 2000);
    this.fullSyncIntervalMs = clampTimerDelay(options.fullSyncIntervalMs ?? 300_000);
    this.rootDir = options.rootDir;
    this.debouncer = new KeyedDebouncer(this.syncDebounceMs, target => this.fireTarget(target));
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    this.watcher.addCallback(this.onWatchEvent);
    await this.scheduler.initialize();
    this.initialized = true;
    log.debug('Initialized');
  }

  /**
   * Start watching and scheduling. `paths` defaults to the managed
   * directories plus the adapters' own watch paths.
   */
  async start(paths?: string[]): Promise<void> {
    if (this.running) {
      return;
    }
    if (!this.enabled) {
      log.info('Auto-sync is disabled; not starting');
      return;
    }

    await this.initialize();
    this.running = true;
    this.stats.startedAt = new Date();

    await this.scheduler.start();

    const watchPaths = paths ?? await discoverWatchPaths(this.rootDir, this.integrations);
    for (const watchPath of watchPaths) {
      await this.watcher.addPath(watchPath, { recursive: true });
    }
    await this.watcher.start();

    if (this.fullSyncIntervalMs > 0) {
      const controller = new AbortController();
      this.periodicAbort = controller;
      this.periodicLoop = this.periodicSyncLoop(controller.signal);
    }

    this.submit(JobType.HEALTH_CHECK, 1, { trigger: 'startup' });
    this.submit(JobType.FULL_SYNC, 2, { trigger: 'startup' });

    log.info(`Auto-sync started, watching ${watchPaths.length} path(s)`);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    this.periodicAbort?.abort();
    await this.periodicLoop;
    this.periodicAbort = null;
    this.periodicLoop = null;

    this.debouncer.cancelAll();
    this.pendingTargets.clear();

    this.watcher.removeCallback(this.onWatchEvent);
    this.initialized = false;
    if (this.watcher.callbackCount === 0) {
      await this.watcher.stop();
    }

    await this.scheduler.stop();
    log.info('Auto-sync stopped');
  }

  enable(): void {
    this.enabled = true;
    log.info('Auto-sync enabled');
  }

  disable(): void {
    this.enabled = false;
    this.debouncer.cancelAll();
    this.pendingTargets.clear();
    log.info('Auto-sync disabled');
  }

  triggerManualSync(targetAdapter?: string, priority = 1): string {
    this.ensureInitialized('trigger a manual sync');
    return this.submit(JobType.FULL_SYNC, priority, { trigger: 'manual' }, targetAdapter);
  }

  triggerConfigSync(priority = 2): string {
    this.ensureInitialized('trigger a config sync');
    return this.submit(JobType.CONFIG_SYNC, priority, { trigger: 'manual' });
  }

  triggerAgentSync(priority = 3): string {
    this.ensureInitialized('trigger an agent sync');
    return this.submit(JobType.AGENT_SYNC, priority, { trigger: 'manual' });
  }

  async addWatchPath(watchPath: string): Promise<boolean> {
    try {
      await this.watcher.addPath(watchPath, { recursive: true });
      log.info(`Added watch path: ${watchPath}`);
      return true;
    }
    catch (error) {
      log.error(`Failed to add watch path ${watchPath}: ${errorMessage(error)}`);
      return false;
    }
  }

  async removeWatchPath(watchPath: string): Promise<boolean> {
    try {
      const removed = await this.watcher.removePath(watchPath);
      if (removed) {
        log.info(`Removed watch path: ${watchPath}`);
      }
      return removed;
    }
    catch (error) {
      log.error(`Failed to remove watch path ${watchPath}: ${errorMessage(error)}`);
      return false;
    }
  }

  getStatus(): CoordinatorStatus {
    const lastTriggers: Partial<Record<WatchTarget, string>> = {};
    for (const [target, at] of this.lastTriggers) {
      lastTriggers[target] = at.toISOString();
    }

    return {
      enabled: this.enabled,
      running: this.running,
      watcherActive: this.watcher.isWatching(),
      pendingTargets: Array.from(this.pendingTargets),
      lastTriggers,
      scheduler: this.scheduler.getQueueStatus(),
      stats: { ...this.stats },
    };
  }

  /** Finished jobs, newest first. */
  getRecentEvents(limit = 10): JobSummary[] {
    const finished = [...this.scheduler.getCompletedJobs(), ...this.scheduler.getFailedJobs()];
    const finishedAt = (time: Date | undefined, fallback: Date) => (time ?? fallback).getTime();

    return finished
      .sort((a, b) => finishedAt(b.completedAt, b.createdAt) - finishedAt(a.completedAt, a.createdAt))
      .slice(0, Math.max(0, limit))
      .map(job => ({
        id: job.id,
        jobType: job.jobType,
        status: job.status,
        targetAdapter: job.targetAdapter ?? null,
        createdAt: job.createdAt.toISOString(),
        completedAt: job.completedAt?.toISOString() ?? null,
        durationMs: job.durationMs,
        retryCount: job.retryCount,
        errorMessage: job.errorMessage ?? null,
      }));
  }

  private handleWatchEvent(event: WatchEvent): void {
    if (!this.enabled || !this.running) {
      return;
    }

    this.stats.fileEventsProcessed++;
    this.pendingTargets.add(event.target);
    this.lastTriggers.set(event.target, event.timestamp);
    this.debouncer.schedule(event.target, event.target);
  }

  private fireTarget(target: WatchTarget): void {
    if (!this.pendingTargets.delete(target)) {
      return;
    }

    const { jobType, priority } = jobForTarget(target);
    try {
      this.submit(jobType, priority, { trigger: 'file_change', target });
      this.stats.autoSyncsTriggered++;
      this.stats.lastAutoSync = new Date();
      log.debug(`Changes in ${target} triggered ${jobType}`);
    }
    catch (error) {
      log.error(`Failed to schedule sync for ${target}: ${errorMessage(error)}`);
    }
  }

  private async periodicSyncLoop(signal: AbortSignal): Promise<void> {
    while (await sleep(this.fullSyncIntervalMs, signal)) {
      if (!this.enabled) {
        continue;
      }
      try {
        this.submit(JobType.FULL_SYNC, 5, { trigger: 'periodic' });
      }
      catch (error) {
        log.error(`Periodic sync failed: ${errorMessage(error)}`);
      }
    }
  }

  private submit(
    jobType: JobType,
    priority: number,
    metadata: Record<string, unknown>,
    targetAdapter?: string,
  ): string {
    const id = this.scheduler.addJob(jobType, { priority, metadata, targetAdapter });
    this.stats.jobsSubmitted++;
    return id;
  }

  private ensureInitialized(operation: string): void {
    if (!this.initialized) {
      throw new SchedulerNotRunningError(operation);
    }
  }
}
