import type { IntegrationManager } from '../integrations/types.js';
import type { AddJobOptions, JobResult } from './job.js';
import { EventEmitter } from 'node:events';
import { AsyncQueue } from '../utils/async-queue.js';
import {
  errorMessage,
  JobExecutionError,
  JobTimeoutError,
  SchedulerNotRunningError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { clampTimerDelay, sleep } from '../utils/timing.js';
import { JOB_HANDLERS } from './handlers.js';
import { compareJobs, JOB_DEFAULTS, JobType, SyncJob, SyncJobStatus } from './job.js';

const log = logger.scoped('scheduler');

const WORKER_ERROR_BACKOFF_MS = 1000;
const HEALTH_CHECK_PRIORITY = 10;

export interface SchedulerOptions {
  maxConcurrentJobs?: number;
  /** Default timeout for jobs that do not set their own. */
  jobTimeoutMs?: number;
  /** Interval between injected health-check jobs; 0 disables them. */
  healthCheckIntervalMs?: number;
  /** Longest a worker waits on an empty queue before re-checking state. */
  pollIntervalMs?: number;
  /** Multiplier applied to the retry delay for every further attempt. */
  backoffFactor?: number;
  maxCompletedHistory?: number;
  maxFailedHistory?: number;
  maxCancelledHistory?: number;
}

export interface SchedulerStats {
  jobsSubmitted: number;
  jobsCompleted: number;
  jobsFailed: number;
  jobsRetried: number;
  jobsCancelled: number;
  jobsEvicted: number;
  totalExecutionMs: number;
  lastSuccessfulSync: Date | null;
}

export interface QueueStatus {
  queueSize: number;
  running: number;
  retrying: number;
  completed: number;
  failed: number;
  cancelled: number;
  isRunning: boolean;
  stats: SchedulerStats;
}

/**
 * Events emitted by the scheduler, each with the job as the only argument
 * (`job:retrying` also passes the delay in milliseconds).
 */
export interface SchedulerEvents {
  'job:queued': [SyncJob];
  'job:started': [SyncJob];
  'job:completed': [SyncJob];
  'job:retrying': [SyncJob, number];
  'job:failed': [SyncJob];
  'job:cancelled': [SyncJob];
  'job:settled': [SyncJob];
  'scheduler:stopped': [];
}

type ExecutionOutcome =
  | { ok: true; result: JobResult }
  | { ok: false; error: unknown };

/**
 * Runs sync jobs with bounded concurrency: a priority queue drained by a
 * fixed pool of worker loops, each job under a timeout and a retry budget.
 */
export class SyncScheduler extends EventEmitter {
  private readonly queue = new AsyncQueue<SyncJob>(compareJobs);
  private readonly runningJobs = new Map<string, SyncJob>();
  private readonly retryingJobs = new Map<string, SyncJob>();
  private completedJobs: SyncJob[] = [];
  private failedJobs: SyncJob[] = [];
  private cancelledJobs: SyncJob[] = [];

  private readonly maxConcurrentJobs: number;
  private readonly jobTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly pollIntervalMs: number;
  private readonly backoffFactor: number;
  private readonly maxCompletedHistory: number;
  private readonly maxFailedHistory: number;
  private readonly maxCancelledHistory: number;

  private running = false;
  private initialization: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private loops: Promise<void>[] = [];
  private readonly retryWaits = new Set<Promise<void>>();

  private stats: SchedulerStats = {
    jobsSubmitted: 0,
    jobsCompleted: 0,
    jobsFailed: 0,
    jobsRetried: 0,
    jobsCancelled: 0,
    jobsEvicted: 0,
    totalExecutionMs: 0,
    lastSuccessfulSync: null,
  };

  constructor(
    private readonly integrations: IntegrationManager,
    options: SchedulerOptions = {},
  ) {
    super();
    this.maxConcurrentJobs = options.maxConcurrentJobs ?? 3;
    this.jobTimeoutMs = clampTimerDelay(options.jobTimeoutMs ?? JOB_DEFAULTS.timeoutMs);
    this.healthCheckIntervalMs = clampTimerDelay(options.healthCheckIntervalMs ?? 60_000);
    this.pollIntervalMs = clampTimerDelay(options.pollIntervalMs ?? 1000);
    this.backoffFactor = options.backoffFactor ?? 1;
    this.maxCompletedHistory = options.maxCompletedHistory ?? 100;
    this.maxFailedHistory = options.maxFailedHistory ?? 50;
    this.maxCancelledHistory = options.maxCancelledHistory ?? 50;
  }

  /**
   * Initialize the integration manager once; later calls share the first run.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.integrations.initialize().then((ready) => {
        if (!ready) {
          log.warn('Integration manager reported a partial initialization');
        }
      });
      this.initialization.catch(() => {
        this.initialization = null;
      });
    }
    return this.initialization;
  }

  isRunning(): boolean {
    return this.running;
  }

  addJob(jobType: JobType, options: AddJobOptions = {}): string {
    const job = new SyncJob(jobType, {
      ...options,
      timeoutMs: clampTimerDelay(options.timeoutMs ?? this.jobTimeoutMs),
    });

    this.queue.push(job);
    this.stats.jobsSubmitted++;
    log.debug(`Queued ${job.jobType} job ${job.id} (priority ${job.priority})`);
    this.emitSafe('job:queued', job);
    return job.id;
  }

  /**
   * Cancel a queued, running or retry-waiting job. A running job keeps
   * executing in the background but its outcome is discarded.
   */
  cancelJob(jobId: string): boolean {
    const running = this.runningJobs.get(jobId);
    if (running) {
      this.runningJobs.delete(jobId);
      running.markCancelled('Cancelled while running');
      this.recordCancelled(running);
      return true;
    }

    const retrying = this.retryingJobs.get(jobId);
    if (retrying) {
      this.retryingJobs.delete(jobId);
      retrying.markCancelled('Cancelled while waiting to retry');
      this.recordCancelled(retrying);
      return true;
    }

    const queued = this.queue.find(job => job.id === jobId);
    if (queued && queued.status !== SyncJobStatus.CANCELLED) {
      // Stays queued until a worker pops and discards it
      queued.markCancelled();
      this.stats.jobsCancelled++;
      this.emitSafe('job:cancelled', queued);
      this.emitSafe('job:settled', queued);
      return true;
    }

    return false;
  }

  getJobStatus(jobId: string): SyncJob | null {
    return this.runningJobs.get(jobId)
      ?? this.retryingJobs.get(jobId)
      ?? this.queue.find(job => job.id === jobId)
      ?? this.completedJobs.find(job => job.id === jobId)
      ?? this.failedJobs.find(job => job.id === jobId)
      ?? this.cancelledJobs.find(job => job.id === jobId)
      ?? null;
  }

  getQueueStatus(): QueueStatus {
    return {
      queueSize: this.queue.size,
      running: this.runningJobs.size,
      retrying: this.retryingJobs.size,
      completed: this.completedJobs.length,
      failed: this.failedJobs.length,
      cancelled: this.cancelledJobs.length,
      isRunning: this.running,
      stats: { ...this.stats },
    };
  }

  getRunningJobs(): readonly SyncJob[] {
    return Array.from(this.runningJobs.values());
  }

  getCompletedJobs(): readonly SyncJob[] {
    return [...this.completedJobs];
  }

  getFailedJobs(): readonly SyncJob[] {
    return [...this.failedJobs];
  }

  /**
   * Resolve with the job once it reaches a terminal state.
   */
  waitForJob(jobId: string): Promise<SyncJob> {
    const job = this.getJobStatus(jobId);
    if (!job) {
      return Promise.reject(new JobExecutionError(`Unknown job: ${jobId}`));
    }
    if (job.isTerminal) {
      return Promise.resolve(job);
    }
    if (!this.running) {
      return Promise.reject(new SchedulerNotRunningError(`wait for job ${jobId}`));
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.off('job:settled', onSettled);
        this.off('scheduler:stopped', onStopped);
      };
      const onSettled = (settled: SyncJob) => {
        if (settled.id === jobId) {
          cleanup();
          resolve(settled);
        }
      };
      const onStopped = () => {
        cleanup();
        reject(new SchedulerNotRunningError(`wait for job ${jobId}`));
      };
      this.on('job:settled', onSettled);
      this.on('scheduler:stopped', onStopped);
    });
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    try {
      await this.initialize();
    }
    catch (error) {
      this.running = false;
      throw error;
    }
    if (!this.running) {
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;

    for (let i = 0; i < this.maxConcurrentJobs; i++) {
      this.loops.push(this.workerLoop(`worker-${i}`, controller.signal));
    }
    if (this.healthCheckIntervalMs > 0) {
      this.loops.push(this.healthCheckLoop(controller.signal));
    }

    log.debug(`Started with ${this.maxConcurrentJobs} worker(s)`);
  }

  /**
   * Stop every worker and the health-check loop. Jobs still executing are
   * marked cancelled; jobs waiting for a retry go back into the queue.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.abortController?.abort();
    this.queue.interrupt();

    await Promise.allSettled([...this.loops, ...this.retryWaits]);

    this.loops = [];
    this.abortController = null;
    log.debug('Stopped');
    this.emitSafe('scheduler:stopped');
  }

  /**
   * Trim the histories to the given sizes, keeping the most recent jobs.
   */
  cleanupOldJobs(maxCompleted = 100, maxFailed = 50): void {
    this.completedJobs = this.trimHistory(this.completedJobs, maxCompleted);
    this.failedJobs = this.trimHistory(this.failedJobs, maxFailed);
  }

  private async workerLoop(name: string, signal: AbortSignal): Promise<void> {
    while (this.running) {
      try {
        await this.queue.waitForItem(this.pollIntervalMs);
        if (!this.running) {
          break;
        }

        const job = this.queue.tryPop();
        if (!job) {
          continue;
        }

        if (job.status === SyncJobStatus.CANCELLED) {
          this.archive(this.cancelledJobs, job, this.maxCancelledHistory);
          continue;
        }

        job.markStarted();
        this.runningJobs.set(job.id, job);
        log.debug(`${name} running ${job.jobType} job ${job.id}`);
        this.emitSafe('job:started', job);

        await this.executeJob(job, signal);
      }
      catch (error) {
        log.error(`Unexpected error in ${name}: ${errorMessage(error)}`);
        await sleep(WORKER_ERROR_BACKOFF_MS, signal);
      }
    }
  }

  private async executeJob(job: SyncJob, signal: AbortSignal): Promise<void> {
    let outcome: ExecutionOutcome;
    try {
      outcome = { ok: true, result: await this.runWithTimeout(job, signal) };
    }
    catch (error) {
      outcome = { ok: false, error };
    }

    if (job.status === SyncJobStatus.CANCELLED) {
      log.debug(`Discarding outcome of cancelled job ${job.id}`);
      return;
    }

    this.runningJobs.delete(job.id);

    if (outcome.ok) {
      job.markCompleted(outcome.result);
      this.stats.jobsCompleted++;
      this.stats.totalExecutionMs += job.durationMs ?? 0;
      this.stats.lastSuccessfulSync = job.completedAt ?? new Date();
      this.archive(this.completedJobs, job, this.maxCompletedHistory);
      log.debug(`Completed ${job.jobType} job ${job.id}`);
      this.emitSafe('job:completed', job);
      this.emitSafe('job:settled', job);
      return;
    }

    if (signal.aborted) {
      job.markCancelled('Scheduler stopped');
      this.recordCancelled(job);
      return;
    }

    job.markFailed(errorMessage(outcome.error));

    if (job.canRetry()) {
      this.scheduleRetry(job, signal);
      return;
    }

    job.archive();
    this.stats.jobsFailed++;
    this.archive(this.failedJobs, job, this.maxFailedHistory);
    log.warn(`${job.jobType} job ${job.id} failed after ${job.retryCount + 1} attempt(s): ${job.errorMessage}`);
    this.emitSafe('job:failed', job);
    this.emitSafe('job:settled', job);
  }

  private runWithTimeout(job: SyncJob, signal: AbortSignal): Promise<JobResult> {
    const handler = JOB_HANDLERS[job.jobType];

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(new SchedulerNotRunningError(`finish job ${job.id}`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new JobTimeoutError(job.id, job.timeoutMs));
      }, job.timeoutMs);

      signal.addEventListener('abort', onAbort, { once: true });

      handler(job, this.integrations).then(
        (result) => {
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
    });
  }

  /**
   * Wait out the retry delay without holding a worker, then re-queue the job
   * at its original priority.
   */
  private scheduleRetry(job: SyncJob, signal: AbortSignal): void {
    job.prepareRetry();
    this.stats.jobsRetried++;
    this.retryingJobs.set(job.id, job);

    const delay = job.retryDelayMs * this.backoffFactor ** (job.retryCount - 1);
    log.info(`Retrying ${job.jobType} job ${job.id} (attempt ${job.retryCount}/${job.maxRetries}) in ${delay}ms`);
    this.emitSafe('job:retrying', job, delay);

    const wait = sleep(delay, signal).then(() => {
      this.retryWaits.delete(wait);
      if (!this.retryingJobs.delete(job.id)) {
        return;
      }
      this.queue.push(job);
    });
    this.retryWaits.add(wait);
  }

  private async healthCheckLoop(signal: AbortSignal): Promise<void> {
    while (this.running) {
      try {
        this.addJob(JobType.HEALTH_CHECK, {
          priority: HEALTH_CHECK_PRIORITY,
          maxRetries: 1,
          metadata: { source: 'health-check-loop' },
        });
      }
      catch (error) {
        log.error(`Failed to queue health check: ${errorMessage(error)}`);
      }

      if (!await sleep(this.healthCheckIntervalMs, signal)) {
        break;
      }
    }
  }

  private recordCancelled(job: SyncJob): void {
    this.stats.jobsCancelled++;
    this.archive(this.cancelledJobs, job, this.maxCancelledHistory);
    log.debug(`Cancelled ${job.jobType} job ${job.id}`);
    this.emitSafe('job:cancelled', job);
    this.emitSafe('job:settled', job);
  }

  private archive(history: SyncJob[], job: SyncJob, cap: number): void {
    history.push(job);
    const overflow = history.length - cap;
    if (overflow > 0) {
      history.splice(0, overflow);
      this.stats.jobsEvicted += overflow;
    }
  }

  private trimHistory(history: SyncJob[], max: number): SyncJob[] {
    if (history.length <= max) {
      return history;
    }
    const finishedAt = (job: SyncJob) => (job.completedAt ?? job.createdAt).getTime();
    const sorted = [...history].sort((a, b) => finishedAt(a) - finishedAt(b));
    this.stats.jobsEvicted += sorted.length - max;
    return sorted.slice(sorted.length - max);
  }

  private emitSafe<K extends keyof SchedulerEvents>(event: K, ...args: SchedulerEvents[K]): void {
    try {
      this.emit(event, ...args);
    }
    catch (error) {
      log.error(`Listener for ${event} failed: ${errorMessage(error)}`);
    }
  }
}
