import type { HealthResult, SyncResult, ValidationResult } from '../integrations/types.js';
import type { AgentConflict, ConflictStats } from './conflict-resolver.js';
import { randomUUID } from 'node:crypto';
import { elapsedMs } from '../utils/timing.js';

export enum SyncJobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  RETRYING = 'retrying',
  CANCELLED = 'cancelled',
}

export enum JobType {
  FULL_SYNC = 'full_sync',
  INCREMENTAL_SYNC = 'incremental_sync',
  CONFIG_SYNC = 'config_sync',
  AGENT_SYNC = 'agent_sync',
  CONFLICT_RESOLUTION = 'conflict_resolution',
  HEALTH_CHECK = 'health_check',
}

export type JobResult =
  | { kind: 'sync'; adapters: Record<string, SyncResult> }
  | { kind: 'config'; validation: Record<string, ValidationResult>; sync: Record<string, SyncResult> }
  | { kind: 'health'; adapters: Record<string, HealthResult> }
  | { kind: 'conflicts'; conflicts: AgentConflict[]; autoResolved: number; stats: ConflictStats };

export interface AddJobOptions {
  /** Adapter to run against; omitted means every adapter. */
  targetAdapter?: string;
  /** Lower runs first. */
  priority?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  metadata?: Record<string, unknown>;
}

export const JOB_DEFAULTS = {
  priority: 5,
  maxRetries: 3,
  retryDelayMs: 30_000,
  timeoutMs: 300_000,
} as const;

const TERMINAL_STATUSES: ReadonlySet<SyncJobStatus> = new Set([
  SyncJobStatus.COMPLETED,
  SyncJobStatus.CANCELLED,
]);

export class InvalidTransitionError extends Error {
  constructor(jobId: string, from: SyncJobStatus, to: SyncJobStatus) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SyncJob {
  readonly id: string = randomUUID();
  readonly jobType: JobType;
  readonly targetAdapter?: string;
  readonly priority: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: Date = new Date();

  status: SyncJobStatus = SyncJobStatus.PENDING;
  startedAt?: Date;
  completedAt?: Date;
  retryCount = 0;
  errorMessage?: string;
  result?: JobResult;

  constructor(jobType: JobType, options: AddJobOptions = {}) {
    this.jobType = jobType;
    this.targetAdapter = options.targetAdapter;
    this.priority = options.priority ?? JOB_DEFAULTS.priority;
    this.maxRetries = options.maxRetries ?? JOB_DEFAULTS.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? JOB_DEFAULTS.retryDelayMs;
    this.timeoutMs = options.timeoutMs ?? JOB_DEFAULTS.timeoutMs;
    this.metadata = Object.freeze({ ...options.metadata });
  }

  /** Completed, cancelled, or failed with no retries left. */
  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.status) || this.completedAt !== undefined;
  }

  /** Milliseconds between the last start and the terminal transition. */
  get durationMs(): number | null {
    if (this.startedAt && this.completedAt) {
      return elapsedMs(this.startedAt, this.completedAt);
    }
    return null;
  }

  canRetry(): boolean {
    return this.status === SyncJobStatus.FAILED && this.retryCount < this.maxRetries;
  }

  markStarted(): void {
    this.transition([SyncJobStatus.PENDING, SyncJobStatus.RETRYING], SyncJobStatus.RUNNING);
    this.startedAt = new Date();
  }

  markCompleted(result: JobResult): void {
    this.transition([SyncJobStatus.RUNNING], SyncJobStatus.COMPLETED);
    this.result = result;
    this.completedAt = new Date();
  }

  /**
   * Record a failed attempt. The job stays open until `prepareRetry` or
   * `archive` decides what happens next.
   */
  markFailed(message: string): void {
    this.transition([SyncJobStatus.RUNNING], SyncJobStatus.FAILED);
    this.errorMessage = message;
  }

  prepareRetry(): void {
    if (!this.canRetry()) {
      throw new InvalidTransitionError(this.id, this.status, SyncJobStatus.RETRYING);
    }
    this.status = SyncJobStatus.RETRYING;
    this.retryCount++;
    this.startedAt = undefined;
    this.errorMessage = undefined;
  }

  /** Seal a failed job that will not be retried. */
  archive(): void {
    if (this.status !== SyncJobStatus.FAILED || this.completedAt) {
      throw new InvalidTransitionError(this.id, this.status, SyncJobStatus.FAILED);
    }
    this.completedAt = new Date();
  }

  markCancelled(reason?: string): void {
    this.transition(
      [SyncJobStatus.PENDING, SyncJobStatus.RUNNING, SyncJobStatus.RETRYING],
      SyncJobStatus.CANCELLED,
    );
    if (reason) {
      this.errorMessage = reason;
    }
    this.completedAt = new Date();
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      jobType: this.jobType,
      targetAdapter: this.targetAdapter ?? null,
      priority: this.priority,
      status: this.status,
      retryCount: this.retryCount,
      maxRetries: this.maxRetries,
      createdAt: this.createdAt.toISOString(),
      startedAt: this.startedAt?.toISOString() ?? null,
      completedAt: this.completedAt?.toISOString() ?? null,
      durationMs: this.durationMs,
      errorMessage: this.errorMessage ?? null,
      metadata: this.metadata,
      result: this.result ?? null,
    };
  }

  private transition(from: readonly SyncJobStatus[], to: SyncJobStatus): void {
    if (!from.includes(this.status)) {
      throw new InvalidTransitionError(this.id, this.status, to);
    }
    this.status = to;
  }
}

/**
 * Queue order: lower priority number first; the queue breaks ties by
 * insertion order.
 */
export function compareJobs(a: SyncJob, b: SyncJob): number {
  return a.priority - b.priority;
}
