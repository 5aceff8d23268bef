export {
  classifyAgentState,
  ConflictResolution,
  ConflictResolver,
  ConflictSeverity,
  ConflictType,
  isConflictSeverity,
} from './conflict-resolver.js';
export type { AgentConflict, ConflictFilter, ConflictStats } from './conflict-resolver.js';
export { AutoSyncCoordinator, jobForTarget } from './coordinator.js';
export type { CoordinatorOptions, CoordinatorStats, CoordinatorStatus, JobSummary } from './coordinator.js';
export { JOB_HANDLERS } from './handlers.js';
export type { JobHandler } from './handlers.js';
export { compareJobs, InvalidTransitionError, JOB_DEFAULTS, JobType, SyncJob, SyncJobStatus } from './job.js';
export type { AddJobOptions, JobResult } from './job.js';
export { SyncScheduler } from './scheduler.js';
export type { QueueStatus, SchedulerEvents, SchedulerOptions, SchedulerStats } from './scheduler.js';
export { createSyncStack } from './stack.js';
export type { SyncStack } from './stack.js';
