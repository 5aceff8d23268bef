import type { IntegrationManager, SyncResult } from '../integrations/types.js';
import type { JobResult, SyncJob } from './job.js';
import { JobExecutionError } from '../utils/errors.js';
import { ConflictResolver, ConflictSeverity, isConflictSeverity } from './conflict-resolver.js';
import { JobType } from './job.js';

export type JobHandler = (job: SyncJob, integrations: IntegrationManager) => Promise<JobResult>;

function targetAdapters(job: SyncJob, integrations: IntegrationManager): string[] | undefined {
  if (!job.targetAdapter) {
    return undefined;
  }
  if (!integrations.getAdapter(job.targetAdapter)) {
    throw new JobExecutionError(`Adapter not found: ${job.targetAdapter}`);
  }
  return [job.targetAdapter];
}

const syncAgents: JobHandler = async (job, integrations) => {
  const adapters = await integrations.syncAgents([], targetAdapters(job, integrations));
  return { kind: 'sync', adapters };
};

const syncConfigurations: JobHandler = async (job, integrations) => {
  const validation = await integrations.validateConfigurations(targetAdapters(job, integrations));
  const sync: Record<string, SyncResult> = {};

  for (const [name, result] of Object.entries(validation)) {
    if (!result.needsSync) {
      continue;
    }
    const adapter = integrations.getAdapter(name);
    if (adapter) {
      sync[name] = await adapter.syncAgents([]);
    }
  }

  return { kind: 'config', validation, sync };
};

const checkHealth: JobHandler = async (job, integrations) => {
  const adapters = await integrations.healthCheck(targetAdapters(job, integrations));
  return { kind: 'health', adapters };
};

// `metadata.maxSeverity` raises or lowers the auto-resolution ceiling
const resolveConflicts: JobHandler = async (job, integrations) => {
  const resolver = new ConflictResolver(integrations);
  await resolver.detectConflicts(targetAdapters(job, integrations));

  const maxSeverity = isConflictSeverity(job.metadata.maxSeverity) ? job.metadata.maxSeverity : ConflictSeverity.MEDIUM;
  const autoResolved = await resolver.autoResolve(maxSeverity);

  return {
    kind: 'conflicts',
    conflicts: resolver.getConflicts({ unresolvedOnly: false }),
    autoResolved,
    stats: resolver.getStats(),
  };
};

/**
 * What each job type does. Incremental sync currently performs a full agent
 * sync; change tracking would make it cheaper.
 */
export const JOB_HANDLERS: Readonly<Record<JobType, JobHandler>> = Object.freeze({
  [JobType.FULL_SYNC]: syncAgents,
  [JobType.INCREMENTAL_SYNC]: syncAgents,
  [JobType.AGENT_SYNC]: syncAgents,
  [JobType.CONFIG_SYNC]: syncConfigurations,
  [JobType.HEALTH_CHECK]: checkHealth,
  [JobType.CONFLICT_RESOLUTION]: resolveConflicts,
});
