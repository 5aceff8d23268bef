import type { AgentSyncConfig } from '../config/schemas.js';
import type { IntegrationManager } from '../integrations/types.js';
import type { AddJobOptions, JobResult, JobType, SyncJob } from '../sync/job.js';
import chalk from 'chalk';
import { ConfigManager } from '../config/config-manager.js';
import { SyncScheduler } from '../sync/scheduler.js';
import { logger, LogLevel, parseLogLevel } from '../utils/logger.js';

export interface CommonOptions {
  configFile?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Load configuration for a command and apply its log level; `--verbose`
 * forces debug output.
 */
export async function loadCommandConfig(options: CommonOptions): Promise<AgentSyncConfig> {
  const config = await ConfigManager.getInstance().loadConfig(options.configFile);
  logger.setLogLevel(options.verbose ? LogLevel.DEBUG : parseLogLevel(config.logLevel));
  if (options.json) {
    // Keep stdout machine-readable
    logger.setLogLevel(LogLevel.ERROR);
  }
  return config;
}

/**
 * Run a single job on a short-lived scheduler and wait for it to finish.
 * The periodic health check is disabled and no retries are attempted.
 */
export async function runOneShotJob(
  integrations: IntegrationManager,
  config: AgentSyncConfig,
  jobType: JobType,
  options: AddJobOptions = {},
): Promise<SyncJob> {
  const scheduler = new SyncScheduler(integrations, {
    ...config.scheduler,
    maxConcurrentJobs: 1,
    healthCheckIntervalMs: 0,
  });

  await scheduler.start();
  try {
    const id = scheduler.addJob(jobType, { maxRetries: 0, priority: 1, ...options });
    return await scheduler.waitForJob(id);
  }
  finally {
    await scheduler.stop();
  }
}

export function formatJobResult(result: JobResult): string[] {
  switch (result.kind) {
    case 'sync':
      return Object.entries(result.adapters).map(([name, outcome]) => {
        const color = outcome.status === 'success' ? chalk.green : outcome.status === 'skipped' ? chalk.dim : chalk.red;
        const errors = outcome.errors.length > 0 ? chalk.red(` (${outcome.errors.length} error(s))`) : '';
        const reason = outcome.reason ? chalk.dim(` - ${outcome.reason}`) : '';
        return `  ${chalk.bold(name)}: ${color(outcome.status)}, ${outcome.synced} file(s) synced${errors}${reason}`;
      });
    case 'config':
      return Object.entries(result.validation).map(([name, validation]) => {
        const synced = result.sync[name];
        const state = validation.errors.length > 0
          ? chalk.yellow(validation.errors.join('; '))
          : validation.needsSync ? chalk.yellow('out of date') : chalk.green('up to date');
        const action = synced ? chalk.dim(` -> ${synced.status}, ${synced.synced} file(s) synced`) : '';
        return `  ${chalk.bold(name)}: ${state}${action}`;
      });
    case 'health':
      return Object.entries(result.adapters).map(([name, health]) => {
        const color = health.status === 'healthy' ? chalk.green : health.status === 'degraded' ? chalk.yellow : chalk.red;
        const error = health.error ? chalk.dim(` - ${health.error}`) : '';
        return `  ${chalk.bold(name)}: ${color(health.status)}${error}`;
      });
    case 'conflicts':
      if (result.conflicts.length === 0) {
        return [chalk.green('  No conflicts found')];
      }
      return result.conflicts.map((conflict) => {
        const state = conflict.resolved
          ? chalk.green(`resolved (${conflict.resolution ?? 'unknown'})`)
          : chalk.yellow('needs review');
        return `  ${chalk.bold(`${conflict.adapter}/${conflict.file}`)}: ${conflict.type}, ${conflict.severity} - ${state}`;
      });
  }
}

/** Whether a finished job's result should make the command exit non-zero. */
export function resultHasFailures(result: JobResult): boolean {
  switch (result.kind) {
    case 'sync':
      return Object.values(result.adapters).some(outcome => outcome.status === 'error' || outcome.status === 'partial');
    case 'config':
      return Object.values(result.sync).some(outcome => outcome.status === 'error' || outcome.status === 'partial');
    case 'health':
      return Object.values(result.adapters).some(health => health.status !== 'healthy');
    case 'conflicts':
      return result.stats.unresolved > 0;
  }
}
