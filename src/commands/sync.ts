import process from 'node:process';
import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { MirrorIntegrationManager } from '../integrations/mirror-manager.js';
import { JobType, SyncJobStatus } from '../sync/job.js';
import { AgentSyncError, ERROR_CODES, handleError } from '../utils/errors.js';
import { formatDuration, jsonReplacer } from '../utils/formatters.js';
import { formatJobResult, loadCommandConfig, resultHasFailures, runOneShotJob } from './shared.js';

interface SyncCommandOptions {
  configFile?: string;
  config?: boolean;
  agents?: boolean;
  conflicts?: boolean;
  adapter?: string;
  json?: boolean;
  verbose?: boolean;
}

const SYNC_MODES = [
  ['config', JobType.CONFIG_SYNC],
  ['agents', JobType.AGENT_SYNC],
  ['conflicts', JobType.CONFLICT_RESOLUTION],
] as const;

export function selectSyncJobType(options: Pick<SyncCommandOptions, 'config' | 'agents' | 'conflicts'>): JobType {
  const selected = SYNC_MODES.filter(([flag]) => options[flag]);
  if (selected.length > 1) {
    const flags = selected.map(([flag]) => `--${flag}`).join(', ');
    throw new AgentSyncError(ERROR_CODES.INVALID_OPTION, `Use only one of ${flags}`);
  }
  return selected[0]?.[1] ?? JobType.FULL_SYNC;
}

export const syncCommand = new Command('sync')
  .description('Run a single sync job against the configured adapters')
  .option('-c, --config-file <path>', 'Path to the configuration file')
  .option('--config', 'Validate adapter configuration and sync the stale ones')
  .option('--agents', 'Sync agent files only')
  .option('--conflicts', 'Detect agent files that differ between the root and adapters, and resolve the safe ones')
  .option('-a, --adapter <name>', 'Limit the sync to one adapter')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Show verbose output')
  .action(async (options: SyncCommandOptions) => {
    const spinner = ora();

    try {
      const jobType = selectSyncJobType(options);
      const config = await loadCommandConfig(options);
      const integrations = new MirrorIntegrationManager({ rootDir: config.rootDir, adapters: config.adapters });

      if (!options.json) {
        spinner.start(`Running ${jobType}...`);
      }

      const job = await runOneShotJob(integrations, config, jobType, {
        targetAdapter: options.adapter,
        metadata: { trigger: 'cli' },
      });

      if (options.json) {
        console.log(JSON.stringify(job, jsonReplacer, 2));
      }
      else if (job.status === SyncJobStatus.COMPLETED && job.result) {
        spinner.succeed(`${jobType} finished in ${formatDuration(job.durationMs ?? 0)}`);
        formatJobResult(job.result).forEach(line => console.log(line));
      }
      else {
        spinner.fail(`${jobType} ${job.status}: ${job.errorMessage ?? 'unknown error'}`);
      }

      if (job.status !== SyncJobStatus.COMPLETED || !job.result || resultHasFailures(job.result)) {
        process.exitCode = 1;
      }
    }
    catch (error) {
      spinner.stop();
      handleError(error, options.verbose);
      if (!options.verbose) {
        console.error(chalk.dim('Re-run with --verbose for details'));
      }
      process.exitCode = 1;
    }
  });
