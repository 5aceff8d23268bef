import type { SyncJob } from '../sync/job.js';
import process from 'node:process';
import chalk from 'chalk';
import { Command } from 'commander';
import { createSyncStack } from '../sync/stack.js';
import { handleError } from '../utils/errors.js';
import { formatDuration, jsonReplacer } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { loadCommandConfig } from './shared.js';

interface WatchCommandOptions {
  configFile?: string;
  path?: string[];
  json?: boolean;
  verbose?: boolean;
}

type LifecycleEvent = 'job:started' | 'job:completed' | 'job:retrying' | 'job:failed' | 'job:cancelled';

export function formatLifecycleLine(event: LifecycleEvent, job: SyncJob, now: Date = new Date()): string {
  const when = chalk.dim(now.toISOString().slice(11, 19));
  const label = `${job.jobType} ${chalk.dim(job.id.slice(0, 8))}`;

  switch (event) {
    case 'job:started':
      return `${when} ${chalk.cyan('▶')} ${label} started`;
    case 'job:completed':
      return `${when} ${chalk.green('✔')} ${label} completed in ${formatDuration(job.durationMs ?? 0)}`;
    case 'job:retrying':
      return `${when} ${chalk.yellow('↻')} ${label} retrying (${job.retryCount}/${job.maxRetries})`;
    case 'job:failed':
      return `${when} ${chalk.red('✖')} ${label} failed: ${job.errorMessage ?? 'unknown error'}`;
    case 'job:cancelled':
      return `${when} ${chalk.dim('○')} ${label} cancelled`;
  }
}

const LIFECYCLE_EVENTS: readonly LifecycleEvent[] = [
  'job:started',
  'job:completed',
  'job:retrying',
  'job:failed',
  'job:cancelled',
];

export const watchCommand = new Command('watch')
  .description('Watch the managed directories and sync changes automatically')
  .option('-c, --config-file <path>', 'Path to the configuration file')
  .option('-p, --path <dir...>', 'Directories to watch instead of the defaults')
  .option('--json', 'Print status as JSON lines')
  .option('-v, --verbose', 'Show verbose output')
  .action(async (options: WatchCommandOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const { coordinator, scheduler } = createSyncStack(config);

      for (const event of LIFECYCLE_EVENTS) {
        scheduler.on(event, (job: SyncJob) => {
          if (options.json) {
            console.log(JSON.stringify({ event, job, status: coordinator.getStatus() }, jsonReplacer));
          }
          else {
            console.log(formatLifecycleLine(event, job));
          }
        });
      }

      await coordinator.start(options.path);

      if (!options.json) {
        logger.info(chalk.green('Watch mode started'));
        logger.info(chalk.dim(`Root: ${config.rootDir}`));
        logger.info(chalk.dim('Press Ctrl+C to stop watching'));
      }

      await new Promise<void>((resolve) => {
        const shutdown = (signal: NodeJS.Signals) => {
          process.removeListener('SIGINT', shutdown);
          process.removeListener('SIGTERM', shutdown);
          if (!options.json && signal === 'SIGINT') {
            logger.info('Stopping watch mode...');
          }
          resolve();
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      });

      await coordinator.stop();
    }
    catch (error) {
      handleError(error, options.verbose);
      process.exitCode = 1;
    }
  });
