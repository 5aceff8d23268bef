import process from 'node:process';
import { Command } from 'commander';
import ora from 'ora';
import { MirrorIntegrationManager } from '../integrations/mirror-manager.js';
import { JobType, SyncJobStatus } from '../sync/job.js';
import { handleError } from '../utils/errors.js';
import { jsonReplacer } from '../utils/formatters.js';
import { getVersion } from '../utils/package-info.js';
import { formatJobResult, loadCommandConfig, resultHasFailures, runOneShotJob } from './shared.js';

interface HealthCommandOptions {
  configFile?: string;
  adapter?: string;
  json?: boolean;
  verbose?: boolean;
}

export const healthCommand = new Command('health')
  .description('Check the health of the configured adapters')
  .option('-c, --config-file <path>', 'Path to the configuration file')
  .option('-a, --adapter <name>', 'Check a single adapter')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Show verbose output')
  .action(async (options: HealthCommandOptions) => {
    const spinner = ora();

    try {
      const config = await loadCommandConfig(options);
      const integrations = new MirrorIntegrationManager({ rootDir: config.rootDir, adapters: config.adapters });

      if (!options.json) {
        spinner.start('Checking adapters...');
      }

      const job = await runOneShotJob(integrations, config, JobType.HEALTH_CHECK, {
        targetAdapter: options.adapter,
      });

      if (options.json) {
        console.log(JSON.stringify({ version: getVersion(), job }, jsonReplacer, 2));
      }
      else if (job.status === SyncJobStatus.COMPLETED && job.result) {
        spinner.stop();
        console.log(`agentsync v${getVersion()}`);
        const lines = formatJobResult(job.result);
        if (lines.length === 0) {
          console.log('  No adapters configured');
        }
        lines.forEach(line => console.log(line));
      }
      else {
        spinner.fail(`Health check ${job.status}: ${job.errorMessage ?? 'unknown error'}`);
      }

      if (job.status !== SyncJobStatus.COMPLETED || !job.result || resultHasFailures(job.result)) {
        process.exitCode = 1;
      }
    }
    catch (error) {
      spinner.stop();
      handleError(error, options.verbose);
      process.exitCode = 1;
    }
  });
