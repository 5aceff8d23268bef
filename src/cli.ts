#!/usr/bin/env node

import process from 'node:process';
import { Command } from 'commander';
import { healthCommand } from './commands/health.js';
import { syncCommand } from './commands/sync.js';
import { watchCommand } from './commands/watch.js';
import { handleError } from './utils/errors.js';
import { getPackageInfo } from './utils/package-info.js';

const packageInfo = getPackageInfo();

const program = new Command();

program
  .name(packageInfo.name)
  .description(packageInfo.description || 'Keep AI agent definitions in sync across tools')
  .version(packageInfo.version);

program.addCommand(healthCommand);
program.addCommand(syncCommand);
program.addCommand(watchCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error);
  process.exitCode = 1;
});
