import chalk from 'chalk';

export interface ErrorSuggestion {
  code: string;
  message: string;
  suggestions: string[];
  documentation?: string;
}

// Error code ranges:
// AS-001 to AS-099: General errors
// AS-100 to AS-199: Watcher errors
// AS-200 to AS-299: Job errors
// AS-300 to AS-399: Scheduler errors
// AS-700 to AS-799: Configuration errors
// AS-1000 to AS-1099: CLI errors

export const ERROR_CODES = {
  UNKNOWN: 'AS-001',
  WATCH_IO: 'AS-101',
  CALLBACK: 'AS-102',
  JOB_TIMEOUT: 'AS-201',
  JOB_EXECUTION: 'AS-202',
  SCHEDULER_NOT_RUNNING: 'AS-301',
  CONFIG_NOT_FOUND: 'AS-701',
  CONFIG_PARSE: 'AS-702',
  CONFIG_INVALID: 'AS-703',
  INVALID_OPTION: 'AS-1001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

const ERROR_SUGGESTIONS: Map<string, ErrorSuggestion> = new Map([
  [ERROR_CODES.WATCH_IO, {
    code: ERROR_CODES.WATCH_IO,
    message: 'Failed to watch path',
    suggestions: [
      'Check that the directory exists and is readable',
      'Raise the inotify watch limit (fs.inotify.max_user_watches) on Linux',
      'Enable polling with "watcher.usePolling" on network file systems',
    ],
  }],
  [ERROR_CODES.JOB_TIMEOUT, {
    code: ERROR_CODES.JOB_TIMEOUT,
    message: 'Sync job timed out',
    suggestions: [
      'Increase "scheduler.jobTimeoutMs" in your configuration',
      'Check that the adapter target directories are reachable',
    ],
  }],
  [ERROR_CODES.JOB_EXECUTION, {
    code: ERROR_CODES.JOB_EXECUTION,
    message: 'Sync job failed',
    suggestions: [
      'Run "agentsync health" to check adapter status',
      'Re-run with --verbose for the full error',
    ],
  }],
  [ERROR_CODES.SCHEDULER_NOT_RUNNING, {
    code: ERROR_CODES.SCHEDULER_NOT_RUNNING,
    message: 'Scheduler is not running',
    suggestions: [
      'Call start() before submitting or awaiting jobs',
    ],
  }],
  [ERROR_CODES.CONFIG_PARSE, {
    code: ERROR_CODES.CONFIG_PARSE,
    message: 'Configuration file could not be parsed',
    suggestions: [
      'Check the JSON syntax in agentsync.config.json',
    ],
  }],
  [ERROR_CODES.CONFIG_INVALID, {
    code: ERROR_CODES.CONFIG_INVALID,
    message: 'Invalid configuration',
    suggestions: [
      'Ensure all adapters have a name and a targetDir',
      'Intervals and timeouts are expressed in milliseconds',
    ],
  }],
]);

export class AgentSyncError extends Error {
  public readonly code: string;
  public readonly suggestions: readonly string[];
  public readonly documentation?: string;
  public readonly originalError?: Error;

  constructor(code: string, message?: string, originalError?: Error) {
    const errorSuggestion = ERROR_SUGGESTIONS.get(code);
    const errorMessage = message || errorSuggestion?.message || 'Unknown error';

    super(`${code}: ${errorMessage}`);

    this.name = 'AgentSyncError';
    this.code = code;
    this.suggestions = Object.freeze(errorSuggestion?.suggestions ?? []);
    this.documentation = errorSuggestion?.documentation;
    this.originalError = originalError;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public format(verbose = false): string {
    let output = chalk.red(`Error ${this.message}`);

    if (this.suggestions.length > 0) {
      output += `\n\n${chalk.yellow('Suggestions:')}`;
      this.suggestions.forEach((suggestion) => {
        output += `\n  • ${chalk.gray(suggestion)}`;
      });
    }

    if (this.documentation) {
      output += `\n\n${chalk.blue('Documentation: ')}${chalk.gray(this.documentation)}`;
    }

    if (verbose) {
      const stack = this.originalError?.stack ?? this.stack;
      if (stack) {
        output += `\n\n${chalk.gray('Stack trace:')}`;
        output += `\n${chalk.gray(stack)}`;
      }
    }

    return output;
  }
}

export class WatchIOError extends AgentSyncError {
  constructor(message: string, originalError?: Error) {
    super(ERROR_CODES.WATCH_IO, message, originalError);
    this.name = 'WatchIOError';
  }
}

export class CallbackError extends AgentSyncError {
  constructor(message: string, originalError?: Error) {
    super(ERROR_CODES.CALLBACK, message, originalError);
    this.name = 'CallbackError';
  }
}

export class JobTimeoutError extends AgentSyncError {
  public readonly timeoutMs: number;

  constructor(jobId: string, timeoutMs: number) {
    super(ERROR_CODES.JOB_TIMEOUT, `Job ${jobId} timed out after ${timeoutMs}ms`);
    this.name = 'JobTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class JobExecutionError extends AgentSyncError {
  constructor(message: string, originalError?: Error) {
    super(ERROR_CODES.JOB_EXECUTION, message, originalError);
    this.name = 'JobExecutionError';
  }
}

export class SchedulerNotRunningError extends AgentSyncError {
  constructor(operation: string) {
    super(ERROR_CODES.SCHEDULER_NOT_RUNNING, `Cannot ${operation}: scheduler is not running`);
    this.name = 'SchedulerNotRunningError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Global error handler for the CLI
 */
export function handleError(error: unknown, verbose = false): void {
  if (error instanceof AgentSyncError) {
    console.error(error.format(verbose));
  }
  else if (error instanceof Error) {
    let code: string = ERROR_CODES.UNKNOWN;

    if (error.message.includes('EACCES') || error.message.includes('ENOSPC')) {
      code = ERROR_CODES.WATCH_IO;
    }

    const wrapped = new AgentSyncError(code, error.message, error);
    console.error(wrapped.format(verbose));
  }
  else {
    console.error(chalk.red('An unexpected error occurred'));
    if (verbose) {
      console.error(error);
    }
  }
}
