import { z } from 'zod';
import { AgentSyncError, ERROR_CODES } from '../utils/errors.js';
import { MAX_TIMER_DELAY_MS } from '../utils/timing.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const durationMs = z.number().int().min(0).max(MAX_TIMER_DELAY_MS);
const positiveDurationMs = z.number().int().min(1).max(MAX_TIMER_DELAY_MS);

const patternListSchema = z.array(z.string().min(1));

// Partial per-target overrides merged over the built-in pattern table
export const watchPatternsSchema = z.object({
  config: patternListSchema.optional(),
  agents: patternListSchema.optional(),
  tools: patternListSchema.optional(),
  templates: patternListSchema.optional(),
  integrations: patternListSchema.optional(),
}).strict();

export const watcherConfigSchema = z.object({
  debounceMs: durationMs.default(1000),
  usePolling: z.boolean().default(false),
  pollIntervalMs: z.number().int().min(10).max(MAX_TIMER_DELAY_MS).default(1000),
  patterns: watchPatternsSchema.default({}),
});

export const coordinatorConfigSchema = z.object({
  enabled: z.boolean().default(true),
  syncDebounceMs: durationMs.default(2000),
  fullSyncIntervalMs: durationMs.default(300_000),
});

export const schedulerConfigSchema = z.object({
  maxConcurrentJobs: z.number().int().min(1).max(32).default(3),
  jobTimeoutMs: positiveDurationMs.default(300_000),
  healthCheckIntervalMs: durationMs.default(60_000),
  pollIntervalMs: positiveDurationMs.default(1000),
  backoffFactor: z.number().min(1).default(1),
  maxCompletedHistory: z.number().int().min(1).default(100),
  maxFailedHistory: z.number().int().min(1).default(50),
});

export const adapterConfigSchema = z.object({
  name: z.string().min(1, 'Adapter name is required'),
  targetDir: z.string().min(1, 'Adapter targetDir is required'),
  enabled: z.boolean().default(true),
});

// Configuration file schema; every section is optional and defaulted
export const configFileSchema = z.object({
  rootDir: z.string().min(1).default('~/.agentsync'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  watcher: watcherConfigSchema.default({}),
  coordinator: coordinatorConfigSchema.default({}),
  scheduler: schedulerConfigSchema.default({}),
  adapters: z.array(adapterConfigSchema).default([]),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.adapters.forEach((adapter, index) => {
    if (seen.has(adapter.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate adapter name: ${adapter.name}`,
        path: ['adapters', index, 'name'],
      });
    }
    seen.add(adapter.name);
  });
});

export type LogLevelSetting = (typeof LOG_LEVELS)[number];
export type WatcherConfig = z.infer<typeof watcherConfigSchema>;
export type CoordinatorConfig = z.infer<typeof coordinatorConfigSchema>;
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type AdapterConfig = z.infer<typeof adapterConfigSchema>;
export type AgentSyncConfig = z.infer<typeof configFileSchema>;

export class ConfigError extends AgentSyncError {
  public readonly details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(code, message, details instanceof Error ? details : undefined);
    this.name = 'ConfigError';
    this.details = details;
  }
}

export function createConfigError(code: string, message: string, details?: unknown): ConfigError {
  return new ConfigError(code, message, details);
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export const CONFIG_ERROR_CODES = {
  FILE_NOT_FOUND: ERROR_CODES.CONFIG_NOT_FOUND,
  PARSE_ERROR: ERROR_CODES.CONFIG_PARSE,
  VALIDATION_ERROR: ERROR_CODES.CONFIG_INVALID,
} as const;
