import type { AgentSyncConfig } from './schemas.js';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  CONFIG_ERROR_CODES,
  configFileSchema,
  createConfigError,
  formatZodIssues,
  LOG_LEVELS,
} from './schemas.js';

export const CONFIG_FILE_NAME = 'agentsync.config.json';

export interface ConfigManagerOptions {
  /** Candidate files, first readable one wins. */
  searchPaths?: string[];
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export function expandHome(value: string, homeDir: string = os.homedir()): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/') || value.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private cachedConfig: AgentSyncConfig | null = null;
  private readonly configPaths: string[];
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.env = options.env ?? process.env;
    this.configPaths = options.searchPaths ?? [
      path.join(process.cwd(), CONFIG_FILE_NAME), // Project config
      path.join(this.homeDir, '.config', 'agentsync', 'config.json'), // User config
    ];
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Load configuration: file (or defaults) < environment variables.
   * An explicit `configPath` must exist.
   */
  async loadConfig(configPath?: string): Promise<AgentSyncConfig> {
    this.cachedConfig = null;

    let source: string | null;
    if (configPath) {
      source = path.resolve(expandHome(configPath, this.homeDir));
      if (!fs.existsSync(source)) {
        throw createConfigError(
          CONFIG_ERROR_CODES.FILE_NOT_FOUND,
          `Configuration file not found: ${source}`,
        );
      }
    }
    else {
      source = await this.findConfigFile();
    }

    const fileConfig = source ? await this.loadConfigFile(source) : this.validate({}, 'defaults');
    const withEnv = this.validate(this.applyEnvironmentVariables(fileConfig), 'environment');
    const config = this.expandPaths(withEnv);

    this.cachedConfig = config;
    logger.debug(source ? `Configuration loaded from ${source}` : 'No configuration file found, using defaults');
    return config;
  }

  async getConfig(): Promise<AgentSyncConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    return this.loadConfig();
  }

  private async findConfigFile(): Promise<string | null> {
    for (const configPath of this.configPaths) {
      try {
        await fs.promises.access(configPath, fs.constants.R_OK);
        return configPath;
      }
      catch {
        // Not present or unreadable, try the next one
      }
    }
    return null;
  }

  private async loadConfigFile(configPath: string): Promise<AgentSyncConfig> {
    const content = await fs.promises.readFile(configPath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    }
    catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw createConfigError(
        CONFIG_ERROR_CODES.PARSE_ERROR,
        `Failed to parse configuration file ${configPath}: ${reason}`,
        error,
      );
    }

    return this.validate(raw, configPath);
  }

  private validate(raw: unknown, source: string): AgentSyncConfig {
    try {
      return configFileSchema.parse(raw);
    }
    catch (error) {
      if (error instanceof z.ZodError) {
        throw createConfigError(
          CONFIG_ERROR_CODES.VALIDATION_ERROR,
          `Invalid configuration (${source}): ${formatZodIssues(error)}`,
          error,
        );
      }
      throw error;
    }
  }

  private applyEnvironmentVariables(config: AgentSyncConfig): AgentSyncConfig {
    const env = this.env;

    return {
      ...config,
      rootDir: env.AGENTSYNC_ROOT || config.rootDir,
      logLevel: parseLogLevelSetting(env.AGENTSYNC_LOG_LEVEL) ?? config.logLevel,
      watcher: {
        ...config.watcher,
        debounceMs: parseEnvNumber(env.AGENTSYNC_DEBOUNCE_MS) ?? config.watcher.debounceMs,
      },
      coordinator: {
        ...config.coordinator,
        fullSyncIntervalMs: parseEnvNumber(env.AGENTSYNC_FULL_SYNC_INTERVAL_MS)
          ?? config.coordinator.fullSyncIntervalMs,
      },
    };
  }

  private expandPaths(config: AgentSyncConfig): AgentSyncConfig {
    return {
      ...config,
      rootDir: path.resolve(expandHome(config.rootDir, this.homeDir)),
      adapters: config.adapters.map(adapter => ({
        ...adapter,
        targetDir: path.resolve(expandHome(adapter.targetDir, this.homeDir)),
      })),
    };
  }
}

// Non-numeric values come back as NaN so validation reports them
function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function parseLogLevelSetting(value: string | undefined): AgentSyncConfig['logLevel'] | undefined {
  const parsed = z.enum(LOG_LEVELS).safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : undefined;
}
