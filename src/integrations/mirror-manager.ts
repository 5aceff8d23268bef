import type { AdapterConfig } from '../config/schemas.js';
import type {
  AgentFileState,
  HealthResult,
  IntegrationAdapter,
  IntegrationManager,
  SyncResult,
  ValidationResult,
} from './types.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import pLimit from 'p-limit';
import { errorMessage, isErrnoException } from '../utils/errors.js';
import { calculateFileHash } from '../utils/hash.js';
import { logger } from '../utils/logger.js';

const log = logger.scoped('integrations');

const AGENT_GLOB = '**/*.md';
const COPY_CONCURRENCY = 4;

export interface MirrorManagerOptions {
  /** Managed root; agents are read from `<rootDir>/agents`. */
  rootDir: string;
  adapters: AdapterConfig[];
}

async function modifiedAt(filePath: string): Promise<Date | null> {
  try {
    return (await fs.promises.stat(filePath)).mtime;
  }
  catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function agentName(relativePath: string): string {
  return relativePath.replace(/\.md$/i, '').split(path.sep).join('/');
}

/**
 * Adapter that keeps a copy of every agent markdown file in a tool's
 * directory, preserving the layout under `agents/`.
 */
export class MirrorAdapter implements IntegrationAdapter {
  constructor(
    readonly name: string,
    readonly sourceDir: string,
    readonly targetDir: string,
  ) {}

  /**
   * Agent files relative to the source directory, optionally limited to the
   * given agent names (path without the `.md` extension).
   */
  async listAgentFiles(agents: string[] = []): Promise<string[]> {
    if (!fs.existsSync(this.sourceDir)) {
      return [];
    }
    const files = await glob(AGENT_GLOB, { cwd: this.sourceDir, nodir: true });
    const wanted = new Set(agents);
    return files
      .filter(file => wanted.size === 0 || wanted.has(agentName(file)))
      .sort();
  }

  async syncAgents(agents: string[]): Promise<SyncResult> {
    const files = await this.listAgentFiles(agents);
    if (files.length === 0) {
      return { status: 'skipped', synced: 0, errors: [], reason: 'No agent files to sync' };
    }

    await fs.promises.mkdir(this.targetDir, { recursive: true });

    const limit = pLimit(COPY_CONCURRENCY);
    const errors: string[] = [];
    const copied = await Promise.all(files.map(file => limit(async () => {
      try {
        return await this.copyIfChanged(file);
      }
      catch (error) {
        errors.push(`${file}: ${errorMessage(error)}`);
        return false;
      }
    })));

    const synced = copied.filter(Boolean).length;
    log.debug(`${this.name}: ${synced} of ${files.length} agent file(s) updated`);

    if (errors.length === 0) {
      return { status: 'success', synced, errors };
    }
    return { status: errors.length === files.length ? 'error' : 'partial', synced, errors };
  }

  async validate(): Promise<ValidationResult> {
    if (!fs.existsSync(this.targetDir)) {
      return { errors: [`Target directory does not exist: ${this.targetDir}`], needsSync: true };
    }

    for (const file of await this.listAgentFiles()) {
      const [source, target] = await Promise.all([
        calculateFileHash(path.join(this.sourceDir, file)),
        calculateFileHash(path.join(this.targetDir, file)),
      ]);
      if (source !== target) {
        return { errors: [], needsSync: true };
      }
    }
    return { errors: [], needsSync: false };
  }

  async healthCheck(): Promise<HealthResult> {
    const timestamp = new Date().toISOString();
    try {
      await fs.promises.access(this.targetDir, fs.constants.W_OK);
      return { status: 'healthy', timestamp, details: { targetDir: this.targetDir } };
    }
    catch (error) {
      return {
        status: 'unhealthy',
        timestamp,
        details: { targetDir: this.targetDir },
        error: errorMessage(error),
      };
    }
  }

  async getWatchPaths(): Promise<string[]> {
    return [this.targetDir];
  }

  async inspectAgents(): Promise<AgentFileState[]> {
    const targetFiles = fs.existsSync(this.targetDir)
      ? await glob(AGENT_GLOB, { cwd: this.targetDir, nodir: true })
      : [];
    const files = Array.from(new Set([...await this.listAgentFiles(), ...targetFiles])).sort();

    return Promise.all(files.map(async (file) => {
      const source = path.join(this.sourceDir, file);
      const target = path.join(this.targetDir, file);
      const [sourceHash, targetHash, sourceModified, targetModified] = await Promise.all([
        calculateFileHash(source),
        calculateFileHash(target),
        modifiedAt(source),
        modifiedAt(target),
      ]);
      return { file, sourceHash, targetHash, sourceModified, targetModified };
    }));
  }

  private async copyIfChanged(file: string): Promise<boolean> {
    const source = path.join(this.sourceDir, file);
    const target = path.join(this.targetDir, file);

    const [sourceHash, targetHash] = await Promise.all([
      calculateFileHash(source),
      calculateFileHash(target),
    ]);
    if (sourceHash === null || sourceHash === targetHash) {
      return false;
    }

    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.copyFile(source, target);
    return true;
  }
}

/**
 * Integration manager over a fixed set of mirror adapters built from
 * configuration. Disabled adapters are left out entirely.
 */
export class MirrorIntegrationManager implements IntegrationManager {
  private readonly adapters = new Map<string, MirrorAdapter>();
  private readonly agentsDir: string;

  constructor(options: MirrorManagerOptions) {
    this.agentsDir = path.join(options.rootDir, 'agents');
    for (const adapter of options.adapters) {
      if (adapter.enabled) {
        this.adapters.set(adapter.name, new MirrorAdapter(adapter.name, this.agentsDir, adapter.targetDir));
      }
    }
  }

  async initialize(): Promise<boolean> {
    if (!fs.existsSync(this.agentsDir)) {
      log.warn(`Agents directory not found: ${this.agentsDir}`);
      return false;
    }
    log.debug(`Initialized ${this.adapters.size} adapter(s)`);
    return true;
  }

  listAdapters(): string[] {
    return Array.from(this.adapters.keys());
  }

  getAdapter(name: string): MirrorAdapter | null {
    return this.adapters.get(name) ?? null;
  }

  async syncAgents(agents: string[], adapterNames?: string[]): Promise<Record<string, SyncResult>> {
    const results: Record<string, SyncResult> = {};
    for (const name of this.select(adapterNames)) {
      const adapter = this.adapters.get(name);
      if (!adapter) {
        results[name] = { status: 'error', synced: 0, errors: [`Adapter not found: ${name}`] };
        continue;
      }
      try {
        results[name] = await adapter.syncAgents(agents);
      }
      catch (error) {
        log.error(`Sync failed for ${name}: ${errorMessage(error)}`);
        results[name] = { status: 'error', synced: 0, errors: [errorMessage(error)] };
      }
    }
    return results;
  }

  async validateConfigurations(adapterNames?: string[]): Promise<Record<string, ValidationResult>> {
    const results: Record<string, ValidationResult> = {};
    for (const name of this.select(adapterNames)) {
      const adapter = this.adapters.get(name);
      if (!adapter) {
        results[name] = { errors: [`Adapter not found: ${name}`], needsSync: false };
        continue;
      }
      try {
        results[name] = await adapter.validate();
      }
      catch (error) {
        results[name] = { errors: [errorMessage(error)], needsSync: false };
      }
    }
    return results;
  }

  async healthCheck(adapterNames?: string[]): Promise<Record<string, HealthResult>> {
    const results: Record<string, HealthResult> = {};
    for (const name of this.select(adapterNames)) {
      const adapter = this.adapters.get(name);
      if (!adapter) {
        results[name] = { status: 'error', timestamp: new Date().toISOString(), error: `Adapter not found: ${name}` };
        continue;
      }
      results[name] = await adapter.healthCheck();
    }
    return results;
  }

  private select(adapterNames?: string[]): string[] {
    return adapterNames ?? this.listAdapters();
  }
}
