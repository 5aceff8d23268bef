export type SyncStatus = 'success' | 'partial' | 'skipped' | 'error';

export interface SyncResult {
  status: SyncStatus;
  synced: number;
  errors: string[];
  reason?: string;
}

export interface ValidationResult {
  errors: string[];
  needsSync: boolean;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'error';

export interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  details?: Record<string, unknown>;
  error?: string;
}

/**
 * One agent file as seen from the managed root (source) and from an adapter's
 * directory (target). A `null` hash means the side has no such file.
 */
export interface AgentFileState {
  /** Path relative to the agents directory. */
  file: string;
  sourceHash: string | null;
  targetHash: string | null;
  sourceModified: Date | null;
  targetModified: Date | null;
}

/**
 * An external tool the integration manager syncs agents into.
 */
export interface IntegrationAdapter {
  readonly name: string;
  /** Sync the named agents; an empty list means every agent. */
  syncAgents: (agents: string[]) => Promise<SyncResult>;
  healthCheck: () => Promise<HealthResult>;
  /** Tool-specific directories worth watching for changes. */
  getWatchPaths?: () => Promise<string[]>;
  /** Both sides of every agent file known to either side. */
  inspectAgents?: () => Promise<AgentFileState[]>;
}

/**
 * Collaborator that performs the actual sync, validation and health checks
 * against adapters. Adapter name lists default to every adapter.
 */
export interface IntegrationManager {
  initialize: () => Promise<boolean>;
  syncAgents: (agents: string[], adapterNames?: string[]) => Promise<Record<string, SyncResult>>;
  validateConfigurations: (adapterNames?: string[]) => Promise<Record<string, ValidationResult>>;
  healthCheck: (adapterNames?: string[]) => Promise<Record<string, HealthResult>>;
  listAdapters: () => string[];
  getAdapter: (name: string) => IntegrationAdapter | null;
}
