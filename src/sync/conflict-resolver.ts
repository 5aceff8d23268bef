import type { AgentFileState, IntegrationManager } from '../integrations/types.js';
import { randomUUID } from 'node:crypto';
import { agentName } from '../integrations/mirror-manager.js';
import { logger } from '../utils/logger.js';

const log = logger.scoped('conflicts');

export enum ConflictType {
  MISSING_IN_TARGET = 'missing_in_target',
  STALE_TARGET = 'stale_target',
  DIVERGED_TARGET = 'diverged_target',
  ORPHANED_IN_TARGET = 'orphaned_in_target',
}

export enum ConflictSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

const SEVERITY_ORDER: Readonly<Record<ConflictSeverity, number>> = {
  [ConflictSeverity.LOW]: 1,
  [ConflictSeverity.MEDIUM]: 2,
  [ConflictSeverity.HIGH]: 3,
  [ConflictSeverity.CRITICAL]: 4,
};

export enum ConflictResolution {
  /** Copy the managed agent over the adapter's copy. */
  USE_SOURCE = 'use_source',
  KEEP_TARGET = 'keep_target',
  SKIP = 'skip',
}

export interface AgentConflict {
  id: string;
  type: ConflictType;
  severity: ConflictSeverity;
  adapter: string;
  /** Path relative to the agents directory. */
  file: string;
  description: string;
  sourceHash: string | null;
  targetHash: string | null;
  /** `null` when only a person can decide. */
  suggestedResolution: ConflictResolution | null;
  resolved: boolean;
  resolution: ConflictResolution | null;
  resolvedBy: string | null;
  detectedAt: string;
  resolvedAt: string | null;
}

export interface ConflictFilter {
  severity?: ConflictSeverity;
  type?: ConflictType;
  unresolvedOnly?: boolean;
}

export interface ConflictStats {
  total: number;
  resolved: number;
  unresolved: number;
  resolutionRate: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
  resolutions: number;
}

interface ResolutionRecord {
  conflictId: string;
  resolution: ConflictResolution;
  resolvedBy: string;
  resolvedAt: string;
}

type Classification = Pick<AgentConflict, 'type' | 'severity' | 'description' | 'suggestedResolution'>;

export function isConflictSeverity(value: unknown): value is ConflictSeverity {
  return Object.values(ConflictSeverity).some(severity => severity === value);
}

/**
 * Decide whether the two sides of an agent file disagree, and how badly.
 * A target edited after its source is a divergence nobody can settle
 * automatically; an older target is just stale.
 */
export function classifyAgentState(state: AgentFileState): Classification | null {
  if (state.sourceHash === state.targetHash) {
    return null;
  }

  if (state.targetHash === null) {
    return {
      type: ConflictType.MISSING_IN_TARGET,
      severity: ConflictSeverity.LOW,
      description: 'Agent is missing from the adapter directory',
      suggestedResolution: ConflictResolution.USE_SOURCE,
    };
  }

  if (state.sourceHash === null) {
    return {
      type: ConflictType.ORPHANED_IN_TARGET,
      severity: ConflictSeverity.LOW,
      description: 'Agent exists only in the adapter directory',
      suggestedResolution: ConflictResolution.KEEP_TARGET,
    };
  }

  const editedInTarget = state.sourceModified !== null
    && state.targetModified !== null
    && state.targetModified.getTime() > state.sourceModified.getTime();

  if (editedInTarget) {
    return {
      type: ConflictType.DIVERGED_TARGET,
      severity: ConflictSeverity.HIGH,
      description: 'Adapter copy was edited after the managed agent',
      suggestedResolution: null,
    };
  }

  return {
    type: ConflictType.STALE_TARGET,
    severity: ConflictSeverity.MEDIUM,
    description: 'Adapter copy is older than the managed agent',
    suggestedResolution: ConflictResolution.USE_SOURCE,
  };
}

/**
 * Finds agent files whose adapter copy disagrees with the managed root and
 * settles the ones that have a safe resolution.
 */
export class ConflictResolver {
  private conflicts: AgentConflict[] = [];
  private readonly history: ResolutionRecord[] = [];

  constructor(private readonly integrations: IntegrationManager) {}

  /**
   * Inspect the given adapters (all by default). A new scan replaces the
   * open conflicts previously found for the same adapter.
   */
  async detectConflicts(adapterNames?: string[]): Promise<AgentConflict[]> {
    const detected: AgentConflict[] = [];

    for (const name of adapterNames ?? this.integrations.listAdapters()) {
      const adapter = this.integrations.getAdapter(name);
      if (!adapter?.inspectAgents) {
        log.debug(`${name}: adapter does not support inspection`);
        continue;
      }

      const states = await adapter.inspectAgents();
      this.conflicts = this.conflicts.filter(conflict => conflict.resolved || conflict.adapter !== name);

      for (const state of states) {
        const classification = classifyAgentState(state);
        if (!classification) {
          continue;
        }
        detected.push({
          id: randomUUID(),
          adapter: name,
          file: state.file,
          sourceHash: state.sourceHash,
          targetHash: state.targetHash,
          ...classification,
          resolved: false,
          resolution: null,
          resolvedBy: null,
          detectedAt: new Date().toISOString(),
          resolvedAt: null,
        });
      }
    }

    this.conflicts.push(...detected);
    if (detected.length > 0) {
      log.info(`Detected ${detected.length} conflict(s)`);
    }
    return detected.map(conflict => ({ ...conflict }));
  }

  getConflicts(filter: ConflictFilter = {}): AgentConflict[] {
    const unresolvedOnly = filter.unresolvedOnly ?? true;
    return this.conflicts
      .filter(conflict => !unresolvedOnly || !conflict.resolved)
      .filter(conflict => filter.severity === undefined || conflict.severity === filter.severity)
      .filter(conflict => filter.type === undefined || conflict.type === filter.type)
      .map(conflict => ({ ...conflict }));
  }

  /**
   * Apply a resolution to an open conflict. Returns `false` for unknown or
   * already resolved conflicts and when the resolution could not be applied.
   */
  async resolveConflict(conflictId: string, resolution: ConflictResolution, resolvedBy = 'user'): Promise<boolean> {
    const conflict = this.conflicts.find(candidate => candidate.id === conflictId && !candidate.resolved);
    if (!conflict) {
      return false;
    }

    if (resolution === ConflictResolution.USE_SOURCE && !await this.copySource(conflict)) {
      return false;
    }

    const resolvedAt = new Date().toISOString();
    conflict.resolved = true;
    conflict.resolution = resolution;
    conflict.resolvedBy = resolvedBy;
    conflict.resolvedAt = resolvedAt;
    this.history.push({ conflictId, resolution, resolvedBy, resolvedAt });
    log.debug(`${conflict.adapter}/${conflict.file}: ${resolution}`);
    return true;
  }

  /**
   * Resolve every open conflict up to `maxSeverity` that has a suggested
   * resolution. Returns how many were resolved.
   */
  async autoResolve(maxSeverity: ConflictSeverity = ConflictSeverity.MEDIUM): Promise<number> {
    let resolved = 0;
    for (const conflict of this.getConflicts()) {
      if (SEVERITY_ORDER[conflict.severity] > SEVERITY_ORDER[maxSeverity] || !conflict.suggestedResolution) {
        continue;
      }
      if (await this.resolveConflict(conflict.id, conflict.suggestedResolution, 'auto')) {
        resolved++;
      }
    }
    return resolved;
  }

  getStats(): ConflictStats {
    const total = this.conflicts.length;
    const resolved = this.conflicts.filter(conflict => conflict.resolved).length;

    const bySeverity: Record<string, number> = {};
    for (const severity of Object.values(ConflictSeverity)) {
      bySeverity[severity] = this.conflicts.filter(conflict => conflict.severity === severity).length;
    }
    const byType: Record<string, number> = {};
    for (const type of Object.values(ConflictType)) {
      byType[type] = this.conflicts.filter(conflict => conflict.type === type).length;
    }

    return {
      total,
      resolved,
      unresolved: total - resolved,
      resolutionRate: resolved / Math.max(total, 1),
      bySeverity,
      byType,
      resolutions: this.history.length,
    };
  }

  clearResolved(): number {
    const before = this.conflicts.length;
    this.conflicts = this.conflicts.filter(conflict => !conflict.resolved);
    return before - this.conflicts.length;
  }

  private async copySource(conflict: AgentConflict): Promise<boolean> {
    const adapter = this.integrations.getAdapter(conflict.adapter);
    if (conflict.sourceHash === null || !adapter) {
      log.warn(`${conflict.adapter}/${conflict.file}: no managed agent to copy`);
      return false;
    }

    const result = await adapter.syncAgents([agentName(conflict.file)]);
    if (result.status === 'error' || result.status === 'partial') {
      log.warn(`${conflict.adapter}/${conflict.file}: ${result.errors.join('; ')}`);
      return false;
    }
    return true;
  }
}
