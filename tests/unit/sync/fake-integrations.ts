import type {
  AgentFileState,
  HealthResult,
  IntegrationAdapter,
  IntegrationManager,
  SyncResult,
  ValidationResult,
} from '../../../src/integrations/types.js';

type SyncHandler = (agents: string[], adapterNames?: string[]) => Promise<Record<string, SyncResult>>;

const TIMESTAMP = '2024-01-01T00:00:00.000Z';

/**
 * In-memory integration manager that records every call.
 */
export class FakeIntegrationManager implements IntegrationManager {
  readonly calls: string[] = [];
  initializeCalls = 0;
  validation: Record<string, ValidationResult> = {};
  readonly agentStates = new Map<string, AgentFileState[]>();
  onSync: SyncHandler;
  private readonly adapters: Map<string, IntegrationAdapter>;

  constructor(adapterNames: string[] = ['cursor', 'claude']) {
    this.adapters = new Map(adapterNames.map(name => [name, this.createAdapter(name)]));
    this.onSync = async (_agents, names) => Object.fromEntries(
      (names ?? this.listAdapters()).map(name => [name, { status: 'success', synced: 1, errors: [] }]),
    );
  }

  async initialize(): Promise<boolean> {
    this.initializeCalls++;
    return true;
  }

  syncAgents(agents: string[], adapterNames?: string[]): Promise<Record<string, SyncResult>> {
    this.calls.push(`syncAgents:${adapterNames?.join(',') ?? '*'}`);
    return this.onSync(agents, adapterNames);
  }

  async validateConfigurations(adapterNames?: string[]): Promise<Record<string, ValidationResult>> {
    this.calls.push(`validate:${adapterNames?.join(',') ?? '*'}`);
    return this.validation;
  }

  async healthCheck(adapterNames?: string[]): Promise<Record<string, HealthResult>> {
    this.calls.push(`health:${adapterNames?.join(',') ?? '*'}`);
    return Object.fromEntries(
      (adapterNames ?? this.listAdapters()).map(name => [name, { status: 'healthy', timestamp: TIMESTAMP }]),
    );
  }

  listAdapters(): string[] {
    return Array.from(this.adapters.keys());
  }

  getAdapter(name: string): IntegrationAdapter | null {
    return this.adapters.get(name) ?? null;
  }

  private createAdapter(name: string): IntegrationAdapter {
    return {
      name,
      syncAgents: async (agents) => {
        this.calls.push(agents.length > 0 ? `adapter.syncAgents:${name}:${agents.join(',')}` : `adapter.syncAgents:${name}`);
        return { status: 'success', synced: 2, errors: [] };
      },
      inspectAgents: async () => this.agentStates.get(name) ?? [],
      healthCheck: async () => ({ status: 'healthy', timestamp: TIMESTAMP }),
    };
  }
}
