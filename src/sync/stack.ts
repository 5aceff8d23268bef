import type { AgentSyncConfig } from '../config/schemas.js';
import type { IntegrationManager } from '../integrations/types.js';
import * as path from 'node:path';
import { MirrorIntegrationManager } from '../integrations/mirror-manager.js';
import { FileWatcher } from '../watch/file-watcher.js';
import { AutoSyncCoordinator } from './coordinator.js';
import { SyncScheduler } from './scheduler.js';

export interface SyncStack {
  integrations: IntegrationManager;
  watcher: FileWatcher;
  scheduler: SyncScheduler;
  coordinator: AutoSyncCoordinator;
}

/**
 * Wire the watcher, scheduler and coordinator from a loaded configuration.
 * `integrations` replaces the default mirror manager.
 */
export function createSyncStack(config: AgentSyncConfig, integrations?: IntegrationManager): SyncStack {
  const manager = integrations ?? new MirrorIntegrationManager({
    rootDir: config.rootDir,
    adapters: config.adapters,
  });

  const watcher = new FileWatcher({
    debounceMs: config.watcher.debounceMs,
    usePolling: config.watcher.usePolling,
    pollIntervalMs: config.watcher.pollIntervalMs,
    rootMarker: path.basename(config.rootDir),
    patterns: config.watcher.patterns,
  });

  const scheduler = new SyncScheduler(manager, config.scheduler);

  const coordinator = new AutoSyncCoordinator(watcher, scheduler, manager, {
    ...config.coordinator,
    rootDir: config.rootDir,
  });

  return { integrations: manager, watcher, scheduler, coordinator };
}
