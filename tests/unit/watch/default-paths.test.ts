import type { IntegrationAdapter, IntegrationManager } from '../../../src/integrations/types.js';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { discoverWatchPaths } from '../../../src/watch/default-paths.js';

function adapter(name: string, getWatchPaths?: () => Promise<string[]>): IntegrationAdapter {
  return {
    name,
    syncAgents: async () => ({ status: 'success', synced: 0, errors: [] }),
    healthCheck: async () => ({ status: 'healthy', timestamp: new Date(0).toISOString() }),
    getWatchPaths,
  };
}

function managerWith(adapters: IntegrationAdapter[]): IntegrationManager {
  return {
    initialize: async () => true,
    syncAgents: async () => ({}),
    validateConfigurations: async () => ({}),
    healthCheck: async () => ({}),
    listAdapters: () => adapters.map(a => a.name),
    getAdapter: name => adapters.find(a => a.name === name) ?? null,
  };
}

describe('discoverWatchPaths', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'agentsync-paths-'));
    fs.mkdirSync(path.join(root, 'agents'));
    fs.mkdirSync(path.join(root, 'config'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns the managed directories that exist', async () => {
    expect(await discoverWatchPaths(root)).toEqual([
      path.join(root, 'config'),
      path.join(root, 'agents'),
    ]);
  });

  it('adds adapter paths, skipping failures and duplicates', async () => {
    const toolDir = path.join(root, 'tool');
    fs.mkdirSync(toolDir);

    const manager = managerWith([
      adapter('cursor', async () => [toolDir, path.join(root, 'agents')]),
      adapter('broken', async () => {
        throw new Error('unavailable');
      }),
      adapter('plain'),
      adapter('missing', async () => [path.join(root, 'nowhere')]),
    ]);

    expect(await discoverWatchPaths(root, manager)).toEqual([
      path.join(root, 'config'),
      path.join(root, 'agents'),
      toolDir,
    ]);
  });
});
