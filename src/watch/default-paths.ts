import type { IntegrationManager } from '../integrations/types.js';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scoped('watcher');

export const MANAGED_DIRECTORIES = ['config', 'agents', 'templates', 'data'] as const;

/**
 * Compute the default set of paths to watch: the managed directories under
 * `rootDir` plus whatever tool directories the adapters report. Adapters that
 * fail to answer are skipped.
 */
export async function discoverWatchPaths(
  rootDir: string,
  integrations?: IntegrationManager,
): Promise<string[]> {
  const candidates = MANAGED_DIRECTORIES.map(dir => path.join(rootDir, dir));

  if (integrations) {
    for (const name of integrations.listAdapters()) {
      const adapter = integrations.getAdapter(name);
      if (!adapter?.getWatchPaths) {
        continue;
      }
      try {
        candidates.push(...await adapter.getWatchPaths());
      }
      catch (error) {
        log.debug(`Adapter ${name} did not report watch paths: ${errorMessage(error)}`);
      }
    }
  }

  const resolved = candidates.map(candidate => path.resolve(candidate));
  return Array.from(new Set(resolved)).filter(candidate => existsSync(candidate));
}
