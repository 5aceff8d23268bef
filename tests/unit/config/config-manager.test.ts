import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigManager, expandHome } from '../../../src/config/config-manager.js';
import { ConfigError } from '../../../src/config/schemas.js';

describe('ConfigManager', () => {
  let dir: string;
  let home: string;
  let projectConfig: string;
  let userConfig: string;

  function manager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager({ searchPaths: [projectConfig, userConfig], env, homeDir: home });
  }

  function write(file: string, content: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agentsync-config-'));
    home = path.join(dir, 'home');
    projectConfig = path.join(dir, 'project', 'agentsync.config.json');
    userConfig = path.join(home, '.config', 'agentsync', 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when no file exists', async () => {
    const config = await manager().loadConfig();

    expect(config.rootDir).toBe(path.join(home, '.agentsync'));
    expect(config.coordinator.syncDebounceMs).toBe(2000);
    expect(config.adapters).toEqual([]);
  });

  it('prefers the project file over the user file', async () => {
    write(projectConfig, { logLevel: 'debug' });
    write(userConfig, { logLevel: 'warn' });

    expect((await manager().loadConfig()).logLevel).toBe('debug');
  });

  it('falls back to the user file', async () => {
    write(userConfig, { logLevel: 'warn' });

    expect((await manager().loadConfig()).logLevel).toBe('warn');
  });

  it('expands ~ in directories', async () => {
    write(projectConfig, {
      rootDir: '~/agents-home',
      adapters: [{ name: 'cursor', targetDir: '~/.cursor/agents' }],
    });

    const config = await manager().loadConfig();

    expect(config.rootDir).toBe(path.join(home, 'agents-home'));
    expect(config.adapters[0]?.targetDir).toBe(path.join(home, '.cursor', 'agents'));
  });

  it('applies environment overrides', async () => {
    write(projectConfig, { logLevel: 'info', watcher: { debounceMs: 100 } });

    const config = await manager({
      AGENTSYNC_ROOT: '/srv/agentsync',
      AGENTSYNC_LOG_LEVEL: 'ERROR',
      AGENTSYNC_DEBOUNCE_MS: '250',
      AGENTSYNC_FULL_SYNC_INTERVAL_MS: '0',
    }).loadConfig();

    expect(config.rootDir).toBe('/srv/agentsync');
    expect(config.logLevel).toBe('error');
    expect(config.watcher.debounceMs).toBe(250);
    expect(config.coordinator.fullSyncIntervalMs).toBe(0);
  });

  it('ignores an unknown log level from the environment', async () => {
    const config = await manager({ AGENTSYNC_LOG_LEVEL: 'loud' }).loadConfig();
    expect(config.logLevel).toBe('info');
  });

  it('rejects a non-numeric environment override', async () => {
    await expect(manager({ AGENTSYNC_DEBOUNCE_MS: 'soon' }).loadConfig()).rejects.toMatchObject({
      code: 'AS-703',
    });
  });

  it('reports malformed JSON', async () => {
    write(projectConfig, '{ "logLevel": ');

    const error = await manager().loadConfig().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'AS-702' });
  });

  it('reports schema violations with their path', async () => {
    write(projectConfig, { scheduler: { backoffFactor: 0.5 } });

    await expect(manager().loadConfig()).rejects.toThrow(/AS-703: Invalid configuration .*scheduler\.backoffFactor/);
  });

  it('requires an explicit file to exist', async () => {
    await expect(manager().loadConfig(path.join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'AS-701' });
  });

  it('loads an explicit file', async () => {
    const explicit = path.join(dir, 'custom.json');
    write(explicit, { scheduler: { maxConcurrentJobs: 7 } });

    expect((await manager().loadConfig(explicit)).scheduler.maxConcurrentJobs).toBe(7);
  });

  it('caches the loaded configuration', async () => {
    const configManager = manager();
    const first = await configManager.getConfig();
    expect(await configManager.getConfig()).toBe(first);
  });
});

describe('expandHome', () => {
  it('expands only a leading tilde', () => {
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
    expect(expandHome('~/x', '/home/dev')).toBe(path.join('/home/dev', 'x'));
    expect(expandHome('/opt/~x', '/home/dev')).toBe('/opt/~x');
  });
});
