import type { FSWatcher } from 'chokidar';
import type { WatchEvent } from '../../../src/types/watch.js';
import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chokidar from 'chokidar';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WatchEventType, WatchTarget } from '../../../src/types/watch.js';
import { logger, LogLevel } from '../../../src/utils/logger.js';
import { FileWatcher, formatWatchEvent } from '../../../src/watch/file-watcher.js';

vi.mock('chokidar', () => ({
  default: {
    watch: vi.fn(),
  },
  watch: vi.fn(),
}));

class FakeFSWatcher extends EventEmitter {
  close = vi.fn(async () => {});
}

const ROOT = '/home/dev/.agentsync';
const settle = () => vi.advanceTimersByTimeAsync(0);

describe('FileWatcher', () => {
  let watcher: FileWatcher;
  let events: WatchEvent[];
  let fakes: FakeFSWatcher[];

  beforeEach(() => {
    vi.useFakeTimers();
    logger.setColors(false);
    logger.setLogLevel(LogLevel.ERROR);

    fakes = [];
    vi.mocked(chokidar.watch).mockImplementation(() => {
      const fake = new FakeFSWatcher();
      fakes.push(fake);
      // Test double for the subset of FSWatcher the watcher uses
      return fake as unknown as FSWatcher;
    });

    events = [];
    watcher = new FileWatcher({ debounceMs: 500 });
    watcher.addCallback(event => events.push(event));
  });

  afterEach(async () => {
    await watcher.stop();
    vi.useRealTimers();
  });

  describe('debouncing', () => {
    it('coalesces a burst on one path into a single event', async () => {
      await watcher.start();
      const file = `${ROOT}/agents/reviewer.md`;

      watcher.ingest({ kind: 'change', path: file, root: ROOT });
      await vi.advanceTimersByTimeAsync(200);
      watcher.ingest({ kind: 'change', path: file, root: ROOT });
      await vi.advanceTimersByTimeAsync(200);

      expect(events).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(300);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        eventType: WatchEventType.MODIFIED,
        path: file,
        target: WatchTarget.AGENTS,
      });
    });

    it('delivers the latest event type for the key', async () => {
      await watcher.start();
      const file = `${ROOT}/agents/reviewer.md`;

      watcher.ingest({ kind: 'add', path: file, root: ROOT });
      watcher.ingest({ kind: 'unlink', path: file, root: ROOT });
      await vi.advanceTimersByTimeAsync(500);

      expect(events.map(event => event.eventType)).toEqual([WatchEventType.DELETED]);
    });

    it('keeps different paths apart', async () => {
      await watcher.start();

      watcher.ingest({ kind: 'change', path: `${ROOT}/agents/a.md`, root: ROOT });
      watcher.ingest({ kind: 'change', path: `${ROOT}/config/settings.toml`, root: ROOT });
      await vi.advanceTimersByTimeAsync(500);

      expect(events.map(event => event.target).sort()).toEqual([WatchTarget.AGENTS, WatchTarget.CONFIG]);
    });
  });

  describe('moves', () => {
    it('reports a move within one target as a single moved event', async () => {
      await watcher.start();

      watcher.ingest({ kind: 'move', oldPath: `${ROOT}/agents/old.md`, path: `${ROOT}/agents/new.md`, root: ROOT });
      await vi.advanceTimersByTimeAsync(500);

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        eventType: WatchEventType.MOVED,
        path: `${ROOT}/agents/new.md`,
        oldPath: `${ROOT}/agents/old.md`,
        target: WatchTarget.AGENTS,
      });
    });

    it('splits a move across targets into delete and create', async () => {
      await watcher.start();

      watcher.ingest({ kind: 'move', oldPath: `${ROOT}/agents/old.md`, path: `${ROOT}/config/old.toml`, root: ROOT });
      await vi.advanceTimersByTimeAsync(500);

      const summary = events.map(event => [event.eventType, event.target, event.path]);
      expect(summary).toEqual([
        [WatchEventType.DELETED, WatchTarget.AGENTS, `${ROOT}/agents/old.md`],
        [WatchEventType.CREATED, WatchTarget.CONFIG, `${ROOT}/config/old.toml`],
      ]);
    });

    it('keeps only the classifiable side of a move', async () => {
      await watcher.start();

      watcher.ingest({ kind: 'move', oldPath: '/tmp/scratch.bin', path: `${ROOT}/agents/new.md`, root: ROOT });
      await vi.advanceTimersByTimeAsync(500);

      expect(events.map(event => event.eventType)).toEqual([WatchEventType.CREATED]);
    });
  });

  it('drops unclassifiable paths', async () => {
    await watcher.start();

    watcher.ingest({ kind: 'change', path: '/tmp/scratch.bin', root: '/tmp' });
    await vi.advanceTimersByTimeAsync(1000);

    expect(events).toHaveLength(0);
  });

  it('ignores events while stopped', async () => {
    watcher.ingest({ kind: 'change', path: `${ROOT}/agents/a.md`, root: ROOT });
    await watcher.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(events).toHaveLength(0);
  });

  it('isolates failing callbacks', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing = vi.fn(() => {
      throw new Error('boom');
    });
    const first = new FileWatcher({ debounceMs: 100 });
    const received: WatchEvent[] = [];
    first.addCallback(failing);
    first.addCallback(event => received.push(event));
    await first.start();

    const file = `${ROOT}/agents/a.md`;
    first.ingest({ kind: 'change', path: file, root: ROOT });
    await vi.advanceTimersByTimeAsync(100);
    first.ingest({ kind: 'change', path: file, root: ROOT });
    await vi.advanceTimersByTimeAsync(100);
    await first.stop();

    expect(failing).toHaveBeenCalledTimes(2);
    expect(received).toHaveLength(2);
    expect(first.callbackCount).toBe(2);
    expect(consoleError).toHaveBeenCalledWith(`[ERROR] [watcher] AS-102: Watch callback failed for ${file}: boom`);
  });

  it('cancels pending debounces on stop', async () => {
    await watcher.start();
    watcher.ingest({ kind: 'change', path: `${ROOT}/agents/a.md`, root: ROOT });
    await settle();
    await watcher.stop();

    await vi.advanceTimersByTimeAsync(1000);
    expect(events).toHaveLength(0);
    expect(watcher.isWatching()).toBe(false);
  });

  describe('chokidar registrations', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agentsync-watch-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('forwards chokidar events through classification', async () => {
      await watcher.addPath(dir);
      await watcher.start();

      expect(chokidar.watch).toHaveBeenCalledWith(dir, expect.objectContaining({
        ignoreInitial: true,
        depth: undefined,
        usePolling: false,
      }));

      fakes[0]?.emit('add', path.join(dir, 'reviewer.md'));
      await vi.advanceTimersByTimeAsync(500);

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ eventType: WatchEventType.CREATED, target: WatchTarget.AGENTS });
    });

    it('reports a rename on disk as a delete and a create', async () => {
      await watcher.addPath(dir);
      await watcher.start();

      fakes[0]?.emit('unlink', path.join(dir, 'reviewer.md'));
      fakes[0]?.emit('add', path.join(dir, 'critic.md'));
      await vi.advanceTimersByTimeAsync(500);

      expect(events.map(event => [event.eventType, path.basename(event.path)])).toEqual([
        [WatchEventType.DELETED, 'reviewer.md'],
        [WatchEventType.CREATED, 'critic.md'],
      ]);
      expect(events.some(event => event.eventType === WatchEventType.MOVED)).toBe(false);
    });

    it('limits non-recursive registrations to the top level', async () => {
      await watcher.addPath(dir, { recursive: false });
      await watcher.start();

      expect(chokidar.watch).toHaveBeenCalledWith(dir, expect.objectContaining({ depth: 0 }));
    });

    it('applies per-path pattern overrides', async () => {
      await watcher.addPath(dir, { patterns: { [WatchTarget.CONFIG]: ['*.md'] } });
      await watcher.start();

      fakes[0]?.emit('change', path.join(dir, 'reviewer.md'));
      await vi.advanceTimersByTimeAsync(500);

      expect(events[0]?.target).toBe(WatchTarget.CONFIG);
    });

    it('restarts a path that is added again while running', async () => {
      await watcher.addPath(dir);
      await watcher.start();
      await watcher.addPath(dir, { recursive: false });

      expect(chokidar.watch).toHaveBeenCalledTimes(2);
      expect(fakes[0]?.close).toHaveBeenCalledTimes(1);
      expect(watcher.getWatchedPaths()).toEqual([dir]);
    });

    it('removes paths and closes their watcher', async () => {
      await watcher.addPath(dir);
      await watcher.start();

      expect(await watcher.removePath(dir)).toBe(true);
      expect(await watcher.removePath(dir)).toBe(false);
      expect(fakes[0]?.close).toHaveBeenCalledTimes(1);
      expect(watcher.getWatchedPaths()).toEqual([]);
    });

    it('skips paths that do not exist', async () => {
      await watcher.addPath(path.join(dir, 'missing'));
      await watcher.start();

      expect(chokidar.watch).not.toHaveBeenCalled();
    });

    it('keeps running after a chokidar error', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      await watcher.addPath(dir);
      await watcher.start();

      fakes[0]?.emit('error', new Error('ENOSPC'));
      fakes[0]?.emit('change', path.join(dir, 'reviewer.md'));
      await vi.advanceTimersByTimeAsync(500);

      expect(consoleError).toHaveBeenCalledWith(`[ERROR] [watcher] AS-101: Watcher error on ${dir}: ENOSPC`);
      expect(events).toHaveLength(1);
    });

    it('closes every watcher on stop', async () => {
      await watcher.addPath(dir);
      await watcher.start();
      await watcher.stop();

      expect(fakes[0]?.close).toHaveBeenCalledTimes(1);
    });
  });
});

describe('formatWatchEvent', () => {
  it('shows both paths for moves', () => {
    expect(formatWatchEvent({
      eventType: WatchEventType.MOVED,
      path: '/r/agents/b.md',
      oldPath: '/r/agents/a.md',
      target: WatchTarget.AGENTS,
      timestamp: new Date(0),
    })).toBe('moved: /r/agents/a.md -> /r/agents/b.md [agents]');
  });
});
