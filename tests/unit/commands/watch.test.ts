import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { formatLifecycleLine, watchCommand } from '../../../src/commands/watch.js';
import { JobType, SyncJob } from '../../../src/sync/job.js';

describe('watch command', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const now = new Date('2024-05-01T12:34:56.000Z');

  it('formats job lifecycle lines', () => {
    const job = new SyncJob(JobType.AGENT_SYNC, { maxRetries: 2 });
    const shortId = job.id.slice(0, 8);

    expect(formatLifecycleLine('job:started', job, now)).toBe(`12:34:56 ▶ agent_sync ${shortId} started`);
    expect(formatLifecycleLine('job:cancelled', job, now)).toBe(`12:34:56 ○ agent_sync ${shortId} cancelled`);
  });

  it('includes the failure reason', () => {
    const job = new SyncJob(JobType.FULL_SYNC);
    job.markStarted();
    job.markFailed('adapter offline');

    expect(formatLifecycleLine('job:failed', job, now)).toBe(`12:34:56 ✖ full_sync ${job.id.slice(0, 8)} failed: adapter offline`);
  });

  it('accepts multiple watch paths', () => {
    const pathOption = watchCommand.options.find(option => option.long === '--path');
    expect(pathOption?.variadic).toBe(true);
  });
});
