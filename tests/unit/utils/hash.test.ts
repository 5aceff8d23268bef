import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { calculateFileHash, calculateHash } from '../../../src/utils/hash.js';

describe('hash utilities', () => {
  describe('calculateHash', () => {
    it('computes the SHA-256 of a string', () => {
      expect(calculateHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('hashes strings and buffers with the same content identically', () => {
      expect(calculateHash(Buffer.from('agent'))).toBe(calculateHash('agent'));
    });
  });

  describe('calculateFileHash', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agentsync-hash-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('hashes file contents', async () => {
      const file = path.join(dir, 'reviewer.md');
      fs.writeFileSync(file, '# Reviewer');
      expect(await calculateFileHash(file)).toBe(calculateHash('# Reviewer'));
    });

    it('returns null for a missing file', async () => {
      expect(await calculateFileHash(path.join(dir, 'missing.md'))).toBeNull();
    });
  });
});
