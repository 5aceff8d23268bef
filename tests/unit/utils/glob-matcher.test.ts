import { describe, expect, it } from 'vitest';
import { globMatch, globMatchMultiple } from '../../../src/utils/glob-matcher.js';

describe('glob-matcher', () => {
  describe('globMatch', () => {
    it('matches slash-free patterns against the basename', () => {
      expect(globMatch('/home/dev/.agentsync/agents/reviewer.md', '*.md')).toBe(true);
      expect(globMatch('/home/dev/notes/todo.txt', '*.md')).toBe(false);
    });

    it('matches dotfiles', () => {
      expect(globMatch('/repo/.cursorrules', '.cursorrules')).toBe(true);
      expect(globMatch('/repo/.hidden.md', '*.md')).toBe(true);
    });

    it('matches slash patterns against trailing segments', () => {
      expect(globMatch('/home/dev/project/agents/reviewer.md', 'agents/*.md')).toBe(true);
      expect(globMatch('/home/dev/project/agents/nested/reviewer.md', 'agents/*.md')).toBe(false);
      expect(globMatch('/home/dev/project/docs/reviewer.md', 'agents/*.md')).toBe(false);
    });

    it('supports character classes and single-character wildcards', () => {
      expect(globMatch('/tmp/test1.md', 'test[0-9].md')).toBe(true);
      expect(globMatch('/tmp/testa.md', 'test[0-9].md')).toBe(false);
      expect(globMatch('/tmp/test.md', 'te?t.md')).toBe(true);
    });

    it('inverts negative patterns', () => {
      expect(globMatch('/tmp/test.md', '!*.txt')).toBe(true);
      expect(globMatch('/tmp/test.txt', '!*.txt')).toBe(false);
    });
  });

  describe('globMatchMultiple', () => {
    it('matches when any positive pattern matches', () => {
      expect(globMatchMultiple('/tmp/settings.yaml', ['*.toml', '*.yaml'])).toBe(true);
      expect(globMatchMultiple('/tmp/settings.ini', ['*.toml', '*.yaml'])).toBe(false);
    });

    it('lets a negative pattern exclude a positive match', () => {
      expect(globMatchMultiple('/tmp/draft.md', ['*.md', '!draft.md'])).toBe(false);
      expect(globMatchMultiple('/tmp/final.md', ['*.md', '!draft.md'])).toBe(true);
    });

    it('never matches without positive patterns', () => {
      expect(globMatchMultiple('/tmp/a.md', [])).toBe(false);
      expect(globMatchMultiple('/tmp/a.md', ['!*.txt'])).toBe(false);
    });
  });
});
