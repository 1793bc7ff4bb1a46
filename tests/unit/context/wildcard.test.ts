import { describe, it, expect } from 'vitest';
import { hasWildcard, matchesWildcard } from '../../../src/context/wildcard.js';

describe('hasWildcard', () => {
  it('detects glob characters', () => {
    expect(hasWildcard('*.log')).toBe(true);
    expect(hasWildcard('file?.ts')).toBe(true);
    expect(hasWildcard('[ab].md')).toBe(true);
  });

  it('treats plain names as literal', () => {
    expect(hasWildcard('build')).toBe(false);
    expect(hasWildcard('.env.local')).toBe(false);
  });
});

describe('matchesWildcard', () => {
  it('matches a star anywhere in the name', () => {
    expect(matchesWildcard('temp1.txt', 'temp*.txt')).toBe(true);
    expect(matchesWildcard('temp.txt', 'temp*.txt')).toBe(true);
  });

  it('is anchored: no substring containment', () => {
    expect(matchesWildcard('mytemp1.txt', 'temp*.txt')).toBe(false);
    expect(matchesWildcard('temp1.txt.bak', 'temp*.txt')).toBe(false);
  });

  it('treats dots as literal characters', () => {
    expect(matchesWildcard('temp1xtxt', 'temp*.txt')).toBe(false);
    expect(matchesWildcard('app.log', '*.log')).toBe(true);
    expect(matchesWildcard('applog', '*.log')).toBe(false);
  });

  it('matches exactly one character with ?', () => {
    expect(matchesWildcard('file1.ts', 'file?.ts')).toBe(true);
    expect(matchesWildcard('file12.ts', 'file?.ts')).toBe(false);
  });

  it('supports character classes and negation', () => {
    expect(matchesWildcard('a.md', '[abc].md')).toBe(true);
    expect(matchesWildcard('d.md', '[abc].md')).toBe(false);
    expect(matchesWildcard('d.md', '[!abc].md')).toBe(true);
    expect(matchesWildcard('a.md', '[!abc].md')).toBe(false);
    expect(matchesWildcard('v7', 'v[0-9]')).toBe(true);
  });

  it('treats a leading ] as a class member', () => {
    expect(matchesWildcard('x', '[!]a]')).toBe(true);
    expect(matchesWildcard(']', '[!]a]')).toBe(false);
    expect(matchesWildcard('a', '[!]a]')).toBe(false);
    expect(matchesWildcard(']', '[]a]')).toBe(true);
  });

  it('treats an unterminated bracket literally', () => {
    expect(matchesWildcard('[draft', '[draft')).toBe(true);
  });

  it('is case-sensitive', () => {
    expect(matchesWildcard('APP.LOG', '*.log')).toBe(false);
  });
});
