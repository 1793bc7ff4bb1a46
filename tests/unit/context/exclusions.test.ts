import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  parseIgnoreLines,
  readIgnoreFiles,
  resolveExclusions,
  EMPTY_EXCLUSIONS,
} from '../../../src/context/exclusions.js';
import { DEFAULT_EXCLUDE_DIRS } from '../../../src/context/defaults.js';

function createFixture(name: string): string {
  const root = join(tmpdir(), `repocoder-exclusions-${name}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(root, { recursive: true });
  return root;
}

// ─── parseIgnoreLines ───────────────────────────────────────────────────────

describe('parseIgnoreLines', () => {
  it('sorts lines into directory, file and extension patterns', () => {
    const result = parseIgnoreLines([
      '# comment',
      '',
      '   ',
      'build/',
      '*.log',
      'temp*.txt',
      'secrets.json',
      '!keep.log',
      '/dist/',
      '/.env',
    ]);

    expect(result.dirs).toEqual(['build', 'secrets.json', 'dist', '.env']);
    expect(result.files).toEqual(['temp*.txt', 'secrets.json', '.env']);
    expect(result.extensions).toEqual(['*.log']);
  });

  it('trims surrounding whitespace', () => {
    const result = parseIgnoreLines(['  coverage/  ', '\t*.tmp']);
    expect(result.dirs).toEqual(['coverage']);
    expect(result.extensions).toEqual(['*.tmp']);
  });

  it('returns empty collections for comments only', () => {
    expect(parseIgnoreLines(['# a', '#b'])).toEqual({ dirs: [], files: [], extensions: [] });
  });
});

// ─── readIgnoreFiles ────────────────────────────────────────────────────────

describe('readIgnoreFiles', () => {
  let base: string;
  let project: string;

  beforeEach(() => {
    base = createFixture('ignore');
    project = join(base, 'project');
    mkdirSync(project, { recursive: true });
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads the directory and its parent, directory first', () => {
    writeFileSync(join(project, '.gitignore'), 'build/\n# note\n');
    writeFileSync(join(base, '.gitignore'), '*.log\nout/\n');

    const result = readIgnoreFiles(project);

    expect(result.dirs).toEqual(['build', 'out']);
    expect(result.extensions).toEqual(['*.log']);
  });

  it('handles CRLF line endings', () => {
    writeFileSync(join(project, '.gitignore'), 'tmp/\r\n*.bak\r\n');
    const result = readIgnoreFiles(project);
    expect(result.dirs).toEqual(['tmp']);
    expect(result.extensions).toEqual(['*.bak']);
  });

  it('silently skips missing ignore files', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(readIgnoreFiles(project)).toEqual({ dirs: [], files: [], extensions: [] });
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns on an unreadable ignore file and still reads the parent', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    mkdirSync(join(project, '.gitignore'));
    writeFileSync(join(base, '.gitignore'), '*.tmp\n');

    const result = readIgnoreFiles(project);

    expect(result.extensions).toEqual(['*.tmp']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining(`Warning: Could not read ${join(project, '.gitignore')}`)
    );
  });
});

// ─── resolveExclusions ──────────────────────────────────────────────────────

describe('resolveExclusions', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('resolve');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('includes the defaults unless disabled', () => {
    const result = resolveExclusions(fixture, { useGitignore: false });
    expect(result.dirs).toContain('.git');
    expect(result.dirs).toContain('node_modules');
    expect(result.files).toContain('requirements.txt');
    expect(result.extensions).toContain('.pyc');
  });

  it('uses only caller lists when defaults and gitignore are off', () => {
    const result = resolveExclusions(fixture, {
      useDefaults: false,
      useGitignore: false,
      excludeDirs: ['out'],
      excludeFiles: ['notes.md'],
      excludeExtensions: ['.tmp'],
    });

    expect(result).toEqual({ dirs: ['out'], files: ['notes.md'], extensions: ['.tmp'] });
  });

  it('drops duplicates, keeping first occurrence', () => {
    const result = resolveExclusions(fixture, { useGitignore: false, excludeDirs: ['.git', 'extra'] });
    expect(result.dirs.filter(d => d === '.git')).toHaveLength(1);
    expect(result.dirs.slice(-1)).toEqual(['extra']);
    expect(result.dirs).toHaveLength(DEFAULT_EXCLUDE_DIRS.length + 1);
  });

  it('merges patterns from .gitignore', () => {
    writeFileSync(join(fixture, '.gitignore'), 'build/\n*.log\n');
    const result = resolveExclusions(fixture, { useDefaults: false });
    expect(result.dirs).toContain('build');
    expect(result.extensions).toContain('*.log');
  });

  it('skips .gitignore when disabled', () => {
    writeFileSync(join(fixture, '.gitignore'), 'build/\n');
    const result = resolveExclusions(fixture, { useDefaults: false, useGitignore: false });
    expect(result.dirs).toEqual([]);
  });

  it('prefers pre-parsed ignore lists over reading the file', () => {
    writeFileSync(join(fixture, '.gitignore'), 'build/\n');
    const result = resolveExclusions(fixture, {
      useDefaults: false,
      ignoreLists: parseIgnoreLines(['cache/']),
    });
    expect(result.dirs).toEqual(['cache']);
  });

  it('returns frozen collections', () => {
    const result = resolveExclusions(fixture, { useGitignore: false });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.dirs)).toBe(true);
    expect(Object.isFrozen(EMPTY_EXCLUSIONS.files)).toBe(true);
  });
});
