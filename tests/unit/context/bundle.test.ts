import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { formatBundle, writeBundle } from '../../../src/context/bundle.js';
import { BundleError } from '../../../src/errors.js';

const TREE = ['proj/', '├── a.py', '└── b.py'];

describe('formatBundle', () => {
  it('writes the tree, then one block per file', () => {
    const text = formatBundle(['a.py', 'b.py'], ['x = 1', 'y = 2'], TREE);

    expect(text).toBe(
      'Directory Structure:\n' +
        'proj/\n├── a.py\n└── b.py' +
        '\n\nFile Contents:\n\n' +
        'File Path: a.py\nCode:\nx = 1\n\n' +
        'File Path: b.py\nCode:\ny = 2\n\n'
    );
  });

  it('keeps contents verbatim, including trailing newlines', () => {
    const text = formatBundle(['a.py'], ['line\n'], ['proj/']);
    expect(text.endsWith('File Path: a.py\nCode:\nline\n\n\n')).toBe(true);
  });

  it('rejects misaligned inputs', () => {
    expect(() => formatBundle(['a.py', 'b.py'], ['x = 1'], TREE)).toThrow(BundleError);
  });
});

describe('writeBundle', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = join(tmpdir(), `repocoder-bundle-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(fixture, { recursive: true });
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('writes and returns the same text', () => {
    const output = join(fixture, 'all_code.txt');

    const text = writeBundle(output, ['a.py'], ['x = 1'], ['proj/', '└── a.py']);

    expect(readFileSync(output, 'utf-8')).toBe(text);
  });

  it('wraps write failures in a BundleError', () => {
    const output = join(fixture, 'no-such-dir', 'all_code.txt');

    let caught: unknown;
    try {
      writeBundle(output, ['a.py'], ['x = 1'], TREE);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BundleError);
    if (caught instanceof BundleError) {
      expect(caught.message.startsWith(`Error writing to ${output}:`)).toBe(true);
      expect(caught.code).toBe('BUNDLE_ERROR');
      expect(caught.context).toEqual({ outputFile: output });
    }
  });
});
