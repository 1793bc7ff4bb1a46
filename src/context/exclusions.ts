/**
 * Exclusion Resolver - merges the three exclusion collections for one crawl:
 * 1. Built-in defaults (unless disabled)
 * 2. Caller-supplied directory / file / extension lists
 * 3. Patterns parsed from .gitignore in the target directory and its parent
 */

import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import {
    DEFAULT_EXCLUDE_DIRS,
    DEFAULT_EXCLUDE_FILES,
    DEFAULT_EXCLUDE_EXTENSIONS,
} from './defaults.js';
import { getErrorCode, getErrorMessage } from '../errors.js';

export interface ExclusionSet {
    /** Directory names or wildcard patterns, pruned before descent */
    readonly dirs: readonly string[];
    /** File names or wildcard patterns */
    readonly files: readonly string[];
    /** Suffixes (".pyc") or wildcard extension patterns ("*.log") */
    readonly extensions: readonly string[];
}

export interface ExclusionOptions {
    excludeDirs?: string[];
    excludeFiles?: string[];
    excludeExtensions?: string[];
    /** Include the built-in lists (default: true) */
    useDefaults?: boolean;
    /** Read .gitignore from the directory and its parent (default: true) */
    useGitignore?: boolean;
    /** Pre-parsed ignore patterns; used instead of reading .gitignore */
    ignoreLists?: ExclusionSet;
}

export const EMPTY_EXCLUSIONS: ExclusionSet = Object.freeze({
    dirs: Object.freeze([]),
    files: Object.freeze([]),
    extensions: Object.freeze([]),
});

/**
 * Turn ignore-file lines into exclusion patterns.
 *
 * `build/` is a directory pattern, `*.log` an extension pattern, `temp*.txt`
 * a wildcard file pattern, and a bare name excludes both a file and a
 * directory of that name. Comments, blanks and `!` negations are skipped.
 */
export function parseIgnoreLines(lines: Iterable<string>): ExclusionSet {
    const dirs: string[] = [];
    const files: string[] = [];
    const extensions: string[] = [];

    for (const raw of lines) {
        let line = raw.trim();
        if (!line || line.startsWith('#') || line.startsWith('!')) continue;

        if (line.startsWith('/')) line = line.slice(1);
        if (!line) continue;

        if (line.endsWith('/')) {
            const dir = line.replace(/\/+$/, '');
            if (dir) dirs.push(dir);
        } else if (line.startsWith('*.')) {
            extensions.push(line);
        } else if (line.includes('*')) {
            files.push(line);
        } else {
            dirs.push(line);
            files.push(line);
        }
    }

    return { dirs, files, extensions };
}

/**
 * Read .gitignore (or another ignore file) from the directory and its parent.
 * Missing files are skipped; unreadable files log a warning and the rest are
 * still parsed.
 */
export function readIgnoreFiles(directory: string, fileName: string = '.gitignore'): ExclusionSet {
    const root = resolve(directory);
    const candidates = [join(root, fileName)];
    const parent = dirname(root);
    if (parent !== root) candidates.push(join(parent, fileName));

    const lines: string[] = [];
    for (const candidate of candidates) {
        try {
            const text = readFileSync(candidate, 'utf-8');
            lines.push(...text.split(/\r?\n/));
        } catch (error) {
            if (getErrorCode(error) === 'ENOENT') continue;
            console.warn(`Warning: Could not read ${candidate}: ${getErrorMessage(error)}`);
        }
    }

    return parseIgnoreLines(lines);
}

function unique(...lists: (readonly string[] | undefined)[]): readonly string[] {
    const seen = new Set<string>();
    for (const list of lists) {
        if (!list) continue;
        for (const item of list) {
            const value = item.trim();
            if (value) seen.add(value);
        }
    }
    return Object.freeze([...seen]);
}

/**
 * Merge defaults, caller lists and ignore-file patterns into one frozen set.
 */
export function resolveExclusions(directory: string, options: ExclusionOptions = {}): ExclusionSet {
    const { useDefaults = true, useGitignore = true } = options;

    const defaults = useDefaults
        ? { dirs: DEFAULT_EXCLUDE_DIRS, files: DEFAULT_EXCLUDE_FILES, extensions: DEFAULT_EXCLUDE_EXTENSIONS }
        : EMPTY_EXCLUSIONS;

    let ignored = EMPTY_EXCLUSIONS;
    if (options.ignoreLists) {
        ignored = options.ignoreLists;
    } else if (useGitignore) {
        ignored = readIgnoreFiles(directory);
    }

    return Object.freeze({
        dirs: unique(defaults.dirs, options.excludeDirs, ignored.dirs),
        files: unique(defaults.files, options.excludeFiles, ignored.files),
        extensions: unique(defaults.extensions, options.excludeExtensions, ignored.extensions),
    });
}
