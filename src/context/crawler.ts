/**
 * Directory Crawler - walks a tree top-down, pruning excluded directories
 * before descent and filtering files by name, suffix and wildcard.
 *
 * Produces the nested structure used by the tree renderer and the flat,
 * ordered list of files to read.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join, resolve } from 'path';
import type { ExclusionSet } from './exclusions.js';
import { hasWildcard, matchesWildcard } from './wildcard.js';
import { getErrorCode, getErrorMessage } from '../errors.js';

export interface StructureEntry {
    /** Path relative to the crawl root, `/`-separated */
    path: string;
    /** null for files, nested entries for directories */
    children: DirectoryStructure | null;
}

export type DirectoryStructure = StructureEntry[];

export interface CrawlResult {
    structure: DirectoryStructure;
    /** Readable paths (root joined with the relative path), in traversal order */
    files: string[];
}

export interface CrawlOptions {
    verbose?: boolean;
    /** Exact files to skip, e.g. the bundle being written; matched on the resolved path */
    excludePaths?: readonly string[];
}

export function isExcludedDir(name: string, exclusions: ExclusionSet): boolean {
    return exclusions.dirs.some(pattern =>
        pattern === name || (hasWildcard(pattern) && matchesWildcard(name, pattern))
    );
}

export function isExcludedFile(name: string, exclusions: ExclusionSet): boolean {
    if (exclusions.files.some(pattern =>
        pattern === name || (hasWildcard(pattern) && matchesWildcard(name, pattern))
    )) {
        return true;
    }

    return exclusions.extensions.some(pattern =>
        hasWildcard(pattern) ? matchesWildcard(name, pattern) : name.endsWith(pattern)
    );
}

function reportAccessError(path: string, error: unknown): void {
    const code = getErrorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
        console.warn(`Permission denied: ${path}`);
    } else {
        console.warn(`Error accessing ${path}: ${getErrorMessage(error)}`);
    }
}

type EntryKind = 'file' | 'dir' | 'other';

function kindOf(entry: Dirent, fullPath: string): EntryKind {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'dir';
    if (entry.isSymbolicLink()) {
        // links to files are kept; linked directories are never followed
        try {
            return statSync(fullPath).isFile() ? 'file' : 'other';
        } catch (error) {
            reportAccessError(fullPath, error);
        }
    }
    return 'other';
}

interface WalkContext {
    root: string;
    exclusions: ExclusionSet;
    excludePaths: ReadonlySet<string>;
    files: string[];
}

function walkDir(currentPath: string, relPath: string, ctx: WalkContext): DirectoryStructure {
    let entries: Dirent[];
    try {
        entries = readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
        reportAccessError(currentPath, error);
        return [];
    }

    // Sort for deterministic output
    entries.sort((a, b) => a.name.localeCompare(b.name, 'en'));

    const structure: DirectoryStructure = [];
    const subdirs: string[] = [];

    for (const entry of entries) {
        const fullPath = join(currentPath, entry.name);
        const kind = kindOf(entry, fullPath);

        if (kind === 'dir') {
            if (!isExcludedDir(entry.name, ctx.exclusions)) subdirs.push(entry.name);
            continue;
        }

        if (kind !== 'file' || isExcludedFile(entry.name, ctx.exclusions)) continue;
        if (ctx.excludePaths.has(resolve(fullPath))) continue;

        const relFile = relPath ? `${relPath}/${entry.name}` : entry.name;
        structure.push({ path: relFile, children: null });
        ctx.files.push(join(ctx.root, relFile));
    }

    for (const name of subdirs) {
        const relDir = relPath ? `${relPath}/${name}` : name;
        try {
            const children = walkDir(join(currentPath, name), relDir, ctx);
            structure.push({ path: relDir, children });
        } catch (error) {
            reportAccessError(join(currentPath, name), error);
        }
    }

    return structure;
}

/**
 * Crawl a directory. Never throws for a single bad path: unreadable
 * subtrees are logged and skipped.
 */
export function crawlDirectory(
    directory: string,
    exclusions: ExclusionSet,
    options: CrawlOptions = {}
): CrawlResult {
    const files: string[] = [];
    const excludePaths = new Set((options.excludePaths ?? []).map(path => resolve(path)));
    const structure = walkDir(directory, '', { root: directory, exclusions, excludePaths, files });

    if (options.verbose) {
        console.log(`  Crawled ${directory}: ${files.length} file(s)`);
    }

    return { structure, files };
}
