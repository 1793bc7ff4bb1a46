/**
 * Review pipeline:
 *
 * 1. Resolve exclusions (defaults + caller lists + .gitignore)
 * 2. Crawl the directory
 * 3. Render the tree and read file contents
 * 4. Write the bundle
 * 5. Build the prompt and send it to the provider
 * 6. Clean, save and display the reply
 *
 * Configuration problems (action, provider, API key) are checked before
 * anything touches the filesystem or the network.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { resolveExclusions } from './context/exclusions.js';
import { crawlDirectory, type DirectoryStructure } from './context/crawler.js';
import { renderDirectoryTree } from './context/tree.js';
import { readFileContents } from './context/reader.js';
import { writeBundle } from './context/bundle.js';
import { DEFAULT_OUTPUT_FILE, DEFAULT_RESPONSE_FILE } from './context/defaults.js';
import { DEFAULT_ACTION, validateAction } from './ai/prompt.js';
import { createBackend, parseProvider, requestCompletion, resolveApiKey } from './ai/providers.js';
import { displayResponse } from './render/response.js';
import { ValidationError } from './errors.js';

export interface BundleOptions {
  /** Directory to bundle (default: cwd) */
  directory?: string;
  /** Bundle artifact path (default: all_code.txt) */
  outputFile?: string;
  excludeDirs?: string[];
  excludeFiles?: string[];
  excludeExtensions?: string[];
  /** Apply built-in exclusions (default: true) */
  useDefaults?: boolean;
  /** Apply .gitignore from the directory and its parent (default: true) */
  useGitignore?: boolean;
  /** Files never bundled, e.g. the reply file; the output file is always added */
  reservedPaths?: string[];
  verbose?: boolean;
}

export interface BundleResult {
  outputFile: string;
  /** The bundle text as written */
  content: string;
  files: string[];
  structure: DirectoryStructure;
}

export interface ReviewOptions extends BundleOptions {
  action?: string;
  /** 'anthropic' or 'gemini' (default: anthropic) */
  provider?: string;
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
  /** Persisted reply file (default: response.md) */
  responseFile?: string;
  display?: (markdown: string) => void;
}

/**
 * Validate that the path exists and is a directory.
 */
export function validateDirectory(directory: string): string {
  const abs = resolve(directory);

  if (!existsSync(abs)) {
    throw new ValidationError(`Path does not exist: ${directory}\nResolved to: ${abs}`, 'directory');
  }
  if (!statSync(abs).isDirectory()) {
    throw new ValidationError(`Path is not a directory: ${directory}\nResolved to: ${abs}`, 'directory');
  }

  return directory;
}

/**
 * Crawl, read and write the bundle. Returns the artifact path and text.
 */
export function formatCodeForLlm(options: BundleOptions = {}): BundleResult {
  const directory = validateDirectory(options.directory ?? '.');
  const outputFile = options.outputFile ?? DEFAULT_OUTPUT_FILE;
  const verbose = options.verbose ?? false;

  const exclusions = resolveExclusions(directory, {
    excludeDirs: options.excludeDirs,
    excludeFiles: options.excludeFiles,
    excludeExtensions: options.excludeExtensions,
    useDefaults: options.useDefaults,
    useGitignore: options.useGitignore,
  });

  if (verbose) {
    console.log(`  Excluded dirs: ${exclusions.dirs.join(', ') || '(none)'}`);
    console.log(`  Excluded files: ${exclusions.files.join(', ') || '(none)'}`);
    console.log(`  Excluded extensions: ${exclusions.extensions.join(', ') || '(none)'}`);
  }

  const { structure, files } = crawlDirectory(directory, exclusions, {
    verbose,
    excludePaths: [outputFile, ...(options.reservedPaths ?? [])],
  });
  if (files.length === 0) {
    throw new ValidationError('No content found in the specified directory.', 'directory', { directory });
  }

  const treeLines = renderDirectoryTree(directory, structure);
  const contents = readFileContents(files, { verbose });
  const content = writeBundle(outputFile, files, contents, treeLines);

  if (verbose) {
    console.log(`  Bundle written to ${outputFile} (${(content.length / 1024).toFixed(1)}KB)`);
  }

  return { outputFile, content, files, structure };
}

/**
 * Full run: bundle the directory, send it with the action, show the reply.
 * Resolves to the cleaned reply, or null when the provider returned nothing.
 */
export async function sendForReview(options: ReviewOptions = {}): Promise<string | null> {
  const action = validateAction(options.action ?? DEFAULT_ACTION);
  const provider = parseProvider(options.provider ?? 'anthropic');
  const apiKey = resolveApiKey(provider, options.apiKey);
  const responseFile = options.responseFile ?? DEFAULT_RESPONSE_FILE;

  const bundle = formatCodeForLlm({
    ...options,
    reservedPaths: [responseFile, ...(options.reservedPaths ?? [])],
  });

  const backend = createBackend(provider, {
    apiKey,
    model: options.model,
    timeoutMs: options.timeoutMs,
    verbose: options.verbose,
  });

  if (options.verbose) {
    console.log(`  Sending ${bundle.files.length} file(s) to ${backend.provider} (${backend.model})`);
  }

  const response = await requestCompletion(backend, bundle.content, action);
  return displayResponse(response, { responseFile, display: options.display });
}
