// Exclusions
export { resolveExclusions, readIgnoreFiles, parseIgnoreLines, EMPTY_EXCLUSIONS } from './exclusions.js';
export type { ExclusionSet, ExclusionOptions } from './exclusions.js';
export {
  DEFAULT_EXCLUDE_DIRS,
  DEFAULT_EXCLUDE_FILES,
  DEFAULT_EXCLUDE_EXTENSIONS,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_RESPONSE_FILE,
} from './defaults.js';
export { hasWildcard, matchesWildcard } from './wildcard.js';

// Crawling
export { crawlDirectory, isExcludedDir, isExcludedFile } from './crawler.js';
export type { CrawlResult, CrawlOptions, DirectoryStructure, StructureEntry } from './crawler.js';

// Tree rendering
export { renderTree, renderDirectoryTree } from './tree.js';

// File reading
export { readFileContents, readFileContent, decodeBuffer, unreadablePlaceholder, DETECTION_SAMPLE_BYTES } from './reader.js';
export type { DecodedFile, ReadOptions } from './reader.js';

// Bundle
export { formatBundle, writeBundle } from './bundle.js';
