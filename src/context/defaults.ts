/**
 * Built-in exclusions applied unless the caller turns defaults off.
 * Frozen so every crawl starts from the same lists.
 */

/** Directories that are never worth sending: VCS metadata, dependencies, caches, virtualenvs */
export const DEFAULT_EXCLUDE_DIRS: readonly string[] = Object.freeze([
    '.git',
    '.svn',
    '.hg',
    'node_modules',
    'bower_components',
    '__pycache__',
    '.pytest_cache',
    '.mypy_cache',
    '.ruff_cache',
    '.tox',
    'venv',
    '.venv',
    '.idea',
    '.vscode',
    '.cache',
    '.turbo',
    '.next',
    'docs',
]);

/** Lock files, OS junk and packaging manifests */
export const DEFAULT_EXCLUDE_FILES: readonly string[] = Object.freeze([
    'setup.py',
    'requirements.txt',
    'package-lock.json',
    'yarn.lock',
    'pnpm-lock.yaml',
    'poetry.lock',
    'Cargo.lock',
    '.DS_Store',
    'Thumbs.db',
    'desktop.ini',
]);

/** Compiled and binary suffixes */
export const DEFAULT_EXCLUDE_EXTENSIONS: readonly string[] = Object.freeze([
    '.pyc', '.pyo', '.pyd',
    '.class', '.o', '.obj', '.so', '.dll', '.dylib', '.exe',
    '.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.webp',
    '.zip', '.tar', '.gz', '.7z', '.rar',
    '.pdf', '.woff', '.woff2', '.ttf', '.eot',
    '.mp3', '.mp4', '.mov', '.wav',
]);

/** Default bundle artifact and persisted reply file names */
export const DEFAULT_OUTPUT_FILE = 'all_code.txt';
export const DEFAULT_RESPONSE_FILE = 'response.md';
