/**
 * CLI Config File Support
 *
 * One config file to control a review run:
 * - Provider settings (provider, model, apiKey, timeoutSecs)
 * - Action
 * - Bundling (directory, output, responseFile)
 * - Exclusions (excludeDirs, excludeFiles, excludeExtensions, useDefaults, useGitignore)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > env vars > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigurationError } from './errors.js';
import { API_KEY_ENV } from './ai/providers.js';
import type { ProviderName } from './ai/backend.js';

export interface CliConfig {
    // Provider
    provider?: string;
    model?: string;
    apiKey?: string;
    timeoutSecs?: number;

    // Action
    action?: string;

    // Bundling
    directory?: string;
    output?: string;
    responseFile?: string;

    // Exclusions
    excludeDirs?: string[];
    excludeFiles?: string[];
    excludeExtensions?: string[];
    useDefaults?: boolean;
    useGitignore?: boolean;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'provider', 'model', 'apiKey', 'timeoutSecs',
    'action',
    'directory', 'output', 'responseFile',
    'excludeDirs', 'excludeFiles', 'excludeExtensions', 'useDefaults', 'useGitignore',
    'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigurationError(`Config "${key}" must be a string`, key);
    return val;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isFinite(val)) {
        throw new ConfigurationError(`Config "${key}" must be a number`, key);
    }
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigurationError(`Config "${key}" must be a boolean`, key);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || !val.every((v): v is string => typeof v === 'string')) {
        throw new ConfigurationError(`Config "${key}" must be an array of strings`, key);
    }
    return val;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative "directory" resolves from the config file's directory
 * - Throws on missing file, invalid JSON or wrongly typed fields
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigurationError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigurationError(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigurationError(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isPlainObject(parsed)) {
        throw new ConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    // Provider
    if (obj.provider !== undefined) config.provider = assertString(obj, 'provider');
    if (obj.model !== undefined) config.model = assertString(obj, 'model');
    if (obj.apiKey !== undefined) {
        const apiKey = assertString(obj, 'apiKey');
        // `<...>` is the unedited init template
        if (!apiKey.trim().startsWith('<')) config.apiKey = apiKey;
    }
    if (obj.timeoutSecs !== undefined) config.timeoutSecs = assertNumber(obj, 'timeoutSecs');

    // Action
    if (obj.action !== undefined) config.action = assertString(obj, 'action');

    // Bundling
    if (obj.directory !== undefined) {
        const dir = assertString(obj, 'directory');
        config.directory = isAbsolute(dir) ? dir : resolve(configDir, dir);
    }
    if (obj.output !== undefined) config.output = assertString(obj, 'output');
    if (obj.responseFile !== undefined) config.responseFile = assertString(obj, 'responseFile');

    // Exclusions
    if (obj.excludeDirs !== undefined) config.excludeDirs = assertStringArray(obj, 'excludeDirs');
    if (obj.excludeFiles !== undefined) config.excludeFiles = assertStringArray(obj, 'excludeFiles');
    if (obj.excludeExtensions !== undefined) config.excludeExtensions = assertStringArray(obj, 'excludeExtensions');
    if (obj.useDefaults !== undefined) config.useDefaults = assertBoolean(obj, 'useDefaults');
    if (obj.useGitignore !== undefined) config.useGitignore = assertBoolean(obj, 'useGitignore');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── API key precedence ──────────────────────────────────────────────────────

export interface SelectedApiKey {
    apiKey?: string;
    source?: '--api-key' | (typeof API_KEY_ENV)[ProviderName] | 'config';
}

/**
 * --api-key first, then the provider's env variable (.env included once
 * dotenv has run), then the config file.
 */
export function selectApiKey(
    provider: ProviderName,
    cliApiKey: string | undefined,
    configApiKey: string | undefined
): SelectedApiKey {
    const fromCli = cliApiKey?.trim();
    if (fromCli) return { apiKey: fromCli, source: '--api-key' };

    const envName = API_KEY_ENV[provider];
    const fromEnv = process.env[envName]?.trim();
    if (fromEnv) return { apiKey: fromEnv, source: envName };

    const fromConfig = configApiKey?.trim();
    if (fromConfig) return { apiKey: fromConfig, source: 'config' };

    return {};
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Shows every available option with sensible defaults.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Provider
    provider: 'anthropic',
    model: 'claude-3-5-sonnet-20240620',
    apiKey: '<Set ANTHROPIC_API_KEY / GEMINI_API_KEY in .env or paste locally. Do not commit this file with apiKey>',
    timeoutSecs: 300,

    // Action
    action: 'code-review',

    // Bundling
    directory: '.',
    output: 'all_code.txt',
    responseFile: 'response.md',

    // Exclusions
    excludeDirs: ['dist', 'coverage'],
    excludeFiles: [],
    excludeExtensions: ['.log'],
    useDefaults: true,
    useGitignore: true,

    // Misc
    verbose: false,
};
