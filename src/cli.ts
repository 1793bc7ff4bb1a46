#!/usr/bin/env node

/**
 * repocoder CLI
 *
 * Bundle a source tree and send it to Anthropic or Gemini for review,
 * improvement, completion, correction or a custom action.
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { formatCodeForLlm, sendForReview, type ReviewOptions } from './pipeline.js';
import { listActions, DEFAULT_ACTION } from './ai/prompt.js';
import { DEFAULT_MODELS, parseProvider } from './ai/providers.js';
import { loadConfig, selectApiKey, CONFIG_TEMPLATE, type CliConfig } from './config.js';
import { DEFAULT_OUTPUT_FILE, DEFAULT_RESPONSE_FILE } from './context/defaults.js';
import { ValidationError, getErrorMessage } from './errors.js';

dotenv.config();

/** package.json sits one level up from src/ and two from dist/src/ */
function readVersion(): string {
    for (const candidate of ['../package.json', '../../package.json']) {
        const url = new URL(candidate, import.meta.url);
        if (!existsSync(url)) continue;
        const parsed: unknown = JSON.parse(readFileSync(url, 'utf-8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
            return parsed.version;
        }
    }
    return '0.0.0';
}

const program = new Command();

const collect = (value: string, previous: string[]): string[] => previous.concat([value]);

interface ReviewCliOptions {
    action: string;
    provider: string;
    model?: string;
    apiKey?: string;
    output: string;
    responseFile: string;
    excludeDir: string[];
    excludeFile: string[];
    excludeExt: string[];
    defaults: boolean;
    gitignore: boolean;
    timeout?: string;
    configPath?: string;
    verbose?: boolean;
}

/**
 * Merge CLI flags over the config file: a flag wins only when it was
 * actually given on the command line.
 */
function buildReviewOptions(directory: string | undefined, options: ReviewCliOptions, command: Command): ReviewOptions {
    let config: CliConfig = {};
    if (options.configPath) {
        config = loadConfig(options.configPath);
        if (options.verbose || config.verbose) {
            console.log(`📄 Config loaded from: ${resolve(options.configPath)}`);
        }
    }

    const fromCli = (name: string) => command.getOptionValueSource(name) === 'cli';
    const pick = <T>(name: string, cliValue: T, configValue: T | undefined): T =>
        fromCli(name) || configValue === undefined ? cliValue : configValue;

    const timeoutSecs = options.timeout !== undefined && fromCli('timeout')
        ? Number(options.timeout)
        : config.timeoutSecs;
    if (timeoutSecs !== undefined && (!Number.isFinite(timeoutSecs) || timeoutSecs <= 0)) {
        throw new ValidationError('Timeout must be a positive number of seconds.', 'timeout');
    }

    const provider = parseProvider(pick('provider', options.provider, config.provider));
    const { apiKey, source } = selectApiKey(provider, fromCli('apiKey') ? options.apiKey : undefined, config.apiKey);
    if (source && (options.verbose || config.verbose)) {
        console.log(`🔑 API key from: ${source}`);
    }

    return {
        directory: directory ?? config.directory ?? '.',
        action: pick('action', options.action, config.action),
        provider,
        model: options.model ?? config.model,
        apiKey,
        outputFile: pick('output', options.output, config.output),
        responseFile: pick('responseFile', options.responseFile, config.responseFile),
        excludeDirs: [...(config.excludeDirs ?? []), ...options.excludeDir],
        excludeFiles: [...(config.excludeFiles ?? []), ...options.excludeFile],
        excludeExtensions: [...(config.excludeExtensions ?? []), ...options.excludeExt],
        useDefaults: pick('defaults', options.defaults, config.useDefaults),
        useGitignore: pick('gitignore', options.gitignore, config.useGitignore),
        timeoutMs: timeoutSecs !== undefined ? timeoutSecs * 1000 : undefined,
        verbose: options.verbose ?? config.verbose ?? false,
    };
}

program
    .name('repocoder')
    .description('Bundle a source tree and send it to an LLM for review')
    .version(readVersion());

/**
 * Review command - bundle, send, render
 */
program
    .command('review')
    .description('Bundle a directory and send it to the model with an action')
    .argument('[directory]', 'Directory to bundle (default: current directory)')
    .option('-a, --action <action>', 'code-review, code-improvement, code-completion, code-correction, or custom text', DEFAULT_ACTION)
    .option('-p, --provider <name>', 'Provider: anthropic, gemini', 'anthropic')
    .option('-m, --model <model>', `Model (default: ${DEFAULT_MODELS.anthropic} / ${DEFAULT_MODELS.gemini})`)
    .option('--api-key <key>', 'API key (overrides ANTHROPIC_API_KEY / GEMINI_API_KEY)')
    .option('-o, --output <file>', 'Bundle output file', DEFAULT_OUTPUT_FILE)
    .option('--response-file <file>', 'File the reply is saved to', DEFAULT_RESPONSE_FILE)
    .option('--exclude-dir <name>', 'Exclude a directory name or pattern (repeatable)', collect, [])
    .option('--exclude-file <name>', 'Exclude a file name or pattern (repeatable)', collect, [])
    .option('--exclude-ext <ext>', 'Exclude an extension, e.g. .log or *.min.js (repeatable)', collect, [])
    .option('--no-defaults', 'Do not apply the built-in exclusions')
    .option('--no-gitignore', 'Do not read .gitignore')
    .option('--timeout <secs>', 'Abort the API request after this many seconds')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (directory: string | undefined, options: ReviewCliOptions, command: Command) => {
        try {
            const reviewOptions = buildReviewOptions(directory, options, command);
            const provider = parseProvider(reviewOptions.provider ?? 'anthropic');
            const startTime = Date.now();

            console.log('🚀 Review Started');
            console.log(`📁 Directory: ${resolve(reviewOptions.directory ?? '.')}`);
            console.log(`📝 Action: ${reviewOptions.action}`);
            console.log(`🤖 Provider: ${provider} (${reviewOptions.model || DEFAULT_MODELS[provider]})`);
            console.log();

            const reply = await sendForReview(reviewOptions);

            if (reply) {
                console.log();
                console.log(`✅ Reply saved to ${resolve(reviewOptions.responseFile ?? DEFAULT_RESPONSE_FILE)}`);
                console.log(`⏱️  Total time: ${((Date.now() - startTime) / 1000).toFixed(2)}s`);
            } else {
                process.exitCode = 1;
            }
        } catch (error) {
            console.error('Error:', getErrorMessage(error));
            process.exitCode = 1;
        }
    });

/**
 * Bundle command - write the bundle only
 */
program
    .command('bundle')
    .description('Write the directory bundle without calling a model')
    .argument('[directory]', 'Directory to bundle (default: current directory)')
    .option('-o, --output <file>', 'Bundle output file', DEFAULT_OUTPUT_FILE)
    .option('--exclude-dir <name>', 'Exclude a directory name or pattern (repeatable)', collect, [])
    .option('--exclude-file <name>', 'Exclude a file name or pattern (repeatable)', collect, [])
    .option('--exclude-ext <ext>', 'Exclude an extension (repeatable)', collect, [])
    .option('--no-defaults', 'Do not apply the built-in exclusions')
    .option('--no-gitignore', 'Do not read .gitignore')
    .option('--verbose', 'Verbose output')
    .action((directory: string | undefined, options: Omit<ReviewCliOptions, 'action' | 'provider' | 'responseFile'>) => {
        try {
            const result = formatCodeForLlm({
                directory: directory ?? '.',
                outputFile: options.output,
                excludeDirs: options.excludeDir,
                excludeFiles: options.excludeFile,
                excludeExtensions: options.excludeExt,
                useDefaults: options.defaults,
                useGitignore: options.gitignore,
                verbose: options.verbose ?? false,
            });
            console.log(`✅ Bundled ${result.files.length} file(s) into ${resolve(result.outputFile)}`);
            console.log(`📦 Size: ${(result.content.length / 1024).toFixed(1)}KB`);
        } catch (error) {
            console.error('Error:', getErrorMessage(error));
            process.exitCode = 1;
        }
    });

/**
 * Actions command - list the built-in actions
 */
program
    .command('actions')
    .description('List the available actions')
    .action(() => {
        for (const line of listActions()) console.log(line);
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'repocoder.config.json')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exitCode = 1;
                return;
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: repocoder review --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', getErrorMessage(error));
            process.exitCode = 1;
        }
    });

// Parse arguments and run
program.parseAsync().catch((error: unknown) => {
    console.error('Error:', getErrorMessage(error));
    process.exitCode = 1;
});
