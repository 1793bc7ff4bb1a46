/**
 * API Gateway
 *
 * resolveApiKey()   → explicit key, else the provider's env variable
 * createBackend()   → concrete ModelBackend for a provider
 * sendToProvider()  → one request, reply text or null (errors go to stderr)
 */

import { ConfigurationError, ProviderError, getErrorMessage } from '../errors.js';
import { AnthropicBackend, ANTHROPIC_DEFAULT_MODEL } from './anthropic.js';
import { GeminiBackend, GEMINI_DEFAULT_MODEL } from './gemini.js';
import type { ModelBackend, ProviderName } from './backend.js';
import { SYSTEM_INSTRUCTION, createPrompt } from './prompt.js';

export const PROVIDERS: readonly ProviderName[] = ['anthropic', 'gemini'];

export const API_KEY_ENV = {
    anthropic: 'ANTHROPIC_API_KEY',
    gemini: 'GEMINI_API_KEY',
} as const satisfies Record<ProviderName, string>;

export const DEFAULT_MODELS: Readonly<Record<ProviderName, string>> = {
    anthropic: ANTHROPIC_DEFAULT_MODEL,
    gemini: GEMINI_DEFAULT_MODEL,
};

const DISPLAY_NAMES: Readonly<Record<ProviderName, string>> = {
    anthropic: 'Anthropic',
    gemini: 'Gemini',
};

export interface SendOptions {
    model?: string;
    apiKey?: string;
    temperature?: number;
    maxTokens?: number;
    timeoutMs?: number;
    verbose?: boolean;
}

export function parseProvider(name: string): ProviderName {
    const normalized = name.trim().toLowerCase();
    const match = PROVIDERS.find(p => p === normalized);
    if (!match) {
        throw new ConfigurationError(
            `Unsupported LLM: ${name}. Please choose either 'anthropic' or 'gemini'.`,
            'provider'
        );
    }
    return match;
}

/**
 * Explicit key first, then the environment. Throws before any request is made.
 */
export function resolveApiKey(provider: ProviderName, explicit?: string): string {
    const apiKey = explicit?.trim() || process.env[API_KEY_ENV[provider]]?.trim();
    if (!apiKey) {
        throw new ConfigurationError(
            `${DISPLAY_NAMES[provider]} API key not provided.\n` +
            `Pass it with --api-key or set ${API_KEY_ENV[provider]} in the environment or .env.`,
            'apiKey',
            { provider }
        );
    }
    return apiKey;
}

export function createBackend(provider: ProviderName, options: SendOptions & { apiKey: string }): ModelBackend {
    switch (provider) {
        case 'anthropic':
            return new AnthropicBackend(options);
        case 'gemini':
            return new GeminiBackend(options);
    }
}

/**
 * Single attempt against an already-built backend. Provider and unexpected
 * errors are printed to stderr and turned into null.
 */
export async function requestCompletion(
    backend: ModelBackend,
    content: string,
    action: string
): Promise<string | null> {
    const name = DISPLAY_NAMES[backend.provider];
    try {
        return await backend.complete(createPrompt(content, action), SYSTEM_INSTRUCTION);
    } catch (error) {
        if (error instanceof ProviderError) {
            console.error(`${name} API error: ${error.message}`);
        } else {
            console.error(`Error sending to ${name} API: ${getErrorMessage(error)}`);
        }
        return null;
    }
}

/**
 * Resolve the key, build the backend and send. A missing key throws
 * ConfigurationError; everything after that resolves to text or null.
 */
export async function sendToProvider(
    provider: ProviderName,
    content: string,
    action: string,
    options: SendOptions = {}
): Promise<string | null> {
    const apiKey = resolveApiKey(provider, options.apiKey);
    const backend = createBackend(provider, { ...options, apiKey });
    return requestCompletion(backend, content, action);
}

export function sendToAnthropic(content: string, action: string, options: SendOptions = {}): Promise<string | null> {
    return sendToProvider('anthropic', content, action, options);
}

export function sendToGemini(content: string, action: string, options: SendOptions = {}): Promise<string | null> {
    return sendToProvider('gemini', content, action, options);
}
