/**
 * Anthropic Messages API backend.
 */

import { ProviderError } from '../errors.js';
import {
    DEFAULT_TEMPERATURE,
    collectText,
    isRecord,
    postJson,
    type BackendOptions,
    type ModelBackend,
} from './backend.js';

export const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
export const ANTHROPIC_API_VERSION = '2023-06-01';
export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-sonnet-20240620';
export const ANTHROPIC_MAX_TOKENS = 4096;

export class AnthropicBackend implements ModelBackend {
    readonly provider = 'anthropic' as const;
    readonly model: string;

    constructor(private readonly options: BackendOptions) {
        this.model = options.model || ANTHROPIC_DEFAULT_MODEL;
    }

    async complete(prompt: string, systemInstruction: string): Promise<string> {
        if (this.options.verbose) {
            console.log(`  Calling ${this.model}...`);
            console.log(`  Prompt size: ${(prompt.length / 1024).toFixed(1)}KB`);
        }

        const data = await postJson(
            this.provider,
            ANTHROPIC_API_URL,
            {
                'x-api-key': this.options.apiKey,
                'anthropic-version': ANTHROPIC_API_VERSION,
            },
            {
                model: this.model,
                max_tokens: this.options.maxTokens ?? ANTHROPIC_MAX_TOKENS,
                temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
                system: systemInstruction,
                messages: [{ role: 'user', content: prompt }],
            },
            this.options.timeoutMs
        );

        const text = isRecord(data) ? collectText(data.content) : '';
        if (!text) {
            throw new ProviderError('Anthropic API returned empty response', this.provider);
        }
        return text;
    }
}
