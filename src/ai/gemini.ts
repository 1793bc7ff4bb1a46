/**
 * Google Gemini generateContent backend.
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

export const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';
export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-pro-002';
export const GEMINI_MAX_OUTPUT_TOKENS = 8192;

export class GeminiBackend implements ModelBackend {
    readonly provider = 'gemini' as const;
    readonly model: string;

    constructor(private readonly options: BackendOptions) {
        this.model = options.model || GEMINI_DEFAULT_MODEL;
    }

    get url(): string {
        return `${GEMINI_API_BASE}/${encodeURIComponent(this.model)}:generateContent`;
    }

    async complete(prompt: string, systemInstruction: string): Promise<string> {
        if (this.options.verbose) {
            console.log(`  Calling ${this.model}...`);
            console.log(`  Prompt size: ${(prompt.length / 1024).toFixed(1)}KB`);
        }

        const data = await postJson(
            this.provider,
            this.url,
            { 'x-goog-api-key': this.options.apiKey },
            {
                systemInstruction: { parts: [{ text: systemInstruction }] },
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                generationConfig: {
                    temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
                    maxOutputTokens: this.options.maxTokens ?? GEMINI_MAX_OUTPUT_TOKENS,
                    responseMimeType: 'text/plain',
                },
            },
            this.options.timeoutMs
        );

        const candidates = isRecord(data) && Array.isArray(data.candidates) ? data.candidates : [];
        const first: unknown = candidates[0];
        const content = isRecord(first) ? first.content : undefined;
        const text = isRecord(content) ? collectText(content.parts) : '';

        if (!text) {
            throw new ProviderError('Gemini API returned empty response', this.provider);
        }
        return text;
    }
}
