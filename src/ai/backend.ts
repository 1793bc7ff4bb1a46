/**
 * Model backend contract shared by every provider.
 *
 * A backend sends one prompt and returns the reply text. It throws
 * ProviderError for HTTP or payload problems; the gateway decides what to
 * do with that.
 */

import { ProviderError } from '../errors.js';

export type ProviderName = 'anthropic' | 'gemini';

export interface ModelBackend {
    readonly provider: ProviderName;
    readonly model: string;
    complete(prompt: string, systemInstruction: string): Promise<string>;
}

export interface BackendOptions {
    apiKey: string;
    model?: string;
    temperature?: number;
    maxTokens?: number;
    /** Abort the request after this many ms; no timeout when omitted */
    timeoutMs?: number;
    verbose?: boolean;
}

export const DEFAULT_TEMPERATURE = 0.1;

/**
 * POST a JSON body and return the parsed JSON reply.
 * Non-2xx responses become ProviderError carrying the status and body.
 */
export async function postJson(
    provider: ProviderName,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    timeoutMs?: number
): Promise<unknown> {
    const controller = new AbortController();
    const timer = timeoutMs !== undefined ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

    let response: Response;
    try {
        response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal: controller.signal,
        });
    } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') {
            throw new ProviderError(`Request timed out after ${(timeoutMs ?? 0) / 1000}s`, provider);
        }
        throw err;
    } finally {
        if (timer) clearTimeout(timer);
    }

    if (!response.ok) {
        const error = await response.text();
        throw new ProviderError(`HTTP ${response.status}: ${error}`, provider, response.status);
    }

    return response.json();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Join the `text` fields of an array of content blocks / parts.
 */
export function collectText(blocks: unknown): string {
    if (!Array.isArray(blocks)) return '';
    return blocks
        .map(block => (isRecord(block) && typeof block.text === 'string' ? block.text : ''))
        .join('');
}
