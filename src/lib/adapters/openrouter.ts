/**
 * OpenRouter adapter (OpenAI-compatible chat completions over fetch)
 */

import type { ExtractionClient, ExtractionConfig, GenerateOptions } from '@/types';
import { assertApiKey } from '../check-env';
import { ServiceCommunicationError, errorMessage } from '../errors';
import { isJsonObject } from '../json-extractor';
import type { ServiceFailureKind } from '../errors';

export const OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';

const BILLING_ERROR_PATTERNS = ['insufficient credits', 'payment required', 'billing', 'no credits'];
const RATE_LIMIT_PATTERNS = ['rate limit', 'quota exceeded', 'too many requests'];

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class OpenRouterExtractionClient implements ExtractionClient {
    readonly provider = 'openrouter' as const;
    readonly model: string;
    private readonly config: ExtractionConfig;
    private readonly fetchImpl: FetchLike;

    constructor(config: ExtractionConfig, fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
        assertApiKey(config);
        this.config = config;
        this.model = config.model;
        this.fetchImpl = fetchImpl;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        const start = Date.now();
        console.log(`[OpenRouter] Generating with ${this.model} (${prompt.length} prompt chars)...`);

        const requestBody = {
            model: this.model,
            messages: [{ role: 'user', content: prompt }],
            temperature: this.config.temperature,
            max_tokens: this.config.maxOutputTokens,
            stop: this.config.stopSequences,
            stream: false,
        };

        let response: Response;
        try {
            response = await this.fetchImpl(OPENROUTER_URL, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${this.config.apiKey}`,
                    'Content-Type': 'application/json',
                    'X-Title': 'resume-field-extractor',
                },
                body: JSON.stringify(requestBody),
                signal: options.signal,
            });
        } catch (error: unknown) {
            throw new ServiceCommunicationError('openrouter', 'network', errorMessage(error), { cause: error });
        }

        if (!response.ok) {
            const errorText = await response.text().catch(() => '');
            throw new ServiceCommunicationError(
                'openrouter',
                classifyHttpFailure(response.status, errorText),
                `HTTP ${response.status}${errorText ? ` - ${errorText.slice(0, 200)}` : ''}`,
                { status: response.status }
            );
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (error: unknown) {
            throw new ServiceCommunicationError('openrouter', 'empty_response', 'Response body was not JSON', { cause: error });
        }

        const content = readMessageContent(data);
        if (!content) {
            throw new ServiceCommunicationError('openrouter', 'empty_response', 'Empty response from OpenRouter');
        }

        console.log(`[OpenRouter] ✓ Generated ${content.length} chars in ${Date.now() - start}ms using ${this.model}`);
        return content;
    }
}

export function classifyHttpFailure(status: number, body: string): ServiceFailureKind {
    const lower = body.toLowerCase();
    if (status === 401 || status === 403) return 'auth';
    if (status === 429 || RATE_LIMIT_PATTERNS.some(p => lower.includes(p))) return 'rate_limit';
    if (status === 402 || BILLING_ERROR_PATTERNS.some(p => lower.includes(p))) return 'auth';
    return 'http';
}

/** `choices[0].message.content` when it is a string, else '' */
function readMessageContent(data: unknown): string {
    if (!isJsonObject(data) || !Array.isArray(data.choices)) return '';
    const first: unknown = data.choices[0];
    if (!isJsonObject(first) || !isJsonObject(first.message)) return '';
    const content = first.message.content;
    return typeof content === 'string' ? content : '';
}
