/**
 * Google Gemini adapter
 *
 * One generateContent call per prompt with fixed sampling settings
 * (temperature, maxOutputTokens, stopSequences from the config).
 * No retries; every failure is rethrown as ServiceCommunicationError.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { ModelParams } from '@google/generative-ai';
import type { ExtractionClient, ExtractionConfig, GenerateOptions } from '@/types';
import { assertApiKey } from '../check-env';
import { ServiceCommunicationError, errorMessage } from '../errors';
import type { ServiceFailureKind } from '../errors';

/** The slice of the SDK's GenerativeModel this adapter calls. */
export interface GeminiModelLike {
    generateContent(
        request: string,
        requestOptions?: { signal?: AbortSignal }
    ): Promise<{ response: { text(): string } }>;
}

export type GeminiModelFactory = (apiKey: string, params: ModelParams) => GeminiModelLike;

const defaultModelFactory: GeminiModelFactory = (apiKey, params) =>
    new GoogleGenerativeAI(apiKey).getGenerativeModel(params);

const RATE_LIMIT_PATTERNS = ['429', 'rate limit', 'quota', 'resource_exhausted', 'too many requests'];
const AUTH_PATTERNS = ['401', '403', 'api key not valid', 'api_key_invalid', 'permission denied', 'unauthenticated'];

export class GeminiExtractionClient implements ExtractionClient {
    readonly provider = 'gemini' as const;
    readonly model: string;
    private readonly generativeModel: GeminiModelLike;

    constructor(config: ExtractionConfig, createModel: GeminiModelFactory = defaultModelFactory) {
        assertApiKey(config);
        this.model = config.model;
        this.generativeModel = createModel(config.apiKey, {
            model: config.model,
            generationConfig: {
                temperature: config.temperature,
                maxOutputTokens: config.maxOutputTokens,
                stopSequences: config.stopSequences,
            },
        });
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        const start = Date.now();
        console.log(`[Gemini] Generating with ${this.model} (${prompt.length} prompt chars)...`);

        let text: string;
        try {
            const result = await this.generativeModel.generateContent(prompt, { signal: options.signal });
            // text() throws when the candidate was blocked
            text = result.response.text();
        } catch (error: unknown) {
            const message = errorMessage(error);
            throw new ServiceCommunicationError('gemini', classifyGeminiError(message), message, { cause: error });
        }

        if (!text) {
            throw new ServiceCommunicationError('gemini', 'empty_response', 'Empty response from Gemini');
        }

        console.log(`[Gemini] ✓ Generated ${text.length} chars in ${Date.now() - start}ms`);
        return text;
    }
}

export function classifyGeminiError(message: string): ServiceFailureKind {
    const lower = message.toLowerCase();
    if (lower.includes('blocked')) return 'empty_response';
    if (RATE_LIMIT_PATTERNS.some(p => lower.includes(p))) return 'rate_limit';
    if (AUTH_PATTERNS.some(p => lower.includes(p))) return 'auth';
    if (/\[\d{3}/.test(message)) return 'http';
    return 'network';
}
