/**
 * Resume Parser Service: extraction pipeline
 *
 * prompt → extraction client → JSON decode → (on decode failure) heuristic
 * fallback over the raw response → contact supplement → frozen record.
 *
 * Client errors (configuration, service communication) abort the parse.
 * Decode failures never reach the caller.
 */

import type {
    ExtractionClient,
    ExtractionConfig,
    ExtractionPath,
    ParseResumeOptions,
    ParseResumeResult,
    ResumeRecord,
} from '@/types';
import { createExtractionClient } from './ai-router';
import { supplementContacts } from './contact-extractor';
import { StructuredDecodeFailure, errorMessage } from './errors';
import { parseResumeFallback } from './fallback-parser';
import { extractJsonObject } from './json-extractor';
import { buildResumePrompt } from './resume-parser-prompt';
import { freezeRecord, normalizeResumeRecord } from './resume-normalizer';

export interface ResumeParserSettings {
    /** Marker the prompt asks the model to end with; match the client's stop sequence. */
    stopMarker?: string;
    /** Default for ParseResumeOptions.supplementContacts */
    supplementContacts?: boolean;
}

export class ResumeParser {
    private readonly client: ExtractionClient;
    private readonly stopMarker?: string;
    private readonly supplementByDefault: boolean;

    constructor(client: ExtractionClient, settings: ResumeParserSettings = {}) {
        this.client = client;
        this.stopMarker = settings.stopMarker;
        this.supplementByDefault = settings.supplementContacts ?? true;
    }

    async parse(resumeText: string, options: ParseResumeOptions = {}): Promise<ResumeRecord> {
        const result = await this.parseWithDetails(resumeText, options);
        return result.record;
    }

    /**
     * Parse and report which path produced the record.
     */
    async parseWithDetails(resumeText: string, options: ParseResumeOptions = {}): Promise<ParseResumeResult> {
        const start = Date.now();
        const prompt = buildResumePrompt(resumeText, this.stopMarker);

        console.log(`[Resume Parser] Sending ${resumeText.length} chars to ${this.client.provider}…`);

        let raw: string;
        try {
            raw = await this.client.generate(prompt, { signal: options.signal });
        } catch (error: unknown) {
            console.error('[Resume Parser] Extraction call failed:', errorMessage(error));
            throw error;
        }

        let record: ResumeRecord;
        let path: ExtractionPath;
        try {
            record = normalizeResumeRecord(extractJsonObject(raw));
            path = 'structured';
            console.log('[Resume Parser] ✓ Structured extraction succeeded');
        } catch (error: unknown) {
            if (!(error instanceof StructuredDecodeFailure)) throw error;
            console.warn(`[Resume Parser] ${error.message}; using heuristic fallback`);
            record = parseResumeFallback(raw);
            path = 'fallback';
        }

        if (options.supplementContacts ?? this.supplementByDefault) {
            record = supplementContacts(record, resumeText);
        }

        return {
            record: freezeRecord(record),
            path,
            provider: this.client.provider,
            model: this.client.model,
            raw_response: raw,
            elapsed_ms: Date.now() - start,
        };
    }
}

/**
 * One-shot helper: build the client from `config` and parse `resumeText`.
 * ConfigurationError is raised here, before any request, when the key is empty.
 */
export async function parseResume(
    resumeText: string,
    config: ExtractionConfig,
    options: ParseResumeOptions = {}
): Promise<ResumeRecord> {
    const parser = new ResumeParser(createExtractionClient(config), { stopMarker: config.stopSequences[0] });
    return parser.parse(resumeText, options);
}
