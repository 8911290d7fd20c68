/**
 * Error taxonomy for the résumé parser.
 *
 * Messages keep the `CODE: detail` shape so callers that only look at
 * `error.message` can still branch on the prefix.
 */

import type { ExtractionProvider } from '@/types';

export type ResumeParserErrorCode =
    | 'CONFIG_MISSING'
    | 'CONFIG_INVALID'
    | 'SERVICE_FAILED'
    | 'PARSE_FAILED';

export class ResumeParserError extends Error {
    readonly code: ResumeParserErrorCode;

    constructor(code: ResumeParserErrorCode, detail: string, options?: { cause?: unknown }) {
        super(`${code}: ${detail}`, options);
        this.name = 'ResumeParserError';
        this.code = code;
    }
}

/** Credential or setting missing/invalid. Raised before any network call. */
export class ConfigurationError extends ResumeParserError {
    constructor(detail: string, code: 'CONFIG_MISSING' | 'CONFIG_INVALID' = 'CONFIG_MISSING') {
        super(code, detail);
        this.name = 'ConfigurationError';
    }
}

export type ServiceFailureKind = 'network' | 'auth' | 'rate_limit' | 'http' | 'empty_response';

/** The external generation API could not be reached or refused the request. */
export class ServiceCommunicationError extends ResumeParserError {
    readonly provider: ExtractionProvider;
    readonly kind: ServiceFailureKind;
    readonly status?: number;

    constructor(
        provider: ExtractionProvider,
        kind: ServiceFailureKind,
        detail: string,
        options?: { status?: number; cause?: unknown }
    ) {
        super('SERVICE_FAILED', `${provider} ${kind}: ${detail}`, { cause: options?.cause });
        this.name = 'ServiceCommunicationError';
        this.provider = provider;
        this.kind = kind;
        this.status = options?.status;
    }
}

/** Generated text held no decodable JSON object. Recovered by the fallback parser. */
export class StructuredDecodeFailure extends ResumeParserError {
    constructor(detail: string, options?: { cause?: unknown }) {
        super('PARSE_FAILED', detail, options);
        this.name = 'StructuredDecodeFailure';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
