export * from './types';
export {
    ResumeParserError,
    ConfigurationError,
    ServiceCommunicationError,
    StructuredDecodeFailure,
} from './lib/errors';
export type { ResumeParserErrorCode, ServiceFailureKind } from './lib/errors';
export { loadExtractionConfig, createExtractionConfig } from './lib/check-env';
export { buildResumePrompt, REQUIRED_RESUME_FIELDS } from './lib/resume-parser-prompt';
export { createExtractionClient } from './lib/ai-router';
export { GeminiExtractionClient } from './lib/adapters/gemini';
export { OpenRouterExtractionClient } from './lib/adapters/openrouter';
export { extractJsonObject, tryExtractJsonObject } from './lib/json-extractor';
export { parseResumeFallback } from './lib/fallback-parser';
export { normalizeResumeRecord, emptyResumeRecord } from './lib/resume-normalizer';
export { extractContactsFromText, supplementContacts } from './lib/contact-extractor';
export { cleanResumeText } from './lib/text-cleaner';
export { ResumeParser, parseResume } from './lib/resume-parser-service';
export type { ResumeParserSettings } from './lib/resume-parser-service';
