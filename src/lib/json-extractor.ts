/**
 * Pull a JSON object out of generated text.
 *
 * Models wrap their JSON in prose and markdown fences even when told not to,
 * so the object is taken as the span from the first `{` to the last `}`.
 * Only syntax is checked here; schema defaults are applied by the normalizer.
 */

import { StructuredDecodeFailure, errorMessage } from './errors';

export function extractJsonObject(text: string): Record<string, unknown> {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');

    if (start < 0 || end <= start) {
        throw new StructuredDecodeFailure('No JSON object found in AI response');
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(text.slice(start, end + 1));
    } catch (error: unknown) {
        throw new StructuredDecodeFailure(`Invalid JSON in AI response: ${errorMessage(error)}`, { cause: error });
    }

    if (!isJsonObject(decoded)) {
        throw new StructuredDecodeFailure('AI response JSON is not an object');
    }

    return decoded;
}

/**
 * Same as extractJsonObject, returning null instead of throwing.
 */
export function tryExtractJsonObject(text: string): Record<string, unknown> | null {
    try {
        return extractJsonObject(text);
    } catch (error: unknown) {
        if (error instanceof StructuredDecodeFailure) return null;
        throw error;
    }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
