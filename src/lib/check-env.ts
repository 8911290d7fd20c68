/**
 * Extraction configuration
 *
 * Builds the ExtractionConfig from an environment map. Library code never
 * reads process.env on its own; callers load `.env` (dotenv) and hand the
 * result in here, or build the config object directly.
 */

import type { ExtractionConfig, ExtractionProvider } from '@/types';
import { ConfigurationError } from './errors';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2000;
export const DEFAULT_STOP_SEQUENCE = 'END_OF_JSON';

const DEFAULT_MODELS: Record<ExtractionProvider, string> = {
    gemini: 'gemini-1.5-flash',
    openrouter: 'google/gemini-2.0-flash-001',
};

const API_KEY_VARS: Record<ExtractionProvider, string> = {
    gemini: 'GEMINI_API_KEY',
    openrouter: 'OPENROUTER_API_KEY',
};

type EnvMap = Record<string, string | undefined>;

// ============================================================================
// LOADING
// ============================================================================

/**
 * Read the extraction settings from `env` (defaults to process.env).
 * Throws ConfigurationError when the provider's API key is absent or a
 * numeric setting does not parse.
 */
export function loadExtractionConfig(env: EnvMap = process.env): ExtractionConfig {
    const provider = parseProvider(env.RESUME_PARSER_PROVIDER);

    const keyVar = API_KEY_VARS[provider];
    const apiKey = (env[keyVar] || '').trim();
    if (!apiKey) {
        throw new ConfigurationError(`${keyVar} is not set. Add it to your environment or .env file.`);
    }

    return {
        provider,
        apiKey,
        model: (env.RESUME_PARSER_MODEL || '').trim() || DEFAULT_MODELS[provider],
        temperature: parseNumber('RESUME_PARSER_TEMPERATURE', env.RESUME_PARSER_TEMPERATURE, DEFAULT_TEMPERATURE, 0, 1),
        maxOutputTokens: Math.floor(
            parseNumber('RESUME_PARSER_MAX_TOKENS', env.RESUME_PARSER_MAX_TOKENS, DEFAULT_MAX_OUTPUT_TOKENS, 1, 32768)
        ),
        stopSequences: [env.RESUME_PARSER_STOP_SEQUENCE || DEFAULT_STOP_SEQUENCE],
    };
}

/**
 * Fill the sampling defaults around an explicit provider/key pair.
 */
export function createExtractionConfig(
    provider: ExtractionProvider,
    apiKey: string,
    overrides: Partial<Omit<ExtractionConfig, 'provider' | 'apiKey'>> = {}
): ExtractionConfig {
    return {
        provider,
        apiKey,
        model: overrides.model ?? DEFAULT_MODELS[provider],
        temperature: overrides.temperature ?? DEFAULT_TEMPERATURE,
        maxOutputTokens: overrides.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        stopSequences: overrides.stopSequences ?? [DEFAULT_STOP_SEQUENCE],
    };
}

/**
 * Guard used by every adapter constructor, so an empty credential fails
 * before a request is ever built.
 */
export function assertApiKey(config: ExtractionConfig): void {
    if (!config.apiKey || !config.apiKey.trim()) {
        throw new ConfigurationError(`${API_KEY_VARS[config.provider]} is not set. Add it to your environment or .env file.`);
    }
}

// ============================================================================
// HELPERS
// ============================================================================

function parseProvider(raw: string | undefined): ExtractionProvider {
    const value = (raw || 'gemini').trim().toLowerCase();
    if (value === 'gemini' || value === 'openrouter') return value;
    throw new ConfigurationError(
        `RESUME_PARSER_PROVIDER must be "gemini" or "openrouter", got "${raw}"`,
        'CONFIG_INVALID'
    );
}

function parseNumber(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min || value > max) {
        throw new ConfigurationError(`${name} must be a number between ${min} and ${max}, got "${raw}"`, 'CONFIG_INVALID');
    }
    return value;
}
