import { describe, it, expect } from 'vitest';
import { createExtractionConfig, loadExtractionConfig } from '../src/lib/check-env';
import { ConfigurationError } from '../src/lib/errors';

describe('loadExtractionConfig', () => {
    it('defaults to gemini with fixed sampling settings', () => {
        expect(loadExtractionConfig({ GEMINI_API_KEY: 'test-secret' })).toEqual({
            provider: 'gemini',
            apiKey: 'test-secret',
            model: 'gemini-1.5-flash',
            temperature: 0.2,
            maxOutputTokens: 2000,
            stopSequences: ['END_OF_JSON'],
        });
    });

    it('reads openrouter settings and overrides', () => {
        const config = loadExtractionConfig({
            RESUME_PARSER_PROVIDER: 'OpenRouter',
            OPENROUTER_API_KEY: ' test-secret ',
            RESUME_PARSER_MODEL: 'anthropic/claude-3-haiku',
            RESUME_PARSER_TEMPERATURE: '0',
            RESUME_PARSER_MAX_TOKENS: '1500',
            RESUME_PARSER_STOP_SEQUENCE: '<<END>>',
        });
        expect(config).toEqual({
            provider: 'openrouter',
            apiKey: 'test-secret',
            model: 'anthropic/claude-3-haiku',
            temperature: 0,
            maxOutputTokens: 1500,
            stopSequences: ['<<END>>'],
        });
    });

    it('throws ConfigurationError when the key is missing', () => {
        expect(() => loadExtractionConfig({})).toThrow(ConfigurationError);
        expect(() => loadExtractionConfig({ GEMINI_API_KEY: '   ' })).toThrow('CONFIG_MISSING: GEMINI_API_KEY is not set');
        // key for the other provider does not count
        expect(() => loadExtractionConfig({ RESUME_PARSER_PROVIDER: 'openrouter', GEMINI_API_KEY: 'test-secret' }))
            .toThrow('CONFIG_MISSING: OPENROUTER_API_KEY is not set');
    });

    it('rejects unknown providers and bad numbers', () => {
        expect(() => loadExtractionConfig({ RESUME_PARSER_PROVIDER: 'mistral', GEMINI_API_KEY: 'test-secret' }))
            .toThrow(/^CONFIG_INVALID: RESUME_PARSER_PROVIDER/);
        expect(() => loadExtractionConfig({ GEMINI_API_KEY: 'test-secret', RESUME_PARSER_TEMPERATURE: 'warm' }))
            .toThrow(/^CONFIG_INVALID: RESUME_PARSER_TEMPERATURE/);
        expect(() => loadExtractionConfig({ GEMINI_API_KEY: 'test-secret', RESUME_PARSER_MAX_TOKENS: '0' }))
            .toThrow(/^CONFIG_INVALID: RESUME_PARSER_MAX_TOKENS/);
    });
});

describe('createExtractionConfig', () => {
    it('fills defaults around an explicit key', () => {
        expect(createExtractionConfig('openrouter', 'test-secret', { temperature: 0.1 })).toEqual({
            provider: 'openrouter',
            apiKey: 'test-secret',
            model: 'google/gemini-2.0-flash-001',
            temperature: 0.1,
            maxOutputTokens: 2000,
            stopSequences: ['END_OF_JSON'],
        });
    });
});
