import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResumeParser, parseResume } from '../src/lib/resume-parser-service';
import { createExtractionConfig } from '../src/lib/check-env';
import { ConfigurationError, ServiceCommunicationError } from '../src/lib/errors';
import { REQUIRED_RESUME_FIELDS } from '../src/lib/resume-parser-prompt';
import type { ExtractionClient, GenerateOptions } from '../src/types';

/** In-process client that records prompts and answers from `reply`. */
class StubClient implements ExtractionClient {
    readonly provider = 'gemini' as const;
    readonly model = 'stub-model';
    readonly prompts: string[] = [];
    private readonly reply: () => Promise<string>;

    constructor(reply: string | (() => Promise<string>)) {
        this.reply = typeof reply === 'string' ? async () => reply : reply;
    }

    async generate(prompt: string, _options?: GenerateOptions): Promise<string> {
        this.prompts.push(prompt);
        return this.reply();
    }
}

const FENCED_REPLY = [
    'Here is the result:',
    '```json',
    '{"full_name":"Jane Doe","contact_info":{"email":"jane@example.com"},"skills":["TypeScript"]}',
    '```',
].join('\n');

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ResumeParser', () => {
    it('decodes JSON wrapped in prose and fences', async () => {
        const parser = new ResumeParser(new StubClient(FENCED_REPLY));
        const result = await parser.parseWithDetails('Jane Doe\njane@example.com');

        expect(result.path).toBe('structured');
        expect(result.provider).toBe('gemini');
        expect(result.model).toBe('stub-model');
        expect(result.raw_response).toBe(FENCED_REPLY);
        expect(result.record).toEqual({
            full_name: 'Jane Doe',
            contact_info: { email: 'jane@example.com', phone: '', linkedin: '', location: '' },
            education: [],
            work_experience: [],
            skills: ['TypeScript'],
            certifications: [],
            projects: [],
            summary: '',
        });
    });

    it('sends one prompt containing the résumé text and stop marker', async () => {
        const client = new StubClient('{}');
        const parser = new ResumeParser(client, { stopMarker: 'END_OF_JSON' });

        await parser.parse('Jane Doe\nSoftware Engineer');

        expect(client.prompts).toHaveLength(1);
        expect(client.prompts[0]).toContain('Jane Doe\nSoftware Engineer');
        expect(client.prompts[0]).toContain('END_OF_JSON');
    });

    it('falls back to the heuristic parser on undecodable output', async () => {
        const parser = new ResumeParser(new StubClient('Name: John Smith\n\nSkills\nPython, SQL'));
        const result = await parser.parseWithDetails('irrelevant');

        expect(result.path).toBe('fallback');
        expect(result.record.full_name).toBe('John Smith');
        expect(result.record.skills).toEqual(['Python', 'SQL']);
        expect(result.record.education).toEqual([]);
    });

    it('falls back on malformed JSON as well', async () => {
        const parser = new ResumeParser(new StubClient('{"full_name": "Jane", }'));
        const result = await parser.parseWithDetails('irrelevant');

        expect(result.path).toBe('fallback');
        expect(Object.keys(result.record).sort()).toEqual([...REQUIRED_RESUME_FIELDS].sort());
    });

    it('propagates service failures unchanged', async () => {
        const failure = new ServiceCommunicationError('gemini', 'network', 'fetch failed');
        const parser = new ResumeParser(new StubClient(() => Promise.reject(failure)));

        await expect(parser.parse('text')).rejects.toBe(failure);
    });

    it('fills missing contacts from the résumé text', async () => {
        const text = 'Contact me at jane@example.com or +1 555 123 4567';
        const parser = new ResumeParser(new StubClient('{"full_name":"Jane"}'));

        const record = await parser.parse(text);
        expect(record.contact_info.email).toBe('jane@example.com');
        expect(record.contact_info.phone).toBe('+1 555 123 4567');

        const bare = await parser.parse(text, { supplementContacts: false });
        expect(bare.contact_info.email).toBe('');
        expect(bare.contact_info.phone).toBe('');
    });

    it('returns a frozen record', async () => {
        const parser = new ResumeParser(new StubClient(FENCED_REPLY));
        const record = await parser.parse('Jane Doe');

        expect(Object.isFrozen(record)).toBe(true);
        expect(Object.isFrozen(record.contact_info)).toBe(true);
        expect(() => {
            record.skills.push('Rust');
        }).toThrow(TypeError);
    });
});

describe('parseResume', () => {
    it('raises ConfigurationError before any request when the key is empty', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch');

        await expect(parseResume('Jane Doe', createExtractionConfig('openrouter', ''))).rejects.toThrow(ConfigurationError);
        await expect(parseResume('Jane Doe', createExtractionConfig('gemini', ''))).rejects.toThrow(
            'CONFIG_MISSING: GEMINI_API_KEY is not set'
        );
        expect(fetchSpy).not.toHaveBeenCalled();
    });
});
