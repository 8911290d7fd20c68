import { describe, it, expect } from 'vitest';
import { cleanResumeText } from '../src/lib/text-cleaner';

describe('cleanResumeText', () => {
    it('returns empty string for empty input', () => {
        expect(cleanResumeText('')).toBe('');
    });

    it('normalizes reader output while keeping section breaks', () => {
        const raw = [
            '  John   Doe  ',
            '',
            '',
            '',
            'EXPERIENCE',
            '• Built   APIs',
            'Page 2 of 3',
            '12',
            'Jan',
            '2020 - Present',
            'https://',
            'example.com',
        ].join('\r\n');

        expect(cleanResumeText(raw)).toBe(
            'John Doe\n\nEXPERIENCE\n- Built APIs\n\nJan 2020 - Present\nhttps://example.com'
        );
    });

    it('drops control characters', () => {
        expect(cleanResumeText('Py\x07thon\x00')).toBe('Python');
    });
});
