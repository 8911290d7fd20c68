import { describe, it, expect } from 'vitest';
import { extractContactsFromText, supplementContacts } from '../src/lib/contact-extractor';
import { emptyResumeRecord } from '../src/lib/resume-normalizer';

const TEXT = 'Email: jane.doe@example.com | Phone: (555) 123-4567 | linkedin.com/in/janedoe';

describe('extractContactsFromText', () => {
    it('finds email, phone and LinkedIn URL', () => {
        expect(extractContactsFromText(TEXT)).toEqual({
            emails: ['jane.doe@example.com'],
            phones: ['(555) 123-4567'],
            linkedins: ['https://linkedin.com/in/janedoe'],
        });
    });

    it('ignores short digit runs', () => {
        expect(extractContactsFromText('Class of 2019, room 12').phones).toEqual([]);
    });
});

describe('supplementContacts', () => {
    it('fills only empty fields', () => {
        const record = emptyResumeRecord();
        record.contact_info.email = 'work@example.com';

        const result = supplementContacts(record, TEXT);
        expect(result.contact_info).toEqual({
            email: 'work@example.com',
            phone: '(555) 123-4567',
            linkedin: 'https://linkedin.com/in/janedoe',
            location: '',
        });
        expect(record.contact_info.phone).toBe('');
    });
});
