/**
 * Regex contact detection over the résumé text.
 * Fills gaps left by either extraction path; never overwrites a value.
 */

import type { ContactInfo, ResumeRecord } from '@/types';

const EMAIL_RE = /[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}/g;
const PHONE_RE = /(?:\+?\d{1,3}[\s\-.]?)?\(?\d{2,4}\)?[\s\-.]?\d{3,4}[\s\-.]?\d{3,4}/g;
const LINKEDIN_RE = /(?:https?:\/\/)?(?:www\.)?linkedin\.com\/(?:in|pub)\/[a-zA-Z0-9\-._~%]+\/?/gi;

export interface ExtractedContacts {
    emails: string[];
    phones: string[];
    linkedins: string[];
}

export function extractContactsFromText(text: string): ExtractedContacts {
    const normalize = (url: string) => (url.toLowerCase().startsWith('http') ? url : `https://${url}`);

    return {
        emails: [...new Set(text.match(EMAIL_RE) ?? [])],
        phones: [...new Set((text.match(PHONE_RE) ?? []).map(p => p.trim()))]
            .filter(p => p.replace(/\D/g, '').length >= 7),
        linkedins: [...new Set(text.match(LINKEDIN_RE) ?? [])].map(normalize),
    };
}

/**
 * Copy of `record` with empty email / phone / linkedin filled from `text`.
 */
export function supplementContacts(record: ResumeRecord, text: string): ResumeRecord {
    const extracted = extractContactsFromText(text);
    const contact: ContactInfo = { ...record.contact_info };

    if (!contact.email && extracted.emails.length > 0) {
        contact.email = extracted.emails[0];
    }
    if (!contact.phone && extracted.phones.length > 0) {
        contact.phone = extracted.phones[0];
    }
    if (!contact.linkedin && extracted.linkedins.length > 0) {
        contact.linkedin = extracted.linkedins[0];
    }

    return { ...record, contact_info: contact };
}
