/**
 * Resume Normalizer
 *
 * Coerces a decoded AI response (or a fallback draft) into a complete
 * ResumeRecord. Missing keys, nulls and wrong types become "" / [] so that
 * consumers can rely on every field being present.
 */

import type {
    ContactInfo,
    EducationEntry,
    ProjectEntry,
    ResumeRecord,
    WorkEntry,
} from '@/types';
import { isJsonObject } from './json-extractor';

// ============================================================================
// PUBLIC API
// ============================================================================

export function emptyResumeRecord(): ResumeRecord {
    return {
        full_name: '',
        contact_info: { email: '', phone: '', linkedin: '', location: '' },
        education: [],
        work_experience: [],
        skills: [],
        certifications: [],
        projects: [],
        summary: '',
    };
}

export function normalizeResumeRecord(raw: Record<string, unknown>): ResumeRecord {
    return {
        full_name: asText(raw.full_name ?? raw.name),
        contact_info: normalizeContact(raw.contact_info ?? raw.contact),
        education: objectList(raw.education).map(normalizeEducation),
        work_experience: objectList(raw.work_experience ?? raw.experience).map(normalizeWork),
        skills: flattenSkills(raw.skills),
        certifications: textList(raw.certifications, ['name', 'title']),
        projects: objectList(raw.projects).map(normalizeProject),
        summary: asText(raw.summary ?? raw.objective),
    };
}

/**
 * Recursively freeze a record so the returned value cannot be mutated.
 */
export function freezeRecord<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            freezeRecord(child);
        }
    }
    return value;
}

// ============================================================================
// SECTION NORMALIZERS
// ============================================================================

function normalizeContact(value: unknown): ContactInfo {
    const contact = isJsonObject(value) ? value : {};
    return {
        email: asText(contact.email),
        phone: asText(contact.phone),
        linkedin: asText(contact.linkedin),
        location: asText(contact.location),
    };
}

function normalizeEducation(entry: Record<string, unknown>): EducationEntry {
    const degree = asText(entry.degree);
    const field = asText(entry.field_of_study ?? entry.field);
    return {
        degree: degree && field ? `${degree}, ${field}` : degree || field,
        institution: asText(entry.institution ?? entry.school),
        date_range: asText(entry.date_range ?? entry.graduation_date ?? entry.dates),
        gpa: asText(entry.gpa),
        details: asText(entry.details ?? entry.coursework),
    };
}

function normalizeWork(entry: Record<string, unknown>): WorkEntry {
    const responsibilities = textList(entry.responsibilities ?? entry.bullets);
    const description = asText(entry.description);
    return {
        title: asText(entry.title ?? entry.job_title),
        company: asText(entry.company),
        date_range: asText(entry.date_range ?? entry.dates),
        location: asText(entry.location),
        responsibilities: responsibilities.length === 0 && description ? [description] : responsibilities,
    };
}

function normalizeProject(entry: Record<string, unknown>): ProjectEntry {
    return {
        title: asText(entry.title ?? entry.name),
        description: asText(entry.description),
        technologies: flattenSkills(entry.technologies),
    };
}

/**
 * Skills arrive as a list, a `{ category: [...] }` map, or a comma string.
 * All three flatten to one ordered list without duplicates.
 */
function flattenSkills(value: unknown): string[] {
    let items: string[];
    if (typeof value === 'string') {
        items = splitCommaList(value);
    } else if (Array.isArray(value)) {
        items = textList(value, ['name']);
    } else if (isJsonObject(value)) {
        items = Object.values(value).flatMap(group => flattenSkills(group));
    } else {
        items = [];
    }
    return [...new Set(items)];
}

// ============================================================================
// HELPERS
// ============================================================================

function asText(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return '';
}

function objectList(value: unknown): Record<string, unknown>[] {
    return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

/** Strings of a list; objects contribute the first of `keys` they carry. */
function textList(value: unknown, keys: string[] = []): string[] {
    if (!Array.isArray(value)) return [];
    const out: string[] = [];
    for (const item of value) {
        let text = '';
        if (isJsonObject(item)) {
            const key = keys.find(k => asText(item[k]));
            text = key ? asText(item[key]) : '';
        } else {
            text = asText(item);
        }
        if (text) out.push(text);
    }
    return out;
}

export function splitCommaList(text: string): string[] {
    return text.split(',').map(s => s.trim()).filter(Boolean);
}
