/**
 * Heuristic Fallback Parser
 *
 * Rebuilds a ResumeRecord from loosely structured text when the AI response
 * did not decode as JSON. Text is split into blank-line separated blocks; the
 * first line of a block is its heading and decides which rule reads the rest.
 *
 * Known limitation: only the first education block and the first work block
 * are read, no matter how many roles or schools the text lists.
 *
 * Never throws. Anything unrecognized leaves the field at its default.
 */

import type { EducationEntry, ResumeRecord, WorkEntry } from '@/types';
import { emptyResumeRecord, splitCommaList } from './resume-normalizer';

type BlockKind = 'name' | 'contact' | 'education' | 'work' | 'skills' | 'summary' | 'other';

interface Block {
    heading: string;
    lines: string[];   // every line, heading included
    body: string[];    // lines after the heading
}

// Substring match: "Jan2020" counts, and so does "Marketing".
const MONTH_RE = /(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)/i;
const BULLET_RE = /^[*\-•●○■□▪▫►▻▶»›]+\s*/;

// ============================================================================
// PREDICATES
// ============================================================================

export function isNameHeading(heading: string): boolean {
    return heading.toLowerCase().includes('name');
}

export function isContactHeading(heading: string): boolean {
    return heading.toLowerCase().includes('contact');
}

export function isEducationHeading(heading: string): boolean {
    return heading.toLowerCase().includes('education');
}

export function isWorkHeading(heading: string): boolean {
    const lower = heading.toLowerCase();
    return lower.includes('experience') || lower.includes('work');
}

export function isSkillsHeading(heading: string): boolean {
    return heading.toLowerCase().includes('skill');
}

export function isSummaryHeading(heading: string): boolean {
    const lower = heading.toLowerCase();
    return lower.includes('summary') || lower.includes('objective');
}

/** Line contains a month abbreviation anywhere, taken as a date range. */
export function isDateLine(line: string): boolean {
    return MONTH_RE.test(line);
}

export function isBulletLine(line: string): boolean {
    return BULLET_RE.test(line);
}

export function isGpaLine(line: string): boolean {
    return line.toLowerCase().includes('gpa');
}

/**
 * Any "at" in the line marks it as a location. Substring match, so words
 * like "Data" also qualify; bullets and dates are checked first.
 */
export function mentionsLocation(line: string): boolean {
    return line.toLowerCase().includes('at');
}

export function classifyHeading(heading: string): BlockKind {
    if (isNameHeading(heading)) return 'name';
    if (isContactHeading(heading)) return 'contact';
    if (isEducationHeading(heading)) return 'education';
    if (isWorkHeading(heading)) return 'work';
    if (isSkillsHeading(heading)) return 'skills';
    if (isSummaryHeading(heading)) return 'summary';
    return 'other';
}

// ============================================================================
// LINE HELPERS
// ============================================================================

/** Split `key: value` at the first colon. Null when there is no colon. */
export function splitKeyValue(line: string): { key: string; value: string } | null {
    const idx = line.indexOf(':');
    if (idx < 0) return null;
    return { key: line.slice(0, idx).trim().toLowerCase(), value: line.slice(idx + 1).trim() };
}

export function stripBullet(line: string): string {
    return line.replace(BULLET_RE, '').trim();
}

/** "GPA: 3.8/4.0, Dean's List" → "3.8/4.0" */
export function extractGpa(line: string): string {
    const afterLabel = line.replace(/^.*?gpa\s*[:\-=]?\s*/i, '');
    return afterLabel.split(',')[0].trim();
}

/** Split on the first comma only. */
function splitOnce(line: string): [string, string] | null {
    const idx = line.indexOf(',');
    if (idx < 0) return null;
    return [line.slice(0, idx).trim(), line.slice(idx + 1).trim()];
}

export function splitBlocks(text: string): Block[] {
    return text
        .replace(/\r\n?/g, '\n')
        .split(/\n[ \t]*\n/)
        .map(block => block.split('\n').map(line => line.trim()).filter(Boolean))
        .filter(lines => lines.length > 0)
        .map(lines => ({ heading: lines[0], lines, body: lines.slice(1) }));
}

// ============================================================================
// SECTION READERS
// ============================================================================

function readName(block: Block): string {
    for (const line of block.lines) {
        const pair = splitKeyValue(line);
        if (pair && pair.key.includes('name') && pair.value) return pair.value;
    }
    return '';
}

function readContact(block: Block, record: ResumeRecord): void {
    const contact = record.contact_info;
    for (const line of block.lines) {
        const pair = splitKeyValue(line);
        if (!pair || !pair.value) continue;

        if (pair.key.includes('email')) {
            if (!contact.email) contact.email = pair.value;
        } else if (pair.key.includes('phone')) {
            if (!contact.phone) contact.phone = pair.value;
        } else if (pair.key.includes('linkedin')) {
            if (!contact.linkedin) contact.linkedin = pair.value;
        } else if (pair.key.includes('location')) {
            if (!contact.location) contact.location = pair.value;
        }
    }
}

function readEducation(block: Block): EducationEntry {
    const entry: EducationEntry = { degree: '', institution: '', date_range: '', gpa: '', details: '' };
    const details: string[] = [];

    block.body.forEach((line, index) => {
        if (index === 0) {
            const pair = splitOnce(line);
            if (pair) {
                [entry.degree, entry.institution] = pair;
            } else {
                entry.degree = line;
            }
        } else if (isGpaLine(line)) {
            entry.gpa = extractGpa(line);
        } else if (isDateLine(line)) {
            entry.date_range = line;
        } else {
            details.push(line);
        }
    });

    entry.details = details.join(' ');
    return entry;
}

function readWork(block: Block): WorkEntry {
    const entry: WorkEntry = { title: '', company: '', date_range: '', location: '', responsibilities: [] };

    block.body.forEach((line, index) => {
        if (index === 0) {
            const pair = splitOnce(line);
            if (pair) {
                [entry.title, entry.company] = pair;
            } else {
                entry.title = line;
            }
        } else if (isBulletLine(line)) {
            const text = stripBullet(line);
            if (text) entry.responsibilities.push(text);
        } else if (isDateLine(line)) {
            entry.date_range = line;
        } else if (mentionsLocation(line)) {
            entry.location = line;
        }
    });

    return entry;
}

function readSkills(block: Block): string[] {
    return block.body.flatMap(line => {
        const pair = splitKeyValue(line);
        return splitCommaList(pair ? pair.value : line);
    });
}

function hasContent(entry: EducationEntry | WorkEntry): boolean {
    return Object.values(entry).some(v => (Array.isArray(v) ? v.length > 0 : v !== ''));
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function parseResumeFallback(text: string): ResumeRecord {
    const record = emptyResumeRecord();
    const summary: string[] = [];
    let educationSeen = false;
    let workSeen = false;

    for (const block of splitBlocks(text || '')) {
        switch (classifyHeading(block.heading)) {
            case 'name':
                if (!record.full_name) record.full_name = readName(block);
                break;
            case 'contact':
                readContact(block, record);
                break;
            case 'education':
                if (!educationSeen) {
                    educationSeen = true;
                    const entry = readEducation(block);
                    if (hasContent(entry)) record.education.push(entry);
                }
                break;
            case 'work':
                if (!workSeen) {
                    workSeen = true;
                    const entry = readWork(block);
                    if (hasContent(entry)) record.work_experience.push(entry);
                }
                break;
            case 'skills':
                record.skills.push(...readSkills(block));
                break;
            case 'summary':
                summary.push(...block.body);
                break;
            case 'other':
                break;
        }
    }

    record.summary = summary.join(' ').trim();
    return record;
}
