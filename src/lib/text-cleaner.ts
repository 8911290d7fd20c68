/**
 * Text Cleaner Utility
 *
 * Normalizes résumé text produced by a PDF/DOCX/TXT reader before it is
 * handed to the parser. Line structure is kept: blank lines still separate
 * sections, which the fallback parser relies on.
 */

/**
 * Bullet glyphs that readers emit in place of list markers
 */
const BULLET_CHARS = ['•', '●', '○', '■', '□', '▪', '▫', '►', '▻', '▶', '»', '›', '◦', '⁃'];

const BULLET_RE = new RegExp(`[${BULLET_CHARS.join('')}]\\s*`, 'g');

/**
 * Clean raw résumé text
 *
 * Steps:
 * - Unifies line endings and collapses 3+ newlines to one blank line
 * - Collapses runs of spaces/tabs and strips indentation
 * - Turns bullet glyphs into "- "
 * - Drops control characters, "Page N of M" lines and lone page numbers
 * - Rejoins URLs split after the scheme and month/year dates split across lines
 *
 * @param text Raw text from the file reader
 * @returns Cleaned text, trimmed
 */
export function cleanResumeText(text: string): string {
    if (!text) return '';

    let cleaned = text;

    // 1. Line endings
    cleaned = cleaned.replace(/\r\n?/g, '\n');

    // 2. Control characters (tab and newline survive)
    cleaned = cleaned.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '');

    // 3. Spaces
    cleaned = cleaned.replace(/[ \t]{2,}/g, ' ');
    cleaned = cleaned.split('\n').map(line => line.trim()).join('\n');

    // 4. Bullets
    cleaned = cleaned.replace(BULLET_RE, '- ');

    // 5. Page furniture
    cleaned = cleaned.replace(/^Page \d+ of \d+$/gim, '');
    cleaned = cleaned.replace(/^\d{1,3}$/gm, '');

    // 6. Broken URLs and dates
    cleaned = cleaned.replace(/(https?:\/\/)\s+([\w\-.]+\.[a-zA-Z]{2,})/g, '$1$2');
    cleaned = cleaned.replace(
        /\b((?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?)[ \t]*\n[ \t]*(\d{4})\b/g,
        '$1 $2'
    );

    // 7. Blank-line runs (after removals, which can leave new ones)
    cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

    return cleaned.trim();
}
