/**
 * Comparison keys for bibliographic titles and scholar names.
 */

/** English, German and French articles removed from titles as whole words. */
const ARTICLES = ['the', 'a', 'an', 'der', 'die', 'das', 'le', 'la', 'les', 'un', 'une'];

// Unicode-aware word boundaries; `\b` in JS only knows ASCII word characters.
const ARTICLE_PATTERN = new RegExp(`(?<![\\p{L}\\p{N}_])(?:${ARTICLES.join('|')})(?![\\p{L}\\p{N}_])`, 'gu');
const PUNCTUATION_PATTERN = /[^\p{L}\p{N}_\s]/gu;
const COMBINING_MARKS = /\p{M}/gu;

/**
 * Remove diacritics: "Jägersma" → "Jagersma", "Ḫimmu" → "Himmu".
 */
export function stripDiacritics(text: string): string {
    return text.normalize('NFKD').replace(COMBINING_MARKS, '');
}

/**
 * Case- and diacritic-folded text. Folded twice because lowercasing can yield
 * combining marks and compatibility decomposition can yield capitals.
 */
function fold(text: string): string {
    return stripDiacritics(stripDiacritics(text).toLowerCase());
}

/**
 * Normalize a title for fuzzy comparison.
 *
 * - Lowercase and strip diacritics
 * - Remove articles (the, a, an, der, die, das, le, la, les, un, une)
 * - Remove punctuation
 * - Collapse whitespace and trim
 *
 * Idempotent: `normalizeTitle(normalizeTitle(x)) === normalizeTitle(x)`.
 * Articles are removed again after punctuation is gone, since stripping
 * "t.he" leaves a bare "the".
 *
 * @example
 * normalizeTitle('The Ḫimmu Letters') // "himmu letters"
 */
export function normalizeTitle(title: string | null | undefined): string {
    if (!title) return '';

    return fold(title)
        .replace(ARTICLE_PATTERN, '')
        .replace(PUNCTUATION_PATTERN, '')
        .replace(ARTICLE_PATTERN, '')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Extract initials from given names: "Douglas R." → "dr", "D. R." → "dr".
 */
export function extractInitials(given: string): string {
    return given
        .split(/[\s.]+/)
        .filter((part) => part.length > 0)
        .map((part) => Array.from(part)[0] ?? '')
        .join('');
}

/**
 * Surname + initials key for duplicate-scholar detection.
 *
 * "Frayne, Douglas R." and "D. R. Frayne" both give "frayne_dr";
 * a bare surname gives just the surname.
 */
export function normalizeNameKey(name: string | null | undefined): string {
    if (!name) return '';

    const folded = fold(name).trim();
    if (!folded) return '';

    let surname: string;
    let given: string;

    const comma = folded.indexOf(',');
    if (comma !== -1) {
        surname = folded.slice(0, comma).trim();
        given = folded.slice(comma + 1).trim();
    } else {
        const words = folded.split(/\s+/);
        surname = words[words.length - 1] ?? '';
        given = words.slice(0, -1).join(' ');
    }

    const initials = extractInitials(given);
    return initials ? `${surname}_${initials}` : surname;
}
