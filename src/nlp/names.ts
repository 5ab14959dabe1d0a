import { extractInitials, stripDiacritics } from './normalize.js';

/**
 * Scholar name parsing for cross-source deduplication.
 *
 * Handles the usual Assyriological variants:
 * - Diacritics: "Zólyomi" vs "Zolyomi"
 * - Particles: "von Soden" vs "Soden, W. von"
 * - Initials: "D. R. Frayne" vs "Douglas R. Frayne"
 * - BibTeX lists: "Englund, Robert K. & Nissen, Hans J."
 */

/** Name particles that sort under the following word */
export const PARTICLES: ReadonlySet<string> = new Set(['von', 'van', 'de', 'del', 'della', 'di', 'du', 'le', 'la', 'al', 'el']);

export interface ParsedName {
    /** Surname as written, particle included ("von Soden") */
    surname: string;
    given: string;
    /** Lowercase initials of the given names without separators, e.g. "dr" */
    initials: string;
    /** Leading particle of the surname, if any */
    particle: string;
    /** Particle-free, diacritic-free, lowercase "surname_initials" */
    key: string;
    raw: string;
}

function isParticle(word: string | undefined): boolean {
    return word !== undefined && PARTICLES.has(word.toLowerCase());
}

/**
 * Parse a scholar name into components.
 *
 * Accepts "Surname, Given Names", "Given Names Surname", "von Soden, Wolfram",
 * "Soden, W. von" and "D. R. Frayne".
 */
export function parseName(input: string): ParsedName {
    const raw = input.trim();
    if (!raw) {
        return { surname: '', given: '', initials: '', particle: '', key: '', raw };
    }

    let surname: string;
    let given: string;

    const comma = raw.indexOf(',');
    if (comma !== -1) {
        surname = raw.slice(0, comma).trim();
        given = raw.slice(comma + 1).trim();

        // Trailing particle on the given side: "Soden, W. von"
        const givenWords = given.split(/\s+/).filter(Boolean);
        const last = givenWords[givenWords.length - 1];
        if (isParticle(last)) {
            givenWords.pop();
            given = givenWords.join(' ');
            surname = `${last} ${surname}`;
        }
    } else {
        const words = raw.split(/\s+/);
        let surnameIdx = words.length - 1;
        while (surnameIdx > 0 && isParticle(words[surnameIdx - 1])) {
            surnameIdx--;
        }
        surname = words.slice(surnameIdx).join(' ');
        given = words.slice(0, surnameIdx).join(' ');
    }

    const surnameWords = surname.split(/\s+/);
    let particle = '';
    let core = surname;
    if (surnameWords.length > 1 && isParticle(surnameWords[0])) {
        particle = surnameWords[0] ?? '';
        core = surnameWords.slice(1).join(' ');
    }

    const initials = stripDiacritics(extractInitials(given)).toLowerCase();
    const coreKey = stripDiacritics(core).toLowerCase().trim();

    return {
        surname,
        given,
        initials,
        particle,
        key: initials ? `${coreKey}_${initials}` : coreKey,
        raw,
    };
}

/**
 * Split a BibTeX-style author string into individual names.
 * Separators: "&", ";" and the word "and".
 */
export function parseAuthorString(authors: string | null | undefined): ParsedName[] {
    if (!authors) return [];

    return authors
        .split(/\s*(?:&|;|\band\b)\s*/)
        .filter((part) => part.trim().length > 0)
        .map(parseName);
}

function bareSurname(name: ParsedName): string {
    const words = stripDiacritics(name.surname).toLowerCase().split(/\s+/);
    if (words.length > 1 && isParticle(words[0])) {
        return words.slice(1).join(' ');
    }
    return words.join(' ');
}

/**
 * Confidence (0.0 to 1.0) that two parsed names refer to the same person.
 *
 * - 1.0 identical key or identical initials
 * - 0.9 one set of initials is a prefix of the other ("d" vs "dr")
 * - 0.7 same surname, one side has no initials
 * - 0.3 same surname, incompatible initials
 * - 0.0 different surnames
 */
export function namesMatch(a: ParsedName, b: ParsedName): number {
    if (!a.key || !b.key) return 0.0;
    if (a.key === b.key) return 1.0;

    if (bareSurname(a) !== bareSurname(b)) return 0.0;

    if (!a.initials || !b.initials) return 0.7;
    if (a.initials === b.initials) return 1.0;

    const [shorter, longer] = a.initials.length <= b.initials.length ? [a.initials, b.initials] : [b.initials, a.initials];
    if (longer.startsWith(shorter)) return 0.9;

    return 0.3;
}
