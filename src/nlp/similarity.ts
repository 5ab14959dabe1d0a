/** Default length-difference ratio beyond which strings are not compared. */
export const DEFAULT_LENGTH_RATIO_CUTOFF = 0.4;

export interface SimilarityOptions {
    /**
     * If the lengths differ by more than this fraction of the longer length,
     * similarity is 0 and no edit distance is computed.
     */
    lengthRatioCutoff?: number;
}

/**
 * Levenshtein distance (insertion, deletion, substitution each cost 1),
 * computed over code points with two rolling rows.
 */
export function levenshteinDistance(a: string, b: string): number {
    const s = Array.from(a);
    const t = Array.from(b);
    const m = s.length;
    const n = t.length;

    if (m === 0) return n;
    if (n === 0) return m;

    let prev: number[] = Array.from({ length: n + 1 }, (_, j) => j);
    let curr: number[] = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        curr[0] = i;
        for (let j = 1; j <= n; j++) {
            const cost = s[i - 1] === t[j - 1] ? 0 : 1;
            curr[j] = Math.min(
                prev[j] + 1,        // deletion
                curr[j - 1] + 1,    // insertion
                prev[j - 1] + cost  // substitution
            );
        }
        [prev, curr] = [curr, prev];
    }

    return prev[n];
}

/**
 * Normalized Levenshtein similarity in [0, 1].
 *
 * Both empty → 1.0; exactly one empty → 0.0. Strings whose lengths differ by
 * more than `lengthRatioCutoff` of the longer one score 0.0 without running
 * the O(n·m) distance.
 */
export function similarity(a: string, b: string, options: SimilarityOptions = {}): number {
    const { lengthRatioCutoff = DEFAULT_LENGTH_RATIO_CUTOFF } = options;

    const lenA = Array.from(a).length;
    const lenB = Array.from(b).length;

    if (lenA === 0 && lenB === 0) return 1.0;
    if (lenA === 0 || lenB === 0) return 0.0;

    const maxLen = Math.max(lenA, lenB);
    if (Math.abs(lenA - lenB) / maxLen > lengthRatioCutoff) {
        return 0.0;
    }

    if (a === b) return 1.0;

    // (max - d) / max rather than 1 - d / max: one rounding step, so 17/20 is exactly 0.85
    return (maxLen - levenshteinDistance(a, b)) / maxLen;
}
