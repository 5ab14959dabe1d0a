import type { MatchCandidate, MatchResult, MatcherConfig, PublicationRef } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { normalizeTitle } from '../nlp/normalize.js';
import { similarity } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';

/** Confidence assigned to each match method. */
export const MATCH_CONFIDENCE = {
    doi: 1.0,
    bibtex_key: 0.95,
    title_year: 0.8,
    short_title_vol: 0.9,
    none: 0.0,
} as const;

/**
 * Point lookups and the year scan the matcher needs from an existing-record store.
 */
export interface PublicationStore {
    findByDoi(doi: string): PublicationRef | undefined;
    findByBibtexKey(bibtexKey: string): PublicationRef | undefined;
    /** All publications of one year, ordered by ascending id */
    findByYear(year: number): PublicationRef[];
    findByShortTitleVolume(shortTitle: string, volume: string): PublicationRef | undefined;
}

export const NO_MATCH: Readonly<MatchResult> = Object.freeze({
    publication_id: null,
    method: 'none',
    confidence: MATCH_CONFIDENCE.none,
    matched_key: null,
});

function hit(ref: PublicationRef, method: Exclude<MatchResult['method'], 'none'>): MatchResult {
    return {
        publication_id: ref.id,
        method,
        confidence: MATCH_CONFIDENCE[method],
        matched_key: ref.bibtex_key,
    };
}

/**
 * Best title+year match at or above the threshold. The year scan is ordered
 * by id and only a strictly better score replaces the leader, so ties go to
 * the lowest publication id.
 */
function matchByTitleYear(
    title: string,
    year: number,
    store: PublicationStore,
    config: MatcherConfig
): { ref: PublicationRef; score: number } | null {
    const normTitle = normalizeTitle(title);
    if (!normTitle) return null;

    let best: { ref: PublicationRef; score: number } | null = null;

    for (const row of store.findByYear(year)) {
        const score = similarity(normTitle, normalizeTitle(row.title), {
            lengthRatioCutoff: config.lengthRatioCutoff,
        });
        if (score > (best?.score ?? 0)) {
            best = { ref: row, score };
        }
    }

    if (best && best.score >= config.titleThreshold) {
        return best;
    }
    return null;
}

/**
 * Find the existing publication a candidate describes.
 *
 * Cascade, first hit wins:
 * 1. DOI exact (1.0)
 * 2. bibtex_key exact (0.95)
 * 3. title + year fuzzy (0.8, fixed regardless of the similarity score)
 * 4. short_title + volume exact (0.9)
 *
 * Never throws on missing fields; a candidate with nothing usable gets
 * `NO_MATCH`. Store errors propagate.
 */
export function findMatch(
    candidate: MatchCandidate,
    store: PublicationStore,
    config: MatcherConfig = DEFAULT_CONFIG.matcher
): MatchResult {
    if (candidate.doi) {
        const row = store.findByDoi(candidate.doi);
        if (row) return hit(row, 'doi');
    }

    if (candidate.bibtex_key) {
        const row = store.findByBibtexKey(candidate.bibtex_key);
        if (row) return hit(row, 'bibtex_key');
    }

    if (candidate.title && candidate.year !== undefined) {
        const best = matchByTitleYear(candidate.title, candidate.year, store, config);
        if (best) {
            getLogger().debug({ publicationId: best.ref.id, score: best.score }, 'Title+year match');
            return hit(best.ref, 'title_year');
        }
    }

    if (candidate.short_title && candidate.volume) {
        const row = store.findByShortTitleVolume(candidate.short_title, candidate.volume);
        if (row) return hit(row, 'short_title_vol');
    }

    return { ...NO_MATCH };
}
