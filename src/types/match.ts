/**
 * Match methods in cascade priority order, followed by the no-match tag.
 */
export type MatchMethod = 'doi' | 'bibtex_key' | 'title_year' | 'short_title_vol' | 'none';

export const MATCH_METHODS: readonly MatchMethod[] = ['doi', 'bibtex_key', 'title_year', 'short_title_vol', 'none'];

/**
 * Candidate bibliographic record handed to the matcher.
 * Every field is optional; absent means "not supplied", never empty.
 */
export interface MatchCandidate {
    doi?: string;
    bibtex_key?: string;
    title?: string;
    year?: number;
    short_title?: string;
    volume?: string;
}

/**
 * Outcome of `findMatch()`. `publication_id` is null only for method "none".
 */
export interface MatchResult {
    publication_id: number | null;
    method: MatchMethod;
    confidence: number;
    /** bibtex_key of the matched publication, when it has one */
    matched_key: string | null;
}

export type DedupResolution = 'same' | 'distinct';

/**
 * A pending or resolved hypothesis that two publications describe the same work.
 * The pair is stored ordered (`pub_a_id < pub_b_id`).
 */
export interface DedupCandidate {
    id?: number;
    pub_a_id: number;
    pub_b_id: number;
    match_method: MatchMethod;
    confidence: number;
    resolved: 0 | 1;
    resolution: DedupResolution | null;
    created_at?: string;
}

/**
 * Caller-side action for a match confidence.
 */
export type ConfidenceBand = 'auto_merge' | 'review' | 'distinct';
