/**
 * Publication: a bibliographic work (book, article, edition) cited by or about
 * cuneiform artifacts. Rows come from independently curated sources and are
 * reconciled by the matcher.
 */
export interface Publication {
    /** Internal auto-increment ID (SQLite rowid) */
    id?: number;

    /** Full title as delivered by the source */
    title: string | null;

    /** Comparison key derived from `title` with `normalizeTitle()` on every write */
    normalized_title: string;

    /** Publication year */
    year: number | null;

    /** Digital Object Identifier (without https://doi.org/ prefix). Unique when present. */
    doi: string | null;

    /** BibTeX citation key. Unique when present. */
    bibtex_key: string | null;

    /** Series abbreviation, e.g. "RIME 4" or "SAA 10" */
    short_title: string | null;

    /** Volume within the series; pairs with `short_title` as a composite key */
    volume_in_series: string | null;

    /** Import run or provider that produced the row */
    source: string;

    /** Publication this one supersedes, if any */
    supersedes_id: number | null;

    /** Bibliographic scope of the supersession, e.g. "Old Babylonian royal inscriptions" */
    superseded_scope: string | null;

    created_at?: string;
}

/**
 * Fields a new publication is inserted with. Supersession is never set on insert.
 */
export type NewPublication = Omit<Publication, 'id' | 'created_at' | 'normalized_title' | 'supersedes_id' | 'superseded_scope'>;

/**
 * The slice of a publication the matcher reads.
 */
export type PublicationRef = Pick<Publication, 'title' | 'bibtex_key'> & { id: number };

/**
 * Scholar (author or editor) row used for duplicate-scholar detection.
 */
export interface Scholar {
    id?: number;
    name: string;
    /** `normalizeNameKey(name)`, e.g. "frayne_dr" */
    normalized_name: string;
}
