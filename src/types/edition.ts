/**
 * How a publication treats an artifact.
 */
export enum EditionType {
    FULL_EDITION = 'full_edition',
    COMMENTARY = 'commentary',
    HAND_COPY = 'hand_copy',
    PHOTOGRAPH_ONLY = 'photograph_only',
    TRANSLATION_ONLY = 'translation_only',
    CATALOG_ENTRY = 'catalog_entry',
}

export const EDITION_TYPES: ReadonlySet<EditionType> = new Set(Object.values(EditionType));

/**
 * Physical cuneiform-inscribed object, keyed by its CDLI P-number.
 */
export interface Artifact {
    p_number: string;
    designation: string | null;
}

/**
 * ArtifactEdition: a claim that a publication presents an edition or
 * treatment of one artifact.
 */
export interface ArtifactEdition {
    /** Internal auto-increment ID (SQLite rowid) */
    id?: number;

    /** External catalog number of the artifact, e.g. "P123456" */
    p_number: string;

    publication_id: number;

    edition_type: EditionType;

    /** Confidence of the link (0.0 to 1.0) */
    confidence: number;

    /** Edition this one replaces */
    supersedes_id: number | null;

    /** SQLite boolean: at most one row per artifact carries 1 */
    is_current_edition: 0 | 1;
}

export type NewArtifactEdition = Omit<ArtifactEdition, 'id' | 'is_current_edition' | 'supersedes_id'> & {
    supersedes_id?: number | null;
};

/**
 * Curated publication-level supersession: `current` supersedes `supersedes`
 * for `scope`. A null `supersedes` marks a publication with no predecessor.
 */
export interface SupersessionTriple {
    current: string;
    supersedes: string | null;
    scope: string;
}
