import Database from 'better-sqlite3';
import type {
    Artifact,
    ArtifactEdition,
    DedupCandidate,
    DedupResolution,
    MatchMethod,
    NewArtifactEdition,
    NewPublication,
    Publication,
    PublicationRef,
    Scholar,
} from '../types/index.js';
import { EditionType } from '../types/index.js';
import type { PublicationStore } from '../matching/publication-matcher.js';
import { normalizeNameKey, normalizeTitle } from '../nlp/normalize.js';
import { getLogger } from '../utils/logger.js';
import { CuneibibError } from '../utils/errors.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Publications: bibliographic works from every source
CREATE TABLE IF NOT EXISTS publications (
  id INTEGER PRIMARY KEY,
  title TEXT,
  normalized_title TEXT NOT NULL DEFAULT '',
  year INTEGER,
  doi TEXT UNIQUE,
  bibtex_key TEXT UNIQUE,
  short_title TEXT,
  volume_in_series TEXT,
  source TEXT NOT NULL,
  supersedes_id INTEGER REFERENCES publications(id),
  superseded_scope TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Artifacts: physical objects keyed by catalog number
CREATE TABLE IF NOT EXISTS artifacts (
  p_number TEXT PRIMARY KEY,
  designation TEXT
);

-- Artifact editions: publication <-> artifact claims
CREATE TABLE IF NOT EXISTS artifact_editions (
  id INTEGER PRIMARY KEY,
  p_number TEXT NOT NULL,
  publication_id INTEGER NOT NULL REFERENCES publications(id),
  edition_type TEXT NOT NULL,
  confidence REAL NOT NULL DEFAULT 1.0,
  supersedes_id INTEGER REFERENCES artifact_editions(id),
  is_current_edition INTEGER NOT NULL DEFAULT 0 CHECK (is_current_edition IN (0, 1)),
  UNIQUE (p_number, publication_id, edition_type)
);

-- Dedup candidates: publication pairs awaiting review (pub_a_id < pub_b_id)
CREATE TABLE IF NOT EXISTS dedup_candidates (
  id INTEGER PRIMARY KEY,
  pub_a_id INTEGER NOT NULL REFERENCES publications(id),
  pub_b_id INTEGER NOT NULL REFERENCES publications(id),
  match_method TEXT NOT NULL,
  confidence REAL NOT NULL,
  resolved INTEGER NOT NULL DEFAULT 0,
  resolution TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  UNIQUE (pub_a_id, pub_b_id),
  CHECK (pub_a_id < pub_b_id)
);

-- Scholars: authors and editors
CREATE TABLE IF NOT EXISTS scholars (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  normalized_name TEXT NOT NULL
);

-- Natural key of a titled record: one row per source, normalized title and year
CREATE UNIQUE INDEX IF NOT EXISTS idx_publications_natural_key
  ON publications(source, normalized_title, IFNULL(year, -1))
  WHERE normalized_title != '';
CREATE INDEX IF NOT EXISTS idx_publications_year ON publications(year);
CREATE INDEX IF NOT EXISTS idx_publications_short_title ON publications(short_title, volume_in_series);
CREATE INDEX IF NOT EXISTS idx_editions_p_number ON artifact_editions(p_number);
CREATE INDEX IF NOT EXISTS idx_editions_publication ON artifact_editions(publication_id);
CREATE INDEX IF NOT EXISTS idx_scholars_normalized_name ON scholars(normalized_name);
`;

/** Identifying fields an auto-merge may fill in on an existing publication. */
export type MergeableFields = Partial<Pick<Publication, 'title' | 'year' | 'doi' | 'bibtex_key' | 'short_title' | 'volume_in_series'>>;

/** A full_edition joined with its publication's year, as ranked for current-edition selection. */
export interface RankedEdition {
    id: number;
    p_number: string;
    year: number | null;
    confidence: number;
}

export interface SupersedesEdge {
    id: number;
    supersedes_id: number;
}

export interface KeyCount {
    key: string;
    count: number;
}

/**
 * Bibliography store on better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and CRUD operations.
 */
export class CuneibibDatabase implements PublicationStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Publications ─────────────────────────────────────────

    /**
     * Insert a publication and return its id. Unique DOI / bibtex_key
     * violations are thrown to the caller.
     */
    insertPublication(publication: NewPublication): number {
        const result = this.db
            .prepare<NewPublication & { normalized_title: string }>(`
      INSERT INTO publications (title, normalized_title, year, doi, bibtex_key, short_title, volume_in_series, source)
      VALUES (@title, @normalized_title, @year, @doi, @bibtex_key, @short_title, @volume_in_series, @source)
    `)
            .run({ ...publication, normalized_title: normalizeTitle(publication.title) });
        return Number(result.lastInsertRowid);
    }

    /**
     * Insert a publication unless a row with the same natural key
     * (source, normalized title, year) or identifier already exists, in which
     * case that row's id is returned with `inserted: false`.
     */
    insertPublicationIfAbsent(publication: NewPublication): { id: number; inserted: boolean } {
        const normalized_title = normalizeTitle(publication.title);
        const result = this.db
            .prepare<NewPublication & { normalized_title: string }>(`
      INSERT INTO publications (title, normalized_title, year, doi, bibtex_key, short_title, volume_in_series, source)
      VALUES (@title, @normalized_title, @year, @doi, @bibtex_key, @short_title, @volume_in_series, @source)
      ON CONFLICT DO NOTHING
    `)
            .run({ ...publication, normalized_title });
        if (result.changes > 0) {
            return { id: Number(result.lastInsertRowid), inserted: true };
        }

        const existing =
            (normalized_title !== '' ? this.findByNaturalKey(publication.source, normalized_title, publication.year) : undefined) ??
            (publication.doi !== null ? this.findByDoi(publication.doi) : undefined) ??
            (publication.bibtex_key !== null ? this.findByBibtexKey(publication.bibtex_key) : undefined);
        if (!existing) {
            throw new CuneibibError(`Publication insert was ignored but no conflicting row was found (source ${publication.source})`);
        }
        return { id: existing.id, inserted: false };
    }

    /**
     * Fill empty identifying fields of an existing publication. Values already
     * present are kept.
     */
    mergePublicationFields(id: number, fields: MergeableFields): boolean {
        const title = fields.title ?? null;
        const result = this.db
            .prepare<{ id: number; title: string | null; normalized_title: string | null; year: number | null; doi: string | null; bibtex_key: string | null; short_title: string | null; volume_in_series: string | null }>(`
      UPDATE publications SET
        title = COALESCE(title, @title),
        normalized_title = CASE WHEN title IS NULL AND @title IS NOT NULL THEN @normalized_title ELSE normalized_title END,
        year = COALESCE(year, @year),
        doi = COALESCE(doi, @doi),
        bibtex_key = COALESCE(bibtex_key, @bibtex_key),
        short_title = COALESCE(short_title, @short_title),
        volume_in_series = COALESCE(volume_in_series, @volume_in_series)
      WHERE id = @id
    `)
            .run({
                id,
                title,
                normalized_title: title === null ? null : normalizeTitle(title),
                year: fields.year ?? null,
                doi: fields.doi ?? null,
                bibtex_key: fields.bibtex_key ?? null,
                short_title: fields.short_title ?? null,
                volume_in_series: fields.volume_in_series ?? null,
            });
        return result.changes > 0;
    }

    getPublicationById(id: number): Publication | undefined {
        return this.db.prepare<[number], Publication>('SELECT * FROM publications WHERE id = ?').get(id);
    }

    findByDoi(doi: string): PublicationRef | undefined {
        return this.db.prepare<[string], PublicationRef>('SELECT id, title, bibtex_key FROM publications WHERE doi = ?').get(doi);
    }

    findByBibtexKey(bibtexKey: string): PublicationRef | undefined {
        return this.db.prepare<[string], PublicationRef>('SELECT id, title, bibtex_key FROM publications WHERE bibtex_key = ?').get(bibtexKey);
    }

    findByYear(year: number): PublicationRef[] {
        return this.db.prepare<[number], PublicationRef>('SELECT id, title, bibtex_key FROM publications WHERE year = ? ORDER BY id').all(year);
    }

    findByShortTitleVolume(shortTitle: string, volume: string): PublicationRef | undefined {
        return this.db
            .prepare<[string, string], PublicationRef>(
                'SELECT id, title, bibtex_key FROM publications WHERE short_title = ? AND volume_in_series = ? ORDER BY id LIMIT 1'
            )
            .get(shortTitle, volume);
    }

    /**
     * Lowest-id publication with the given short title (the natural key used by curated supersessions).
     */
    findByShortTitle(shortTitle: string): PublicationRef | undefined {
        return this.db
            .prepare<[string], PublicationRef>('SELECT id, title, bibtex_key FROM publications WHERE short_title = ? ORDER BY id LIMIT 1')
            .get(shortTitle);
    }

    findByNaturalKey(source: string, normalizedTitle: string, year: number | null): PublicationRef | undefined {
        return this.db
            .prepare<[string, string, number | null], PublicationRef>(
                'SELECT id, title, bibtex_key FROM publications WHERE source = ? AND normalized_title = ? AND IFNULL(year, -1) = IFNULL(?, -1)'
            )
            .get(source, normalizedTitle, year);
    }

    /** Publications that no artifact edition cites. */
    getOrphanPublicationCount(): number {
        return this.count(`
      SELECT COUNT(*) as count FROM publications p
      WHERE NOT EXISTS (SELECT 1 FROM artifact_editions ae WHERE ae.publication_id = p.id)
    `);
    }

    getPublicationCount(): number {
        return this.count('SELECT COUNT(*) as count FROM publications');
    }

    setSupersession(id: number, supersedesId: number, scope: string | null): void {
        this.db
            .prepare<[number, string | null, number]>('UPDATE publications SET supersedes_id = ?, superseded_scope = ? WHERE id = ?')
            .run(supersedesId, scope, id);
    }

    getPublicationSupersessionEdges(): SupersedesEdge[] {
        return this.db
            .prepare<[], SupersedesEdge>('SELECT id, supersedes_id FROM publications WHERE supersedes_id IS NOT NULL ORDER BY id')
            .all();
    }

    /** DOIs held by more than one publication, compared case-insensitively. */
    getDuplicateDois(): KeyCount[] {
        return this.db
            .prepare<[], KeyCount>(`
      SELECT LOWER(doi) as key, COUNT(*) as count FROM publications
      WHERE doi IS NOT NULL
      GROUP BY LOWER(doi) HAVING COUNT(*) > 1
      ORDER BY count DESC, key
    `)
            .all();
    }

    getDuplicateBibtexKeys(): KeyCount[] {
        return this.db
            .prepare<[], KeyCount>(`
      SELECT bibtex_key as key, COUNT(*) as count FROM publications
      WHERE bibtex_key IS NOT NULL
      GROUP BY bibtex_key HAVING COUNT(*) > 1
      ORDER BY count DESC, key
    `)
            .all();
    }

    /** Groups of publications sharing a non-empty normalized title. */
    getNormalizedTitleGroups(): KeyCount[] {
        return this.db
            .prepare<[], KeyCount>(`
      SELECT normalized_title as key, COUNT(*) as count FROM publications
      WHERE normalized_title != ''
      GROUP BY normalized_title HAVING COUNT(*) > 1
      ORDER BY count DESC, key
    `)
            .all();
    }

    // ─── Artifacts & editions ─────────────────────────────────

    insertArtifacts(artifacts: Artifact[]): void {
        const stmt = this.db.prepare<Artifact>('INSERT OR IGNORE INTO artifacts (p_number, designation) VALUES (@p_number, @designation)');
        this.transaction(() => {
            for (const artifact of artifacts) stmt.run(artifact);
        });
    }

    /**
     * Insert editions in a single transaction. An edition already present for
     * the same (p_number, publication, type) keeps its row; its id is returned.
     */
    insertEditions(editions: NewArtifactEdition[]): number[] {
        const stmt = this.db.prepare<{ p_number: string; publication_id: number; edition_type: EditionType; confidence: number; supersedes_id: number | null }>(`
      INSERT OR IGNORE INTO artifact_editions (p_number, publication_id, edition_type, confidence, supersedes_id)
      VALUES (@p_number, @publication_id, @edition_type, @confidence, @supersedes_id)
    `);
        const existing = this.db.prepare<[string, number, string], { id: number }>(
            'SELECT id FROM artifact_editions WHERE p_number = ? AND publication_id = ? AND edition_type = ?'
        );

        return this.transaction(() =>
            editions.map((edition) => {
                const result = stmt.run({ ...edition, supersedes_id: edition.supersedes_id ?? null });
                if (result.changes > 0) return Number(result.lastInsertRowid);
                return existing.get(edition.p_number, edition.publication_id, edition.edition_type)?.id ?? -1;
            })
        );
    }

    getEditionById(id: number): ArtifactEdition | undefined {
        return this.db.prepare<[number], ArtifactEdition>('SELECT * FROM artifact_editions WHERE id = ?').get(id);
    }

    getEditionsForArtifact(pNumber: string): ArtifactEdition[] {
        return this.db.prepare<[string], ArtifactEdition>('SELECT * FROM artifact_editions WHERE p_number = ? ORDER BY id').all(pNumber);
    }

    setEditionSupersedes(id: number, supersedesId: number | null): void {
        this.db.prepare<[number | null, number]>('UPDATE artifact_editions SET supersedes_id = ? WHERE id = ?').run(supersedesId, id);
    }

    getEditionSupersessionEdges(): SupersedesEdge[] {
        return this.db
            .prepare<[], SupersedesEdge>('SELECT id, supersedes_id FROM artifact_editions WHERE supersedes_id IS NOT NULL ORDER BY id')
            .all();
    }

    /** Every full_edition whose publication exists, with the publication year. */
    getFullEditions(): RankedEdition[] {
        return this.db
            .prepare<[string], RankedEdition>(`
      SELECT ae.id, ae.p_number, p.year, ae.confidence
      FROM artifact_editions ae
      JOIN publications p ON ae.publication_id = p.id
      WHERE ae.edition_type = ?
      ORDER BY ae.p_number, ae.id
    `)
            .all(EditionType.FULL_EDITION);
    }

    getCurrentEditions(): Array<{ id: number; p_number: string }> {
        return this.db
            .prepare<[], { id: number; p_number: string }>('SELECT id, p_number FROM artifact_editions WHERE is_current_edition = 1 ORDER BY id')
            .all();
    }

    /**
     * Make `editionId` the only current edition of `pNumber`, atomically.
     */
    setCurrentEdition(pNumber: string, editionId: number): void {
        const clear = this.db.prepare<[string]>('UPDATE artifact_editions SET is_current_edition = 0 WHERE p_number = ? AND is_current_edition = 1');
        const mark = this.db.prepare<[number]>('UPDATE artifact_editions SET is_current_edition = 1 WHERE id = ?');
        this.transaction(() => {
            clear.run(pNumber);
            mark.run(editionId);
        });
    }

    /** Raw flag write, bypassing the one-current-per-artifact discipline. */
    flagEditionCurrent(editionId: number, current: boolean): void {
        this.db.prepare<[number, number]>('UPDATE artifact_editions SET is_current_edition = ? WHERE id = ?').run(current ? 1 : 0, editionId);
    }

    /** Artifacts holding more than one current edition. */
    getDuplicateCurrentEditions(): KeyCount[] {
        return this.db
            .prepare<[], KeyCount>(`
      SELECT p_number as key, COUNT(*) as count
      FROM artifact_editions
      WHERE is_current_edition = 1
      GROUP BY p_number
      HAVING COUNT(*) > 1
      ORDER BY count DESC, key
    `)
            .all();
    }

    /** Edition ids whose publication_id does not resolve. */
    getEditionsWithMissingPublication(): number[] {
        return this.db
            .prepare<[], { id: number }>(`
      SELECT ae.id FROM artifact_editions ae
      LEFT JOIN publications p ON ae.publication_id = p.id
      WHERE p.id IS NULL
      ORDER BY ae.id
    `)
            .all()
            .map((row) => row.id);
    }

    /** Edition ids whose p_number has no artifacts row. */
    getEditionsWithMissingArtifact(): number[] {
        return this.db
            .prepare<[], { id: number }>(`
      SELECT ae.id FROM artifact_editions ae
      LEFT JOIN artifacts a ON ae.p_number = a.p_number
      WHERE a.p_number IS NULL
      ORDER BY ae.id
    `)
            .all()
            .map((row) => row.id);
    }

    getEditionTypeCounts(): Record<string, number> {
        const rows = this.db
            .prepare<[], KeyCount>('SELECT edition_type as key, COUNT(*) as count FROM artifact_editions GROUP BY edition_type')
            .all();
        return Object.fromEntries(rows.map((row) => [row.key, row.count]));
    }

    /** Edition confidence buckets: high ≥ 0.9, medium 0.5–0.9, low < 0.5. */
    getEditionConfidenceBuckets(): { high: number; medium: number; low: number } {
        const row = this.db
            .prepare<[], { high: number | null; medium: number | null; low: number | null }>(`
      SELECT
        SUM(CASE WHEN confidence >= 0.9 THEN 1 ELSE 0 END) as high,
        SUM(CASE WHEN confidence >= 0.5 AND confidence < 0.9 THEN 1 ELSE 0 END) as medium,
        SUM(CASE WHEN confidence < 0.5 THEN 1 ELSE 0 END) as low
      FROM artifact_editions
    `)
            .get();
        return { high: row?.high ?? 0, medium: row?.medium ?? 0, low: row?.low ?? 0 };
    }

    getEditionCount(): number {
        return this.count('SELECT COUNT(*) as count FROM artifact_editions');
    }

    // ─── Dedup candidates ─────────────────────────────────────

    /**
     * Record a potential duplicate for review. Idempotent on the unordered
     * pair: returns false when the pair is already recorded or both ids are equal.
     */
    recordDedupCandidate(pubAId: number, pubBId: number, matchMethod: MatchMethod, confidence: number): boolean {
        if (pubAId === pubBId) return false;

        const [a, b] = pubAId < pubBId ? [pubAId, pubBId] : [pubBId, pubAId];
        const result = this.db
            .prepare<[number, number, string, number]>(`
      INSERT INTO dedup_candidates (pub_a_id, pub_b_id, match_method, confidence)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (pub_a_id, pub_b_id) DO NOTHING
    `)
            .run(a, b, matchMethod, confidence);
        return result.changes > 0;
    }

    getDedupCandidates(filter: { resolved?: boolean } = {}): DedupCandidate[] {
        if (filter.resolved === undefined) {
            return this.db.prepare<[], DedupCandidate>('SELECT * FROM dedup_candidates ORDER BY confidence DESC, id').all();
        }
        return this.db
            .prepare<[number], DedupCandidate>('SELECT * FROM dedup_candidates WHERE resolved = ? ORDER BY confidence DESC, id')
            .all(filter.resolved ? 1 : 0);
    }

    /**
     * Close a review item. Returns false when no pending candidate has this id.
     */
    resolveDedupCandidate(id: number, resolution: DedupResolution): boolean {
        const result = this.db
            .prepare<[string, number]>('UPDATE dedup_candidates SET resolved = 1, resolution = ? WHERE id = ? AND resolved = 0')
            .run(resolution, id);
        return result.changes > 0;
    }

    getDedupCandidateCount(): number {
        return this.count('SELECT COUNT(*) as count FROM dedup_candidates');
    }

    getDedupMethodCounts(): Record<string, number> {
        const rows = this.db
            .prepare<[], KeyCount>('SELECT match_method as key, COUNT(*) as count FROM dedup_candidates GROUP BY match_method')
            .all();
        return Object.fromEntries(rows.map((row) => [row.key, row.count]));
    }

    /** Pending candidates bucketed as high (>= 0.8), medium (0.5 to 0.8) and low (< 0.5) confidence. */
    getPendingDedupConfidenceBuckets(): { high: number; medium: number; low: number } {
        const row = this.db
            .prepare<[], { high: number | null; medium: number | null; low: number | null }>(`
      SELECT
        SUM(CASE WHEN confidence >= 0.8 THEN 1 ELSE 0 END) as high,
        SUM(CASE WHEN confidence >= 0.5 AND confidence < 0.8 THEN 1 ELSE 0 END) as medium,
        SUM(CASE WHEN confidence < 0.5 THEN 1 ELSE 0 END) as low
      FROM dedup_candidates
      WHERE resolved = 0
    `)
            .get();
        return { high: row?.high ?? 0, medium: row?.medium ?? 0, low: row?.low ?? 0 };
    }

    // ─── Scholars ─────────────────────────────────────────────

    /**
     * Insert scholars by name (existing names are kept) and return their ids.
     */
    insertScholars(names: string[]): number[] {
        const stmt = this.db.prepare<[string, string]>('INSERT OR IGNORE INTO scholars (name, normalized_name) VALUES (?, ?)');
        const existing = this.db.prepare<[string], { id: number }>('SELECT id FROM scholars WHERE name = ?');

        return this.transaction(() =>
            names.map((name) => {
                const result = stmt.run(name, normalizeNameKey(name));
                if (result.changes > 0) return Number(result.lastInsertRowid);
                return existing.get(name)?.id ?? -1;
            })
        );
    }

    /** Non-empty normalized names shared by more than one scholar. */
    getScholarKeyCollisions(): KeyCount[] {
        return this.db
            .prepare<[], KeyCount>(`
      SELECT normalized_name as key, COUNT(*) as count FROM scholars
      WHERE normalized_name != ''
      GROUP BY normalized_name HAVING COUNT(*) > 1
      ORDER BY count DESC, key
    `)
            .all();
    }

    getScholarsByNormalizedName(normalizedName: string): Scholar[] {
        return this.db.prepare<[string], Scholar>('SELECT * FROM scholars WHERE normalized_name = ? ORDER BY id').all(normalizedName);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        publications: number;
        artifacts: number;
        editions: number;
        currentEditions: number;
        supersessions: number;
        dedupPending: number;
        scholars: number;
    } {
        return {
            publications: this.getPublicationCount(),
            artifacts: this.count('SELECT COUNT(*) as count FROM artifacts'),
            editions: this.getEditionCount(),
            currentEditions: this.count('SELECT COUNT(*) as count FROM artifact_editions WHERE is_current_edition = 1'),
            supersessions: this.count('SELECT COUNT(*) as count FROM publications WHERE supersedes_id IS NOT NULL'),
            dedupPending: this.count('SELECT COUNT(*) as count FROM dedup_candidates WHERE resolved = 0'),
            scholars: this.count('SELECT COUNT(*) as count FROM scholars'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    private count(sql: string): number {
        return this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;
    }

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
