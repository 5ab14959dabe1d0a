import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CuneibibDatabase } from '../storage/database.js';
import { EditionType } from '../types/index.js';
import { createTempDatabase, publication, type TempDatabase } from './fixtures.js';

describe('CuneibibDatabase', () => {
    let temp: TempDatabase;
    let db: CuneibibDatabase;

    beforeEach(() => {
        temp = createTempDatabase();
        db = temp.db;
    });

    afterEach(() => {
        temp.cleanup();
    });

    describe('initialization', () => {
        it('should create all tables', () => {
            const tableNames = db
                .getRawDb()
                .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
                .all()
                .map((t) => t.name);

            expect(tableNames).toEqual(['artifact_editions', 'artifacts', 'dedup_candidates', 'publications', 'scholars']);
        });

        it('should set PRAGMA user_version = 1', () => {
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });

        it('should set PRAGMA journal_mode = WAL', () => {
            expect(db.getRawDb().pragma('journal_mode', { simple: true })).toBe('wal');
        });

        it('should keep data when reopened', () => {
            db.insertPublication(publication({ title: 'Persistent' }));
            const reopened = new CuneibibDatabase(temp.dbPath);
            try {
                expect(reopened.getPublicationCount()).toBe(1);
                expect(reopened.getRawDb().pragma('user_version', { simple: true })).toBe(1);
            } finally {
                reopened.close();
            }
        });
    });

    describe('publications', () => {
        it('should store the normalized title on insert', () => {
            const id = db.insertPublication(publication({ title: 'The Ḫimmu Letters', year: 1995 }));
            expect(db.getPublicationById(id)?.normalized_title).toBe('himmu letters');
        });

        it('should reject a duplicate DOI', () => {
            db.insertPublication(publication({ doi: '10.1234/test' }));
            expect(() => db.insertPublication(publication({ doi: '10.1234/test' }))).toThrow(/UNIQUE/);
        });

        it('should reuse the row with the same source, normalized title and year', () => {
            const first = db.insertPublicationIfAbsent(publication({ title: 'The Letters', year: 1990 }));
            const again = db.insertPublicationIfAbsent(publication({ title: 'Letters!', year: 1990 }));
            const otherYear = db.insertPublicationIfAbsent(publication({ title: 'Letters', year: 1991 }));
            const otherSource = db.insertPublicationIfAbsent(publication({ title: 'Letters', year: 1990, source: 'oracc' }));

            expect(first.inserted).toBe(true);
            expect(again).toEqual({ id: first.id, inserted: false });
            expect(otherYear.inserted).toBe(true);
            expect(otherSource.inserted).toBe(true);
            expect(db.getPublicationCount()).toBe(3);
        });

        it('should treat a missing year as part of the natural key', () => {
            const first = db.insertPublicationIfAbsent(publication({ title: 'Only a title' }));
            expect(db.insertPublicationIfAbsent(publication({ title: 'Only a title' }))).toEqual({ id: first.id, inserted: false });
            expect(db.insertPublicationIfAbsent(publication({ title: 'Only a title', year: 2001 })).inserted).toBe(true);
        });

        it('should keep untitled rows out of the natural key', () => {
            db.insertPublicationIfAbsent(publication({ short_title: 'RIME 4' }));
            expect(db.insertPublicationIfAbsent(publication({ short_title: 'RIME 4' })).inserted).toBe(true);
            expect(db.getPublicationCount()).toBe(2);
        });

        it('should return the row holding a conflicting DOI', () => {
            const id = db.insertPublication(publication({ doi: '10.1234/test' }));
            expect(db.insertPublicationIfAbsent(publication({ doi: '10.1234/test', title: 'Other' }))).toEqual({ id, inserted: false });
        });

        it('should count publications no edition cites', () => {
            db.insertArtifacts([{ p_number: 'P100001', designation: null }]);
            const cited = db.insertPublication(publication({ title: 'Cited' }));
            db.insertPublication(publication({ title: 'Uncited' }));
            db.insertEditions([{ p_number: 'P100001', publication_id: cited, edition_type: EditionType.FULL_EDITION, confidence: 1 }]);

            expect(db.getOrphanPublicationCount()).toBe(1);
        });

        it('should return year matches in id order', () => {
            const a = db.insertPublication(publication({ title: 'A', year: 2000 }));
            db.insertPublication(publication({ title: 'B', year: 2001 }));
            const c = db.insertPublication(publication({ title: 'C', year: 2000 }));
            expect(db.findByYear(2000).map((p) => p.id)).toEqual([a, c]);
        });

        it('should only fill empty fields on merge', () => {
            const id = db.insertPublication(publication({ title: 'Kept', doi: null }));
            expect(db.mergePublicationFields(id, { title: 'Ignored', doi: '10.1/filled' })).toBe(true);

            const row = db.getPublicationById(id);
            expect(row?.title).toBe('Kept');
            expect(row?.normalized_title).toBe('kept');
            expect(row?.doi).toBe('10.1/filled');
        });

        it('should return false when merging into a missing row', () => {
            expect(db.mergePublicationFields(999, { title: 'X' })).toBe(false);
        });

        it('should find the lowest id by short title', () => {
            const first = db.insertPublication(publication({ short_title: 'RIME 4' }));
            db.insertPublication(publication({ short_title: 'RIME 4' }));
            expect(db.findByShortTitle('RIME 4')?.id).toBe(first);
            expect(db.findByShortTitle('RIME 5')).toBeUndefined();
        });

        it('should report DOIs that differ only in case', () => {
            db.insertPublication(publication({ doi: '10.1/X' }));
            db.insertPublication(publication({ doi: '10.1/x' }));
            expect(db.getDuplicateDois()).toEqual([{ key: '10.1/x', count: 2 }]);
        });

        it('should group identical normalized titles', () => {
            db.insertPublication(publication({ title: 'The Letters', source: 'oracc' }));
            db.insertPublication(publication({ title: 'Letters!', source: 'bibtex' }));
            db.insertPublication(publication({ title: 'Other' }));
            expect(db.getNormalizedTitleGroups()).toEqual([{ key: 'letters', count: 2 }]);
        });
    });

    describe('editions', () => {
        it('should not duplicate an edition and return the existing id', () => {
            db.insertArtifacts([{ p_number: 'P100001', designation: null }]);
            const pub = db.insertPublication(publication({ title: 'Edition' }));
            const edition = { p_number: 'P100001', publication_id: pub, edition_type: EditionType.FULL_EDITION, confidence: 1 };

            const [first] = db.insertEditions([edition]);
            const [second] = db.insertEditions([edition]);

            expect(second).toBe(first);
            expect(db.getEditionCount()).toBe(1);
        });

        it('should keep exactly one current edition per artifact', () => {
            const pub1 = db.insertPublication(publication({ title: 'One' }));
            const pub2 = db.insertPublication(publication({ title: 'Two' }));
            const [e1, e2] = db.insertEditions([
                { p_number: 'P1', publication_id: pub1, edition_type: EditionType.FULL_EDITION, confidence: 1 },
                { p_number: 'P1', publication_id: pub2, edition_type: EditionType.FULL_EDITION, confidence: 1 },
            ]);

            db.setCurrentEdition('P1', e1);
            db.setCurrentEdition('P1', e2);

            expect(db.getCurrentEditions()).toEqual([{ id: e2, p_number: 'P1' }]);
        });

        it('should count edition types and confidence buckets', () => {
            const pub = db.insertPublication(publication({ title: 'Counts' }));
            db.insertEditions([
                { p_number: 'P1', publication_id: pub, edition_type: EditionType.FULL_EDITION, confidence: 0.95 },
                { p_number: 'P2', publication_id: pub, edition_type: EditionType.FULL_EDITION, confidence: 0.6 },
                { p_number: 'P3', publication_id: pub, edition_type: EditionType.HAND_COPY, confidence: 0.2 },
            ]);

            expect(db.getEditionTypeCounts()).toEqual({ full_edition: 2, hand_copy: 1 });
            expect(db.getEditionConfidenceBuckets()).toEqual({ high: 1, medium: 1, low: 1 });
        });

        it('should report editions of unknown artifacts', () => {
            db.insertArtifacts([{ p_number: 'P1', designation: 'AO 1234' }]);
            const pub = db.insertPublication(publication({ title: 'Refs' }));
            const [, orphan] = db.insertEditions([
                { p_number: 'P1', publication_id: pub, edition_type: EditionType.FULL_EDITION, confidence: 1 },
                { p_number: 'P2', publication_id: pub, edition_type: EditionType.FULL_EDITION, confidence: 1 },
            ]);

            expect(db.getEditionsWithMissingArtifact()).toEqual([orphan]);
        });
    });

    describe('dedup candidates', () => {
        it('should store pairs ordered and ignore repeats', () => {
            const a = db.insertPublication(publication({ title: 'A' }));
            const b = db.insertPublication(publication({ title: 'B' }));

            expect(db.recordDedupCandidate(b, a, 'title_year', 0.8)).toBe(true);
            expect(db.recordDedupCandidate(a, b, 'title_year', 0.8)).toBe(false);
            expect(db.recordDedupCandidate(a, a, 'title_year', 0.8)).toBe(false);

            const [candidate] = db.getDedupCandidates();
            expect(candidate?.pub_a_id).toBe(a);
            expect(candidate?.pub_b_id).toBe(b);
        });

        it('should resolve a pending candidate once', () => {
            const a = db.insertPublication(publication({ title: 'A' }));
            const b = db.insertPublication(publication({ title: 'B' }));
            db.recordDedupCandidate(a, b, 'title_year', 0.8);
            const id = db.getDedupCandidates()[0]?.id ?? -1;

            expect(db.resolveDedupCandidate(id, 'distinct')).toBe(true);
            expect(db.resolveDedupCandidate(id, 'same')).toBe(false);
            expect(db.getDedupCandidates({ resolved: true })[0]?.resolution).toBe('distinct');
            expect(db.getDedupCandidates({ resolved: false })).toEqual([]);
        });

        it('should bucket pending candidates by confidence', () => {
            const [a, b, c, d] = ['A', 'B', 'C', 'D'].map((title) => db.insertPublication(publication({ title })));
            db.recordDedupCandidate(a, b, 'title_year', 0.8);
            db.recordDedupCandidate(a, c, 'title_year', 0.6);
            db.recordDedupCandidate(a, d, 'title_year', 0.3);
            db.recordDedupCandidate(b, c, 'bibtex_key', 0.95);
            const resolvedId = db.getDedupCandidates().find((candidate) => candidate.confidence === 0.95)?.id ?? -1;
            db.resolveDedupCandidate(resolvedId, 'same');

            expect(db.getPendingDedupConfidenceBuckets()).toEqual({ high: 1, medium: 1, low: 1 });
        });
    });

    describe('scholars', () => {
        it('should key scholars by surname and initials and report collisions', () => {
            const ids = db.insertScholars(['Frayne, Douglas R.', 'D. R. Frayne', 'Stol, Marten']);
            expect(db.insertScholars(['Stol, Marten'])).toEqual([ids[2]]);

            expect(db.getScholarKeyCollisions()).toEqual([{ key: 'frayne_dr', count: 2 }]);
            expect(db.getScholarsByNormalizedName('frayne_dr').map((s) => s.name)).toEqual(['Frayne, Douglas R.', 'D. R. Frayne']);
        });
    });

    describe('stats', () => {
        it('should return zero counts for an empty database', () => {
            expect(db.getStats()).toEqual({
                publications: 0,
                artifacts: 0,
                editions: 0,
                currentEditions: 0,
                supersessions: 0,
                dedupPending: 0,
                scholars: 0,
            });
        });
    });
});
