import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { verifyEditions } from '../verify/editions.js';
import { verifyPublications } from '../verify/publications.js';
import { verifyDedup } from '../verify/dedup.js';
import { planScholarMerges, verifyScholars } from '../verify/scholars.js';
import { assertReleasable, runReleaseGate } from '../verify/gate.js';
import { ReleaseBlockedError } from '../utils/errors.js';
import { EditionType, type VerificationReport } from '../types/index.js';
import { createTempDatabase, publication, type TempDatabase } from './fixtures.js';

function check(report: VerificationReport, name: string) {
    return report.checks.find((c) => c.name === name);
}

describe('verifiers', () => {
    let temp: TempDatabase;

    beforeEach(() => {
        temp = createTempDatabase();
    });

    afterEach(() => {
        temp.cleanup();
    });

    function twoEditions(pNumber = 'P1'): [number, number] {
        temp.db.insertArtifacts([{ p_number: pNumber, designation: null }]);
        const a = temp.db.insertPublication(publication({ title: `A ${pNumber}`, year: 2000 }));
        const b = temp.db.insertPublication(publication({ title: `B ${pNumber}`, year: 2001 }));
        const [ea, eb] = temp.db.insertEditions([
            { p_number: pNumber, publication_id: a, edition_type: EditionType.FULL_EDITION, confidence: 1 },
            { p_number: pNumber, publication_id: b, edition_type: EditionType.FULL_EDITION, confidence: 0.6 },
        ]);
        return [ea, eb];
    }

    describe('verifyEditions', () => {
        it('should pass on a consistent database', () => {
            twoEditions();
            const report = verifyEditions(temp.db);

            expect(report.name).toBe('editions');
            expect(report.checks.map((c) => c.status)).toEqual(['pass', 'pass', 'pass', 'pass']);
            expect(report.stats).toEqual({
                editions: 2,
                byType: { full_edition: 2 },
                confidence: { high: 1, medium: 1, low: 0 },
            });
        });

        it('should fail on an artifact with two current editions', () => {
            const [ea, eb] = twoEditions();
            temp.db.flagEditionCurrent(ea, true);
            temp.db.flagEditionCurrent(eb, true);

            const result = check(verifyEditions(temp.db), 'current_edition_unique');
            expect(result?.status).toBe('fail');
            expect(result?.offenders).toEqual(['P1']);
        });

        it('should fail on an edition supersession cycle', () => {
            const [ea, eb] = twoEditions();
            temp.db.setEditionSupersedes(ea, eb);
            temp.db.setEditionSupersedes(eb, ea);

            const result = check(verifyEditions(temp.db), 'edition_chains_terminate');
            expect(result?.status).toBe('fail');
            expect(result?.offenders).toEqual([ea, eb]);
        });

        it('should fail on an edition whose publication is gone', () => {
            temp.db.insertArtifacts([{ p_number: 'P1', designation: null }]);
            temp.db.getRawDb().pragma('foreign_keys = OFF');
            const [orphan] = temp.db.insertEditions([
                { p_number: 'P1', publication_id: 999, edition_type: EditionType.COMMENTARY, confidence: 1 },
            ]);

            const result = check(verifyEditions(temp.db), 'edition_publication_exists');
            expect(result?.status).toBe('fail');
            expect(result?.offenders).toEqual([orphan]);
        });

        it('should warn on an edition of an unknown artifact', () => {
            const pub = temp.db.insertPublication(publication({ title: 'X' }));
            temp.db.insertEditions([{ p_number: 'P404', publication_id: pub, edition_type: EditionType.CATALOG_ENTRY, confidence: 1 }]);

            expect(check(verifyEditions(temp.db), 'edition_artifact_exists')?.status).toBe('warn');
        });
    });

    describe('verifyPublications', () => {
        it('should fail on DOIs that differ only in case', () => {
            temp.db.insertPublication(publication({ doi: '10.1/X' }));
            temp.db.insertPublication(publication({ doi: '10.1/x' }));

            const result = check(verifyPublications(temp.db), 'doi_unique');
            expect(result?.status).toBe('fail');
            expect(result?.offenders).toEqual(['10.1/x']);
        });

        it('should fail on a publication supersession cycle', () => {
            const a = temp.db.insertPublication(publication({ short_title: 'A' }));
            const b = temp.db.insertPublication(publication({ short_title: 'B' }));
            temp.db.setSupersession(a, b, 'x');
            temp.db.setSupersession(b, a, 'x');

            const report = verifyPublications(temp.db);
            expect(check(report, 'publication_chains_terminate')?.offenders).toEqual([a, b]);
            expect(report.stats).toEqual({ publications: 2, supersessions: 2 });
        });

        it('should warn on identical normalized titles', () => {
            temp.db.insertPublication(publication({ title: 'The Letters', source: 'oracc' }));
            temp.db.insertPublication(publication({ title: 'Letters.', source: 'bibtex' }));

            const report = verifyPublications(temp.db);
            expect(check(report, 'normalized_title_distinct')).toEqual({
                name: 'normalized_title_distinct',
                status: 'warn',
                detail: '1 normalized title(s) shared by several publications',
                offenders: ['letters'],
            });
            expect(check(report, 'doi_unique')?.status).toBe('pass');
        });
    });

    describe('verifyDedup', () => {
        it('should warn while candidates are pending and pass once resolved', () => {
            const a = temp.db.insertPublication(publication({ title: 'A' }));
            const b = temp.db.insertPublication(publication({ title: 'B' }));
            temp.db.recordDedupCandidate(a, b, 'title_year', 0.8);
            const id = temp.db.getDedupCandidates()[0]?.id ?? -1;

            const pending = verifyDedup(temp.db);
            expect(check(pending, 'dedup_queue_empty')?.status).toBe('warn');
            expect(check(pending, 'dedup_queue_empty')?.offenders).toEqual([id]);

            temp.db.resolveDedupCandidate(id, 'distinct');
            const resolved = verifyDedup(temp.db);
            expect(check(resolved, 'dedup_queue_empty')?.status).toBe('pass');
            expect(resolved.stats).toEqual({
                pending: 0,
                resolved: 1,
                byMethod: { title_year: 1 },
                byResolution: { distinct: 1 },
                pendingConfidence: { high: 0, medium: 0, low: 0 },
                orphanPublications: 2,
            });
        });

        it('should report the pending confidence spread and uncited publications', () => {
            temp.db.insertArtifacts([{ p_number: 'P1', designation: null }]);
            const [a, b, c] = ['A', 'B', 'C'].map((title) => temp.db.insertPublication(publication({ title })));
            temp.db.insertEditions([{ p_number: 'P1', publication_id: a, edition_type: EditionType.FULL_EDITION, confidence: 1 }]);
            temp.db.recordDedupCandidate(a, b, 'title_year', 0.8);
            temp.db.recordDedupCandidate(a, c, 'title_year', 0.55);

            const report = verifyDedup(temp.db);
            expect(report.stats.pendingConfidence).toEqual({ high: 1, medium: 1, low: 0 });
            expect(report.stats.orphanPublications).toBe(2);
        });
    });

    describe('verifyScholars', () => {
        it('should warn on shared normalized names and count planned merges', () => {
            temp.db.insertScholars(['Frayne, Douglas R.', 'D. R. Frayne', 'Stol, Marten']);

            const report = verifyScholars(temp.db);
            expect(check(report, 'scholar_keys_distinct')?.offenders).toEqual(['frayne_dr']);
            expect(report.stats).toEqual({ collisionGroups: 1, plannedMerges: 1, plannedReview: 0 });
        });
    });

    describe('runReleaseGate', () => {
        it('should pass a clean database', () => {
            twoEditions();
            const result = runReleaseGate(temp.db);

            expect(result.passed).toBe(true);
            expect(result.failed).toEqual([]);
            expect(result.reports.map((r) => r.name)).toEqual(['editions', 'publications', 'dedup', 'scholars']);
            expect(() => assertReleasable(result)).not.toThrow();
        });

        it('should fail on a duplicate current edition', () => {
            const [ea, eb] = twoEditions();
            temp.db.flagEditionCurrent(ea, true);
            temp.db.flagEditionCurrent(eb, true);

            const result = runReleaseGate(temp.db);
            expect(result.passed).toBe(false);
            expect(result.failed).toEqual(['editions.current_edition_unique']);

            let thrown: unknown;
            try {
                assertReleasable(result);
            } catch (error) {
                thrown = error;
            }
            expect(thrown).toBeInstanceOf(ReleaseBlockedError);
            expect(thrown instanceof ReleaseBlockedError && thrown.failedChecks).toEqual(['editions.current_edition_unique']);
        });

        it('should not be blocked by warnings', () => {
            const a = temp.db.insertPublication(publication({ title: 'A' }));
            const b = temp.db.insertPublication(publication({ title: 'B' }));
            temp.db.recordDedupCandidate(a, b, 'title_year', 0.8);

            const result = runReleaseGate(temp.db, { only: ['dedup'] });
            expect(result.reports).toHaveLength(1);
            expect(result.passed).toBe(true);
        });
    });
});

describe('planScholarMerges', () => {
    it('should merge identical keys into the longest name', () => {
        const plan = planScholarMerges([
            [
                { id: 1, name: 'Frayne, D. R.', normalized_name: 'frayne_dr' },
                { id: 2, name: 'Frayne, Douglas R.', normalized_name: 'frayne_dr' },
                { id: 3, name: 'D. R. Frayne', normalized_name: 'frayne_dr' },
            ],
        ]);

        expect(plan.merges.map((p) => [p.keep.id, p.drop.id, p.score])).toEqual([
            [2, 1, 1],
            [2, 3, 1],
        ]);
        expect(plan.review).toEqual([]);
    });

    it('should keep the lowest id among equally long names', () => {
        const plan = planScholarMerges([
            [
                { id: 5, name: 'Stol, M', normalized_name: 'stol_m' },
                { id: 4, name: 'M. Stol', normalized_name: 'stol_m' },
            ],
        ]);
        expect(plan.merges.map((p) => [p.keep.id, p.drop.id])).toEqual([[4, 5]]);
    });

    it('should send surname-only matches to review', () => {
        const plan = planScholarMerges([
            [
                { id: 1, name: 'Dijk, van', normalized_name: 'dijk_v' },
                { id: 2, name: 'V. Dijk', normalized_name: 'dijk_v' },
            ],
        ]);
        expect(plan.merges).toEqual([]);
        expect(plan.review.map((p) => [p.keep.id, p.drop.id, p.score])).toEqual([[1, 2, 0.7]]);
    });

    it('should skip rows without an id', () => {
        expect(planScholarMerges([[{ name: 'Stol, M.', normalized_name: 'stol_m' }]])).toEqual({ merges: [], review: [] });
    });
});
