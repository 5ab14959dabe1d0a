import type { VerificationReport } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { DEFAULT_MAX_CHAIN_DEPTH, findChainViolations } from '../supersession/chains.js';
import { logReport, offenderCheck } from './report.js';

export type EditionAuditStore = Pick<
    CuneibibDatabase,
    | 'getDuplicateCurrentEditions'
    | 'getEditionSupersessionEdges'
    | 'getEditionsWithMissingPublication'
    | 'getEditionsWithMissingArtifact'
    | 'getEditionTypeCounts'
    | 'getEditionConfidenceBuckets'
    | 'getEditionCount'
>;

/**
 * Audit artifact editions: one current edition per artifact, terminating
 * supersedes chains, resolvable references.
 */
export function verifyEditions(store: EditionAuditStore, options: { maxChainDepth?: number } = {}): VerificationReport {
    const duplicates = store.getDuplicateCurrentEditions();
    const violations = findChainViolations(store.getEditionSupersessionEdges(), options.maxChainDepth ?? DEFAULT_MAX_CHAIN_DEPTH);
    const missingPublication = store.getEditionsWithMissingPublication();
    const missingArtifact = store.getEditionsWithMissingArtifact();

    return logReport({
        name: 'editions',
        checks: [
            offenderCheck(
                'current_edition_unique',
                duplicates.map((row) => row.key),
                'fail',
                (n) => (n === 0 ? 'Every artifact has at most one current edition' : `${n} artifact(s) with multiple current editions`)
            ),
            offenderCheck(
                'edition_chains_terminate',
                violations.map((v) => v.start),
                'fail',
                (n) => (n === 0 ? 'All edition supersession chains terminate' : `${n} edition chain(s) cycle or exceed the hop bound`)
            ),
            offenderCheck(
                'edition_publication_exists',
                missingPublication,
                'fail',
                (n) => (n === 0 ? 'All editions reference an existing publication' : `${n} edition(s) reference a missing publication`)
            ),
            offenderCheck(
                'edition_artifact_exists',
                missingArtifact,
                'warn',
                (n) => (n === 0 ? 'All editions reference a known artifact' : `${n} edition(s) reference an unknown artifact`)
            ),
        ],
        stats: {
            editions: store.getEditionCount(),
            byType: store.getEditionTypeCounts(),
            confidence: store.getEditionConfidenceBuckets(),
        },
    });
}
