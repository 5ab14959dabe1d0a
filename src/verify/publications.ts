import type { VerificationReport } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { DEFAULT_MAX_CHAIN_DEPTH, findChainViolations } from '../supersession/chains.js';
import { logReport, offenderCheck } from './report.js';

export type PublicationAuditStore = Pick<
    CuneibibDatabase,
    | 'getDuplicateDois'
    | 'getDuplicateBibtexKeys'
    | 'getPublicationSupersessionEdges'
    | 'getNormalizedTitleGroups'
    | 'getPublicationCount'
>;

/**
 * Audit publications: unique identifiers, terminating supersession chains,
 * and titles that normalize identically.
 */
export function verifyPublications(store: PublicationAuditStore, options: { maxChainDepth?: number } = {}): VerificationReport {
    const edges = store.getPublicationSupersessionEdges();
    const violations = findChainViolations(edges, options.maxChainDepth ?? DEFAULT_MAX_CHAIN_DEPTH);
    const titleGroups = store.getNormalizedTitleGroups();

    return logReport({
        name: 'publications',
        checks: [
            offenderCheck(
                'doi_unique',
                store.getDuplicateDois().map((row) => row.key),
                'fail',
                (n) => (n === 0 ? 'No duplicate DOIs' : `${n} DOI(s) shared by several publications`)
            ),
            offenderCheck(
                'bibtex_key_unique',
                store.getDuplicateBibtexKeys().map((row) => row.key),
                'fail',
                (n) => (n === 0 ? 'No duplicate bibtex keys' : `${n} bibtex key(s) shared by several publications`)
            ),
            offenderCheck(
                'publication_chains_terminate',
                violations.map((v) => v.start),
                'fail',
                (n) => (n === 0 ? 'All publication supersession chains terminate' : `${n} publication chain(s) cycle or exceed the hop bound`)
            ),
            offenderCheck(
                'normalized_title_distinct',
                titleGroups.map((row) => row.key),
                'warn',
                (n) => (n === 0 ? 'No identical normalized titles' : `${n} normalized title(s) shared by several publications`)
            ),
        ],
        stats: {
            publications: store.getPublicationCount(),
            supersessions: edges.length,
        },
    });
}
