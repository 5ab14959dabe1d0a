import type { VerificationReport } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { logReport, offenderCheck } from './report.js';

export type DedupAuditStore = Pick<
    CuneibibDatabase,
    'getDedupCandidates' | 'getDedupMethodCounts' | 'getPendingDedupConfidenceBuckets' | 'getOrphanPublicationCount'
>;

/**
 * Report the dedup review queue. Pending items warn; they never block a release.
 * Stats also carry the pending confidence spread and the count of
 * publications no edition cites.
 */
export function verifyDedup(store: DedupAuditStore): VerificationReport {
    const pending = store.getDedupCandidates({ resolved: false });
    const resolved = store.getDedupCandidates({ resolved: true });

    const resolutions: Record<string, number> = {};
    for (const candidate of resolved) {
        const key = candidate.resolution ?? 'unknown';
        resolutions[key] = (resolutions[key] ?? 0) + 1;
    }

    return logReport({
        name: 'dedup',
        checks: [
            offenderCheck(
                'dedup_queue_empty',
                pending.map((candidate) => candidate.id ?? 0),
                'warn',
                (n) => (n === 0 ? 'No pending dedup candidates' : `${n} dedup candidate(s) awaiting review`)
            ),
        ],
        stats: {
            pending: pending.length,
            resolved: resolved.length,
            byMethod: store.getDedupMethodCounts(),
            byResolution: resolutions,
            pendingConfidence: store.getPendingDedupConfidenceBuckets(),
            orphanPublications: store.getOrphanPublicationCount(),
        },
    });
}
