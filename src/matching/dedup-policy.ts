import type { ConfidenceBand, MatchResult, MatcherConfig, PolicyConfig, PublicationRef } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { findMatch, type PublicationStore } from './publication-matcher.js';
import { hasIdentifyingField, parseIngestRecord, type IngestRecord } from './candidate.js';
import { getLogger } from '../utils/logger.js';

/**
 * Store operations the ingest policy writes through.
 */
export type IngestStore = PublicationStore &
    Pick<CuneibibDatabase, 'insertPublicationIfAbsent' | 'mergePublicationFields' | 'recordDedupCandidate' | 'transaction'>;

/** `unchanged`: the record was already in the store from an earlier run. */
export type IngestAction = 'merged' | 'inserted' | 'review' | 'unchanged';

export interface IngestOutcome {
    action: IngestAction;
    /** Publication the record ended up in (merged-into, inserted or already present) */
    publicationId: number;
    match: MatchResult;
}

export interface IngestOptions {
    matcher?: MatcherConfig;
    policy?: PolicyConfig;
    /** Provenance for records that carry no `source` of their own */
    defaultSource?: string;
}

export interface BatchSummary {
    total: number;
    merged: number;
    inserted: number;
    review: number;
    unchanged: number;
    rejected: number;
    rejections: Array<{ index: number; error: string }>;
}

/**
 * Map a match confidence to the caller's action:
 * ≥ autoMergeThreshold merge, ≥ reviewThreshold record for review, else distinct.
 */
export function classifyConfidence(confidence: number, policy: PolicyConfig = DEFAULT_CONFIG.policy): ConfidenceBand {
    if (confidence >= policy.autoMergeThreshold) return 'auto_merge';
    if (confidence >= policy.reviewThreshold) return 'review';
    return 'distinct';
}

/**
 * DOI and bibtex key of the record, minus any already held by a publication
 * other than `ownerId`. Both columns are unique.
 */
function claimableIdentifiers(
    store: PublicationStore,
    record: IngestRecord,
    ownerId: number | null
): { doi: string | undefined; bibtex_key: string | undefined } {
    const heldElsewhere = (ref: PublicationRef | undefined): boolean => ref !== undefined && ref.id !== ownerId;
    return {
        doi: record.doi && heldElsewhere(store.findByDoi(record.doi)) ? undefined : record.doi,
        bibtex_key: record.bibtex_key && heldElsewhere(store.findByBibtexKey(record.bibtex_key)) ? undefined : record.bibtex_key,
    };
}

/**
 * Resolve one validated record against the store and act on the result:
 * - auto_merge: fill the matched publication's empty identifying fields
 * - review: insert as new and record the pair as a dedup candidate
 * - distinct / no match: insert as new
 *
 * Identifiers held by another publication are never written. Inserts reuse
 * the row with the same (source, normalized title, year), so rerunning a
 * batch reports `unchanged` instead of adding rows.
 *
 * Runs in one transaction; storage errors propagate.
 */
export function ingestPublication(store: IngestStore, record: IngestRecord, options: IngestOptions = {}): IngestOutcome {
    const { matcher = DEFAULT_CONFIG.matcher, policy = DEFAULT_CONFIG.policy, defaultSource = 'import' } = options;

    return store.transaction((): IngestOutcome => {
        const match = findMatch(record, store, matcher);
        const band = match.publication_id === null ? 'distinct' : classifyConfidence(match.confidence, policy);

        if (band === 'auto_merge' && match.publication_id !== null) {
            const ids = claimableIdentifiers(store, record, match.publication_id);
            store.mergePublicationFields(match.publication_id, {
                title: record.title,
                year: record.year,
                doi: ids.doi,
                bibtex_key: ids.bibtex_key,
                short_title: record.short_title,
                volume_in_series: record.volume,
            });
            return { action: 'merged', publicationId: match.publication_id, match };
        }

        const ids = claimableIdentifiers(store, record, null);
        if (match.publication_id !== null && !record.title && !ids.doi && !ids.bibtex_key && !record.short_title) {
            // Only the matched identifier described this record; there is no new row to add.
            return { action: 'unchanged', publicationId: match.publication_id, match };
        }

        const { id: publicationId, inserted } = store.insertPublicationIfAbsent({
            title: record.title ?? null,
            year: record.year ?? null,
            doi: ids.doi ?? null,
            bibtex_key: ids.bibtex_key ?? null,
            short_title: record.short_title ?? null,
            volume_in_series: record.volume ?? null,
            source: record.source ?? defaultSource,
        });

        if (band === 'review' && match.publication_id !== null) {
            const recorded = store.recordDedupCandidate(match.publication_id, publicationId, match.method, match.confidence);
            if (inserted || recorded) return { action: 'review', publicationId, match };
        }

        return { action: inserted ? 'inserted' : 'unchanged', publicationId, match };
    });
}

/**
 * Validate and ingest raw importer records one at a time. Invalid records are
 * reported and skipped; the rest of the batch continues.
 */
export function ingestBatch(store: IngestStore, records: unknown[], options: IngestOptions = {}): BatchSummary {
    const logger = getLogger();
    const summary: BatchSummary = { total: records.length, merged: 0, inserted: 0, review: 0, unchanged: 0, rejected: 0, rejections: [] };

    records.forEach((raw, index) => {
        const parsed = parseIngestRecord(raw);
        if (!parsed.success) {
            summary.rejected++;
            summary.rejections.push({ index, error: parsed.error });
            logger.warn({ index, error: parsed.error }, 'Rejected record');
            return;
        }

        const record = parsed.value;
        if (!record.title && !hasIdentifyingField(record)) {
            summary.rejected++;
            summary.rejections.push({ index, error: 'no title or identifying field' });
            logger.warn({ index }, 'Rejected record without title or identifying field');
            return;
        }

        const outcome = ingestPublication(store, record, options);
        summary[outcome.action]++;
        logger.debug(
            { index, action: outcome.action, publicationId: outcome.publicationId, method: outcome.match.method },
            'Record ingested'
        );
    });

    const { rejections: _rejections, ...counts } = summary;
    logger.info(counts, 'Batch ingest complete');
    return summary;
}
