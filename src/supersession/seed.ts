import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ChainViolation, SupersessionTriple } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { CurationFileError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { DEFAULT_MAX_CHAIN_DEPTH, findChainViolations } from './chains.js';

/** Curated list shipped with the package (resolves from both src/ and dist/). */
export const DEFAULT_CURATION_PATH = fileURLToPath(new URL('../../data/known-supersessions.json', import.meta.url));

const CurationSchema = z.array(
    z.object({
        current: z.string().trim().min(1),
        supersedes: z.string().trim().min(1).nullable(),
        scope: z.string().trim().min(1),
    })
);

export type SeedStore = Pick<
    CuneibibDatabase,
    'findByShortTitle' | 'setSupersession' | 'getPublicationSupersessionEdges' | 'transaction'
>;

export type SkipReason = 'current_missing' | 'supersedes_missing' | 'both_missing' | 'self_reference';

export interface SeedReport {
    seeded: SupersessionTriple[];
    skipped: Array<SupersessionTriple & { reason: SkipReason }>;
    /** Triples without a predecessor */
    ignored: number;
    /** Publication chains that do not terminate after seeding */
    violations: ChainViolation[];
}

/**
 * Read and validate a curated supersession file.
 */
export function loadCurationFile(path: string = DEFAULT_CURATION_PATH): SupersessionTriple[] {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new CurationFileError(`Cannot read curation file: ${path}`, path, { cause: error });
    }

    const parsed = CurationSchema.safeParse(raw);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        throw new CurationFileError(
            `Invalid curation file ${path}: ${first ? `${first.path.join('.')}: ${first.message}` : 'unknown error'}`,
            path,
            { cause: parsed.error }
        );
    }
    return parsed.data;
}

/**
 * Apply curated publication-level supersessions.
 *
 * Each triple is looked up by short title; when both publications exist the
 * current one gets `supersedes_id` and `superseded_scope`. Missing
 * publications are reported and skipped. Chains are audited afterwards.
 */
export function seedSupersessions(
    store: SeedStore,
    triples: SupersessionTriple[],
    options: { maxChainDepth?: number } = {}
): SeedReport {
    const logger = getLogger();
    const report: SeedReport = { seeded: [], skipped: [], ignored: 0, violations: [] };

    for (const triple of triples) {
        if (triple.supersedes === null) {
            report.ignored++;
            continue;
        }

        const current = store.findByShortTitle(triple.current);
        const superseded = store.findByShortTitle(triple.supersedes);

        if (!current || !superseded || current.id === superseded.id) {
            const reason: SkipReason = !current
                ? superseded ? 'current_missing' : 'both_missing'
                : superseded ? 'self_reference' : 'supersedes_missing';
            report.skipped.push({ ...triple, reason });
            logger.warn({ current: triple.current, supersedes: triple.supersedes, reason }, 'Supersession skipped');
            continue;
        }

        store.transaction(() => store.setSupersession(current.id, superseded.id, triple.scope));
        report.seeded.push(triple);
        logger.info({ current: triple.current, supersedes: triple.supersedes }, 'Supersession seeded');
    }

    report.violations = findChainViolations(store.getPublicationSupersessionEdges(), options.maxChainDepth ?? DEFAULT_MAX_CHAIN_DEPTH);
    if (report.violations.length > 0) {
        logger.warn({ starts: report.violations.map((v) => v.start) }, 'Publication supersession chains do not terminate');
    }

    logger.info({ seeded: report.seeded.length, skipped: report.skipped.length, ignored: report.ignored }, 'Supersession seeding complete');
    return report;
}
