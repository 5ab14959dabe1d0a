import type { CuneibibDatabase, RankedEdition } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';

export type CurrentEditionStore = Pick<CuneibibDatabase, 'getFullEditions' | 'getCurrentEditions' | 'setCurrentEdition'>;

export interface CurrentEditionReport {
    /** Artifacts with at least one full_edition */
    artifacts: number;
    /** Artifacts whose flags were rewritten */
    updated: number;
    /** Artifacts whose flags already matched */
    unchanged: number;
}

/**
 * Total order for current-edition selection: newest publication year first
 * (unknown years last), then highest confidence, then lowest edition id.
 */
export function compareEditionRank(a: RankedEdition, b: RankedEdition): number {
    if (a.year !== b.year) {
        if (a.year === null) return 1;
        if (b.year === null) return -1;
        return b.year - a.year;
    }
    if (a.confidence !== b.confidence) {
        return b.confidence - a.confidence;
    }
    return a.id - b.id;
}

/**
 * Pick the winning full_edition per artifact.
 */
export function selectCurrentEditions(editions: RankedEdition[]): Map<string, RankedEdition> {
    const winners = new Map<string, RankedEdition>();
    for (const edition of editions) {
        const leader = winners.get(edition.p_number);
        if (!leader || compareEditionRank(edition, leader) < 0) {
            winners.set(edition.p_number, edition);
        }
    }
    return winners;
}

/**
 * Set `is_current_edition` on the winning full_edition of every artifact that
 * has one, and clear it on that artifact's other editions. Each artifact is
 * written in its own transaction; artifacts already in the desired state are
 * not written, so a rerun changes nothing.
 */
export function computeCurrentEditions(store: CurrentEditionStore): CurrentEditionReport {
    const logger = getLogger();
    const winners = selectCurrentEditions(store.getFullEditions());

    const flagged = new Map<string, number[]>();
    for (const { id, p_number } of store.getCurrentEditions()) {
        const ids = flagged.get(p_number) ?? [];
        ids.push(id);
        flagged.set(p_number, ids);
    }

    const report: CurrentEditionReport = { artifacts: winners.size, updated: 0, unchanged: 0 };

    for (const [pNumber, winner] of winners) {
        const current = flagged.get(pNumber) ?? [];
        if (current.length === 1 && current[0] === winner.id) {
            report.unchanged++;
            continue;
        }

        store.setCurrentEdition(pNumber, winner.id);
        report.updated++;
        logger.debug({ pNumber, editionId: winner.id, previous: current }, 'Current edition set');
    }

    logger.info(report, 'Current editions computed');
    return report;
}
