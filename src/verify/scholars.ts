import type { Scholar, VerificationReport } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { namesMatch, parseName } from '../nlp/names.js';
import { logReport, offenderCheck } from './report.js';

export type ScholarAuditStore = Pick<CuneibibDatabase, 'getScholarKeyCollisions' | 'getScholarsByNormalizedName'>;

export const SCHOLAR_MERGE_THRESHOLD = 0.9;
export const SCHOLAR_REVIEW_THRESHOLD = 0.7;

export interface ScholarPair {
    keep: Required<Scholar>;
    drop: Required<Scholar>;
    score: number;
}

export interface ScholarMergePlan {
    merges: ScholarPair[];
    review: ScholarPair[];
}

function hasId(scholar: Scholar): scholar is Required<Scholar> {
    return scholar.id !== undefined;
}

/**
 * The fullest spelling is kept; among equally long names the lowest id.
 */
function pickKeeper(group: Required<Scholar>[]): Required<Scholar> | undefined {
    let keeper: Required<Scholar> | undefined;
    for (const scholar of group) {
        if (
            !keeper ||
            scholar.name.length > keeper.name.length ||
            (scholar.name.length === keeper.name.length && scholar.id < keeper.id)
        ) {
            keeper = scholar;
        }
    }
    return keeper;
}

/**
 * Propose merges within each normalized-name group. Scores come from
 * `namesMatch` against the group's keeper. Nothing is written.
 */
export function planScholarMerges(groups: Scholar[][]): ScholarMergePlan {
    const plan: ScholarMergePlan = { merges: [], review: [] };

    for (const raw of groups) {
        const group = raw.filter(hasId);
        const keeper = pickKeeper(group);
        if (!keeper) continue;
        const keeperName = parseName(keeper.name);

        for (const scholar of group) {
            if (scholar.id === keeper.id) continue;
            const score = namesMatch(keeperName, parseName(scholar.name));
            if (score >= SCHOLAR_MERGE_THRESHOLD) {
                plan.merges.push({ keep: keeper, drop: scholar, score });
            } else if (score >= SCHOLAR_REVIEW_THRESHOLD) {
                plan.review.push({ keep: keeper, drop: scholar, score });
            }
        }
    }

    return plan;
}

/**
 * Load every collision group from the store.
 */
export function loadScholarCollisionGroups(store: ScholarAuditStore): Scholar[][] {
    return store.getScholarKeyCollisions().map((row) => store.getScholarsByNormalizedName(row.key));
}

/**
 * Report scholars sharing a normalized name. Collisions warn.
 */
export function verifyScholars(store: ScholarAuditStore): VerificationReport {
    const collisions = store.getScholarKeyCollisions();
    const plan = planScholarMerges(collisions.map((row) => store.getScholarsByNormalizedName(row.key)));

    return logReport({
        name: 'scholars',
        checks: [
            offenderCheck(
                'scholar_keys_distinct',
                collisions.map((row) => row.key),
                'warn',
                (n) => (n === 0 ? 'No scholar name collisions' : `${n} normalized name(s) shared by several scholars`)
            ),
        ],
        stats: {
            collisionGroups: collisions.length,
            plannedMerges: plan.merges.length,
            plannedReview: plan.review.length,
        },
    });
}
