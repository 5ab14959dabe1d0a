import type { VerificationReport, VerifyConfig } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { CuneibibDatabase } from '../storage/database.js';
import { ReleaseBlockedError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { verifyDedup } from './dedup.js';
import { verifyEditions } from './editions.js';
import { verifyPublications } from './publications.js';
import { failedChecks } from './report.js';
import { verifyScholars } from './scholars.js';

export const VERIFIERS = ['editions', 'publications', 'dedup', 'scholars'] as const;
export type VerifierName = (typeof VERIFIERS)[number];

export function isVerifierName(value: string): value is VerifierName {
    return VERIFIERS.some((name) => name === value);
}

export interface GateResult {
    passed: boolean;
    reports: VerificationReport[];
    /** "verifier.check" for every failed check */
    failed: string[];
}

/**
 * Run the selected verifiers (all by default). The gate passes when no check failed;
 * warnings never block.
 */
export function runReleaseGate(
    db: CuneibibDatabase,
    options: { only?: VerifierName[]; verify?: VerifyConfig } = {}
): GateResult {
    const selected = options.only && options.only.length > 0 ? options.only : [...VERIFIERS];
    const { maxChainDepth } = options.verify ?? DEFAULT_CONFIG.verify;

    const reports = selected.map((name): VerificationReport => {
        switch (name) {
            case 'editions':
                return verifyEditions(db, { maxChainDepth });
            case 'publications':
                return verifyPublications(db, { maxChainDepth });
            case 'dedup':
                return verifyDedup(db);
            case 'scholars':
                return verifyScholars(db);
        }
    });

    const failed = reports.flatMap((report) => failedChecks(report).map((check) => `${report.name}.${check.name}`));
    const passed = failed.length === 0;

    const logger = getLogger();
    if (passed) logger.info({ verifiers: selected }, 'Release gate passed');
    else logger.error({ failed }, 'Release gate failed');

    return { passed, reports, failed };
}

/**
 * Throw `ReleaseBlockedError` unless the gate passes.
 */
export function assertReleasable(result: GateResult): void {
    if (!result.passed) {
        throw new ReleaseBlockedError(result.failed);
    }
}
