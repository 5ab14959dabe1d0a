import type { CheckStatus, VerificationCheck, VerificationReport } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Build a check that passes when there are no offenders and otherwise takes
 * `failStatus`.
 */
export function offenderCheck(
    name: string,
    offenders: Array<string | number>,
    failStatus: Exclude<CheckStatus, 'pass'>,
    describe: (count: number) => string
): VerificationCheck {
    return {
        name,
        status: offenders.length === 0 ? 'pass' : failStatus,
        detail: describe(offenders.length),
        offenders,
    };
}

export function failedChecks(report: VerificationReport): VerificationCheck[] {
    return report.checks.filter((check) => check.status === 'fail');
}

/**
 * Log every check at a level matching its status, then a summary line.
 */
export function logReport(report: VerificationReport): VerificationReport {
    const logger = getLogger().child({ verifier: report.name });

    for (const check of report.checks) {
        const fields = { check: check.name, offenders: check.offenders.slice(0, 20) };
        if (check.status === 'fail') logger.error(fields, check.detail);
        else if (check.status === 'warn') logger.warn(fields, check.detail);
        else logger.info({ check: check.name }, check.detail);
    }

    logger.info({ stats: report.stats, failed: failedChecks(report).length }, 'Verification complete');
    return report;
}
