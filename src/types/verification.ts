export type CheckStatus = 'pass' | 'warn' | 'fail';

/**
 * One audit check. `offenders` carries the IDs or keys needed to locate the
 * rows behind a warning or failure.
 */
export interface VerificationCheck {
    name: string;
    status: CheckStatus;
    detail: string;
    offenders: Array<string | number>;
}

export interface VerificationReport {
    name: string;
    checks: VerificationCheck[];
    /** Counts and distributions reported alongside the checks */
    stats: Record<string, number | Record<string, number>>;
}

export type ChainViolationKind = 'cycle' | 'depth_exceeded';

/**
 * A `supersedes_id` walk that did not terminate within the bound.
 */
export interface ChainViolation {
    start: number;
    kind: ChainViolationKind;
    /** Nodes visited before the walk stopped, starting with `start` */
    path: number[];
}
