import { CuneibibError } from '../utils/errors.js';

/**
 * Parse a positive integer id given on the command line. Digits only:
 * "12abc", "1e3" and "-4" are rejected rather than truncated.
 */
export function parseIdArgument(value: string, label = 'id'): number {
    if (!/^\d+$/.test(value)) {
        throw new CuneibibError(`Invalid ${label}: ${value}`);
    }
    const id = Number(value);
    if (!Number.isSafeInteger(id) || id === 0) {
        throw new CuneibibError(`Invalid ${label}: ${value}`);
    }
    return id;
}
