import { z } from 'zod';
import type { MatchCandidate } from '../types/index.js';

/**
 * Strip resolver prefixes to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test", "doi:10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string): string {
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim();
}

/** Trimmed text; an empty string is an error, null means absent. */
const text = z
    .string()
    .trim()
    .min(1, 'must not be empty (omit the field or use null)')
    .nullish()
    .transform((value) => value ?? undefined);

const doi = text.transform((value, ctx) => {
    if (value === undefined) return undefined;
    const stripped = stripDoiPrefix(value);
    if (!stripped) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'DOI prefix without identifier' });
        return z.NEVER;
    }
    return stripped;
});

const year = z
    .union([
        z.number().int().min(1).max(9999),
        z.string().trim().regex(/^\d{1,4}$/, 'must be a year').transform(Number),
    ])
    .nullish()
    .transform((value) => value ?? undefined);

const volume = z
    .union([z.string().trim().min(1, 'must not be empty (omit the field or use null)'), z.number().int().nonnegative().transform(String)])
    .nullish()
    .transform((value) => value ?? undefined);

/**
 * Boundary schema for candidate records delivered by importers.
 * Unknown keys are dropped.
 */
export const CandidateSchema = z.object({
    doi,
    bibtex_key: text,
    title: text,
    year,
    short_title: text,
    volume,
});

/**
 * Candidate plus the provenance tag the row is inserted with.
 */
export const IngestRecordSchema = CandidateSchema.extend({
    source: text,
});

export type IngestRecord = z.infer<typeof IngestRecordSchema>;

export type ParseResult<T> = { success: true; value: T } | { success: false; error: string };

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`).join('; ');
}

/**
 * Validate a raw record into a `MatchCandidate`.
 */
export function parseCandidate(raw: unknown): ParseResult<MatchCandidate> {
    const parsed = CandidateSchema.safeParse(raw);
    return parsed.success ? { success: true, value: parsed.data } : { success: false, error: formatIssues(parsed.error) };
}

export function parseIngestRecord(raw: unknown): ParseResult<IngestRecord> {
    const parsed = IngestRecordSchema.safeParse(raw);
    return parsed.success ? { success: true, value: parsed.data } : { success: false, error: formatIssues(parsed.error) };
}

/**
 * True when the candidate carries at least one field the matcher can use.
 */
export function hasIdentifyingField(candidate: MatchCandidate): boolean {
    return Boolean(
        candidate.doi ||
            candidate.bibtex_key ||
            (candidate.title && candidate.year !== undefined) ||
            (candidate.short_title && candidate.volume)
    );
}
