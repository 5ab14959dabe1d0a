/**
 * Library entry point.
 */
export * from './types/index.js';

export { normalizeTitle, normalizeNameKey, stripDiacritics, extractInitials } from './nlp/normalize.js';
export { similarity, levenshteinDistance, DEFAULT_LENGTH_RATIO_CUTOFF } from './nlp/similarity.js';
export type { SimilarityOptions } from './nlp/similarity.js';
export { parseName, parseAuthorString, namesMatch, PARTICLES } from './nlp/names.js';
export type { ParsedName } from './nlp/names.js';

export { findMatch, MATCH_CONFIDENCE } from './matching/publication-matcher.js';
export type { PublicationStore } from './matching/publication-matcher.js';
export { CandidateSchema, IngestRecordSchema, parseCandidate, parseIngestRecord, hasIdentifyingField, stripDoiPrefix } from './matching/candidate.js';
export type { IngestRecord, ParseResult } from './matching/candidate.js';
export { classifyConfidence, ingestPublication, ingestBatch } from './matching/dedup-policy.js';
export type { IngestStore, IngestAction, IngestOutcome, IngestOptions, BatchSummary } from './matching/dedup-policy.js';

export { CuneibibDatabase } from './storage/database.js';
export type { MergeableFields, RankedEdition, SupersedesEdge, KeyCount } from './storage/database.js';

export { buildSupersessionGraph, walkChain, findChainViolations, DEFAULT_MAX_CHAIN_DEPTH } from './supersession/chains.js';
export type { ChainWalk } from './supersession/chains.js';
export { seedSupersessions, loadCurationFile, DEFAULT_CURATION_PATH } from './supersession/seed.js';
export type { SeedStore, SeedReport, SkipReason } from './supersession/seed.js';
export { computeCurrentEditions, compareEditionRank, selectCurrentEditions } from './supersession/current-edition.js';
export type { CurrentEditionStore, CurrentEditionReport } from './supersession/current-edition.js';

export { verifyEditions } from './verify/editions.js';
export { verifyPublications } from './verify/publications.js';
export { verifyDedup } from './verify/dedup.js';
export { verifyScholars, planScholarMerges, loadScholarCollisionGroups } from './verify/scholars.js';
export type { ScholarMergePlan, ScholarPair } from './verify/scholars.js';
export { runReleaseGate, assertReleasable, isVerifierName, VERIFIERS } from './verify/gate.js';
export type { GateResult, VerifierName } from './verify/gate.js';

export { CuneibibError, ConfigError, CurationFileError, ReleaseBlockedError } from './utils/errors.js';
export { resolveConfig } from './utils/config.js';
export type { FileConfig, CliConfigFlags } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
