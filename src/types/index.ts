/**
 * Barrel export for all shared types.
 */
export type { Publication, NewPublication, PublicationRef, Scholar } from './publication.js';
export { EditionType, EDITION_TYPES } from './edition.js';
export type { Artifact, ArtifactEdition, NewArtifactEdition, SupersessionTriple } from './edition.js';
export { MATCH_METHODS } from './match.js';
export type {
    MatchMethod,
    MatchCandidate,
    MatchResult,
    DedupCandidate,
    DedupResolution,
    ConfidenceBand,
} from './match.js';
export { DEFAULT_CONFIG } from './config.js';
export type { CuneibibConfig, LogLevel, MatcherConfig, PolicyConfig, VerifyConfig } from './config.js';
export type {
    CheckStatus,
    VerificationCheck,
    VerificationReport,
    ChainViolation,
    ChainViolationKind,
} from './verification.js';
