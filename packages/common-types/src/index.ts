// Entities
export { RecordingVerificationEntity } from './entities/RecordingVerification.entity.js';
export type { VerificationState, ClassificationOptions } from './entities/RecordingVerification.entity.js';

// Domain Errors
export {
  DomainError,
  RecordingNotFoundError,
  InvalidStateTransitionError,
  InvalidOperationError,
  NetworkError,
  UnprobeableSizeError,
  ParseError,
  ProbeCancelledError,
  CatalogError,
  CacheAccessError,
} from './errors/DomainErrors.js';

// Recording types
export type { RecordingId, RecordingRef, ProbeTarget } from './recording.js';

// Probe types
export type { ProbeKind, ProbeSource, DetectedDuration, DurationCacheDocument } from './probe.js';
export { PROBE_SOURCES } from './probe.js';

// Verdict
export type { Verdict, MismatchLabel, VerdictDetail } from './verdict.js';
export {
  classifyDuration,
  describeMismatch,
  MISMATCH_LABEL_TEXT,
  DEFAULT_MISMATCH_THRESHOLD,
  DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND,
} from './verdict.js';

// Job types
export type {
  VerificationPassJobPayload,
  VerificationPassJobResult,
  VerificationPassSummary,
} from './job.js';
export { QUEUE_NAMES } from './job.js';
