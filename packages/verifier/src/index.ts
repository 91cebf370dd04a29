// Probes
export { probeTsDuration, extractFirstPts, extractLastPts, parsePts } from './domain/probes/tsProbe.js';
export { extractMp4Duration } from './domain/probes/mp4Probe.js';
export { extractMkvDuration } from './domain/probes/mkvProbe.js';
export { selectProbeKind, extensionHintFromFileName } from './domain/probes/selectProbeKind.js';

// Domain interfaces
export type { FetchRangeOptions, IRangeFetcher, RangeResponse } from './domain/repositories/IRangeFetcher.js';
export type { IRecordingCatalog } from './domain/repositories/IRecordingCatalog.js';
export type { IDurationCacheStore } from './domain/repositories/IDurationCacheStore.js';

// Services / UseCases
export { DurationCache } from './domain/services/DurationCache.js';
export { DurationVerifier } from './domain/services/DurationVerifier.js';
export type { DurationVerifierOptions, VerificationPassOptions } from './domain/services/DurationVerifier.js';
export { runWithConcurrency } from './domain/services/runWithConcurrency.js';
export { selectRecordings } from './domain/services/selectRecordings.js';
export { ProbeRecordingUseCase, DEFAULT_PROBE_PLAN } from './domain/usecases/ProbeRecording.usecase.js';
export type { ProbePlan, ProbeRecordingRequest } from './domain/usecases/ProbeRecording.usecase.js';

// Infrastructure
export { HttpRangeFetcher, parseContentRangeTotal } from './infrastructure/http/HttpRangeFetcher.js';
export type { FetchFn, HttpRangeFetcherOptions } from './infrastructure/http/HttpRangeFetcher.js';
export { InMemoryDurationCacheStore } from './infrastructure/repositories/InMemoryDurationCacheStore.js';
export { PostgresDurationCacheStore } from './infrastructure/repositories/PostgresDurationCacheStore.js';
export { NextPvrCatalogService } from './infrastructure/catalog/NextPvrCatalogService.js';
export { StaticRecordingCatalog } from './infrastructure/catalog/StaticRecordingCatalog.js';
export { getPool, closePool } from './infrastructure/database/PostgresClient.js';

// Config
export { getVerifierConfig } from './infrastructure/config/verifierConfig.js';
export type { VerifierConfig } from './infrastructure/config/verifierConfig.js';
export { getCacheConfig } from './infrastructure/config/cacheConfig.js';
export type { CacheConfig } from './infrastructure/config/cacheConfig.js';
export { getCatalogConfig } from './infrastructure/config/catalogConfig.js';
export type { CatalogConfig } from './infrastructure/config/catalogConfig.js';
export { readIntEnv, readOptionalEnv } from './infrastructure/config/env.js';

// Wiring
export { createVerificationEngine, createDurationCacheStore } from './createVerificationEngine.js';
export type { VerificationEngine, VerificationEngineDependencies } from './createVerificationEngine.js';
