import type { IDurationCacheStore } from './domain/repositories/IDurationCacheStore.js';
import type { IRecordingCatalog } from './domain/repositories/IRecordingCatalog.js';
import type { IRangeFetcher } from './domain/repositories/IRangeFetcher.js';
import { DurationCache } from './domain/services/DurationCache.js';
import { DurationVerifier } from './domain/services/DurationVerifier.js';
import { ProbeRecordingUseCase } from './domain/usecases/ProbeRecording.usecase.js';
import type { CacheConfig } from './infrastructure/config/cacheConfig.js';
import type { VerifierConfig } from './infrastructure/config/verifierConfig.js';
import { getPool } from './infrastructure/database/PostgresClient.js';
import { HttpRangeFetcher } from './infrastructure/http/HttpRangeFetcher.js';
import { InMemoryDurationCacheStore } from './infrastructure/repositories/InMemoryDurationCacheStore.js';
import { PostgresDurationCacheStore } from './infrastructure/repositories/PostgresDurationCacheStore.js';

export interface VerificationEngine {
  catalog: IRecordingCatalog;
  cache: DurationCache;
  verifier: DurationVerifier;
}

export interface VerificationEngineDependencies {
  verifierConfig: VerifierConfig;
  catalog: IRecordingCatalog;
  cacheStore: IDurationCacheStore;
  fetcher?: IRangeFetcher;
}

/**
 * 設定に応じたキャッシュストアを作成（postgres の場合はテーブルも用意する）
 */
export async function createDurationCacheStore(config: CacheConfig): Promise<IDurationCacheStore> {
  if (config.backend === 'postgres') {
    const store = new PostgresDurationCacheStore(getPool(config.databaseUrl));
    await store.ensureSchema();
    console.log('🗄️ [DurationCache] Using PostgreSQL key_value_store');
    return store;
  }

  console.log('🗄️ [DurationCache] Using in-memory store');
  return new InMemoryDurationCacheStore();
}

/**
 * 検証エンジン一式を組み立てる（server / worker 共通）
 */
export function createVerificationEngine(deps: VerificationEngineDependencies): VerificationEngine {
  const { verifierConfig, catalog, cacheStore } = deps;

  const fetcher =
    deps.fetcher ??
    new HttpRangeFetcher({
      timeoutMs: verifierConfig.fetchTimeoutMs,
      fallbackBodyLimitBytes: verifierConfig.fallbackBodyLimitBytes,
    });

  const probeRecording = new ProbeRecordingUseCase(catalog, fetcher, {
    headBytes: verifierConfig.headBytes,
    containerHeaderBytes: verifierConfig.containerHeaderBytes,
    minProbeSizeBytes: verifierConfig.minProbeSizeBytes,
  });

  const cache = new DurationCache(cacheStore);
  const verifier = new DurationVerifier(cache, probeRecording, {
    concurrency: verifierConfig.concurrency,
    mismatchThreshold: verifierConfig.mismatchThreshold,
    completeFileBytesPerSecond: verifierConfig.completeFileBytesPerSecond,
  });

  return { catalog, cache, verifier };
}
