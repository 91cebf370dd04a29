import type { DurationVerifier, IDurationCacheStore, IRangeFetcher, IRecordingCatalog } from '@pvrcheck/verifier';
import {
  createDurationCacheStore,
  createVerificationEngine,
  getCacheConfig,
  getCatalogConfig,
  getVerifierConfig,
  NextPvrCatalogService,
} from '@pvrcheck/verifier';
import { DIContainer } from './DIContainer.js';
import { getQueueConfig } from '../config/queueConfig.js';
import { BullMqVerificationPassQueue } from '../queue/verificationQueue.js';
import type { IVerificationPassQueue } from '../../domain/queue/IVerificationPassQueue.js';

// Use Cases
import { RunVerificationPassUseCase } from '../../domain/usecases/RunVerificationPass.usecase.js';
import { GetVerdictUseCase } from '../../domain/usecases/GetVerdict.usecase.js';
import { ListVerdictsUseCase } from '../../domain/usecases/ListVerdicts.usecase.js';
import { ClearDurationCacheUseCase } from '../../domain/usecases/ClearDurationCache.usecase.js';

// Controllers
import { VerificationController } from '../../presentation/controllers/VerificationController.js';

export interface ServerServices {
  Catalog: IRecordingCatalog;
  DurationVerifier: DurationVerifier;
  VerificationPassQueue: IVerificationPassQueue | null;
  RunVerificationPassUseCase: RunVerificationPassUseCase;
  GetVerdictUseCase: GetVerdictUseCase;
  ListVerdictsUseCase: ListVerdictsUseCase;
  ClearDurationCacheUseCase: ClearDurationCacheUseCase;
  VerificationController: VerificationController;
}

export type ServerContainer = DIContainer<ServerServices>;

/**
 * 差し替え可能な依存（テストではインメモリ実装を渡す）
 */
export interface ServerOverrides {
  catalog?: IRecordingCatalog;
  cacheStore?: IDurationCacheStore;
  fetcher?: IRangeFetcher;
  queue?: IVerificationPassQueue | null;
  /** インラインで実行するパスに渡すシャットダウン用シグナル */
  signal?: AbortSignal;
}

/**
 * DIコンテナのセットアップ (Server-side)
 *
 * キャッシュバックエンドは CACHE_BACKEND、キューの有無は REDIS_HOST で切り替え
 */
export async function setupContainer(overrides: ServerOverrides = {}): Promise<ServerContainer> {
  const container = new DIContainer<ServerServices>();

  const catalog = overrides.catalog ?? new NextPvrCatalogService(getCatalogConfig());
  const cacheStore = overrides.cacheStore ?? (await createDurationCacheStore(getCacheConfig()));
  const { verifier } = createVerificationEngine({
    verifierConfig: getVerifierConfig(),
    catalog,
    cacheStore,
    fetcher: overrides.fetcher,
  });

  container.register('Catalog', catalog);
  container.register('DurationVerifier', verifier);

  // Queue（REDIS_HOST 未設定ならパスはAPIプロセス内で実行）
  let queue: IVerificationPassQueue | null;
  if (overrides.queue !== undefined) {
    queue = overrides.queue;
  } else {
    const queueConfig = getQueueConfig();
    queue = queueConfig ? new BullMqVerificationPassQueue(queueConfig) : null;
    console.log(
      queueConfig
        ? `📬 [Server] Verification passes go to queue (redis: ${queueConfig.redisHost}:${queueConfig.redisPort})`
        : 'ℹ️ [Server] Redis not configured, verification passes run inline'
    );
  }
  container.register('VerificationPassQueue', queue);

  // Use Cases
  const runVerificationPassUseCase = new RunVerificationPassUseCase(catalog, verifier, queue, overrides.signal);
  container.register('RunVerificationPassUseCase', runVerificationPassUseCase);

  const getVerdictUseCase = new GetVerdictUseCase(catalog, verifier);
  container.register('GetVerdictUseCase', getVerdictUseCase);

  const listVerdictsUseCase = new ListVerdictsUseCase(catalog, verifier);
  container.register('ListVerdictsUseCase', listVerdictsUseCase);

  const clearDurationCacheUseCase = new ClearDurationCacheUseCase(verifier);
  container.register('ClearDurationCacheUseCase', clearDurationCacheUseCase);

  // Controllers
  const verificationController = new VerificationController(
    runVerificationPassUseCase,
    getVerdictUseCase,
    listVerdictsUseCase,
    clearDurationCacheUseCase
  );
  container.register('VerificationController', verificationController);

  console.log('✅ [Server] DIContainer setup complete');

  return container;
}
