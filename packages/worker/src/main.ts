import dotenv from 'dotenv';
import { Queue, Worker } from 'bullmq';
import { QUEUE_NAMES } from '@pvrcheck/common-types';
import type { VerificationPassJobPayload, VerificationPassJobResult } from '@pvrcheck/common-types';
import {
  closePool,
  createDurationCacheStore,
  createVerificationEngine,
  getCacheConfig,
  getCatalogConfig,
  getVerifierConfig,
  NextPvrCatalogService,
} from '@pvrcheck/verifier';
import { getWorkerConfig } from './infrastructure/config/workerConfig.js';
import { VerificationPassJobHandler } from './application/VerificationPassJobHandler.js';

dotenv.config();

async function main(): Promise<void> {
  console.log('🚀 [Worker] pvrcheck verification worker starting...');

  // 設定の読み込み
  const workerConfig = getWorkerConfig();
  const verifierConfig = getVerifierConfig();
  const cacheConfig = getCacheConfig();

  if (cacheConfig.backend !== 'postgres') {
    console.warn('⚠️ [Worker] CACHE_BACKEND is not postgres, detected durations will not be visible to the API');
  }

  // シャットダウン時に実行中のプローブを中断する
  const session = new AbortController();

  const catalog = new NextPvrCatalogService(getCatalogConfig());
  const { verifier } = createVerificationEngine({
    verifierConfig,
    catalog,
    cacheStore: await createDurationCacheStore(cacheConfig),
  });
  const jobHandler = new VerificationPassJobHandler(catalog, verifier, session.signal);

  const connection = {
    host: workerConfig.redisHost,
    port: workerConfig.redisPort,
  };

  // BullMQ Worker の起動（パスは1つずつ。パス内のプローブは verifier が並列化する）
  const worker = new Worker<VerificationPassJobPayload, VerificationPassJobResult>(
    QUEUE_NAMES.DURATION_VERIFICATION,
    async (job) => jobHandler.handle(job),
    {
      connection,
      concurrency: 1,
    },
  );

  worker.on('completed', (job, result) => {
    console.log(
      `🎉 [Worker] Verification job ${job.id} completed: ${result.verified} verified, ${result.mismatched} mismatched`
    );
  });

  worker.on('failed', (job, err) => {
    console.error(`❌ [Worker] Verification job ${job?.id} failed:`, err.message);
  });

  worker.on('error', (err) => {
    console.error('❌ [Worker] Verification worker error:', err);
  });

  console.log(
    `✅ [Worker] Listening on queue "${QUEUE_NAMES.DURATION_VERIFICATION}" (probe concurrency ${verifierConfig.concurrency})`
  );

  // 定期パス
  let scheduler: Queue<VerificationPassJobPayload, VerificationPassJobResult> | null = null;
  if (workerConfig.repeatEveryMs) {
    scheduler = new Queue<VerificationPassJobPayload, VerificationPassJobResult>(QUEUE_NAMES.DURATION_VERIFICATION, {
      connection,
    });
    await scheduler.add(
      'scheduled-pass',
      { trigger: 'scheduled', createdAt: new Date().toISOString() },
      {
        repeat: { every: workerConfig.repeatEveryMs },
        removeOnComplete: 100,
        removeOnFail: 200,
      },
    );
    console.log(`⏰ [Worker] Scheduled pass every ${workerConfig.repeatEveryMs}ms`);
  } else {
    console.log('ℹ️ [Worker] VERIFICATION_REPEAT_MS not set, scheduled passes disabled');
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n🛑 [Worker] Received ${signal}, shutting down gracefully...`);
    session.abort();
    try {
      await worker.close();
      console.log('✅ [Worker] Verification worker closed');
      if (scheduler) {
        await scheduler.close();
      }
      await closePool();
      console.log('✅ [Worker] Database pool closed');
    } catch (err) {
      console.error('❌ [Worker] Error during shutdown:', err);
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('❌ [Worker] Fatal error:', err);
  process.exit(1);
});
