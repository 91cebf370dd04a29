import { readIntEnv, readOptionalEnv } from '@pvrcheck/verifier';

export interface WorkerConfig {
  redisHost: string;
  redisPort: number;
  /** 定期パスの間隔（未設定なら定期実行しない） */
  repeatEveryMs?: number;
}

export function getWorkerConfig(): WorkerConfig {
  const redisHost = readOptionalEnv('REDIS_HOST');
  if (!redisHost) {
    throw new Error('REDIS_HOST environment variable is required');
  }

  const repeatEveryMs = readIntEnv('VERIFICATION_REPEAT_MS', 0);
  if (repeatEveryMs < 0) {
    throw new Error(`VERIFICATION_REPEAT_MS must not be negative (got ${repeatEveryMs})`);
  }

  return {
    redisHost,
    redisPort: readIntEnv('REDIS_PORT', 6379),
    ...(repeatEveryMs > 0 && { repeatEveryMs }),
  };
}
