import { readIntEnv, readOptionalEnv } from '@pvrcheck/verifier';

export interface QueueConfig {
  redisHost: string;
  redisPort: number;
}

/**
 * 環境変数からキューの接続設定を取得
 *
 * REDIS_HOST が未設定なら null（キューなしで動作し、API はパスをその場で実行する）
 */
export function getQueueConfig(): QueueConfig | null {
  const redisHost = readOptionalEnv('REDIS_HOST');
  if (!redisHost) {
    return null;
  }

  return {
    redisHost,
    redisPort: readIntEnv('REDIS_PORT', 6379),
  };
}
