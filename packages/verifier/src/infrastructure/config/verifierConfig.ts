import { DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND, DEFAULT_MISMATCH_THRESHOLD } from '@pvrcheck/common-types';
import { readIntEnv, readNumberEnv } from './env.js';

export interface VerifierConfig {
  concurrency: number;
  fetchTimeoutMs: number;
  headBytes: number;
  containerHeaderBytes: number;
  minProbeSizeBytes: number;
  fallbackBodyLimitBytes: number;
  mismatchThreshold: number;
  completeFileBytesPerSecond: number;
}

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 8;

/**
 * 環境変数から検証エンジンの設定を取得
 *
 * PROBE_CONCURRENCY は 1〜8 に丸める
 */
export function getVerifierConfig(): VerifierConfig {
  const concurrency = readIntEnv('PROBE_CONCURRENCY', 4);
  const mismatchThreshold = readNumberEnv('DURATION_MISMATCH_THRESHOLD', DEFAULT_MISMATCH_THRESHOLD);

  if (mismatchThreshold <= 0 || mismatchThreshold > 1) {
    throw new Error(`DURATION_MISMATCH_THRESHOLD must be in (0, 1] (got ${mismatchThreshold})`);
  }

  const config: VerifierConfig = {
    concurrency: Math.min(MAX_CONCURRENCY, Math.max(MIN_CONCURRENCY, concurrency)),
    fetchTimeoutMs: readIntEnv('PROBE_FETCH_TIMEOUT_MS', 30_000),
    headBytes: readIntEnv('PROBE_HEAD_BYTES', 2 * 1024 * 1024),
    containerHeaderBytes: readIntEnv('PROBE_CONTAINER_HEADER_BYTES', 64 * 1024),
    minProbeSizeBytes: readIntEnv('PROBE_MIN_SIZE_BYTES', 4_000_000),
    fallbackBodyLimitBytes: readIntEnv('PROBE_FALLBACK_BODY_LIMIT_BYTES', 256 * 1024 * 1024),
    mismatchThreshold,
    completeFileBytesPerSecond: readNumberEnv(
      'COMPLETE_FILE_BYTES_PER_SECOND',
      DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND
    ),
  };

  for (const key of ['fetchTimeoutMs', 'headBytes', 'containerHeaderBytes', 'fallbackBodyLimitBytes'] as const) {
    if (config[key] <= 0) {
      throw new Error(`Verifier setting ${key} must be positive (got ${config[key]})`);
    }
  }

  return config;
}
