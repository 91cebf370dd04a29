export type CacheBackend = 'memory' | 'postgres';

export interface MemoryCacheConfig {
  backend: 'memory';
}

export interface PostgresCacheConfig {
  backend: 'postgres';
  databaseUrl: string;
}

export type CacheConfig = MemoryCacheConfig | PostgresCacheConfig;

/**
 * 環境変数からキャッシュ設定を取得
 *
 * CACHE_BACKEND=memory (default): プロセス内のみ
 * CACHE_BACKEND=postgres: key_value_store テーブル（DATABASE_URL 必須）
 */
export function getCacheConfig(): CacheConfig {
  const backend = process.env.CACHE_BACKEND || 'memory';

  if (backend === 'postgres') {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
      throw new Error('Postgres cache backend requires DATABASE_URL environment variable');
    }
    return { backend: 'postgres', databaseUrl };
  }

  if (backend !== 'memory') {
    throw new Error(`Unknown CACHE_BACKEND: ${backend} (expected "memory" or "postgres")`);
  }

  return { backend: 'memory' };
}
