import type { DurationCacheDocument } from '@pvrcheck/common-types';
import { CacheAccessError } from '@pvrcheck/common-types';
import type { IDurationCacheStore } from '../../domain/repositories/IDurationCacheStore.js';
import { DURATION_CACHE_KEY, parseCacheDocument } from './cacheDocument.js';

/**
 * このストアが使うクエリ実行部分（pg.Pool / pg.PoolClient が満たす）
 */
export interface SqlQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

/**
 * PostgreSQL Duration Cache Store の実装
 *
 * key_value_store テーブルの1行（key = DurationProbeCache）に JSONB でドキュメント全体を保存する
 */
export class PostgresDurationCacheStore implements IDurationCacheStore {
  constructor(
    private readonly pool: SqlQueryable,
    private readonly key: string = DURATION_CACHE_KEY
  ) {}

  /**
   * テーブルがなければ作成
   */
  async ensureSchema(): Promise<void> {
    try {
      await this.pool.query(
        `CREATE TABLE IF NOT EXISTS key_value_store (
           key TEXT PRIMARY KEY,
           value JSONB NOT NULL,
           updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
         )`
      );
    } catch (error) {
      throw new CacheAccessError(`Failed to prepare key_value_store: ${describe(error)}`);
    }
  }

  async load(): Promise<DurationCacheDocument> {
    let result: { rows: Array<Record<string, unknown>> };
    try {
      result = await this.pool.query(
        'SELECT value FROM key_value_store WHERE key = $1',
        [this.key]
      );
    } catch (error) {
      throw new CacheAccessError(`Failed to load ${this.key}: ${describe(error)}`);
    }

    if (result.rows.length === 0) {
      return {};
    }
    return parseCacheDocument(result.rows[0].value);
  }

  async save(document: DurationCacheDocument): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO key_value_store (key, value, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (key) DO UPDATE SET
           value = EXCLUDED.value,
           updated_at = EXCLUDED.updated_at`,
        [this.key, JSON.stringify(document)]
      );
    } catch (error) {
      throw new CacheAccessError(`Failed to save ${this.key}: ${describe(error)}`);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
