import { describe, it, expect, beforeEach } from 'vitest';
import { CacheAccessError } from '@pvrcheck/common-types';
import { PostgresDurationCacheStore } from '../PostgresDurationCacheStore.js';
import type { SqlQueryable } from '../PostgresDurationCacheStore.js';
import { DurationCache } from '../../../domain/services/DurationCache.js';

/**
 * key_value_store の SELECT / UPSERT だけを解釈するプロセス内の代用品
 */
class FakeKeyValuePool implements SqlQueryable {
  readonly rows = new Map<string, unknown>();
  readonly statements: string[] = [];
  failWith: Error | null = null;

  async query(text: string, values: unknown[] = []): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.statements.push(text.trim().split(/\s+/).slice(0, 2).join(' '));
    if (this.failWith) {
      throw this.failWith;
    }

    if (text.startsWith('SELECT')) {
      const key = String(values[0]);
      return { rows: this.rows.has(key) ? [{ value: this.rows.get(key) }] : [] };
    }

    if (text.startsWith('INSERT')) {
      // JSONB として保存され、読み出し時はパース済みで返る
      this.rows.set(String(values[0]), JSON.parse(String(values[1])));
    }
    return { rows: [] };
  }
}

describe('PostgresDurationCacheStore', () => {
  let pool: FakeKeyValuePool;
  let store: PostgresDurationCacheStore;

  beforeEach(() => {
    pool = new FakeKeyValuePool();
    store = new PostgresDurationCacheStore(pool);
  });

  it('ensureSchema はテーブルを作成する', async () => {
    await store.ensureSchema();
    expect(pool.statements).toEqual(['CREATE TABLE']);
  });

  it('未保存なら空のドキュメント', async () => {
    expect(await store.load()).toEqual({});
  });

  it('DurationProbeCache キーにドキュメント全体を保存して読み戻す', async () => {
    await store.save({ '101': 5400, '102': 1800 });

    expect(pool.rows.get('DurationProbeCache')).toEqual({ '101': 5400, '102': 1800 });
    expect(await store.load()).toEqual({ '101': 5400, '102': 1800 });
  });

  it('不正なエントリは読み込み時に捨てる', async () => {
    pool.rows.set('DurationProbeCache', { '101': 5400, '102': 'long', '103': -5, '104': 12.5 });

    expect(await store.load()).toEqual({ '101': 5400 });
  });

  it('オブジェクトでない値は空として扱う', async () => {
    pool.rows.set('DurationProbeCache', [1, 2, 3]);

    expect(await store.load()).toEqual({});
  });

  it('DB エラーは CacheAccessError', async () => {
    pool.failWith = new Error('connection refused');

    await expect(store.load()).rejects.toThrow(CacheAccessError);
    await expect(store.save({ '101': 5400 })).rejects.toThrow('Failed to save DurationProbeCache: connection refused');
  });

  it('DurationCache 経由の更新は1行を読み書きする', async () => {
    const cache = new DurationCache(store);

    await Promise.all([cache.set('101', 5400), cache.set('102', 1800), cache.set('103', 600)]);

    expect(pool.rows.get('DurationProbeCache')).toEqual({ '101': 5400, '102': 1800, '103': 600 });
    expect(pool.statements.filter((statement) => statement.startsWith('INSERT'))).toHaveLength(3);
  });
});
