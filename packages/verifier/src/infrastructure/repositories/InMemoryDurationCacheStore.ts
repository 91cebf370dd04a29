import type { DurationCacheDocument } from '@pvrcheck/common-types';
import type { IDurationCacheStore } from '../../domain/repositories/IDurationCacheStore.js';

/**
 * In-memory Duration Cache Store の実装
 *
 * プロセス終了で消える。ローカル実行とテスト用
 */
export class InMemoryDurationCacheStore implements IDurationCacheStore {
  private document: DurationCacheDocument;

  constructor(initial: DurationCacheDocument = {}) {
    this.document = { ...initial };
  }

  async load(): Promise<DurationCacheDocument> {
    return { ...this.document };
  }

  async save(document: DurationCacheDocument): Promise<void> {
    this.document = { ...document };
  }
}
