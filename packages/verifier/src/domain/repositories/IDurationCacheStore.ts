import type { DurationCacheDocument } from '@pvrcheck/common-types';

/**
 * 検出時間キャッシュの永続化を抽象化
 *
 * ドキュメント全体を1つのキーで読み書きする。
 * 実装: InMemoryDurationCacheStore, PostgresDurationCacheStore
 */
export interface IDurationCacheStore {
  /**
   * ドキュメント全体を読む。未保存なら空オブジェクト
   */
  load(): Promise<DurationCacheDocument>;

  /**
   * ドキュメント全体を置き換える
   */
  save(document: DurationCacheDocument): Promise<void>;
}
