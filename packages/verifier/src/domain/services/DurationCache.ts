import type { DurationCacheDocument, RecordingId } from '@pvrcheck/common-types';
import { InvalidOperationError } from '@pvrcheck/common-types';
import type { IDurationCacheStore } from '../repositories/IDurationCacheStore.js';

/**
 * 検出時間キャッシュ（recordingId -> 秒）
 *
 * ストアはドキュメント全体を読み書きするため、更新は「全体を読む -> 変更 -> 全体を書く」になる。
 * 並行プローブからの更新が互いを上書きしないよう、すべての操作を1本のキューで直列化する。
 */
export class DurationCache {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly store: IDurationCacheStore) {}

  /**
   * ドキュメント全体のコピーを返す
   */
  loadAll(): Promise<DurationCacheDocument> {
    return this.enqueue(async () => ({ ...(await this.store.load()) }));
  }

  get(recordingId: RecordingId): Promise<number | undefined> {
    return this.enqueue(async () => {
      const document = await this.store.load();
      return Object.prototype.hasOwnProperty.call(document, recordingId) ? document[recordingId] : undefined;
    });
  }

  set(recordingId: RecordingId, seconds: number): Promise<void> {
    if (!Number.isInteger(seconds) || seconds <= 0) {
      return Promise.reject(
        new InvalidOperationError(`Detected duration must be a positive integer: ${recordingId}=${seconds}`)
      );
    }

    return this.enqueue(async () => {
      const document = await this.store.load();
      await this.store.save({ ...document, [recordingId]: seconds });
    });
  }

  /**
   * エントリを削除する。存在した場合は true
   */
  delete(recordingId: RecordingId): Promise<boolean> {
    return this.enqueue(async () => {
      const document = await this.store.load();
      if (!Object.prototype.hasOwnProperty.call(document, recordingId)) {
        return false;
      }
      const next = { ...document };
      delete next[recordingId];
      await this.store.save(next);
      return true;
    });
  }

  /**
   * 複数エントリをまとめて書き込む（既存エントリは上書き）
   */
  saveAll(entries: DurationCacheDocument): Promise<void> {
    return this.enqueue(async () => {
      const document = await this.store.load();
      await this.store.save({ ...document, ...entries });
    });
  }

  /**
   * 直前の操作の完了（成功・失敗を問わない）を待ってから task を実行する
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
