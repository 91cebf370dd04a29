import type { ProbeTarget } from '@pvrcheck/common-types';

/**
 * Range リクエストの結果
 * - supportsRange: 206 なら true、Range を無視して 200 を返したら false
 * - complete: 200 の本文を上限で打ち切った場合は false
 */
export interface RangeResponse {
  bytes: Uint8Array;
  supportsRange: boolean;
  complete: boolean;
}

export interface FetchRangeOptions {
  /** Range を無視された場合に読む本文の上限（実装側の上限より小さいときだけ効く） */
  maxBytes?: number;
}

/**
 * 録画ストリームへのバイト範囲読み取りを抽象化
 *
 * 実装: HttpRangeFetcher
 */
export interface IRangeFetcher {
  /**
   * ファイルサイズを調べる（HEAD -> bytes=0-0 の Content-Range）。分からなければ null
   *
   * 認証エラーやサーバーエラーなど想定外のステータスは NetworkError
   */
  totalSize(target: ProbeTarget, signal?: AbortSignal): Promise<number | null>;

  /**
   * [start, end]（両端含む）のバイトを取得
   */
  fetchRange(
    target: ProbeTarget,
    start: number,
    end: number,
    signal?: AbortSignal,
    options?: FetchRangeOptions
  ): Promise<RangeResponse>;
}
