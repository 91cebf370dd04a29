import type { ProbeTarget } from '@pvrcheck/common-types';
import { DomainError, NetworkError, ProbeCancelledError } from '@pvrcheck/common-types';
import type { FetchRangeOptions, IRangeFetcher, RangeResponse } from '../../domain/repositories/IRangeFetcher.js';
import { createRequestScope } from './requestScope.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRangeFetcherOptions {
  /** 1リクエスト（本文の読み取りを含む）のタイムアウト */
  timeoutMs: number;
  /** Range を無視して 200 が返ったときに読む本文の上限 */
  fallbackBodyLimitBytes: number;
  fetchFn?: FetchFn;
}

/** HEAD 自体に対応していないサーバーの応答 */
const HEAD_UNSUPPORTED_STATUSES = new Set([405, 501]);

/**
 * Content-Range: bytes 0-0/<total> の total を読む（"*" は不明扱い）
 */
export function parseContentRangeTotal(value: string | null): number | null {
  if (!value) return null;
  const slash = value.lastIndexOf('/');
  if (slash < 0) return null;
  return parseNonNegativeInteger(value.slice(slash + 1));
}

function parseNonNegativeInteger(value: string | null): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * クエリ文字列（セッションIDを含む）を除いた表示用URL
 */
function describeUrl(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart < 0 ? url : url.slice(0, queryStart);
}

/**
 * HTTP Range Fetcher
 *
 * fetch で録画ストリームの一部だけを読む。サーバーが Range を無視した場合は
 * supportsRange = false として、上限までの本文を返す。
 */
export class HttpRangeFetcher implements IRangeFetcher {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpRangeFetcherOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async totalSize(target: ProbeTarget, signal?: AbortSignal): Promise<number | null> {
    // 1. HEAD の Content-Length（HEAD 非対応なら次へ）
    const fromHead = await this.request(target, 'HEAD', {}, signal, async (response) => {
      await this.discardBody(response);
      if (response.ok) {
        return parseNonNegativeInteger(response.headers.get('content-length'));
      }
      if (HEAD_UNSUPPORTED_STATUSES.has(response.status)) {
        return null;
      }
      throw new NetworkError(`HTTP ${response.status} for HEAD ${describeUrl(target.streamUrl)}`);
    });
    if (fromHead !== null) {
      return fromHead;
    }

    // 2. bytes=0-0 の Content-Range
    return this.request(target, 'GET', { Range: 'bytes=0-0' }, signal, async (response) => {
      await this.discardBody(response);
      if (response.status !== 200 && response.status !== 206) {
        throw new NetworkError(`HTTP ${response.status} for ${describeUrl(target.streamUrl)}`);
      }
      return parseContentRangeTotal(response.headers.get('content-range'));
    });
  }

  async fetchRange(
    target: ProbeTarget,
    start: number,
    end: number,
    signal?: AbortSignal,
    rangeOptions: FetchRangeOptions = {}
  ): Promise<RangeResponse> {
    const bodyLimit = Math.min(
      this.options.fallbackBodyLimitBytes,
      rangeOptions.maxBytes ?? this.options.fallbackBodyLimitBytes
    );

    return this.request(target, 'GET', { Range: `bytes=${start}-${end}` }, signal, async (response) => {
      if (response.status === 206) {
        const bytes = new Uint8Array(await response.arrayBuffer());
        return { bytes, supportsRange: true, complete: true };
      }

      if (response.status === 200) {
        const { bytes, complete } = await this.readBodyUpTo(response, bodyLimit);
        return { bytes, supportsRange: false, complete };
      }

      await this.discardBody(response);
      throw new NetworkError(`HTTP ${response.status} for ${describeUrl(target.streamUrl)}`);
    });
  }

  /**
   * タイムアウトと外部キャンセルを付けてリクエストを実行し、本文の処理まで同じスコープで行う
   */
  private async request<T>(
    target: ProbeTarget,
    method: 'HEAD' | 'GET',
    headers: Record<string, string>,
    signal: AbortSignal | undefined,
    handle: (response: Response) => Promise<T>
  ): Promise<T> {
    const url = describeUrl(target.streamUrl);

    if (signal?.aborted) {
      throw new ProbeCancelledError(`Request cancelled: ${method} ${url}`);
    }

    const scope = createRequestScope(this.options.timeoutMs, signal);
    try {
      const response = await this.fetchFn(target.streamUrl, {
        method,
        headers: { ...target.authHeaders, ...headers },
        signal: scope.signal,
      });
      return await handle(response);
    } catch (error) {
      if (signal?.aborted) {
        throw new ProbeCancelledError(`Request cancelled: ${method} ${url}`);
      }
      if (scope.timedOut()) {
        throw new NetworkError(`Request timed out after ${this.options.timeoutMs}ms: ${method} ${url}`);
      }
      if (error instanceof DomainError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request failed: ${method} ${url}: ${message}`);
    } finally {
      scope.dispose();
    }
  }

  /**
   * 本文を limit バイトまで読み、残りはキャンセルする
   */
  private async readBodyUpTo(
    response: Response,
    limit: number
  ): Promise<{ bytes: Uint8Array; complete: boolean }> {
    if (!response.body) {
      return { bytes: new Uint8Array(0), complete: true };
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;
    let complete = true;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      const room = limit - received;
      if (value.length >= room) {
        if (room > 0) {
          chunks.push(value.subarray(0, room));
          received += room;
        }
        // ちょうど上限で終わったかは、次の read をしないと分からない
        const next = value.length > room ? null : await reader.read();
        if (next === null || !next.done) {
          complete = false;
          await reader.cancel();
        }
        break;
      }

      chunks.push(value);
      received += value.length;
    }

    const bytes = new Uint8Array(received);
    let offset = 0;
    for (const chunk of chunks) {
      bytes.set(chunk, offset);
      offset += chunk.length;
    }
    return { bytes, complete };
  }

  private async discardBody(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
      await response.body.cancel();
    }
  }
}
