import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ProbeTarget } from '@pvrcheck/common-types';
import { NetworkError, ProbeCancelledError } from '@pvrcheck/common-types';
import { HttpRangeFetcher, parseContentRangeTotal } from '../HttpRangeFetcher.js';
import type { FetchFn } from '../HttpRangeFetcher.js';

const target: ProbeTarget = {
  streamUrl: 'http://pvr.test/live?recording=42&sid=test-sid',
  authHeaders: { Authorization: 'Bearer test-secret' },
};

function createFetcher(fetchFn: FetchFn, overrides: { timeoutMs?: number; fallbackBodyLimitBytes?: number } = {}) {
  return new HttpRangeFetcher({
    timeoutMs: overrides.timeoutMs ?? 1000,
    fallbackBodyLimitBytes: overrides.fallbackBodyLimitBytes ?? 1024,
    fetchFn,
  });
}

type FetchMock = Mock<Parameters<FetchFn>, ReturnType<FetchFn>>;

function mockFetch(implementation?: FetchFn): FetchMock {
  return implementation
    ? vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(implementation)
    : vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>();
}

function requestHeaders(fetchFn: FetchMock, callIndex: number): Headers {
  const init: RequestInit | undefined = fetchFn.mock.calls[callIndex][1];
  return new Headers(init?.headers);
}

/**
 * 要求された分だけ chunkSize ずつ流し、流したバイト数を数える本文
 */
function countingBody(chunkSize: number, chunkCount: number): { stream: ReadableStream<Uint8Array>; pulled: () => number } {
  let sent = 0;
  let pulledBytes = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent === chunkCount) {
        controller.close();
        return;
      }
      sent += 1;
      pulledBytes += chunkSize;
      controller.enqueue(new Uint8Array(chunkSize).fill(sent));
    },
  });
  return { stream, pulled: () => pulledBytes };
}

/**
 * signal が中断されるまで応答しない fetch
 */
const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });

describe('parseContentRangeTotal', () => {
  it('最後の / 以降を total として読む', () => {
    expect(parseContentRangeTotal('bytes 0-0/7340032')).toBe(7340032);
  });

  it('不明な total や壊れた値は null', () => {
    expect(parseContentRangeTotal('bytes 0-0/*')).toBeNull();
    expect(parseContentRangeTotal('bytes 0-0')).toBeNull();
    expect(parseContentRangeTotal(null)).toBeNull();
  });
});

describe('HttpRangeFetcher', () => {
  describe('totalSize', () => {
    it('HEAD の Content-Length を使う', async () => {
      const fetchFn = mockFetch(async () => new Response(null, { status: 200, headers: { 'content-length': '5000000' } }));
      const fetcher = createFetcher(fetchFn);

      expect(await fetcher.totalSize(target)).toBe(5000000);
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(fetchFn.mock.calls[0][0]).toBe(target.streamUrl);
      expect(fetchFn.mock.calls[0][1]?.method).toBe('HEAD');
      expect(requestHeaders(fetchFn, 0).get('authorization')).toBe('Bearer test-secret');
    });

    it('HEAD で分からなければ bytes=0-0 の Content-Range を使う', async () => {
      const fetchFn = mockFetch()
        .mockResolvedValueOnce(new Response(null, { status: 405 }))
        .mockResolvedValueOnce(
          new Response(new Uint8Array([0x47]), { status: 206, headers: { 'content-range': 'bytes 0-0/7340032' } })
        );
      const fetcher = createFetcher(fetchFn);

      expect(await fetcher.totalSize(target)).toBe(7340032);
      expect(fetchFn.mock.calls[1][1]?.method).toBe('GET');
      expect(requestHeaders(fetchFn, 1).get('range')).toBe('bytes=0-0');
      expect(requestHeaders(fetchFn, 1).get('authorization')).toBe('Bearer test-secret');
    });

    it('どちらでも分からなければ null', async () => {
      const fetchFn = mockFetch()
        .mockResolvedValueOnce(new Response(null, { status: 200 }))
        .mockResolvedValueOnce(new Response('x', { status: 200 }));
      const fetcher = createFetcher(fetchFn);

      expect(await fetcher.totalSize(target)).toBeNull();
    });

    it('HEAD が 501 でも bytes=0-0 にフォールバックする', async () => {
      const fetchFn = mockFetch()
        .mockResolvedValueOnce(new Response(null, { status: 501 }))
        .mockResolvedValueOnce(
          new Response(new Uint8Array([0x47]), { status: 206, headers: { 'content-range': 'bytes 0-0/4096' } })
        );
      const fetcher = createFetcher(fetchFn);

      expect(await fetcher.totalSize(target)).toBe(4096);
    });

    it('HEAD が 401 なら GET を試さずに NetworkError', async () => {
      const fetchFn = mockFetch(async () => new Response(null, { status: 401 }));
      const fetcher = createFetcher(fetchFn);

      await expect(fetcher.totalSize(target)).rejects.toThrow('HTTP 401 for HEAD http://pvr.test/live');
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('HEAD が 5xx なら NetworkError', async () => {
      const fetchFn = mockFetch(async () => new Response(null, { status: 503 }));
      const fetcher = createFetcher(fetchFn);

      await expect(fetcher.totalSize(target)).rejects.toThrow(NetworkError);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('bytes=0-0 が 200/206 以外なら NetworkError（null にしない）', async () => {
      const fetchFn = mockFetch()
        .mockResolvedValueOnce(new Response(null, { status: 405 }))
        .mockResolvedValueOnce(new Response('forbidden', { status: 403 }));
      const fetcher = createFetcher(fetchFn);

      await expect(fetcher.totalSize(target)).rejects.toThrow('HTTP 403 for http://pvr.test/live');
    });

    it('接続エラーは NetworkError', async () => {
      const fetchFn = mockFetch(async (): Promise<Response> => {
        throw new TypeError('fetch failed');
      });
      const fetcher = createFetcher(fetchFn);

      await expect(fetcher.totalSize(target)).rejects.toThrow(NetworkError);
    });
  });

  describe('fetchRange', () => {
    it('206 は Range 対応として本文を返す', async () => {
      const fetchFn = mockFetch(async () => new Response(new Uint8Array([1, 2, 3, 4]), { status: 206 }));
      const fetcher = createFetcher(fetchFn);

      const result = await fetcher.fetchRange(target, 100, 103);

      expect(result).toEqual({ bytes: new Uint8Array([1, 2, 3, 4]), supportsRange: true, complete: true });
      expect(requestHeaders(fetchFn, 0).get('range')).toBe('bytes=100-103');
    });

    it('200 は Range 非対応として本文全体を返す', async () => {
      const body = new Uint8Array(300).fill(7);
      const fetchFn = mockFetch(async () => new Response(body, { status: 200 }));
      const fetcher = createFetcher(fetchFn);

      const result = await fetcher.fetchRange(target, 0, 99);

      expect(result.supportsRange).toBe(false);
      expect(result.complete).toBe(true);
      expect(result.bytes).toHaveLength(300);
    });

    it('200 の本文は上限で打ち切り、complete = false にする', async () => {
      const fetchFn = mockFetch(async () => new Response(new Uint8Array(100).fill(9), { status: 200 }));
      const fetcher = createFetcher(fetchFn, { fallbackBodyLimitBytes: 40 });

      const result = await fetcher.fetchRange(target, 0, 9);

      expect(result.supportsRange).toBe(false);
      expect(result.complete).toBe(false);
      expect(result.bytes).toHaveLength(40);
    });

    it('本文がちょうど上限なら complete = true', async () => {
      const fetchFn = mockFetch(async () => new Response(new Uint8Array(40), { status: 200 }));
      const fetcher = createFetcher(fetchFn, { fallbackBodyLimitBytes: 40 });

      const result = await fetcher.fetchRange(target, 0, 9);

      expect(result.complete).toBe(true);
      expect(result.bytes).toHaveLength(40);
    });

    it('maxBytes を渡すと 200 の本文はそこで打ち切り、それ以上は読まない', async () => {
      const body = countingBody(16, 100);
      const fetchFn = mockFetch(async () => new Response(body.stream, { status: 200 }));
      const fetcher = createFetcher(fetchFn);

      const result = await fetcher.fetchRange(target, 0, 31, undefined, { maxBytes: 32 });

      expect(result.supportsRange).toBe(false);
      expect(result.complete).toBe(false);
      expect(result.bytes).toHaveLength(32);
      expect(body.pulled()).toBeLessThan(256);
    });

    it('maxBytes が全体の上限より大きければ全体の上限が効く', async () => {
      const fetchFn = mockFetch(async () => new Response(new Uint8Array(100), { status: 200 }));
      const fetcher = createFetcher(fetchFn, { fallbackBodyLimitBytes: 40 });

      const result = await fetcher.fetchRange(target, 0, 9, undefined, { maxBytes: 80 });

      expect(result.complete).toBe(false);
      expect(result.bytes).toHaveLength(40);
    });

    it('それ以外のステータスは NetworkError（URL のクエリは出さない）', async () => {
      const fetchFn = mockFetch(async () => new Response('not found', { status: 404 }));
      const fetcher = createFetcher(fetchFn);

      await expect(fetcher.fetchRange(target, 0, 9)).rejects.toThrow('HTTP 404 for http://pvr.test/live');
    });
  });

  describe('キャンセル / タイムアウト', () => {
    it('キャンセル済みなら fetch を呼ばずに ProbeCancelledError', async () => {
      const fetchFn = mockFetch(hangingFetch);
      const fetcher = createFetcher(fetchFn);
      const controller = new AbortController();
      controller.abort();

      await expect(fetcher.fetchRange(target, 0, 9, controller.signal)).rejects.toThrow(ProbeCancelledError);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('通信中のキャンセルは ProbeCancelledError', async () => {
      const fetcher = createFetcher(hangingFetch);
      const controller = new AbortController();

      const pending = fetcher.fetchRange(target, 0, 9, controller.signal);
      controller.abort();

      await expect(pending).rejects.toThrow(ProbeCancelledError);
    });

    it('タイムアウトは NetworkError', async () => {
      const fetcher = createFetcher(hangingFetch, { timeoutMs: 5 });

      await expect(fetcher.fetchRange(target, 0, 9)).rejects.toThrow('Request timed out after 5ms');
    });
  });
});
