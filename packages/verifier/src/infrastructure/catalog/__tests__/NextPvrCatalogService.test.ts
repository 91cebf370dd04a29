import { describe, it, expect, vi } from 'vitest';
import { CatalogError } from '@pvrcheck/common-types';
import { computeLoginHash, NextPvrCatalogService, toRecordingRef } from '../NextPvrCatalogService.js';
import type { FetchFn } from '../../http/HttpRangeFetcher.js';

const config = { baseUrl: 'http://pvr.test:8866', pin: '0000', deviceName: 'pvrcheck' };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * service?method=... を振り分けるインプロセスの NextPVR
 */
class FakeNextPvr {
  readonly requests: URL[] = [];
  recordings: unknown[] = [];
  /** recording.list が返すステータスの列（空なら 200） */
  listStatuses: number[] = [];
  loginResult = 'ok';
  private issued = 0;

  readonly fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async (input) => this.handle(new URL(input)));

  calls(method: string): URL[] {
    return this.requests.filter((url) => url.searchParams.get('method') === method);
  }

  private async handle(url: URL): Promise<Response> {
    this.requests.push(url);
    switch (url.searchParams.get('method')) {
      case 'session.initiate':
        this.issued++;
        return json({ sid: `sid-${this.issued}`, salt: 'test-salt' });
      case 'session.login':
        return json({ stat: this.loginResult });
      case 'recording.list': {
        const status = this.listStatuses.shift() ?? 200;
        return status === 200 ? json({ recordings: this.recordings }) : new Response('denied', { status });
      }
      default:
        return new Response('unknown method', { status: 404 });
    }
  }
}

describe('computeLoginHash', () => {
  it('md5(":" + md5(pin) + ":" + salt) を16進で返す', () => {
    expect(computeLoginHash('0000', 'test-salt')).toBe('b3325f79fed452a5cd41a68026e35ee2');
  });
});

describe('toRecordingRef', () => {
  it('ファイル名から拡張子ヒントを取り、size 0 はサイズなしとして扱う', () => {
    expect(
      toRecordingRef({ id: 43, name: 'Film', duration: 7200, status: 'ready', file: '/rec/Film.MKV', size: 0 })
    ).toEqual({
      id: '43',
      name: 'Film',
      expectedDurationSeconds: 7200,
      fileExtensionHint: 'mkv',
      isCompleted: true,
    });
  });

  it('ready 以外は未完了、duration がなければ 0', () => {
    const ref = toRecordingRef({ id: 44, name: 'Live', status: 'recording' });
    expect(ref.isCompleted).toBe(false);
    expect(ref.expectedDurationSeconds).toBe(0);
    expect(ref.fileSizeBytes).toBeUndefined();
  });
});

describe('NextPvrCatalogService', () => {
  it('ログインして録画一覧を RecordingRef に変換する', async () => {
    const pvr = new FakeNextPvr();
    pvr.recordings = [
      {
        id: 42,
        name: 'News',
        duration: 3600,
        status: 'ready',
        file: 'C:\\Recordings\\News.ts',
        size: 1_500_000_000,
      },
    ];
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    const recordings = await catalog.listCompletedRecordings();

    expect(recordings).toEqual([
      {
        id: '42',
        name: 'News',
        expectedDurationSeconds: 3600,
        fileExtensionHint: 'ts',
        fileSizeBytes: 1_500_000_000,
        isCompleted: true,
      },
    ]);

    const [initiate] = pvr.calls('session.initiate');
    expect(initiate.searchParams.get('device')).toBe('pvrcheck');
    const [login] = pvr.calls('session.login');
    expect(login.searchParams.get('sid')).toBe('sid-1');
    expect(login.searchParams.get('md5')).toBe(computeLoginHash('0000', 'test-salt'));
    const [list] = pvr.calls('recording.list');
    expect(list.searchParams.get('sid')).toBe('sid-1');
    expect(list.searchParams.get('filter')).toBe('ready');
    expect(list.searchParams.get('format')).toBe('json');
  });

  it('壊れたエントリは読み飛ばす', async () => {
    const pvr = new FakeNextPvr();
    pvr.recordings = [{ id: 'not-a-number' }, { id: 7, name: 'Quiz', duration: 1800, status: 'ready' }];
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    const recordings = await catalog.listCompletedRecordings();

    expect(recordings.map((recording) => recording.id)).toEqual(['7']);
  });

  it('401 なら1回だけ再認証してリトライする', async () => {
    const pvr = new FakeNextPvr();
    pvr.listStatuses = [401];
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    await expect(catalog.listCompletedRecordings()).resolves.toEqual([]);

    expect(pvr.calls('session.initiate')).toHaveLength(2);
    expect(pvr.calls('recording.list').map((url) => url.searchParams.get('sid'))).toEqual(['sid-1', 'sid-2']);
  });

  it('再認証後も 401 なら CatalogError', async () => {
    const pvr = new FakeNextPvr();
    pvr.listStatuses = [401, 401];
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    const promise = catalog.listCompletedRecordings();
    await expect(promise).rejects.toBeInstanceOf(CatalogError);
    await expect(promise).rejects.toThrow('recording.list rejected after re-authentication (HTTP 401)');
    expect(pvr.calls('recording.list')).toHaveLength(2);
  });

  it('ログインに失敗したら CatalogError', async () => {
    const pvr = new FakeNextPvr();
    pvr.loginResult = 'fail';
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    await expect(catalog.listCompletedRecordings()).rejects.toThrow('NextPVR login failed (check NEXTPVR_PIN)');
    expect(pvr.calls('recording.list')).toHaveLength(0);
  });

  it('HTTP エラーはメソッド名付きの CatalogError', async () => {
    const pvr = new FakeNextPvr();
    pvr.listStatuses = [500];
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    await expect(catalog.listCompletedRecordings()).rejects.toThrow('recording.list failed with HTTP 500');
  });

  it('通信エラーは CatalogError に包む', async () => {
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => {
      throw new TypeError('fetch failed');
    });
    const catalog = new NextPvrCatalogService(config, fetchFn);

    await expect(catalog.listCompletedRecordings()).rejects.toThrow('NextPVR request failed: fetch failed');
  });

  it('ストリームURLにセッションIDを付け、同時呼び出しでもログインは1回', async () => {
    const pvr = new FakeNextPvr();
    const catalog = new NextPvrCatalogService(config, pvr.fetchFn);

    const [first, second] = await Promise.all([
      catalog.resolveStreamTarget('42'),
      catalog.resolveStreamTarget('43'),
    ]);

    expect(first).toEqual({ streamUrl: 'http://pvr.test:8866/live?recording=42&sid=sid-1', authHeaders: {} });
    expect(second.streamUrl).toBe('http://pvr.test:8866/live?recording=43&sid=sid-1');
    expect(pvr.calls('session.initiate')).toHaveLength(1);
  });
});
