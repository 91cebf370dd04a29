import { z } from 'zod';
import { md5 } from '@noble/hashes/legacy.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import type { ProbeTarget, RecordingId, RecordingRef } from '@pvrcheck/common-types';
import { CatalogError } from '@pvrcheck/common-types';
import type { IRecordingCatalog } from '../../domain/repositories/IRecordingCatalog.js';
import { extensionHintFromFileName } from '../../domain/probes/selectProbeKind.js';
import type { CatalogConfig } from '../config/catalogConfig.js';
import type { FetchFn } from '../http/HttpRangeFetcher.js';

const sessionInitiateSchema = z.object({
  sid: z.string().min(1),
  salt: z.string().min(1),
});

const statusSchema = z.object({
  stat: z.string().optional(),
  status: z.string().optional(),
});

const recordingSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  duration: z.number().nullish(),
  status: z.string().nullish(),
  file: z.string().nullish(),
  size: z.number().nullish(),
});

const recordingListSchema = z.object({
  recordings: z.array(z.unknown()).nullish(),
});

export type NextPvrRecording = z.infer<typeof recordingSchema>;

/**
 * NextPVR のログインハッシュ: md5(":" + md5(pin) + ":" + salt)
 */
export function computeLoginHash(pin: string, salt: string): string {
  const pinHash = bytesToHex(md5(utf8ToBytes(pin)));
  return bytesToHex(md5(utf8ToBytes(`:${pinHash}:${salt}`)));
}

/**
 * NextPVR の録画エントリを RecordingRef に変換
 */
export function toRecordingRef(recording: NextPvrRecording): RecordingRef {
  return {
    id: String(recording.id),
    name: recording.name,
    expectedDurationSeconds: recording.duration ?? 0,
    fileExtensionHint: extensionHintFromFileName(recording.file),
    ...(recording.size != null && recording.size > 0 && { fileSizeBytes: recording.size }),
    isCompleted: recording.status === 'ready',
  };
}

function isOk(body: z.infer<typeof statusSchema>): boolean {
  return (body.stat ?? body.status ?? '').toLowerCase() === 'ok';
}

/**
 * NextPVR Catalog Service
 *
 * session.initiate / session.login でセッションIDを取得し、録画一覧とストリームURLを提供する。
 * 401 を受けたら1回だけ再認証してリトライする。
 */
export class NextPvrCatalogService implements IRecordingCatalog {
  private sid: string | null = null;
  private pendingLogin: Promise<string> | null = null;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: CatalogConfig,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? fetch;
  }

  async listCompletedRecordings(): Promise<RecordingRef[]> {
    const body = recordingListSchema.safeParse(await this.callService('recording.list', { filter: 'ready' }));
    if (!body.success) {
      throw new CatalogError(`Invalid recording.list response: ${body.error.message}`);
    }

    const recordings: RecordingRef[] = [];
    for (const entry of body.data.recordings ?? []) {
      const parsed = recordingSchema.safeParse(entry);
      if (!parsed.success) {
        console.warn(`⚠️ [Catalog] Skipping malformed recording entry: ${parsed.error.message}`);
        continue;
      }
      recordings.push(toRecordingRef(parsed.data));
    }

    console.log(`📚 [Catalog] Loaded ${recordings.length} recordings`);
    return recordings;
  }

  async resolveStreamTarget(recordingId: RecordingId): Promise<ProbeTarget> {
    const sid = await this.ensureSession();
    const query = new URLSearchParams({ recording: recordingId, sid });
    return {
      streamUrl: `${this.config.baseUrl}/live?${query.toString()}`,
      authHeaders: {},
    };
  }

  /**
   * セッションを取得（同時に呼ばれてもログインは1回）
   */
  private ensureSession(): Promise<string> {
    if (this.sid) {
      return Promise.resolve(this.sid);
    }
    if (!this.pendingLogin) {
      this.pendingLogin = this.authenticate().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  private async authenticate(): Promise<string> {
    const initiate = sessionInitiateSchema.safeParse(
      await this.getJson(this.serviceUrl({ method: 'session.initiate', ver: '1.0', device: this.config.deviceName }))
    );
    if (!initiate.success) {
      throw new CatalogError('session.initiate did not return sid and salt');
    }

    const { sid, salt } = initiate.data;
    const login = statusSchema.safeParse(
      await this.getJson(this.serviceUrl({ method: 'session.login', sid, md5: computeLoginHash(this.config.pin, salt) }))
    );
    if (!login.success || !isOk(login.data)) {
      throw new CatalogError('NextPVR login failed (check NEXTPVR_PIN)');
    }

    console.log('🔑 [Catalog] Authenticated with NextPVR');
    this.sid = sid;
    return sid;
  }

  private async callService(method: string, params: Record<string, string>, allowRetry = true): Promise<unknown> {
    const sid = await this.ensureSession();
    const response = await this.send(this.serviceUrl({ method, sid, ...params }));

    if (response.status === 401) {
      await response.body?.cancel();
      this.sid = null;
      if (!allowRetry) {
        throw new CatalogError(`${method} rejected after re-authentication (HTTP 401)`);
      }
      console.log(`🔁 [Catalog] Session expired during ${method}, re-authenticating`);
      return this.callService(method, params, false);
    }

    return this.readJson(response, method);
  }

  private serviceUrl(params: Record<string, string>): string {
    const query = new URLSearchParams({ ...params, format: 'json' });
    return `${this.config.baseUrl}/services/service?${query.toString()}`;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.send(url);
    return this.readJson(response, 'session');
  }

  private async send(url: string): Promise<Response> {
    try {
      return await this.fetchFn(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogError(`NextPVR request failed: ${message}`);
    }
  }

  private async readJson(response: Response, method: string): Promise<unknown> {
    if (!response.ok) {
      await response.body?.cancel();
      throw new CatalogError(`${method} failed with HTTP ${response.status}`);
    }
    try {
      return await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogError(`${method} returned invalid JSON: ${message}`);
    }
  }
}
