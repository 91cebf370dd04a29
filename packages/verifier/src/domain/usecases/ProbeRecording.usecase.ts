import type { DetectedDuration, ProbeKind, ProbeTarget, RecordingRef } from '@pvrcheck/common-types';
import { PROBE_SOURCES, ParseError, ProbeCancelledError, UnprobeableSizeError } from '@pvrcheck/common-types';
import type { IRangeFetcher } from '../repositories/IRangeFetcher.js';
import type { IRecordingCatalog } from '../repositories/IRecordingCatalog.js';
import { selectProbeKind } from '../probes/selectProbeKind.js';
import { probeTsDuration } from '../probes/tsProbe.js';
import { extractMp4Duration } from '../probes/mp4Probe.js';
import { extractMkvDuration } from '../probes/mkvProbe.js';

/**
 * 読み取りサイズの設定
 */
export interface ProbePlan {
  /** TS の先頭・末尾それぞれの読み取りバイト数 */
  headBytes: number;
  /** MP4 / MKV の先頭読み取りバイト数 */
  containerHeaderBytes: number;
  /** TS でこのサイズ以下（または不明）の録画はプローブしない */
  minProbeSizeBytes: number;
}

export const DEFAULT_PROBE_PLAN: ProbePlan = {
  headBytes: 2 * 1024 * 1024,
  containerHeaderBytes: 64 * 1024,
  minProbeSizeBytes: 4_000_000,
};

export interface ProbeRecordingRequest {
  recording: RecordingRef;
  signal?: AbortSignal;
}

/**
 * ProbeRecording UseCase
 *
 * ストリームURLを解決 -> コンテナ種別ごとに必要なバイトだけ取得 -> 再生時間を取り出す
 *
 * 失敗時は UnprobeableSizeError / ParseError / NetworkError / CatalogError / ProbeCancelledError を投げる
 */
export class ProbeRecordingUseCase {
  constructor(
    private readonly catalog: IRecordingCatalog,
    private readonly fetcher: IRangeFetcher,
    private readonly plan: ProbePlan = DEFAULT_PROBE_PLAN
  ) {}

  async execute(request: ProbeRecordingRequest): Promise<DetectedDuration> {
    const { recording, signal } = request;
    const kind = selectProbeKind(recording.fileExtensionHint);

    this.throwIfCancelled(recording, signal);
    const target = await this.catalog.resolveStreamTarget(recording.id);
    this.throwIfCancelled(recording, signal);

    const seconds =
      kind === 'ts'
        ? await this.probeTransportStream(recording, target, signal)
        : await this.probeContainerHeader(recording, kind, target, signal);

    return { seconds, source: PROBE_SOURCES[kind] };
  }

  /**
   * TS: サイズ確認 -> 先頭 2MiB -> (Range 対応時のみ) 末尾 2MiB
   */
  private async probeTransportStream(
    recording: RecordingRef,
    target: ProbeTarget,
    signal?: AbortSignal
  ): Promise<number> {
    const { headBytes, minProbeSizeBytes } = this.plan;

    const fileSize = await this.fetcher.totalSize(target, signal);
    if (fileSize === null || fileSize <= minProbeSizeBytes) {
      throw new UnprobeableSizeError(
        `Could not determine file size or too small for ${recording.id} (size: ${fileSize ?? 'unknown'})`
      );
    }

    const head = await this.fetcher.fetchRange(target, 0, Math.min(headBytes, fileSize) - 1, signal);

    let tailBytes: Uint8Array;
    if (head.supportsRange) {
      const tailStart = Math.max(0, fileSize - headBytes);
      const tail = await this.fetcher.fetchRange(target, tailStart, fileSize - 1, signal, {
        maxBytes: headBytes,
      });
      if (!tail.supportsRange) {
        throw new ParseError(`Server ignored Range for the tail of ${recording.id}; last PTS is not reachable`);
      }
      tailBytes = tail.bytes;
    } else {
      // Range 非対応: 返ってきた本文の末尾から最後の PTS を探す
      console.log(
        `  ↩️ [Verifier] Server ignored Range for ${recording.id}, using full response (${head.bytes.length} bytes)`
      );
      if (!head.complete) {
        throw new ParseError(
          `Full response for ${recording.id} exceeded the read limit; last PTS is not reachable`
        );
      }
      tailBytes = head.bytes;
    }

    const seconds = probeTsDuration(head.bytes, tailBytes);
    if (seconds === null) {
      throw new ParseError(`Could not extract PTS timestamps for ${recording.id}`);
    }
    return seconds;
  }

  /**
   * MP4 / MKV: 先頭 64KiB のみ。200 が返っても先頭 64KiB を読んだら本文を打ち切る
   */
  private async probeContainerHeader(
    recording: RecordingRef,
    kind: Exclude<ProbeKind, 'ts'>,
    target: ProbeTarget,
    signal?: AbortSignal
  ): Promise<number> {
    const { containerHeaderBytes } = this.plan;
    const response = await this.fetcher.fetchRange(target, 0, containerHeaderBytes - 1, signal, {
      maxBytes: containerHeaderBytes,
    });
    const bytes = response.bytes.subarray(0, containerHeaderBytes);

    const seconds = kind === 'mp4' ? extractMp4Duration(bytes) : extractMkvDuration(bytes);
    if (seconds === null) {
      throw new ParseError(
        kind === 'mp4'
          ? `No usable mvhd box in the first ${bytes.length} bytes of ${recording.id}`
          : `No usable Segment Info duration in the first ${bytes.length} bytes of ${recording.id}`
      );
    }
    return seconds;
  }

  private throwIfCancelled(recording: RecordingRef, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new ProbeCancelledError(`Probe cancelled for ${recording.id}`);
    }
  }
}
