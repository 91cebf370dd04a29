import { v4 as uuidv4 } from 'uuid';
import type {
  ClassificationOptions,
  DurationCacheDocument,
  RecordingId,
  RecordingRef,
  Verdict,
  VerdictDetail,
  VerificationPassSummary,
} from '@pvrcheck/common-types';
import {
  ParseError,
  ProbeCancelledError,
  RecordingVerificationEntity,
  UnprobeableSizeError,
} from '@pvrcheck/common-types';
import type { ProbeRecordingUseCase } from '../usecases/ProbeRecording.usecase.js';
import type { DurationCache } from './DurationCache.js';
import { runWithConcurrency } from './runWithConcurrency.js';

export interface DurationVerifierOptions extends ClassificationOptions {
  /** 同時プローブ数 */
  concurrency?: number;
}

export interface VerificationPassOptions {
  signal?: AbortSignal;
}

const DEFAULT_CONCURRENCY = 4;

type PassCounters = Omit<VerificationPassSummary, 'passId' | 'startedAt' | 'finishedAt'>;

function lookupSeconds(document: DurationCacheDocument, recordingId: RecordingId): number | undefined {
  return Object.prototype.hasOwnProperty.call(document, recordingId) ? document[recordingId] : undefined;
}

/**
 * Duration Verifier
 *
 * 完了済み録画の実再生時間をキャッシュまたはプローブで求め、予定時間と比較して Verdict を出す。
 * 録画ごとの状態は RecordingVerificationEntity で持つ（セッション中のみ保持）。
 */
export class DurationVerifier {
  private readonly verifications = new Map<RecordingId, RecordingVerificationEntity>();
  private readonly concurrency: number;
  private readonly classification: ClassificationOptions;

  constructor(
    private readonly cache: DurationCache,
    private readonly probeRecording: ProbeRecordingUseCase,
    options: DurationVerifierOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.classification = {
      mismatchThreshold: options.mismatchThreshold,
      completeFileBytesPerSecond: options.completeFileBytesPerSecond,
    };
  }

  /**
   * 検証パスを実行する
   *
   * キャッシュ済みの録画はネットワークに触れずに判定し、未キャッシュの録画だけを並列にプローブする。
   * 全プローブの完了を待ってから集計を返す。
   */
  async runVerificationPass(
    recordings: readonly RecordingRef[],
    options: VerificationPassOptions = {}
  ): Promise<VerificationPassSummary> {
    const { signal } = options;
    const passId = uuidv4();
    const startedAt = new Date().toISOString();
    const counters: PassCounters = {
      eligible: 0,
      cacheHits: 0,
      probed: 0,
      verified: 0,
      mismatched: 0,
      skipped: 0,
      failed: 0,
      cancelled: 0,
    };

    const eligible = recordings.filter((recording) => RecordingVerificationEntity.isEligible(recording));
    counters.eligible = eligible.length;

    const cached = await this.loadCacheDocument();
    const misses: RecordingVerificationEntity[] = [];

    for (const recording of eligible) {
      const verification = RecordingVerificationEntity.create(recording);
      this.verifications.set(recording.id, verification);

      const seconds = lookupSeconds(cached, recording.id);
      if (seconds !== undefined) {
        const verdict = verification.applyCachedDuration(seconds, this.classification);
        counters.cacheHits++;
        this.tally(counters, verdict);
      } else {
        misses.push(verification);
      }
    }

    console.log(
      `🔎 [Verifier] Pass ${passId}: ${eligible.length} eligible, ${counters.cacheHits} cached, ${misses.length} to probe`
    );

    await runWithConcurrency(misses, this.concurrency, (verification) =>
      this.probeOne(verification, counters, signal)
    );

    const summary: VerificationPassSummary = {
      passId,
      startedAt,
      finishedAt: new Date().toISOString(),
      ...counters,
    };

    console.log(
      `✅ [Verifier] Pass ${passId} finished: ${summary.verified} verified, ${summary.mismatched} mismatched, ` +
        `${summary.skipped} skipped, ${summary.failed} failed, ${summary.cancelled} cancelled`
    );

    return summary;
  }

  /**
   * キャッシュ済みの録画だけを判定し直す（プローブはしない）
   *
   * キャッシュから消えた録画の判定は破棄する。
   */
  async refreshFromCache(recordings: readonly RecordingRef[]): Promise<VerdictDetail[]> {
    const cached = await this.cache.loadAll();
    const details: VerdictDetail[] = [];

    for (const recording of recordings) {
      if (!RecordingVerificationEntity.isEligible(recording)) {
        continue;
      }

      const seconds = lookupSeconds(cached, recording.id);
      if (seconds === undefined) {
        this.verifications.delete(recording.id);
        continue;
      }

      const verification = RecordingVerificationEntity.create(recording);
      verification.applyCachedDuration(seconds, this.classification);
      this.verifications.set(recording.id, verification);

      const detail = verification.toDetail();
      if (detail) {
        details.push(detail);
      }
    }

    return details;
  }

  /**
   * 判定済みなら Verdict、未判定なら null
   */
  verdict(recordingId: RecordingId): Verdict | null {
    return this.verifications.get(recordingId)?.getVerdict() ?? null;
  }

  verdictDetail(recordingId: RecordingId): VerdictDetail | null {
    return this.verifications.get(recordingId)?.toDetail() ?? null;
  }

  listVerdicts(): VerdictDetail[] {
    const details: VerdictDetail[] = [];
    for (const verification of this.verifications.values()) {
      const detail = verification.toDetail();
      if (detail) {
        details.push(detail);
      }
    }
    return details;
  }

  getVerification(recordingId: RecordingId): RecordingVerificationEntity | undefined {
    return this.verifications.get(recordingId);
  }

  /**
   * キャッシュエントリと判定を破棄し、次のパスで再プローブさせる
   */
  async invalidate(recordingId: RecordingId): Promise<boolean> {
    const removed = await this.cache.delete(recordingId);
    this.verifications.delete(recordingId);
    return removed;
  }

  /**
   * 1録画分の作業単位。エラーはここで回収し、他の録画を止めない
   */
  private async probeOne(
    verification: RecordingVerificationEntity,
    counters: PassCounters,
    signal?: AbortSignal
  ): Promise<void> {
    const recording = verification.getRecording();
    const label = recording.name ? `'${recording.name}' (${recording.id})` : recording.id;

    if (signal?.aborted) {
      counters.cancelled++;
      return;
    }

    try {
      const detected = await this.probeRecording.execute({ recording, signal });

      if (signal?.aborted) {
        counters.cancelled++;
        return;
      }

      verification.recordProbeResult(detected);
      try {
        await this.cache.set(recording.id, detected.seconds);
      } catch (error) {
        console.error(`❌ [Verifier] Failed to cache duration for ${label}:`, error);
      }

      const verdict = verification.classify(this.classification);
      counters.probed++;
      this.tally(counters, verdict);

      console.log(
        `  📏 [Verifier] ${label}: expected ${recording.expectedDurationSeconds}s, detected ${detected.seconds}s (${detected.source}) -> ${verdict.kind}`
      );
    } catch (error) {
      if (error instanceof ProbeCancelledError || signal?.aborted) {
        counters.cancelled++;
      } else if (error instanceof UnprobeableSizeError || error instanceof ParseError) {
        counters.skipped++;
        console.warn(`  ⏭️ [Verifier] Skipped ${label}: ${error.message}`);
      } else {
        counters.failed++;
        console.error(`  ❌ [Verifier] Probe failed for ${label}:`, error);
      }
    }
  }

  private async loadCacheDocument(): Promise<DurationCacheDocument> {
    try {
      return await this.cache.loadAll();
    } catch (error) {
      console.error('❌ [Verifier] Failed to load duration cache, probing without it:', error);
      return {};
    }
  }

  private tally(counters: PassCounters, verdict: Verdict): void {
    if (verdict.kind === 'verified') {
      counters.verified++;
    } else {
      counters.mismatched++;
    }
  }
}
