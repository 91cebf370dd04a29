import type { RecordingId, RecordingRef } from '../recording.js';
import type { DetectedDuration, ProbeSource } from '../probe.js';
import type { MismatchLabel, Verdict, VerdictDetail } from '../verdict.js';
import {
  classifyDuration,
  describeMismatch,
  DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND,
  DEFAULT_MISMATCH_THRESHOLD,
} from '../verdict.js';
import { InvalidOperationError, InvalidStateTransitionError } from '../errors/DomainErrors.js';

/**
 * 検証状態
 * - unprobed: 未判定（キャッシュなし、またはプローブ失敗）
 * - cached: プローブ成功、検出時間をキャッシュ済み
 * - classified: Verdict 確定
 */
export type VerificationState = 'unprobed' | 'cached' | 'classified';

export interface ClassificationOptions {
  mismatchThreshold?: number;
  completeFileBytesPerSecond?: number;
}

/**
 * RecordingVerification ドメインエンティティ
 *
 * ビジネスルール:
 * - unprobed -> classified（キャッシュヒット）
 * - unprobed -> cached -> classified（プローブ成功）
 * - プローブ失敗時は unprobed のまま（次のパスで再試行）
 * - 判定対象は完了済みかつ予定時間 > 0 の録画のみ
 */
export class RecordingVerificationEntity {
  private constructor(
    private readonly recording: RecordingRef,
    private state: VerificationState,
    private detectedSeconds: number | undefined,
    private source: ProbeSource | 'cache' | undefined,
    private verdict: Verdict | undefined,
    private label: MismatchLabel | undefined
  ) {}

  /**
   * 新しい検証状態を作成
   */
  static create(recording: RecordingRef): RecordingVerificationEntity {
    if (!RecordingVerificationEntity.isEligible(recording)) {
      throw new InvalidOperationError(
        `Recording ${recording.id} is not eligible for verification (completed: ${recording.isCompleted}, expected: ${recording.expectedDurationSeconds}s)`
      );
    }
    return new RecordingVerificationEntity(recording, 'unprobed', undefined, undefined, undefined, undefined);
  }

  /**
   * ビジネスルール: 完了済みかつ予定時間が分かっている録画のみ判定対象
   */
  static isEligible(recording: RecordingRef): boolean {
    return recording.isCompleted && recording.expectedDurationSeconds > 0;
  }

  /**
   * ビジネスルール: キャッシュヒット
   * unprobed 状態からのみ、直接 classified に遷移
   */
  applyCachedDuration(seconds: number, options: ClassificationOptions = {}): Verdict {
    if (this.state !== 'unprobed') {
      throw new InvalidStateTransitionError(
        `Cannot apply cached duration from state: ${this.state}. Must be in 'unprobed' state.`
      );
    }
    this.detectedSeconds = seconds;
    this.source = 'cache';
    return this.settle(options);
  }

  /**
   * ビジネスルール: プローブ成功
   * unprobed 状態からのみ遷移可能
   */
  recordProbeResult(detected: DetectedDuration): void {
    if (this.state !== 'unprobed') {
      throw new InvalidStateTransitionError(
        `Cannot record probe result from state: ${this.state}. Must be in 'unprobed' state.`
      );
    }
    this.detectedSeconds = detected.seconds;
    this.source = detected.source;
    this.state = 'cached';
  }

  /**
   * ビジネスルール: 判定確定
   * cached 状態からのみ遷移可能
   */
  classify(options: ClassificationOptions = {}): Verdict {
    if (this.state !== 'cached') {
      throw new InvalidStateTransitionError(
        `Cannot classify from state: ${this.state}. Must be in 'cached' state.`
      );
    }
    return this.settle(options);
  }

  private settle(options: ClassificationOptions): Verdict {
    const detected = this.detectedSeconds ?? 0;
    const verdict = classifyDuration(
      this.recording.expectedDurationSeconds,
      detected,
      options.mismatchThreshold ?? DEFAULT_MISMATCH_THRESHOLD
    );
    this.verdict = verdict;
    this.label =
      verdict.kind === 'mismatch'
        ? describeMismatch(
            this.recording.expectedDurationSeconds,
            this.recording.fileSizeBytes,
            options.completeFileBytesPerSecond ?? DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND
          )
        : undefined;
    this.state = 'classified';
    return verdict;
  }

  // Getters
  getId(): RecordingId {
    return this.recording.id;
  }

  getRecording(): RecordingRef {
    return this.recording;
  }

  getState(): VerificationState {
    return this.state;
  }

  getDetectedSeconds(): number | undefined {
    return this.detectedSeconds;
  }

  getSource(): ProbeSource | 'cache' | undefined {
    return this.source;
  }

  getVerdict(): Verdict | undefined {
    return this.verdict;
  }

  /**
   * DTOへの変換（classified 以外は null）
   */
  toDetail(): VerdictDetail | null {
    if (this.state !== 'classified' || !this.verdict) {
      return null;
    }
    return {
      recordingId: this.recording.id,
      verdict: this.verdict,
      ...(this.label && { label: this.label }),
    };
  }
}
