import type { RecordingId } from './recording.js';

/**
 * 録画時間の判定結果
 *
 * キャッシュ内容と現在の RecordingRef から毎回算出する。永続化はしない。
 */
export type Verdict =
  | { kind: 'verified' }
  | { kind: 'mismatch'; expected: number; detected: number };

/**
 * Mismatch の表示用ラベル（Verdict 自体は変えない）
 * - truncated: ファイルが途中で切れている
 * - complete-desync: ファイルサイズは完全に見えるがタイムスタンプがずれている
 */
export type MismatchLabel = 'truncated' | 'complete-desync';

export const MISMATCH_LABEL_TEXT: Record<MismatchLabel, string> = {
  truncated: 'recording looks truncated',
  'complete-desync': 'file looks complete, playback may desync',
};

export interface VerdictDetail {
  recordingId: RecordingId;
  verdict: Verdict;
  label?: MismatchLabel;
}

/** 検出時間が予定時間のこの割合を下回ると Mismatch */
export const DEFAULT_MISMATCH_THRESHOLD = 0.9;

/** これ以上のビットレートなら「ファイルは完全」とみなす（B/s） */
export const DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND = 200_000;

/**
 * 予定時間と検出時間から Verdict を決める
 */
export function classifyDuration(
  expectedSeconds: number,
  detectedSeconds: number,
  threshold: number = DEFAULT_MISMATCH_THRESHOLD
): Verdict {
  if (detectedSeconds < expectedSeconds * threshold) {
    return { kind: 'mismatch', expected: expectedSeconds, detected: detectedSeconds };
  }
  return { kind: 'verified' };
}

/**
 * Mismatch の表示ラベルを決める
 *
 * ファイルサイズ / 予定時間 が閾値以上なら、データ量は揃っているので
 * 切り詰めではなくタイムスタンプ異常の可能性が高い
 */
export function describeMismatch(
  expectedSeconds: number,
  fileSizeBytes: number | undefined,
  completeBytesPerSecond: number = DEFAULT_COMPLETE_FILE_BYTES_PER_SECOND
): MismatchLabel {
  if (fileSizeBytes === undefined || expectedSeconds <= 0) {
    return 'truncated';
  }
  const bytesPerSecond = fileSizeBytes / expectedSeconds;
  return bytesPerSecond >= completeBytesPerSecond ? 'complete-desync' : 'truncated';
}
