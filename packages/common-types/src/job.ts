import type { RecordingId } from './recording.js';

/**
 * 検証パスのジョブペイロード
 * - trigger: API からの手動実行か、定期実行か
 * - recordingIds: 指定時はその録画だけを対象にする
 */
export interface VerificationPassJobPayload {
  trigger: 'manual' | 'scheduled';
  recordingIds?: RecordingId[];
  createdAt: string;
}

/**
 * 1回の検証パスの集計結果
 */
export interface VerificationPassSummary {
  passId: string;
  startedAt: string;
  finishedAt: string;
  /** 完了済みかつ予定時間が分かっている録画数 */
  eligible: number;
  /** キャッシュから判定した録画数 */
  cacheHits: number;
  /** ネットワーク経由でプローブに成功した録画数 */
  probed: number;
  verified: number;
  mismatched: number;
  /** サイズ不明・小さすぎる・解析できない録画数 */
  skipped: number;
  /** 通信エラー等で失敗した録画数 */
  failed: number;
  /** キャンセルされた録画数 */
  cancelled: number;
}

export type VerificationPassJobResult = VerificationPassSummary;

export const QUEUE_NAMES = {
  DURATION_VERIFICATION: 'duration-verification',
} as const;
