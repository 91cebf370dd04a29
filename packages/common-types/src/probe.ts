/**
 * コンテナ形式ごとのプローバー種別
 */
export type ProbeKind = 'ts' | 'mp4' | 'mkv';

/**
 * 検出した再生時間の出所
 */
export type ProbeSource = 'tsProbe' | 'mp4Probe' | 'mkvProbe';

export const PROBE_SOURCES: Record<ProbeKind, ProbeSource> = {
  ts: 'tsProbe',
  mp4: 'mp4Probe',
  mkv: 'mkvProbe',
};

/**
 * プローブで検出した再生時間
 *
 * 完了済み録画のバイト列は変わらないため、一度算出したら不変として扱う
 */
export interface DetectedDuration {
  /** 検出した再生時間（秒、正の整数） */
  seconds: number;
  source: ProbeSource;
}

/**
 * 永続化される検出結果キャッシュ: recordingId -> detectedSeconds
 */
export type DurationCacheDocument = Record<string, number>;
