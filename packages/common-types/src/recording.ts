/**
 * Unique identifier for a recording (PVR側のIDを文字列化したもの)
 */
export type RecordingId = string;

/**
 * 録画カタログから受け取る録画情報のスナップショット
 *
 * カタログ更新のたびに新しいスナップショットが届く。検証エンジンはこれを変更しない。
 */
export interface RecordingRef {
  /** Recording identifier */
  id: RecordingId;

  /** 予定録画時間（秒）。不明な場合は 0 */
  expectedDurationSeconds: number;

  /** ファイル拡張子のヒント（小文字、ドットなし）。例: "ts", "mp4", "mkv" */
  fileExtensionHint?: string;

  /** カタログが報告するファイルサイズ（バイト） */
  fileSizeBytes?: number;

  /** 録画が完了しているか */
  isCompleted: boolean;

  /** 表示名（ログ出力用） */
  name?: string;
}

/**
 * プローブ対象のストリームURLと認証ヘッダー
 *
 * 録画ごとにカタログ側のストリームリゾルバから取得する
 */
export interface ProbeTarget {
  streamUrl: string;
  authHeaders: Record<string, string>;
}
