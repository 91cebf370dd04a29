import type { RecordingId, RecordingRef, ProbeTarget } from '@pvrcheck/common-types';

/**
 * 録画カタログ（PVRサーバー）を抽象化
 *
 * 実装: NextPvrCatalogService, StaticRecordingCatalog
 */
export interface IRecordingCatalog {
  /**
   * 録画済み一覧を取得
   */
  listCompletedRecordings(): Promise<RecordingRef[]>;

  /**
   * 認証済みのストリームURLを解決
   */
  resolveStreamTarget(recordingId: RecordingId): Promise<ProbeTarget>;
}
