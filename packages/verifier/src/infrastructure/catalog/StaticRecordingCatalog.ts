import type { ProbeTarget, RecordingId, RecordingRef } from '@pvrcheck/common-types';
import { RecordingNotFoundError } from '@pvrcheck/common-types';
import type { IRecordingCatalog } from '../../domain/repositories/IRecordingCatalog.js';

/**
 * 固定リストの録画カタログ（テスト・ローカル実行用）
 */
export class StaticRecordingCatalog implements IRecordingCatalog {
  private readonly recordings = new Map<RecordingId, RecordingRef>();

  constructor(
    recordings: RecordingRef[] = [],
    private readonly streamBaseUrl: string = 'http://localhost:8866'
  ) {
    for (const recording of recordings) {
      this.recordings.set(recording.id, recording);
    }
  }

  async listCompletedRecordings(): Promise<RecordingRef[]> {
    return Array.from(this.recordings.values());
  }

  async resolveStreamTarget(recordingId: RecordingId): Promise<ProbeTarget> {
    if (!this.recordings.has(recordingId)) {
      throw new RecordingNotFoundError(`Recording not found: ${recordingId}`);
    }
    return {
      streamUrl: `${this.streamBaseUrl}/recordings/${encodeURIComponent(recordingId)}`,
      authHeaders: {},
    };
  }
}
