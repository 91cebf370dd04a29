import type { DurationVerifier, IRecordingCatalog } from '@pvrcheck/verifier';
import type { RecordingVerdictView } from './verdictView.js';
import { toVerdictView } from './verdictView.js';

/**
 * 判定一覧 Use Case
 *
 * 現在のカタログに対してキャッシュから判定し直し、判定済みの録画だけを返す
 */
export class ListVerdictsUseCase {
  constructor(
    private readonly catalog: IRecordingCatalog,
    private readonly verifier: DurationVerifier
  ) {}

  async execute(): Promise<RecordingVerdictView[]> {
    const recordings = await this.catalog.listCompletedRecordings();
    const details = await this.verifier.refreshFromCache(recordings);
    const byId = new Map(recordings.map((recording) => [recording.id, recording]));

    const views: RecordingVerdictView[] = [];
    for (const detail of details) {
      const recording = byId.get(detail.recordingId);
      if (recording) {
        views.push(toVerdictView(recording, this.verifier.getVerification(detail.recordingId)));
      }
    }
    return views;
  }
}
