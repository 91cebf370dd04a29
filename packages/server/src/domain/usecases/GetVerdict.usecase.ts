import type { RecordingId } from '@pvrcheck/common-types';
import { RecordingNotFoundError } from '@pvrcheck/common-types';
import type { DurationVerifier, IRecordingCatalog } from '@pvrcheck/verifier';
import type { RecordingVerdictView } from './verdictView.js';
import { toVerdictView } from './verdictView.js';

export interface GetVerdictRequest {
  recordingId: RecordingId;
}

/**
 * 判定取得 Use Case
 *
 * worker が書いたキャッシュも反映するため、取得のたびにキャッシュから判定し直す
 */
export class GetVerdictUseCase {
  constructor(
    private readonly catalog: IRecordingCatalog,
    private readonly verifier: DurationVerifier
  ) {}

  async execute(request: GetVerdictRequest): Promise<RecordingVerdictView> {
    const recordings = await this.catalog.listCompletedRecordings();
    const recording = recordings.find((candidate) => candidate.id === request.recordingId);

    if (!recording) {
      throw new RecordingNotFoundError(`Recording not found: ${request.recordingId}`);
    }

    await this.verifier.refreshFromCache([recording]);
    return toVerdictView(recording, this.verifier.getVerification(recording.id));
  }
}
