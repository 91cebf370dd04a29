import type { RecordingId } from '@pvrcheck/common-types';
import { RecordingNotFoundError } from '@pvrcheck/common-types';
import type { DurationVerifier } from '@pvrcheck/verifier';

export interface ClearDurationCacheRequest {
  recordingId: RecordingId;
}

/**
 * キャッシュ削除 Use Case（次のパスで再プローブさせる）
 */
export class ClearDurationCacheUseCase {
  constructor(private readonly verifier: DurationVerifier) {}

  async execute(request: ClearDurationCacheRequest): Promise<void> {
    const removed = await this.verifier.invalidate(request.recordingId);
    if (!removed) {
      throw new RecordingNotFoundError(`No cached duration for recording: ${request.recordingId}`);
    }
    console.log(`🧹 [Server] Cleared cached duration for recording ${request.recordingId}`);
  }
}
