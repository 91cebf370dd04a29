import type { RecordingId, VerificationPassSummary } from '@pvrcheck/common-types';
import type { DurationVerifier, IRecordingCatalog } from '@pvrcheck/verifier';
import { selectRecordings } from '@pvrcheck/verifier';
import type { IVerificationPassQueue } from '../queue/IVerificationPassQueue.js';

export interface RunVerificationPassRequest {
  recordingIds?: RecordingId[];
}

export type RunVerificationPassResult =
  | { mode: 'queued'; jobId: string }
  | { mode: 'inline'; summary: VerificationPassSummary };

/**
 * 検証パス実行 Use Case
 *
 * ビジネスフロー:
 * 1. キューがあればジョブを投入して返す（worker が実行）
 * 2. なければカタログを取得し、その場でパスを実行して集計を返す
 */
export class RunVerificationPassUseCase {
  constructor(
    private readonly catalog: IRecordingCatalog,
    private readonly verifier: DurationVerifier,
    private readonly queue: IVerificationPassQueue | null,
    private readonly signal?: AbortSignal
  ) {}

  async execute(request: RunVerificationPassRequest = {}): Promise<RunVerificationPassResult> {
    if (this.queue) {
      const jobId = await this.queue.enqueue({
        trigger: 'manual',
        ...(request.recordingIds && { recordingIds: request.recordingIds }),
        createdAt: new Date().toISOString(),
      });
      console.log(`📨 [Server] Verification pass job ${jobId} enqueued`);
      return { mode: 'queued', jobId };
    }

    const recordings = selectRecordings(await this.catalog.listCompletedRecordings(), request.recordingIds);
    const summary = await this.verifier.runVerificationPass(recordings, { signal: this.signal });
    return { mode: 'inline', summary };
  }
}
