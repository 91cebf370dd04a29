import type { Job } from 'bullmq';
import type { VerificationPassJobPayload, VerificationPassJobResult } from '@pvrcheck/common-types';
import type { DurationVerifier, IRecordingCatalog } from '@pvrcheck/verifier';
import { selectRecordings } from '@pvrcheck/verifier';

export type VerificationPassJob = Pick<Job<VerificationPassJobPayload, VerificationPassJobResult>, 'id' | 'name' | 'data'>;

/**
 * Verification Pass ジョブハンドラ
 *
 * カタログから完了済み録画を取得し、1回の検証パスを実行して集計を返す。
 * 録画単位の失敗は集計に数えるだけで、ジョブは失敗させない
 */
export class VerificationPassJobHandler {
  constructor(
    private readonly catalog: IRecordingCatalog,
    private readonly verifier: DurationVerifier,
    private readonly signal?: AbortSignal
  ) {}

  async handle(job: VerificationPassJob): Promise<VerificationPassJobResult> {
    const { trigger, recordingIds } = job.data;

    console.log(
      `🎬 [Worker] Processing ${trigger} pass job ${job.id}` +
        (recordingIds?.length ? ` for ${recordingIds.length} recordings` : '')
    );

    const recordings = selectRecordings(await this.catalog.listCompletedRecordings(), recordingIds);
    const summary = await this.verifier.runVerificationPass(recordings, { signal: this.signal });

    console.log(`✅ [Worker] Job ${job.id} completed (pass ${summary.passId})`);
    return summary;
  }
}
