import type { Request, Response } from 'express';
import { z } from 'zod';
import { InvalidOperationError } from '@pvrcheck/common-types';
import type { RunVerificationPassUseCase } from '../../domain/usecases/RunVerificationPass.usecase.js';
import type { GetVerdictUseCase } from '../../domain/usecases/GetVerdict.usecase.js';
import type { ListVerdictsUseCase } from '../../domain/usecases/ListVerdicts.usecase.js';
import type { ClearDurationCacheUseCase } from '../../domain/usecases/ClearDurationCache.usecase.js';
import type { RecordingVerdictView } from '../../domain/usecases/verdictView.js';

const runPassBodySchema = z
  .object({
    recording_ids: z.array(z.string().min(1)).optional(),
  })
  .default({});

function toVerdictResponse(view: RecordingVerdictView) {
  return {
    recording_id: view.recordingId,
    name: view.name ?? null,
    status: view.status,
    expected_seconds: view.expectedSeconds,
    detected_seconds: view.detectedSeconds,
    label: view.label,
    label_text: view.labelText,
  };
}

/**
 * Verification Controller
 *
 * HTTPリクエストを受け取り、Use Caseを実行し、レスポンスを返す
 * エラーハンドリングはミドルウェアに委譲
 */
export class VerificationController {
  constructor(
    private readonly runVerificationPassUseCase: RunVerificationPassUseCase,
    private readonly getVerdictUseCase: GetVerdictUseCase,
    private readonly listVerdictsUseCase: ListVerdictsUseCase,
    private readonly clearDurationCacheUseCase: ClearDurationCacheUseCase
  ) {}

  async runPass(req: Request, res: Response): Promise<void> {
    const body = runPassBodySchema.safeParse(req.body);
    if (!body.success) {
      throw new InvalidOperationError(`Invalid request body: ${body.error.issues[0]?.message ?? 'unknown'}`);
    }

    const result = await this.runVerificationPassUseCase.execute({ recordingIds: body.data.recording_ids });

    if (result.mode === 'queued') {
      res.status(202).json({ job_id: result.jobId });
      return;
    }

    res.status(200).json(result.summary);
  }

  async listVerdicts(_req: Request, res: Response): Promise<void> {
    const views = await this.listVerdictsUseCase.execute();
    res.json(views.map(toVerdictResponse));
  }

  async getVerdict(req: Request, res: Response): Promise<void> {
    const view = await this.getVerdictUseCase.execute({ recordingId: req.params.id });
    res.json(toVerdictResponse(view));
  }

  async clearCache(req: Request, res: Response): Promise<void> {
    await this.clearDurationCacheUseCase.execute({ recordingId: req.params.id });
    res.status(204).end();
  }
}
