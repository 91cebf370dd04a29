import type { MismatchLabel, RecordingId, RecordingRef, RecordingVerificationEntity } from '@pvrcheck/common-types';
import { MISMATCH_LABEL_TEXT } from '@pvrcheck/common-types';

export type VerdictStatus = 'verified' | 'mismatch' | 'unverified';

/**
 * API に返す1録画分の判定
 */
export interface RecordingVerdictView {
  recordingId: RecordingId;
  name?: string;
  status: VerdictStatus;
  expectedSeconds: number;
  detectedSeconds: number | null;
  label: MismatchLabel | null;
  labelText: string | null;
}

export function toVerdictView(
  recording: RecordingRef,
  verification: RecordingVerificationEntity | undefined
): RecordingVerdictView {
  const detail = verification?.toDetail() ?? null;
  const label = detail?.label ?? null;

  return {
    recordingId: recording.id,
    ...(recording.name !== undefined && { name: recording.name }),
    status: detail ? detail.verdict.kind : 'unverified',
    expectedSeconds: recording.expectedDurationSeconds,
    detectedSeconds: detail ? (verification?.getDetectedSeconds() ?? null) : null,
    label,
    labelText: label ? MISMATCH_LABEL_TEXT[label] : null,
  };
}
