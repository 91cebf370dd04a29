import type { RecordingId, RecordingRef } from '@pvrcheck/common-types';

/**
 * ジョブで対象IDが指定されていればその録画だけに絞る（未指定・空なら全件）
 */
export function selectRecordings(
  recordings: readonly RecordingRef[],
  recordingIds?: readonly RecordingId[]
): RecordingRef[] {
  if (!recordingIds || recordingIds.length === 0) {
    return [...recordings];
  }
  const wanted = new Set(recordingIds);
  return recordings.filter((recording) => wanted.has(recording.id));
}
