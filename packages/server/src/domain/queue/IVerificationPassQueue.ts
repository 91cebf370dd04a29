import type { VerificationPassJobPayload } from '@pvrcheck/common-types';

/**
 * 検証パスのジョブ投入先
 */
export interface IVerificationPassQueue {
  /**
   * ジョブを投入し、ジョブIDを返す
   */
  enqueue(payload: VerificationPassJobPayload): Promise<string>;
  close(): Promise<void>;
}
