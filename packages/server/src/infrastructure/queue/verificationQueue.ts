import { Queue } from 'bullmq';
import type { VerificationPassJobPayload, VerificationPassJobResult } from '@pvrcheck/common-types';
import { QUEUE_NAMES } from '@pvrcheck/common-types';
import type { IVerificationPassQueue } from '../../domain/queue/IVerificationPassQueue.js';
import type { QueueConfig } from '../config/queueConfig.js';

/**
 * BullMQ Verification Pass Queue
 *
 * worker パッケージが同じキュー名で消費する
 */
export class BullMqVerificationPassQueue implements IVerificationPassQueue {
  private readonly queue: Queue<VerificationPassJobPayload, VerificationPassJobResult>;

  constructor(config: QueueConfig) {
    this.queue = new Queue<VerificationPassJobPayload, VerificationPassJobResult>(QUEUE_NAMES.DURATION_VERIFICATION, {
      connection: {
        host: config.redisHost,
        port: config.redisPort,
      },
      defaultJobOptions: {
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 30000,
        },
        removeOnComplete: 100,
        removeOnFail: 200,
      },
    });
  }

  async enqueue(payload: VerificationPassJobPayload): Promise<string> {
    const job = await this.queue.add(`${payload.trigger}-pass`, payload);
    if (!job.id) {
      throw new Error('BullMQ did not assign a job id');
    }
    return job.id;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
