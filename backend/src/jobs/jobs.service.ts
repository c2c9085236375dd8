import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { getBatchJobAttempts } from '../common/utils/analysis.utils';
import { BatchJobPayload, BatchJobStatusDto } from '../convergence/dto/batch-job.dto';
import { BatchAnalysisResult } from '../convergence/engine/convergence.types';
import { CONVERGENCE_BATCH_QUEUE, RUN_BATCH_JOB } from './jobs.constants';

@Injectable()
export class JobsService {
  constructor(
    @InjectQueue(CONVERGENCE_BATCH_QUEUE)
    private batchQueue: Queue<BatchJobPayload, BatchAnalysisResult>,
    private configService: ConfigService,
  ) {}

  async enqueueBatchAnalysis(payload: BatchJobPayload): Promise<string> {
    const job = await this.batchQueue.add(RUN_BATCH_JOB, payload, {
      attempts: getBatchJobAttempts(this.configService),
      removeOnComplete: { age: 24 * 60 * 60 },
      removeOnFail: { age: 24 * 60 * 60 },
    });

    if (!job.id) {
      throw new Error('Queue did not assign an id to the batch job');
    }
    return job.id;
  }

  async getBatchJob(jobId: string): Promise<BatchJobStatusDto | null> {
    const job = await this.batchQueue.getJob(jobId);
    if (!job) {
      return null;
    }

    const state = await job.getState();
    const status: BatchJobStatusDto = { jobId, state };
    if (state === 'completed') {
      status.result = job.returnvalue;
    }
    if (state === 'failed') {
      status.failedReason = job.failedReason;
    }
    return status;
  }
}
