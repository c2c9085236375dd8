import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Injectable } from '@nestjs/common';
import { ConvergenceService } from '../../convergence/convergence.service';
import { BatchJobPayload } from '../../convergence/dto/batch-job.dto';
import { BatchAnalysisResult } from '../../convergence/engine/convergence.types';
import { ReturnSeries } from '../../convergence/engine/return-series';
import { LoggerService } from '../../logger/logger.service';
import { CONVERGENCE_BATCH_QUEUE } from '../jobs.constants';

@Processor(CONVERGENCE_BATCH_QUEUE)
@Injectable()
export class ConvergenceBatchProcessor extends WorkerHost {
  constructor(
    private convergenceService: ConvergenceService,
    private logger: LoggerService,
  ) {
    super();
    this.logger.setContext('ConvergenceBatchProcessor');
  }

  async process(job: Job<BatchJobPayload, BatchAnalysisResult>): Promise<BatchAnalysisResult> {
    const { series: points, requestId, ...options } = job.data;
    this.logger.log('Starting batch analysis job', {
      jobId: job.id,
      requestId,
      years: points.length,
    });

    try {
      const series = ReturnSeries.fromPoints(points);
      const result = this.convergenceService.runResolvedBatch(series, options);

      this.logger.log('Batch analysis job complete', {
        jobId: job.id,
        requestId,
        failures: result.failures.length,
      });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Batch analysis job failed', error instanceof Error ? error.stack : undefined, {
        jobId: job.id,
        requestId,
        error: message,
      });
      // Rethrow so BullMQ marks the job failed (and retries if attempts allow)
      throw error;
    }
  }
}
