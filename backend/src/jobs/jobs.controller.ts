import { Body, Controller, Get, Headers, NotFoundException, Param, Post } from '@nestjs/common';
import { runEngineQuery } from '../common/utils/http-errors.utils';
import { ConvergenceService } from '../convergence/convergence.service';
import { BatchAnalysisRequestDto } from '../convergence/dto/analysis-request.dto';
import { BatchJobStatusDto } from '../convergence/dto/batch-job.dto';
import { ReturnSeries } from '../convergence/engine/return-series';
import { REQUEST_ID_HEADER } from '../logger/request-id.middleware';
import { LoggerService } from '../logger/logger.service';
import { JobsService } from './jobs.service';

@Controller('api/convergence/batch/jobs')
export class JobsController {
  constructor(
    private jobsService: JobsService,
    private convergenceService: ConvergenceService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsController');
  }

  /**
   * Validates the series and resolves the options up front, so a bad request
   * is rejected here the same way as a synchronous batch.
   */
  @Post()
  async enqueueBatch(
    @Body() request: BatchAnalysisRequestDto,
    @Headers(REQUEST_ID_HEADER) requestId?: string,
  ): Promise<{ jobId: string }> {
    const { series, options } = runEngineQuery(
      () => ({
        series: ReturnSeries.fromPoints(request.series),
        options: this.convergenceService.resolveBatchOptions({
          baselineYears: request.baselineYears,
          windowSizes: request.windowSizes,
          thresholds: request.thresholds,
          thresholdRange: request.thresholdRange,
          includeRisk: request.includeRisk,
          riskFreeRate: request.riskFreeRate,
        }),
      }),
      this.logger,
    );

    const jobId = await this.jobsService.enqueueBatchAnalysis({
      series: series.toPoints(),
      ...options,
      requestId,
    });

    this.logger.log('Enqueued batch analysis', { jobId, requestId, years: series.length });
    return { jobId };
  }

  @Get(':id')
  async getBatchJob(@Param('id') id: string): Promise<BatchJobStatusDto> {
    const status = await this.jobsService.getBatchJob(id);
    if (!status) {
      throw new NotFoundException(`Batch job ${id} not found`);
    }
    return status;
  }
}
