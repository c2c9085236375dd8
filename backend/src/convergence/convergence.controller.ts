import { Body, Controller, Headers, HttpCode, Post } from '@nestjs/common';
import { runEngineQuery } from '../common/utils/http-errors.utils';
import { LoggerService } from '../logger/logger.service';
import { REQUEST_ID_HEADER } from '../logger/request-id.middleware';
import { ConvergenceService } from './convergence.service';
import {
  BatchAnalysisRequestDto,
  NoLossRequestDto,
  RiskRequestDto,
  RollingWindowsRequestDto,
  SeriesRequestDto,
  SpreadRequestDto,
} from './dto/analysis-request.dto';
import {
  BatchAnalysisResult,
  NoLossResult,
  RiskAnalysisResult,
  SpreadResult,
  WindowSet,
  WindowStatistics,
} from './engine/convergence.types';
import { ReturnSeries } from './engine/return-series';

@Controller('api/convergence')
export class ConvergenceController {
  constructor(
    private convergenceService: ConvergenceService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ConvergenceController');
  }

  @Post('windows')
  @HttpCode(200)
  rollingWindows(@Body() request: RollingWindowsRequestDto): WindowSet {
    return this.handle(() =>
      this.convergenceService.rollingWindows(this.toSeries(request), request.baselineYear, request.windowSize),
    );
  }

  @Post('statistics')
  @HttpCode(200)
  windowStatistics(@Body() request: RollingWindowsRequestDto): WindowStatistics {
    return this.handle(() =>
      this.convergenceService.windowStatistics(this.toSeries(request), request.baselineYear, request.windowSize),
    );
  }

  @Post('no-loss')
  @HttpCode(200)
  noLossHorizon(@Body() request: NoLossRequestDto): NoLossResult {
    return this.handle(() =>
      this.convergenceService.noLossHorizon(this.toSeries(request), request.baselineYear),
    );
  }

  @Post('spread')
  @HttpCode(200)
  spreadHorizon(@Body() request: SpreadRequestDto): SpreadResult {
    return this.handle(() =>
      this.convergenceService.spreadHorizon(this.toSeries(request), request.baselineYear, request.threshold),
    );
  }

  @Post('risk')
  @HttpCode(200)
  riskAnalysis(@Body() request: RiskRequestDto): RiskAnalysisResult {
    return this.handle(() =>
      this.convergenceService.riskAnalysis(
        this.toSeries(request),
        request.baselineYear,
        request.windowSize,
        request.riskFreeRate,
      ),
    );
  }

  @Post('batch')
  @HttpCode(200)
  analyzeBatch(
    @Body() request: BatchAnalysisRequestDto,
    @Headers(REQUEST_ID_HEADER) requestId?: string,
  ): BatchAnalysisResult {
    this.logger.log('Batch analysis requested', { requestId, years: request.series.length });
    return this.handle(() =>
      this.convergenceService.analyzeBatch(this.toSeries(request), {
        baselineYears: request.baselineYears,
        windowSizes: request.windowSizes,
        thresholds: request.thresholds,
        thresholdRange: request.thresholdRange,
        includeRisk: request.includeRisk,
        riskFreeRate: request.riskFreeRate,
      }),
    );
  }

  private toSeries(request: SeriesRequestDto): ReturnSeries {
    return ReturnSeries.fromPoints(request.series);
  }

  private handle<T>(query: () => T): T {
    return runEngineQuery(query, this.logger);
  }
}
