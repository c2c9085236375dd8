import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../logger/logger.service';
import {
  getAnalysisDefault,
  getAnalysisDefaults,
  getRiskFreeRate,
} from '../common/utils/analysis.utils';
import { runBatchAnalysis, thresholdRange } from './engine/batch-analysis';
import {
  BatchAnalysisInput,
  BatchAnalysisOptions,
  BatchAnalysisResult,
  NoLossResult,
  RiskAnalysisResult,
  SpreadResult,
  WindowSet,
  WindowStatistics,
} from './engine/convergence.types';
import { findNoLossHorizon, findSpreadHorizon } from './engine/horizon-search';
import { ReturnSeries } from './engine/return-series';
import { riskProfile, rollingRiskMetrics } from './engine/risk-metrics';
import { formatWindowLabel, generateRollingWindows } from './engine/rolling-windows';
import { summarizeWindows } from './engine/window-statistics';

/**
 * Stateless facade over the rolling window engine. The series is passed in on
 * every call; nothing is cached between queries.
 */
@Injectable()
export class ConvergenceService implements OnModuleInit {
  constructor(
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ConvergenceService');
  }

  /** Fails startup on malformed analysis defaults. */
  onModuleInit() {
    const defaults = getAnalysisDefaults(this.configService);
    const riskFreeRate = getRiskFreeRate(this.configService);
    this.logger.log('Analysis defaults loaded', { ...defaults, riskFreeRate });
  }

  rollingWindows(series: ReturnSeries, baselineYear: number, windowSize: number): WindowSet {
    const windowSet = generateRollingWindows(series, baselineYear, windowSize);
    if (windowSet.note) {
      this.logger.debug(windowSet.note, { baselineYear, windowSize, coverage: windowSet.coverage });
    }
    return windowSet;
  }

  windowStatistics(series: ReturnSeries, baselineYear: number, windowSize: number): WindowStatistics {
    return summarizeWindows(this.rollingWindows(series, baselineYear, windowSize));
  }

  noLossHorizon(series: ReturnSeries, baselineYear: number): NoLossResult {
    const result = findNoLossHorizon(series, baselineYear);
    this.logger.debug(`No-loss horizon ${result.status}`, {
      baselineYear,
      minHoldingYears: result.minHoldingYears,
      worstWindow: formatWindowLabel(result.worstWindow),
    });
    return result;
  }

  spreadHorizon(series: ReturnSeries, baselineYear: number, threshold: number): SpreadResult {
    const result = findSpreadHorizon(series, baselineYear, threshold);
    this.logger.debug(`Spread horizon ${result.status}`, {
      baselineYear,
      threshold,
      minHoldingYears: result.minHoldingYears,
      spread: result.spread,
    });
    return result;
  }

  /**
   * Risk profile from the baseline, plus rolling risk metrics when a window
   * size is given. The configured rate applies when none is passed.
   */
  riskAnalysis(
    series: ReturnSeries,
    baselineYear: number,
    windowSize?: number,
    riskFreeRate?: number,
  ): RiskAnalysisResult {
    const rate = riskFreeRate ?? getRiskFreeRate(this.configService);
    const profile = riskProfile(series, baselineYear, rate);
    const rolling = windowSize === undefined ? null : rollingRiskMetrics(series, baselineYear, windowSize, rate);

    this.logger.debug('Risk analysis complete', {
      baselineYear,
      windowSize,
      riskFreeRate: rate,
      sampleCount: profile.metrics?.sampleCount ?? 0,
      note: profile.note,
    });
    return { profile, rolling };
  }

  /**
   * Fills omitted lists from configuration, reading only the defaults that are
   * needed. An explicit threshold list wins over a threshold range.
   */
  resolveBatchOptions(input: BatchAnalysisInput): BatchAnalysisOptions {
    let thresholds = input.thresholds;
    if (!thresholds?.length && input.thresholdRange) {
      const { min, max, steps } = input.thresholdRange;
      thresholds = thresholdRange(min, max, steps);
    }

    const options: BatchAnalysisOptions = {
      baselineYears: input.baselineYears?.length
        ? input.baselineYears
        : getAnalysisDefault(this.configService, 'baselineYears'),
      windowSizes: input.windowSizes?.length
        ? input.windowSizes
        : getAnalysisDefault(this.configService, 'windowSizes'),
      thresholds: thresholds?.length ? thresholds : getAnalysisDefault(this.configService, 'thresholds'),
    };

    if (input.includeRisk) {
      options.riskFreeRate = input.riskFreeRate ?? getRiskFreeRate(this.configService);
    }
    return options;
  }

  analyzeBatch(series: ReturnSeries, input: BatchAnalysisInput): BatchAnalysisResult {
    return this.runResolvedBatch(series, this.resolveBatchOptions(input));
  }

  runResolvedBatch(series: ReturnSeries, options: BatchAnalysisOptions): BatchAnalysisResult {
    const span = series.span();

    this.logger.log('Running batch analysis', {
      firstYear: span.firstYear,
      lastYear: span.lastYear,
      yearCount: span.yearCount,
      baselineYears: options.baselineYears,
      windowSizes: options.windowSizes,
      thresholds: options.thresholds,
      riskFreeRate: options.riskFreeRate,
    });

    const result = runBatchAnalysis(series, options);

    for (const warning of result.warnings) {
      this.logger.warn(warning, { yearCount: span.yearCount });
    }
    for (const failure of result.failures) {
      this.logger.warn(`Batch query failed: ${failure.message}`, { ...failure });
    }

    this.logger.log('Batch analysis complete', {
      noLossResults: result.noLoss.length,
      spreadResults: result.spreadGrid.length,
      failures: result.failures.length,
    });
    return result;
  }
}
