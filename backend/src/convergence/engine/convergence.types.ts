export interface ReturnPoint {
  year: number;
  return: number; // Decimal fraction, e.g. 0.12 for +12%
}

export interface WindowSpan {
  startYear: number;
  endYear: number;
}

export interface RollingWindow extends WindowSpan {
  cagr: number;
}

export type WindowCoverage = 'complete' | 'unknown-baseline' | 'insufficient-data';

export interface WindowSet {
  baselineYear: number;
  windowSize: number;
  coverage: WindowCoverage;
  windows: RollingWindow[]; // Ordered by endYear
  note: string | null;
}

export interface WindowStatistics {
  windowSize: number;
  bestWindow: WindowSpan | null;
  bestCagr: number | null;
  worstWindow: WindowSpan | null;
  worstCagr: number | null;
  averageCagr: number | null;
  sampleCount: number;
}

export type HorizonStatus = 'found' | 'exhausted' | 'no-data';

export interface NoLossResult {
  baselineYear: number;
  minHoldingYears: number | null;
  worstWindow: WindowSpan | null;
  worstCagr: number | null;
  bestWindow: WindowSpan | null;
  bestCagr: number | null;
  averageCagr: number | null;
  windowsChecked: number;
  metCondition: boolean;
  status: HorizonStatus;
  note: string | null;
}

export interface SpreadResult {
  baselineYear: number;
  threshold: number;
  minHoldingYears: number | null;
  bestWindow: WindowSpan | null;
  bestCagr: number | null;
  worstWindow: WindowSpan | null;
  worstCagr: number | null;
  spread: number | null;
  metCondition: boolean;
  status: HorizonStatus;
  note: string | null;
}

export interface SeriesSpan {
  firstYear: number;
  lastYear: number;
  yearCount: number;
}

export interface RollingCagrRow {
  endYear: number;
  cagrByWindow: Record<number, number | null>;
}

export interface BaselineAnalysis {
  baselineYear: number;
  rollingTable: RollingCagrRow[];
  statistics: WindowStatistics[];
}

/** Ratios and tail losses of one run of annual returns; null where undefined. */
export interface RiskMetrics {
  sampleCount: number;
  sharpeRatio: number | null;
  sortinoRatio: number | null; // Infinity when no year is below the risk-free rate
  calmarRatio: number | null;
  volatility: number | null;
  maxDrawdown: number | null; // Positive fraction, e.g. 0.35 for a 35% fall
  var95: number | null;
  cvar95: number | null;
  var99: number | null;
  cvar99: number | null;
}

export interface DrawdownAnalysis {
  maxDrawdown: number | null;
  peakIndex: number | null;
  troughIndex: number | null;
  recoveryIndex: number | null;
}

export interface DrawdownSpan {
  peakYear: number;
  troughYear: number;
  recoveryYear: number | null;
}

export interface RiskProfile {
  baselineYear: number;
  riskFreeRate: number;
  span: WindowSpan | null;
  metrics: RiskMetrics | null;
  drawdown: DrawdownSpan | null;
  note: string | null;
}

export interface RiskWindow extends WindowSpan {
  metrics: RiskMetrics;
}

export interface RollingRiskSet {
  baselineYear: number;
  windowSize: number;
  riskFreeRate: number;
  coverage: WindowCoverage;
  windows: RiskWindow[];
  note: string | null;
}

export interface RiskAnalysisResult {
  profile: RiskProfile;
  rolling: RollingRiskSet | null;
}

export interface BaselineRiskAnalysis {
  baselineYear: number;
  profile: RiskProfile | null;
  rolling: RollingRiskSet[];
}

export interface BatchFailure {
  query: 'window-statistics' | 'no-loss' | 'spread' | 'risk';
  baselineYear: number;
  windowSize?: number;
  threshold?: number;
  code: string;
  message: string;
}

export interface BatchAnalysisOptions {
  baselineYears: number[];
  windowSizes: number[];
  thresholds: number[];
  riskFreeRate?: number; // Risk section is computed only when set
}

export interface ThresholdRangeInput {
  min: number;
  max: number;
  steps: number;
}

/** Batch request with optional lists; omitted lists fall back to configured defaults. */
export interface BatchAnalysisInput {
  baselineYears?: number[];
  windowSizes?: number[];
  thresholds?: number[];
  thresholdRange?: ThresholdRangeInput;
  includeRisk?: boolean;
  riskFreeRate?: number;
}

export interface BatchAnalysisResult {
  series: SeriesSpan;
  baselineYears: number[];
  windowSizes: number[];
  thresholds: number[];
  baselines: BaselineAnalysis[];
  noLoss: NoLossResult[];
  spreadGrid: SpreadResult[];
  riskFreeRate?: number;
  risk?: BaselineRiskAnalysis[];
  failures: BatchFailure[];
  warnings: string[];
}
