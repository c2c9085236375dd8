import { ConfigService } from '@nestjs/config';

export const DEFAULT_WINDOW_SIZES = '5,10,15,20,30';
export const DEFAULT_BASELINE_YEARS = '1926,1957,1972,1985';
export const DEFAULT_THRESHOLDS = '0.0025,0.005,0.0075,0.01';
export const DEFAULT_RISK_FREE_RATE = '0.02';

export interface AnalysisDefaults {
  windowSizes: number[];
  baselineYears: number[];
  thresholds: number[];
}

const DEFAULT_LISTS: Record<keyof AnalysisDefaults, { key: string; fallback: string }> = {
  windowSizes: { key: 'DEFAULT_WINDOW_SIZES', fallback: DEFAULT_WINDOW_SIZES },
  baselineYears: { key: 'DEFAULT_BASELINE_YEARS', fallback: DEFAULT_BASELINE_YEARS },
  thresholds: { key: 'DEFAULT_THRESHOLDS', fallback: DEFAULT_THRESHOLDS },
};

/** A configured value the service cannot use. Not the caller's fault. */
export class InvalidConfigError extends Error {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export const parseNumberList = (raw: string, key: string): number[] => {
  const values = raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => Number(part));

  if (values.length === 0 || values.some(v => !Number.isFinite(v))) {
    throw new InvalidConfigError(key, `${key} must be a comma-separated list of numbers: "${raw}"`);
  }
  return values;
};

const readSetting = (configService: ConfigService, key: string, fallback: string): string => {
  const configured = configService.get<string>(key);
  return (configured && configured.trim()) || fallback;
};

/** One configured default list, read and parsed on demand. */
export const getAnalysisDefault = (
  configService: ConfigService,
  list: keyof AnalysisDefaults,
): number[] => {
  const { key, fallback } = DEFAULT_LISTS[list];
  return parseNumberList(readSetting(configService, key, fallback), key);
};

export const getAnalysisDefaults = (configService: ConfigService): AnalysisDefaults => ({
  windowSizes: getAnalysisDefault(configService, 'windowSizes'),
  baselineYears: getAnalysisDefault(configService, 'baselineYears'),
  thresholds: getAnalysisDefault(configService, 'thresholds'),
});

export const getRiskFreeRate = (configService: ConfigService): number => {
  const raw = readSetting(configService, 'RISK_FREE_RATE', DEFAULT_RISK_FREE_RATE);
  const rate = Number(raw);
  if (!Number.isFinite(rate)) {
    throw new InvalidConfigError('RISK_FREE_RATE', `RISK_FREE_RATE must be a number: "${raw}"`);
  }
  return rate;
};

export const getBatchJobAttempts = (configService: ConfigService): number => {
  const attempts = parseInt(configService.get<string>('BATCH_JOB_ATTEMPTS') || '1', 10);
  return Number.isInteger(attempts) && attempts > 0 ? attempts : 1;
};
