import { ConfigService } from '@nestjs/config';
import {
  getAnalysisDefault,
  getAnalysisDefaults,
  getBatchJobAttempts,
  getRiskFreeRate,
  InvalidConfigError,
  parseNumberList,
} from './analysis.utils';

const configWith = (values: Record<string, string>): ConfigService =>
  new ConfigService(values);

describe('analysis utils', () => {
  describe('parseNumberList', () => {
    it('should parse comma-separated numbers and ignore blanks', () => {
      expect(parseNumberList(' 5, 10,,15 ', 'KEY')).toEqual([5, 10, 15]);
    });

    it('should reject non-numeric entries', () => {
      expect(() => parseNumberList('5,ten', 'DEFAULT_WINDOW_SIZES')).toThrow(InvalidConfigError);
      expect(() => parseNumberList('5,ten', 'DEFAULT_WINDOW_SIZES')).toThrow(
        'DEFAULT_WINDOW_SIZES must be a comma-separated list of numbers: "5,ten"',
      );
    });

    it('should reject an empty list', () => {
      expect(() => parseNumberList(' , ', 'KEY')).toThrow(InvalidConfigError);
    });
  });

  describe('getAnalysisDefaults', () => {
    it('should use built-in lists when nothing is configured', () => {
      expect(getAnalysisDefaults(configWith({}))).toEqual({
        windowSizes: [5, 10, 15, 20, 30],
        baselineYears: [1926, 1957, 1972, 1985],
        thresholds: [0.0025, 0.005, 0.0075, 0.01],
      });
    });

    it('should ignore whitespace-only configuration', () => {
      const defaults = getAnalysisDefaults(configWith({ DEFAULT_BASELINE_YEARS: '   ' }));
      expect(defaults.baselineYears).toEqual([1926, 1957, 1972, 1985]);
    });
  });

  describe('getAnalysisDefault', () => {
    it('should parse only the requested list', () => {
      const config = configWith({ DEFAULT_THRESHOLDS: '0.01,abc', DEFAULT_WINDOW_SIZES: '3,6' });

      expect(getAnalysisDefault(config, 'windowSizes')).toEqual([3, 6]);
      expect(getAnalysisDefault(config, 'baselineYears')).toEqual([1926, 1957, 1972, 1985]);
      expect(() => getAnalysisDefault(config, 'thresholds')).toThrow(
        'DEFAULT_THRESHOLDS must be a comma-separated list of numbers: "0.01,abc"',
      );
    });
  });

  describe('getRiskFreeRate', () => {
    it('should default to two percent', () => {
      expect(getRiskFreeRate(configWith({}))).toBe(0.02);
    });

    it('should read the configured rate', () => {
      expect(getRiskFreeRate(configWith({ RISK_FREE_RATE: '0.035' }))).toBe(0.035);
    });

    it('should reject a non-numeric rate', () => {
      expect(() => getRiskFreeRate(configWith({ RISK_FREE_RATE: 'two' }))).toThrow(InvalidConfigError);
    });
  });

  describe('getBatchJobAttempts', () => {
    it('should default to a single attempt', () => {
      expect(getBatchJobAttempts(configWith({}))).toBe(1);
    });

    it('should read the configured attempts', () => {
      expect(getBatchJobAttempts(configWith({ BATCH_JOB_ATTEMPTS: '3' }))).toBe(3);
    });

    it('should fall back to one for invalid values', () => {
      expect(getBatchJobAttempts(configWith({ BATCH_JOB_ATTEMPTS: '0' }))).toBe(1);
      expect(getBatchJobAttempts(configWith({ BATCH_JOB_ATTEMPTS: 'many' }))).toBe(1);
    });
  });
});
