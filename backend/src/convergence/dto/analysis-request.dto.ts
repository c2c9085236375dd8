import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  Min,
  ValidateNested,
} from 'class-validator';

export class ReturnPointDto {
  @IsInt()
  year!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  return!: number; // Decimal fraction, not a percentage
}

export class SeriesRequestDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => ReturnPointDto)
  series!: ReturnPointDto[]; // Sorted by year, unique years
}

export class RollingWindowsRequestDto extends SeriesRequestDto {
  @IsInt()
  baselineYear!: number;

  @IsInt()
  @Min(1)
  windowSize!: number;
}

export class NoLossRequestDto extends SeriesRequestDto {
  @IsInt()
  baselineYear!: number;
}

export class SpreadRequestDto extends SeriesRequestDto {
  @IsInt()
  baselineYear!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  threshold!: number; // e.g. 0.0025 for 25bp
}

export class RiskRequestDto extends SeriesRequestDto {
  @IsInt()
  baselineYear!: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  windowSize?: number; // Adds rolling risk metrics

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsOptional()
  riskFreeRate?: number; // Default: RISK_FREE_RATE
}

export class ThresholdRangeDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  min!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  max!: number;

  @IsInt()
  @Min(1)
  steps!: number;
}

export class BatchAnalysisRequestDto extends SeriesRequestDto {
  @IsArray()
  @IsInt({ each: true })
  @IsOptional()
  baselineYears?: number[]; // Default: DEFAULT_BASELINE_YEARS

  @IsArray()
  @IsInt({ each: true })
  @Min(1, { each: true })
  @IsOptional()
  windowSizes?: number[]; // Default: DEFAULT_WINDOW_SIZES

  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  @Min(0, { each: true })
  @IsOptional()
  thresholds?: number[]; // Default: DEFAULT_THRESHOLDS

  @ValidateNested()
  @Type(() => ThresholdRangeDto)
  @IsOptional()
  thresholdRange?: ThresholdRangeDto; // Ignored when thresholds is given

  @IsBoolean()
  @IsOptional()
  includeRisk?: boolean;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsOptional()
  riskFreeRate?: number; // Default: RISK_FREE_RATE, used with includeRisk
}
