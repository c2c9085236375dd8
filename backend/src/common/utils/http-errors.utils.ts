import {
  BadRequestException,
  InternalServerErrorException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  InvalidParameterError,
  InvalidReturnError,
  InvalidSeriesError,
} from '../../convergence/engine/convergence.errors';
import { LoggerService } from '../../logger/logger.service';
import { InvalidConfigError } from './analysis.utils';

/**
 * Runs an engine query and maps its errors to HTTP errors: bad input is a 400,
 * a return at or below -100% a 422 and unusable configuration a 500. Anything
 * else goes to Nest's default handler.
 */
export function runEngineQuery<T>(query: () => T, logger: LoggerService): T {
  try {
    return query();
  } catch (error) {
    if (error instanceof InvalidSeriesError || error instanceof InvalidParameterError) {
      throw new BadRequestException({ code: error.code, message: error.message });
    }
    if (error instanceof InvalidReturnError) {
      logger.warn(error.message, { code: error.code, year: error.year, value: error.value });
      throw new UnprocessableEntityException({ code: error.code, message: error.message });
    }
    if (error instanceof InvalidConfigError) {
      logger.error(`Invalid configuration: ${error.message}`, error.stack, { key: error.key });
      throw new InternalServerErrorException({
        code: 'INVALID_CONFIG',
        message: 'Server configuration is invalid',
      });
    }
    throw error;
  }
}
