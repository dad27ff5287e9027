import { Logger } from '@nestjs/common';
import { ApiErrorResponse } from '@trendlens/shared-types';
import { EmptyResultError, TrendsError } from '../errors/trends.errors';

/**
 * Map a pipeline failure to the API error envelope. Anything that is not a
 * TrendsError is a bug and goes to Nest's 500 handler.
 */
export function toErrorResponse(error: unknown, logger: Logger): ApiErrorResponse {
  if (!(error instanceof TrendsError)) {
    throw error;
  }

  logger.warn(`${error.code}: ${error.message}`);
  const response: ApiErrorResponse = {
    success: false,
    error: error.message,
    code: error.code,
  };
  if (error instanceof EmptyResultError) {
    response.empty = true;
  }
  return response;
}
