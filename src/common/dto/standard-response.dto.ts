// src/common/dto/standard-response.dto.ts

import { TransitDataError } from '../errors/transit-errors';

/**
 * Response envelope shared by every endpoint
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
}

/**
 * Error payload
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export function successResponse<T>(data: T): StandardResponse<T> {
  return {
    success: true,
    data,
  };
}

export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): StandardResponse<never> {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

/**
 * Map a routing-core data error to an error envelope listing every violation.
 */
export function transitErrorResponse(error: TransitDataError): StandardResponse<never> {
  return errorResponse(error.code, error.message, {
    violations: error.violations,
  });
}
