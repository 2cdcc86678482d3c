import type { StandardResponse } from '../types/index.js';

/**
 * Helper function to create standardized responses
 */
export function createStandardResponse<T>(
  success: boolean,
  data: T,
  message: string | null = null,
  statusCode: number = 200
): StandardResponse<T> {
  return {
    success,
    message,
    timestamp: new Date().toISOString(),
    statusCode,
    data,
  };
}

/**
 * Statuses whose responses never carry a body
 */
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

export function isNullBodyStatus(status: number): boolean {
  return NULL_BODY_STATUSES.has(status);
}
