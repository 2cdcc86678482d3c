import { createStandardResponse } from './response.js';

/**
 * Custom error class for proxy-related errors
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ProxyError';
  }
}

/**
 * Custom error class for configuration errors
 */
export class ConfigurationError extends Error {
  constructor(message: string, public missingConfig: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Human readable description of an error, including its cause.
 * fetch() reports network failures as "fetch failed" with the socket error as cause.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const { cause } = error;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * Handle and format errors into standard response format
 */
export function handleError(error: unknown, statusCode: number = 500) {
  let message: string;

  if (error instanceof ProxyError) {
    message = error.message;
    statusCode = error.statusCode;
  } else if (error instanceof ConfigurationError) {
    message = 'Service configuration error';
    statusCode = 500;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = 'Unknown error occurred';
  }

  return createStandardResponse(false, null, message, statusCode);
}
