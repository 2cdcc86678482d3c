import { describe, it, expect } from 'vitest';
import { ConfigurationError, ProxyError, describeError, handleError } from './errors.js';

describe('describeError', () => {
  it('includes the cause of a failed fetch', () => {
    const error = new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND notebook.internal') });
    expect(describeError(error)).toBe('fetch failed (getaddrinfo ENOTFOUND notebook.internal)');
  });

  it('uses the message alone when there is no cause', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies non-errors', () => {
    expect(describeError('closed')).toBe('closed');
  });
});

describe('handleError', () => {
  it('keeps the status of a proxy error', () => {
    expect(handleError(new ProxyError('upstream down', 502))).toMatchObject({
      success: false,
      message: 'upstream down',
      statusCode: 502,
    });
  });

  it('hides configuration details', () => {
    expect(handleError(new ConfigurationError('PORT is invalid', 'PORT'))).toMatchObject({
      message: 'Service configuration error',
      statusCode: 500,
    });
  });
});
