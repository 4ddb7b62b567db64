import { describe, it, expect } from 'vitest';
import { AppError, CorruptDocumentError, ExternalApiError, NotFoundError, ValidationError } from '../errors.js';

describe('errors', () => {
  it('should name errors after their class', () => {
    const error = new NotFoundError('Raw news data', 'AAPL');

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('NotFoundError');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('Raw news data with identifier AAPL not found');
  });

  it('should omit the identifier when there is none', () => {
    expect(new NotFoundError('Config').message).toBe('Config not found');
  });

  it('should serialize code, message and details', () => {
    const error = new CorruptDocumentError('/data/AAPL.json', 'root is not an object');

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      error: {
        code: 'CORRUPT_DOCUMENT',
        message: 'Corrupt document at /data/AAPL.json: root is not an object',
        details: { filePath: '/data/AAPL.json' },
      },
    });
  });

  it('should leave details out when absent', () => {
    expect(new ValidationError('--company is required').toJSON()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: '--company is required' },
    });
  });

  it('should prefix upstream failures with the service name', () => {
    const error = new ExternalApiError('GNews', 'Failed to fetch: 403', 403);

    expect(error.message).toBe('GNews API error: Failed to fetch: 403');
    expect(error.statusCode).toBe(502);
    expect(error.upstreamStatus).toBe(403);
  });
});
