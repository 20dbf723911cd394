import { describe, it, expect } from 'vitest';
import { NotFoundError, TransportError, ValidationError, errorMessage, isDeskError } from './errors';

describe('errors', () => {
  it('carries code, usage and status for validation failures', () => {
    const err = new ValidationError('Entry must be a number', 'signal TICKER ENTRY SL');
    expect(err.code).toBe('VALIDATION');
    expect(err.usage).toBe('signal TICKER ENTRY SL');
    expect(err.statusCode).toBe(400);
    expect(err.name).toBe('ValidationError');
    expect(isDeskError(err)).toBe(true);
  });

  it('keeps the transport cause', () => {
    const cause = new Error('ETIMEDOUT');
    const err = new TransportError('Could not post to the channel', cause);
    expect(err.cause).toBe(cause);
    expect(err.statusCode).toBe(502);
  });

  it('maps not-found to 404', () => {
    expect(new NotFoundError('No creative fix9').statusCode).toBe(404);
  });

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(isDeskError(new Error('x'))).toBe(false);
  });
});
