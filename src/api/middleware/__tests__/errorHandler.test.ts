import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ApiError, describeError } from '../errorHandler.js';
import { IllegalActionError, NotFoundError } from '@/utils/errors.js';

describe('describeError', () => {
  it('turns schema failures into validation errors', () => {
    const parsed = z.object({ amount: z.number() }).safeParse({});
    if (parsed.success) throw new Error('expected a parse failure');

    const { statusCode, body } = describeError(parsed.error);
    expect(statusCode).toBe(400);
    expect(body).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid request' });
  });

  it('tells the DM a forced retry is available', () => {
    const error = new IllegalActionError('Goblin is already out of the fight');
    error.forceApplyAvailable = true;

    expect(describeError(error)).toEqual({
      statusCode: 409,
      body: { code: 'ILLEGAL_ACTION', message: 'Goblin is already out of the fight', forceApplyAvailable: true },
    });
  });

  it('keeps engine error details', () => {
    expect(describeError(new NotFoundError('Map crypt not found', { mapId: 'crypt' }))).toEqual({
      statusCode: 404,
      body: { code: 'NOT_FOUND', message: 'Map crypt not found', details: { mapId: 'crypt' } },
    });
  });

  it('passes API errors through', () => {
    expect(describeError(new ApiError('Session required', 401, 'AUTH_REQUIRED'))).toEqual({
      statusCode: 401,
      body: { code: 'AUTH_REQUIRED', message: 'Session required' },
    });
  });

  it('reports malformed JSON bodies', () => {
    const error = Object.assign(new SyntaxError('Unexpected token'), { status: 400 });
    expect(describeError(error).body).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
  });

  it('falls back to a 500', () => {
    expect(describeError(new Error('boom'))).toEqual({
      statusCode: 500,
      body: { code: 'INTERNAL_ERROR', message: 'boom' },
    });
  });
});
