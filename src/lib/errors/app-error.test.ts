import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError, isAppError } from './app-error';

describe('AppError', () => {
  it('keeps plain-object details for serialization', () => {
    const err = new AppError('CONFLICT', 'Target week already has meals', {
      conflictingDates: ['2025-10-06'],
    });

    assert.strictEqual(err.name, 'AppError');
    assert.strictEqual(err.message, 'Target week already has meals');
    assert.deepStrictEqual(err.toJSON(), {
      code: 'CONFLICT',
      message: 'Target week already has meals',
      details: { conflictingDates: ['2025-10-06'] },
    });
  });

  it('keeps an Error argument as cause and omits details', () => {
    const cause = new Error('connection refused');
    const err = new AppError('DB_ERROR', 'Storage unavailable', cause);

    assert.strictEqual(err.cause, cause);
    assert.strictEqual(err.details, undefined);
    assert.deepStrictEqual(err.toJSON(), {
      code: 'DB_ERROR',
      message: 'Storage unavailable',
    });
  });

  it('wraps a primitive argument into an Error cause', () => {
    const err = new AppError('DB_ERROR', 'Missing', 'day 4');
    assert.ok(err.cause instanceof Error);
    assert.strictEqual(err.cause.message, 'day 4');
  });

  it('isAppError narrows only AppError instances', () => {
    assert.strictEqual(isAppError(new AppError('CONFLICT', 'x')), true);
    assert.strictEqual(isAppError(new Error('x')), false);
    assert.strictEqual(isAppError({ code: 'CONFLICT' }), false);
  });
});
