/**
 * Tests for the engine error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  EngineError,
  MalformedRecordError,
  ValidationError,
  getErrorCode,
  getErrorMessage,
  normalizeError,
} from '../../src/core/errors.js';

describe('EngineError', () => {
  it('should default its code and context', () => {
    const error = new EngineError('boom');
    expect(error.code).toBe('ENGINE_ERROR');
    expect(error.context).toEqual({});
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new EngineError('boom', { code: 'X', context: { a: 1 } });
    const json = error.toJSON();

    expect(json.name).toBe('EngineError');
    expect(json.message).toBe('boom');
    expect(json.code).toBe('X');
    expect(json.context).toEqual({ a: 1 });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it('should merge context', () => {
    const error = new EngineError('boom', { context: { a: 1 } }).withContext({ b: 2 });
    expect(error.context).toEqual({ a: 1, b: 2 });
  });
});

describe('ValidationError', () => {
  it('should carry the missing sections', () => {
    const error = new ValidationError('Missing required fields: metrics', ['metrics']);

    expect(error).toBeInstanceOf(EngineError);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.missing).toEqual(['metrics']);
    expect(error.context).toEqual({ missing: ['metrics'] });
  });

  it('should leave context empty without missing sections', () => {
    expect(new ValidationError('not an object').context).toEqual({});
  });
});

describe('MalformedRecordError', () => {
  it('should name the field and the expected shape', () => {
    const error = new MalformedRecordError('trajectory', 'an array');

    expect(error.message).toBe('trajectory must be an array');
    expect(error.code).toBe('MALFORMED_RECORD');
    expect(error.field).toBe('trajectory');
    expect(error.context).toEqual({ field: 'trajectory', expected: 'an array' });
  });
});

describe('utilities', () => {
  it('normalizeError should pass engine errors through', () => {
    const error = new ValidationError('bad');
    expect(normalizeError(error)).toBe(error);
  });

  it('normalizeError should wrap plain errors and strings', () => {
    const cause = new Error('plain');
    const wrapped = normalizeError(cause, 'WRAPPED');

    expect(wrapped.code).toBe('WRAPPED');
    expect(wrapped.message).toBe('plain');
    expect(wrapped.cause).toBe(cause);
    expect(normalizeError('text').message).toBe('text');
    expect(normalizeError(42).context).toEqual({ originalError: 42 });
  });

  it('getErrorCode should read codes and names', () => {
    expect(getErrorCode(new MalformedRecordError('x', 'y'))).toBe('MALFORMED_RECORD');
    expect(getErrorCode(new TypeError('t'))).toBe('TypeError');
    expect(getErrorCode('nope')).toBe('UNKNOWN_ERROR');
  });

  it('getErrorMessage should stringify non-errors', () => {
    expect(getErrorMessage(new Error('m'))).toBe('m');
    expect(getErrorMessage(7)).toBe('7');
  });
});
