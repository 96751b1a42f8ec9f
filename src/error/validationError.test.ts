import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

const ISSUE = { message: 'Required', path: ['access_token'] };

describe('ValidationError', () => {
  it('serializes issues into the message and exposes them', () => {
    const err = new ValidationError('error validating data', [ISSUE]);

    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["access_token"]}]');
    expect(err.issues).toEqual([ISSUE]);
    expect(err.name).toBe('ValidationError');
  });
});

describe('isValidationError', () => {
  it('returns true for instances of ValidationError', () => {
    expect(isValidationError(new ValidationError('error-validating', []))).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isValidationError(new Error('error'))).toBe(false);
  });
});

describe('getValidationError', () => {
  it('unwraps nested causes', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });

    expect(getValidationError(err)).toBe(validationErr);
  });
});
