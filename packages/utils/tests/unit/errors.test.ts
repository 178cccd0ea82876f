import { describe, it, expect } from 'vitest';
import {
  AppError,
  NotFoundError,
  SchemaError,
  ValidationError,
  isOperationalError,
} from '../../src/errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('should default code, status and operational flag', () => {
      const error = new AppError('boom');

      expect(error.message).toBe('boom');
      expect(error.code).toBe('APP_ERROR');
      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });
  });

  describe('ValidationError', () => {
    it('should be an operational 400 error', () => {
      const error = new ValidationError('bad value', { value: 'x' });

      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.statusCode).toBe(400);
      expect(error.context).toEqual({ value: 'x' });
      expect(isOperationalError(error)).toBe(true);
    });
  });

  describe('NotFoundError', () => {
    it('should name the resource and identifier', () => {
      const error = new NotFoundError('Command', 'plot');

      expect(error.message).toBe("Command with identifier 'plot' not found");
      expect(error.code).toBe('NOT_FOUND');
      expect(error.context).toEqual({ resource: 'Command', identifier: 'plot' });
    });

    it('should omit the identifier when none is given', () => {
      expect(new NotFoundError('Command').message).toBe('Command not found');
    });
  });

  describe('SchemaError', () => {
    it('should not be operational', () => {
      const error = new SchemaError('duplicate key');

      expect(error.code).toBe('SCHEMA_ERROR');
      expect(isOperationalError(error)).toBe(false);
    });
  });

  it('should treat plain errors as non-operational', () => {
    expect(isOperationalError(new Error('plain'))).toBe(false);
  });
});
