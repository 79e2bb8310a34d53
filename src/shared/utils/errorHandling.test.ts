/**
 * Error Handling Utilities Tests
 */

import { describe, it, expect } from 'vitest';
import { getErrorMessage, serializeError, toError } from './errorHandling';

describe('errorHandling', () => {
  describe('serializeError', () => {
    it('should keep name, message and extra properties of errors', () => {
      const error = Object.assign(new Error('write after end'), { code: 'EPIPE' });

      const serialized = serializeError(error);

      expect(serialized).toMatchObject({ name: 'Error', message: 'write after end', code: 'EPIPE' });
      expect(typeof serialized.stack).toBe('string');
    });

    it('should copy plain objects', () => {
      expect(serializeError({ reason: 'closed', attempts: 2 })).toEqual({ reason: 'closed', attempts: 2 });
    });

    it('should wrap primitives', () => {
      expect(serializeError(42)).toEqual({ value: '42' });
      expect(serializeError(null)).toEqual({ value: 'null' });
    });
  });

  describe('getErrorMessage', () => {
    it('should read messages from any thrown value', () => {
      expect(getErrorMessage(new TypeError('bad type'))).toBe('bad type');
      expect(getErrorMessage('plain text')).toBe('plain text');
      expect(getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('toError', () => {
    it('should return errors unchanged', () => {
      const error = new RangeError('out of range');
      expect(toError(error)).toBe(error);
    });

    it('should wrap everything else', () => {
      const error = toError('socket hang up');
      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('socket hang up');
    });
  });
});
