/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  VaultError,
  StorageError,
  RetrievalError,
  EmbeddingError,
  ConfigError,
  ValidationError,
  isErrorWithCode,
  isStorageError,
  isRetrievalError,
  isEmbeddingError,
  isConfigError,
  isValidationError,
  errorMessage,
  wrapError,
} from '../../src/utils/errors.js';

describe('errors', () => {
  describe('VaultError', () => {
    it('has message, code, and name', () => {
      const error = new VaultError('Something failed', 'TEST_ERROR');

      expect(error.message).toBe('Something failed');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('VaultError');
    });

    it('captures cause from Error', () => {
      const cause = new Error('Original error');
      const error = new VaultError('Wrapped error', 'WRAPPED', cause);

      expect(error.cause).toBe(cause);
    });

    it('converts non-Error cause to Error', () => {
      const error = new VaultError('Wrapped error', 'WRAPPED', 'string cause');

      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause?.message).toBe('string cause');
    });

    it('has undefined cause when not provided', () => {
      const error = new VaultError('No cause', 'NO_CAUSE');

      expect(error.cause).toBeUndefined();
    });

    it('formats detailed string with cause chain', () => {
      const inner = new StorageError('disk full', 'CHUNK_WRITE_FAILED');
      const outer = new RetrievalError('lookup failed', 'VECTOR_SEARCH_FAILED', inner);

      expect(outer.toDetailedString()).toBe(
        'RetrievalError [VECTOR_SEARCH_FAILED]: lookup failed\n  Caused by: disk full [CHUNK_WRITE_FAILED]',
      );
    });

    it('formats detailed string without cause', () => {
      const error = new ConfigError('bad', 'CONFIG_INVALID');

      expect(error.toDetailedString()).toBe('ConfigError [CONFIG_INVALID]: bad');
    });
  });

  describe('subclasses', () => {
    it.each([
      ['StorageError', new StorageError('m', 'C')],
      ['RetrievalError', new RetrievalError('m', 'C')],
      ['EmbeddingError', new EmbeddingError('m', 'C')],
      ['ConfigError', new ConfigError('m', 'C')],
      ['ValidationError', new ValidationError('m', 'C')],
    ])('%s extends VaultError and carries its own name', (name, error) => {
      expect(error).toBeInstanceOf(VaultError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
    });
  });

  describe('type guards', () => {
    it('matches only their own class', () => {
      const storage = new StorageError('m', 'C');
      const validation = new ValidationError('m', 'C');

      expect(isStorageError(storage)).toBe(true);
      expect(isStorageError(validation)).toBe(false);
      expect(isValidationError(validation)).toBe(true);
      expect(isRetrievalError(new RetrievalError('m', 'C'))).toBe(true);
      expect(isEmbeddingError(new EmbeddingError('m', 'C'))).toBe(true);
      expect(isConfigError(new ConfigError('m', 'C'))).toBe(true);
      expect(isConfigError(new Error('plain'))).toBe(false);
    });

    it('isErrorWithCode checks the code', () => {
      const error = new ConfigError('m', 'UNKNOWN_PROVIDER');

      expect(isErrorWithCode(error, 'UNKNOWN_PROVIDER')).toBe(true);
      expect(isErrorWithCode(error, 'OTHER')).toBe(false);
      expect(isErrorWithCode(new Error('plain'), 'UNKNOWN_PROVIDER')).toBe(false);
    });
  });

  describe('errorMessage', () => {
    it('reads Error messages and stringifies anything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('text')).toBe('text');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('wrapError', () => {
    it('returns VaultErrors unchanged', () => {
      const error = new StorageError('m', 'C');

      expect(wrapError(error)).toBe(error);
    });

    it('wraps plain errors with UNKNOWN code', () => {
      const cause = new Error('plain');
      const wrapped = wrapError(cause);

      expect(wrapped).toBeInstanceOf(VaultError);
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('plain');
      expect(wrapped.cause).toBe(cause);
    });

    it('uses the provided message', () => {
      expect(wrapError('raw', 'Context').message).toBe('Context');
    });
  });
});
