/**
 * Tests for error handling system
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AssetBuildError,
  ConstraintError,
  ErrorCode,
  ErrorHandler,
  ExtensionError,
  NetworkError,
  ShopextError,
  SystemError,
  ValidationError,
  getErrorMessage,
  getUserFriendlyMessage,
  isAbortError,
  isShopextError,
  wrapError,
} from '../index.js';

describe('Error Classes', () => {
  describe('ShopextError', () => {
    it('should create error with all properties', () => {
      const cause = new Error('root cause');
      const error = new ShopextError({
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Test error',
        context: { key: 'value' },
        cause,
        isRetryable: true,
      });

      expect(error.name).toBe('ShopextError');
      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.message).toBe('Test error');
      expect(error.context).toEqual({ key: 'value' });
      expect(error.cause).toBe(cause);
      expect(error.isRetryable).toBe(true);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should expose the cause through the standard Error property', () => {
      const cause = new SyntaxError('Unexpected token');
      const error: Error = new ExtensionError(
        'composer.json is not valid JSON',
        ErrorCode.MANIFEST_INVALID,
        undefined,
        cause
      );

      expect(error.cause).toBe(cause);
    });

    it('should serialize to JSON correctly', () => {
      const error = new ExtensionError(
        'composer.json is not valid JSON',
        ErrorCode.MANIFEST_INVALID,
        { path: '/plugins/TestPlugin' },
        new SyntaxError('Unexpected end of JSON input')
      );

      const json = error.toJSON();
      expect(json).toMatchObject({
        name: 'ExtensionError',
        code: ErrorCode.MANIFEST_INVALID,
        message: 'composer.json is not valid JSON',
        context: { path: '/plugins/TestPlugin' },
        isRetryable: false,
        cause: 'Unexpected end of JSON input',
      });
      expect(json.timestamp).toBeDefined();
    });
  });

  it('should default the codes of the subclasses', () => {
    expect(new ExtensionError('x').code).toBe(ErrorCode.MANIFEST_INVALID);
    expect(new ConstraintError('x').code).toBe(ErrorCode.CONSTRAINT_INVALID);
    expect(new ValidationError('x').code).toBe(ErrorCode.VALIDATION_FAILED);
    expect(new AssetBuildError('x').code).toBe(ErrorCode.ASSET_BUILD_FAILED);
    expect(new NetworkError('x').code).toBe(ErrorCode.NETWORK_ERROR);
    expect(new SystemError('x').code).toBe(ErrorCode.INTERNAL_ERROR);
  });

  it('should mark only network errors as retryable', () => {
    expect(new NetworkError('x').isRetryable).toBe(true);
    expect(new AssetBuildError('x').isRetryable).toBe(false);
  });

  it('should keep the prototype chain', () => {
    const error = new ConstraintError('Malformed version constraint: x');

    expect(error).toBeInstanceOf(ConstraintError);
    expect(error).toBeInstanceOf(ShopextError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('Error Utilities', () => {
  describe('getErrorMessage', () => {
    it('should extract messages from every shape', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage({ message: 'object' })).toBe('object');
      expect(getErrorMessage(42)).toBe('An unknown error occurred');
    });
  });

  describe('wrapError', () => {
    it('should pass shopext errors through', () => {
      const error = new ExtensionError('broken');

      expect(wrapError(error, 'fallback')).toBe(error);
    });

    it('should wrap native errors as system errors', () => {
      const cause = new TypeError('bad');
      const wrapped = wrapError(cause, 'fallback', ErrorCode.COMMAND_FAILED, {
        command: 'npm',
      });

      expect(wrapped).toBeInstanceOf(SystemError);
      expect(wrapped.message).toBe('bad');
      expect(wrapped.code).toBe(ErrorCode.COMMAND_FAILED);
      expect(wrapped.cause).toBe(cause);
      expect(wrapped.context).toEqual({ command: 'npm' });
    });

    it('should use the default message for non-errors', () => {
      expect(wrapError(undefined, 'fallback').message).toBe('fallback');
    });
  });

  it('should recognise shopext errors', () => {
    expect(isShopextError(new AssetBuildError('x'))).toBe(true);
    expect(isShopextError(new Error('x'))).toBe(false);
  });

  it('should recognise aborts and timeouts', () => {
    const timeout = Object.assign(new Error('timed out'), { name: 'TimeoutError' });
    const abort = Object.assign(new Error('aborted'), { name: 'AbortError' });

    expect(isAbortError(timeout)).toBe(true);
    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('other'))).toBe(false);
    expect(isAbortError('TimeoutError')).toBe(false);
  });

  it('should provide a message for every code group', () => {
    expect(getUserFriendlyMessage(ErrorCode.ASSET_BUILD_FAILED)).toBe(
      'Building the extension assets failed. No assets were installed.'
    );
    expect(getUserFriendlyMessage(ErrorCode.COMMAND_FAILED)).toBe(
      'An unexpected error occurred.'
    );
  });
});

describe('ErrorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fromNodeError', () => {
    const nodeError = (code: string, message = 'failed'): NodeJS.ErrnoException =>
      Object.assign(new Error(message), { code, path: '/srv/shop/composer.json' });

    it('should map ENOENT to FILE_NOT_FOUND', () => {
      const error = ErrorHandler.fromNodeError(nodeError('ENOENT'));

      expect(error.code).toBe(ErrorCode.FILE_NOT_FOUND);
      expect(error.message).toBe('File or directory not found: /srv/shop/composer.json');
    });

    it('should map EACCES to PERMISSION_DENIED', () => {
      expect(ErrorHandler.fromNodeError(nodeError('EACCES')).code).toBe(
        ErrorCode.PERMISSION_DENIED
      );
    });

    it('should map ETIMEDOUT to a retryable timeout', () => {
      const error = ErrorHandler.fromNodeError(nodeError('ETIMEDOUT'));

      expect(error).toBeInstanceOf(NetworkError);
      expect(error.code).toBe(ErrorCode.OPERATION_TIMEOUT);
      expect(error.isRetryable).toBe(true);
    });

    it('should keep unknown codes in the context', () => {
      const error = ErrorHandler.fromNodeError(nodeError('EBUSY', 'resource busy'), {
        operation: 'extension validate',
      });

      expect(error.code).toBe(ErrorCode.UNKNOWN_ERROR);
      expect(error.context).toEqual({
        operation: 'extension validate',
        nodeErrorCode: 'EBUSY',
      });
    });
  });

  describe('handle', () => {
    it('should print a friendly message and exit', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit');
      });

      expect(() =>
        ErrorHandler.handle(
          new ConstraintError('require.shopware/core is required', ErrorCode.CONSTRAINT_MISSING),
          'project admin-build'
        )
      ).toThrow('process.exit');

      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
        '❌ The Shopware version constraint could not be resolved. Please require "shopware/core" or set build.shopwareVersionConstraint.',
        '   require.shopware/core is required',
      ]);
    });
  });
});
