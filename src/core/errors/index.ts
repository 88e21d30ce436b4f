/**
 * Custom error classes for shopext
 * Provides a hierarchy of error types for extension discovery, constraint
 * resolution, asset builds and remote validation
 */

export enum ErrorCode {
  // Extension errors (EXT_*)
  EXTENSION_NOT_FOUND = 'EXT_001',
  MANIFEST_MISSING = 'EXT_002',
  MANIFEST_INVALID = 'EXT_003',
  MANIFEST_WRONG_TYPE = 'EXT_004',
  EXTENSION_NAME_MISSING = 'EXT_005',
  EXTENSION_CONFIG_INVALID = 'EXT_006',
  CHANGELOG_MISSING = 'EXT_007',
  UNKNOWN_EXTENSION_TYPE = 'EXT_008',

  // Version errors (VER_*)
  CONSTRAINT_INVALID = 'VER_001',
  CONSTRAINT_MISSING = 'VER_002',
  VERSION_INVALID = 'VER_003',
  VERSION_MISSING = 'VER_004',

  // Validation errors (VAL_*)
  VALIDATION_FAILED = 'VAL_001',
  INVALID_INPUT = 'VAL_002',
  ARCHIVE_PATH_COLLISION = 'VAL_003',

  // Asset build errors (ASSET_*)
  ASSET_BUILD_FAILED = 'ASSET_001',
  ASSET_INSTALL_FAILED = 'ASSET_002',

  // Project errors (PROJECT_*)
  PROJECT_NOT_FOUND = 'PROJECT_001',

  // Network errors (NET_*)
  NETWORK_ERROR = 'NET_001',
  API_ERROR = 'NET_002',
  OPERATION_TIMEOUT = 'NET_003',

  // System errors (SYS_*)
  INTERNAL_ERROR = 'SYS_001',
  CONFIGURATION_ERROR = 'SYS_002',
  FILE_NOT_FOUND = 'SYS_003',
  PERMISSION_DENIED = 'SYS_004',
  COMMAND_FAILED = 'SYS_005',
  UNKNOWN_ERROR = 'SYS_006',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ShopextErrorOptions {
  code: ErrorCode;
  message: string;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
}

/**
 * Base error class for all shopext errors
 */
export class ShopextError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(options: ShopextErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? false;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Manifest could not be read or does not describe a known extension
 */
export class ExtensionError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MANIFEST_INVALID,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause, isRetryable: false });
  }
}

/**
 * Version or constraint could not be parsed or resolved
 */
export class ConstraintError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONSTRAINT_INVALID,
    context?: ErrorContext
  ) {
    super({ code, message, context, isRetryable: false });
  }
}

export class ValidationError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: ErrorContext
  ) {
    super({ code, message, context, isRetryable: false });
  }
}

/**
 * A build step failed; the whole orchestration run is aborted
 */
export class AssetBuildError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ASSET_BUILD_FAILED,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause, isRetryable: false });
  }
}

/**
 * Remote endpoint unreachable, timed out or answered unexpectedly
 */
export class NetworkError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_ERROR,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause, isRetryable: true });
  }
}

export class SystemError extends ShopextError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause, isRetryable: false });
  }
}

/**
 * Helper function to safely extract error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}

/**
 * Helper function to wrap unknown errors in ShopextError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  context?: ErrorContext
): ShopextError {
  if (error instanceof ShopextError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : defaultMessage;

  return new SystemError(message, code, context, cause);
}

export function isShopextError(error: unknown): error is ShopextError {
  return error instanceof ShopextError;
}

/**
 * True for aborts raised by AbortSignal.timeout() or a manual abort
 */
export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    !(error instanceof ShopextError) &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * User-friendly error messages for each error code
 */
export function getUserFriendlyMessage(code: ErrorCode): string {
  switch (code) {
    case ErrorCode.EXTENSION_NOT_FOUND:
    case ErrorCode.UNKNOWN_EXTENSION_TYPE:
      return 'No extension was found in the given directory.';
    case ErrorCode.MANIFEST_MISSING:
    case ErrorCode.MANIFEST_INVALID:
    case ErrorCode.MANIFEST_WRONG_TYPE:
      return 'The extension manifest could not be read. Please check composer.json or manifest.json.';
    case ErrorCode.EXTENSION_CONFIG_INVALID:
      return 'The .shopware-extension.yml file is invalid.';

    case ErrorCode.CONSTRAINT_INVALID:
    case ErrorCode.CONSTRAINT_MISSING:
      return 'The Shopware version constraint could not be resolved. Please require "shopware/core" or set build.shopwareVersionConstraint.';
    case ErrorCode.VERSION_INVALID:
    case ErrorCode.VERSION_MISSING:
      return 'The extension version is missing or invalid.';

    case ErrorCode.ASSET_BUILD_FAILED:
      return 'Building the extension assets failed. No assets were installed.';
    case ErrorCode.ASSET_INSTALL_FAILED:
      return 'Installing the assets into the project failed.';

    case ErrorCode.PROJECT_NOT_FOUND:
      return 'No Shopware project was found. Please pass the project directory.';

    case ErrorCode.NETWORK_ERROR:
      return 'Network error. Please check your internet connection and try again.';
    case ErrorCode.OPERATION_TIMEOUT:
      return 'The operation timed out. Please try again.';

    case ErrorCode.VALIDATION_FAILED:
      return 'Validation failed.';
    case ErrorCode.FILE_NOT_FOUND:
      return 'The requested file or directory was not found.';
    case ErrorCode.PERMISSION_DENIED:
      return 'Permission denied. Please check file permissions.';
    case ErrorCode.CONFIGURATION_ERROR:
      return 'Configuration error. Please check your environment settings.';

    default:
      return 'An unexpected error occurred.';
  }
}

/**
 * ErrorHandler provides utilities for handling errors in CLI context
 */
export class ErrorHandler {
  /**
   * Print the error and exit the process
   */
  static handle(error: unknown, operation: string): never {
    const shopextError = isErrnoException(error)
      ? ErrorHandler.fromNodeError(error, { operation })
      : wrapError(
          error,
          'An unexpected error occurred.',
          ErrorCode.UNKNOWN_ERROR,
          { operation }
        );

    console.error(`❌ ${getUserFriendlyMessage(shopextError.code)}`);
    console.error(`   ${shopextError.message}`);

    if (shopextError.isRetryable) {
      console.error('💡 This error may be recoverable. Please try again.');
    }

    process.exit(1);
  }

  /**
   * Convert Node.js error to ShopextError
   */
  static fromNodeError(
    nodeError: NodeJS.ErrnoException,
    context: ErrorContext = {}
  ): ShopextError {
    switch (nodeError.code) {
      case 'ENOENT':
        return new SystemError(
          `File or directory not found: ${nodeError.path}`,
          ErrorCode.FILE_NOT_FOUND,
          { ...context, path: nodeError.path },
          nodeError
        );

      case 'EACCES':
      case 'EPERM':
        return new SystemError(
          `Permission denied: ${nodeError.path}`,
          ErrorCode.PERMISSION_DENIED,
          { ...context, path: nodeError.path },
          nodeError
        );

      case 'ETIMEDOUT':
        return new NetworkError(
          'Operation timed out',
          ErrorCode.OPERATION_TIMEOUT,
          context,
          nodeError
        );

      default:
        return new SystemError(
          nodeError.message,
          ErrorCode.UNKNOWN_ERROR,
          { ...context, nodeErrorCode: nodeError.code },
          nodeError
        );
    }
  }
}
