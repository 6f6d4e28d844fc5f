// src/core/errors.ts
import type { DeletionResult, Platform } from './types/index.js';

export enum ErrorCode {
  INVALID_CONFIG = 'invalid_config',
  NOT_CONFIGURED = 'not_configured',
  NOT_IMPLEMENTED = 'not_implemented',
  AUTH_FAILED = 'auth_failed',
  LIST_FAILED = 'list_failed',
  RATE_LIMITED = 'rate_limited',
  DELETE_FAILED = 'delete_failed',
  ARCHIVE_FAILED = 'archive_failed',
  CANCELLED = 'cancelled',
}

export class ScrubError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScrubError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends ScrubError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(ErrorCode.INVALID_CONFIG, message, false, 'Check your .env file or command-line options');
    this.name = 'ConfigError';
  }
}

export class AuthError extends ScrubError {
  constructor(
    public readonly platform: Platform,
    message: string,
    code: ErrorCode.AUTH_FAILED | ErrorCode.NOT_CONFIGURED | ErrorCode.NOT_IMPLEMENTED = ErrorCode.AUTH_FAILED,
    suggestion?: string
  ) {
    super(code, message, false, suggestion, { platform });
    this.name = 'AuthError';
  }
}

export class ListError extends ScrubError {
  constructor(
    public readonly platform: Platform,
    message: string,
    public readonly cause?: unknown
  ) {
    super(ErrorCode.LIST_FAILED, message, false, undefined, { platform });
    this.name = 'ListError';
  }
}

export class RateLimitError extends ScrubError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    retryable: boolean = true
  ) {
    super(
      ErrorCode.RATE_LIMITED,
      message,
      retryable,
      retryable ? undefined : 'Wait for the rate limit window to reset and run again',
      retryAfterMs === undefined ? undefined : { retryAfterMs }
    );
    this.name = 'RateLimitError';
  }
}

export class DeleteError extends ScrubError {
  constructor(
    public readonly postId: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(ErrorCode.DELETE_FAILED, message, false, undefined, { postId });
    this.name = 'DeleteError';
  }
}

export class ArchiveWriteError extends ScrubError {
  constructor(
    public readonly postId: string,
    public readonly filePath: string,
    message: string
  ) {
    super(ErrorCode.ARCHIVE_FAILED, message, false, 'Check that ARCHIVE_PATH is writable', {
      postId,
      filePath,
    });
    this.name = 'ArchiveWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createFailedResult(
  platform: Platform,
  postId: string,
  error: unknown,
  archivePath?: string
): DeletionResult & { outcome: 'failed' } {
  return {
    postId,
    platform,
    outcome: 'failed',
    error: errorMessage(error),
    errorCode: error instanceof ScrubError ? error.code : ErrorCode.DELETE_FAILED,
    archivePath,
  };
}
