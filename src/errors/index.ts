import type { CommandFailure, CommandName } from '../types/inventory.js';
import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for lvmscope
 * Extends native Error with additional metadata
 */
export class LvmScopeError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'LvmScopeError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends LvmScopeError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure of one inventory command. The gateway returns failures as values;
 * this wraps one for logging.
 */
export class CommandError extends LvmScopeError {
  public readonly command: CommandName;
  public readonly failure: CommandFailure;

  constructor(command: CommandName, failure: CommandFailure) {
    super(
      `${command}: ${describeCommandFailure(failure)}`,
      codeForFailure(failure),
      ErrorSeverity.MEDIUM,
      { command, failure: failure.kind }
    );
    this.name = 'CommandError';
    this.command = command;
    this.failure = failure;
  }
}

/**
 * Write outside a frame buffer's bounds
 */
export class RenderError extends LvmScopeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.RENDER_OUT_OF_BOUNDS, ErrorSeverity.LOW, context);
    this.name = 'RenderError';
  }
}

/**
 * The terminal could not be acquired. The only fatal class once configuration has loaded.
 */
export class TerminalError extends LvmScopeError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCode.TERMINAL_INIT_FAILED, ErrorSeverity.CRITICAL, undefined, originalError);
    this.name = 'TerminalError';
  }
}

export function describeCommandFailure(failure: CommandFailure): string {
  switch (failure.kind) {
    case 'ExecutionFailed':
      return failure.reason;
    case 'PermissionDenied':
      return `permission denied (${failure.detail})`;
    case 'NotFound':
      return `${failure.program} not found`;
  }
}

function codeForFailure(failure: CommandFailure): ErrorCode {
  switch (failure.kind) {
    case 'ExecutionFailed':
      return ErrorCode.COMMAND_EXECUTION_FAILED;
    case 'PermissionDenied':
      return ErrorCode.COMMAND_PERMISSION_DENIED;
    case 'NotFound':
      return ErrorCode.COMMAND_NOT_FOUND;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
