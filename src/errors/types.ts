/**
 * Error types and error codes for lvmscope
 * Provides structured error handling with proper categorization
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  CONFIGURATION_ERROR = 1001,
  INITIALIZATION_ERROR = 1002,

  // Command gateway errors (2000-2999)
  COMMAND_EXECUTION_FAILED = 2000,
  COMMAND_PERMISSION_DENIED = 2001,
  COMMAND_NOT_FOUND = 2002,

  // Rendering errors (3000-3999)
  RENDER_OUT_OF_BOUNDS = 3000,

  // Terminal errors (4000-4999)
  TERMINAL_INIT_FAILED = 4000,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
