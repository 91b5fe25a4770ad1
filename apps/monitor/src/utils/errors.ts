/**
 * Standardized error classes for the Zurg repair monitor
 * All errors carry a stable code and serialize to a consistent shape
 */

import type { ZodError } from 'zod';

// Error codes for log and exit-path identification
export const ErrorCodes = {
  // Configuration (1xxx)
  CONFIG_INVALID: 'CFG_001',
  CONFIG_UNREADABLE: 'CFG_002',

  // Process identity (2xxx)
  PERMISSION_DENIED: 'PRM_001',

  // External services (6xxx)
  ZURG_ERROR: 'EXT_001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface SerializedAppError {
  error: string;
  message: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
}

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.isOperational = true;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  toJSON(): SerializedAppError {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Configuration error - invalid values or unreadable config file. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  public readonly fields?: Array<{ field: string; message: string }>;

  constructor(
    message: string,
    fields?: Array<{ field: string; message: string }>,
    code: ErrorCode = ErrorCodes.CONFIG_INVALID
  ) {
    super(message, code, fields ? { fields } : undefined);
    this.name = 'ConfigurationError';
    this.fields = fields;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  static fromZodError(error: ZodError, source = 'configuration'): ConfigurationError {
    const fields = error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = fields.map((f) => (f.field ? `${f.field}: ${f.message}` : f.message)).join('; ');
    return new ConfigurationError(`Invalid ${source}: ${summary}`, fields);
  }

  static unreadable(path: string, reason: string): ConfigurationError {
    return new ConfigurationError(
      `Cannot read configuration file ${path}: ${reason}`,
      undefined,
      ErrorCodes.CONFIG_UNREADABLE
    );
  }
}

/**
 * Permission error - PUID/PGID could not be applied. Downgraded to a warning by callers.
 */
export class PermissionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PERMISSION_DENIED, details);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * External service error (Zurg)
 */
export class ExternalServiceError extends AppError {
  constructor(service: 'zurg', message: string, details?: Record<string, unknown>) {
    const codeMap: Record<typeof service, ErrorCode> = {
      zurg: ErrorCodes.ZURG_ERROR,
    };
    super(
      `${service.charAt(0).toUpperCase() + service.slice(1)} error: ${message}`,
      codeMap[service],
      details
    );
    this.name = 'ExternalServiceError';
    Object.setPrototypeOf(this, ExternalServiceError.prototype);
  }
}

/**
 * Describe an unknown thrown value for log output
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
