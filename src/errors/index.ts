/**
 * Storage MCP Gateway - Structured error handling
 *
 * Provides consistent error types and codes for diagnostics.
 */

/**
 * Error code enumeration
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_MISSING = 1002,
  CONFIG_MALFORMED_JSON = 1003,
  DUPLICATE_TOOL = 1004,

  // Authentication errors (2xxx)
  MISSING_CREDENTIAL = 2001,
  INVALID_CREDENTIAL = 2002,

  // Gating errors (3xxx)
  CONTEXT_BUDGET_EXCEEDED = 3001,

  // Appliance errors (4xxx)
  APPLIANCE_CONNECTION = 4001,
  APPLIANCE_TIMEOUT = 4002,
  APPLIANCE_AUTH = 4003,
  APPLIANCE_NOT_FOUND = 4004,
  APPLIANCE_RATE_LIMITED = 4005,
  APPLIANCE_API = 4006,

  // Validation errors (6xxx)
  INVALID_INPUT = 6001,
  OPERATION_DISABLED = 6002,

  // System errors (9xxx)
  INTERNAL_ERROR = 9001,
}

/**
 * HTTP status mapping for error codes
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCode.CONFIG_INVALID]: 500,
  [ErrorCode.CONFIG_MISSING]: 500,
  [ErrorCode.CONFIG_MALFORMED_JSON]: 500,
  [ErrorCode.DUPLICATE_TOOL]: 500,

  [ErrorCode.MISSING_CREDENTIAL]: 401,
  [ErrorCode.INVALID_CREDENTIAL]: 401,

  [ErrorCode.CONTEXT_BUDGET_EXCEEDED]: 413,

  [ErrorCode.APPLIANCE_CONNECTION]: 502,
  [ErrorCode.APPLIANCE_TIMEOUT]: 504,
  [ErrorCode.APPLIANCE_AUTH]: 502,
  [ErrorCode.APPLIANCE_NOT_FOUND]: 404,
  [ErrorCode.APPLIANCE_RATE_LIMITED]: 429,
  [ErrorCode.APPLIANCE_API]: 502,

  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.OPERATION_DISABLED]: 403,

  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Gateway-specific error type
 */
export class GatewayError extends Error {
  public readonly timestamp: Date;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
    this.timestamp = new Date();

    // Preserve the prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * HTTP status code for this error.
   */
  get httpStatus(): number {
    return ErrorHttpStatus[this.code] || 500;
  }

  /**
   * Serialize error details to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString()
    };
  }

  /**
   * Wrap an unknown error as a GatewayError.
   */
  static fromError(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    if (error instanceof Error) {
      return new GatewayError(
        ErrorCode.INTERNAL_ERROR,
        error.message,
        { originalError: error.name }
      );
    }

    return new GatewayError(ErrorCode.INTERNAL_ERROR, String(error));
  }
}

/**
 * Fatal startup configuration problem.
 */
export class ConfigError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.CONFIG_INVALID) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a tool listing exceeds the hard context limit under enforcement.
 */
export class ContextBudgetExceededError extends GatewayError {
  constructor(public readonly tokenCount: number, public readonly limit: number) {
    super(
      ErrorCode.CONTEXT_BUDGET_EXCEEDED,
      `Context size ${tokenCount} tokens exceeds hard limit of ${limit} tokens. ` +
        'Reduce tool count or enable stricter filtering.',
      { tokenCount, limit }
    );
    this.name = 'ContextBudgetExceededError';
  }
}

/**
 * Credential missing or rejected at the HTTP boundary.
 */
export class AuthenticationError extends GatewayError {
  constructor(code: ErrorCode.MISSING_CREDENTIAL | ErrorCode.INVALID_CREDENTIAL, message: string) {
    super(code, message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Helper factory functions for common errors.
 */
export const Errors = {
  missingCredential: () =>
    new AuthenticationError(ErrorCode.MISSING_CREDENTIAL, 'Missing Authorization header'),

  invalidCredential: () =>
    new AuthenticationError(ErrorCode.INVALID_CREDENTIAL, 'Invalid or missing access token'),

  invalidConfig: (field: string, reason: string) =>
    new ConfigError(`Invalid configuration for ${field}: ${reason}`, { field, reason }),

  missingConfig: (message: string) =>
    new ConfigError(message, undefined, ErrorCode.CONFIG_MISSING),

  malformedJson: (source: string, reason: string) =>
    new ConfigError(`Invalid JSON in ${source}: ${reason}`, { source, reason }, ErrorCode.CONFIG_MALFORMED_JSON),

  duplicateTool: (name: string) =>
    new ConfigError(`Duplicate tool name: ${name}`, { name }, ErrorCode.DUPLICATE_TOOL),

  invalidInput: (field: string, reason: string) =>
    new GatewayError(ErrorCode.INVALID_INPUT, `Invalid input for ${field}: ${reason}`, { field, reason }),

  operationDisabled: (operation: string) =>
    new GatewayError(
      ErrorCode.OPERATION_DISABLED,
      `Destructive operation "${operation}" is disabled. Set ENABLE_DESTRUCTIVE_OPERATIONS=true to allow it.`,
      { operation }
    ),

  applianceConnection: (attempts: number) =>
    new GatewayError(ErrorCode.APPLIANCE_CONNECTION, `Connection failed after ${attempts} attempts`, { attempts }),

  applianceTimeout: (attempts: number) =>
    new GatewayError(ErrorCode.APPLIANCE_TIMEOUT, `Request timed out after ${attempts} attempts`, { attempts }),

  applianceAuth: (status: number) =>
    new GatewayError(ErrorCode.APPLIANCE_AUTH, 'Appliance rejected the API key', { status }),

  applianceNotFound: (path: string) =>
    new GatewayError(ErrorCode.APPLIANCE_NOT_FOUND, `Appliance resource not found: ${path}`, { path }),

  applianceRateLimited: () =>
    new GatewayError(ErrorCode.APPLIANCE_RATE_LIMITED, 'Appliance rate limit exceeded'),

  applianceApi: (status: number, body: string) =>
    new GatewayError(ErrorCode.APPLIANCE_API, `Appliance API error (${status}): ${body}`, { status }),

  unexpectedResponse: (path: string, reason: string) =>
    new GatewayError(ErrorCode.APPLIANCE_API, `Unexpected appliance response from ${path}: ${reason}`, { path, reason }),
};
