export enum ErrorCode {
  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2002,

  // Dashboard API Errors (3xxx)
  API_REQUEST_FAILED = 3001,
  API_INVALID_RESPONSE = 3002,
  NETWORK_NOT_FOUND = 3003,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  OPERATION_CANCELLED = 9003,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class MigrationError extends Error {
  readonly code: ErrorCode;
  readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'MigrationError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;

    Error.captureStackTrace?.(this, MigrationError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
    };
  }

  static fromError(err: Error, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): MigrationError {
    if (err instanceof MigrationError) return err;
    return new MigrationError(code, err.message, { cause: err });
  }
}

export class ConfigurationError extends MigrationError {
  readonly issues: string[];

  constructor(
    message: string,
    options?: { issues?: string[]; cause?: Error; context?: Record<string, unknown> }
  ) {
    super(ErrorCode.CONFIG_INVALID, message, options);
    this.name = 'ConfigurationError';
    this.issues = options?.issues ?? [];
  }
}

export class ApiError extends MigrationError {
  readonly status: number;
  readonly endpoint: string;

  constructor(
    status: number,
    endpoint: string,
    body: string,
    options?: { cause?: Error }
  ) {
    super(
      ErrorCode.API_REQUEST_FAILED,
      `Dashboard API Error [${status}] ${endpoint}: ${body}`,
      { ...options, context: { status, endpoint } }
    );
    this.name = 'ApiError';
    this.status = status;
    this.endpoint = endpoint;
  }
}

export class NetworkNotFoundError extends MigrationError {
  readonly orgId: string;
  readonly networkId: string;

  constructor(orgId: string, networkId: string) {
    super(
      ErrorCode.NETWORK_NOT_FOUND,
      `Network ${networkId} not found in organization ${orgId}`,
      { context: { orgId, networkId } }
    );
    this.name = 'NetworkNotFoundError';
    this.orgId = orgId;
    this.networkId = networkId;
  }
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof MigrationError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

/** Process exit status for a failed run: 2 for bad invocation, 1 otherwise. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? 2 : 1;
}
