/**
 * Application error hierarchy.
 *
 * Every error raised by the generation pipeline carries a stable `code` so the
 * handlers can tell the failure kinds apart without string matching.
 */
export type AppErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'SUBMISSION_ERROR'
  | 'REMOTE_GENERATION_ERROR'
  | 'GENERATION_TIMEOUT'
  | 'EMPTY_RESULT'
  | 'UNSUPPORTED_ENCODING'
  | 'QUOTA_EXCEEDED';

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly statusCode: number;
  readonly isOperational: boolean;

  constructor(message: string, code: AppErrorCode, statusCode = 500, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

/** Required environment configuration is missing or invalid. Startup only. */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIGURATION_ERROR', 500, false);
    this.issues = issues;
  }
}

/** Network or HTTP failure while talking to the generation service. */
export class TransportError extends AppError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'TRANSPORT_ERROR', 502);
    this.status = status;
  }
}

/** The service accepted the request but returned no operation name. */
export class SubmissionError extends AppError {
  constructor(message: string) {
    super(message, 'SUBMISSION_ERROR', 502);
  }
}

/** The service reported the generation itself as failed. */
export class RemoteGenerationError extends AppError {
  constructor(message: string) {
    super(message, 'REMOTE_GENERATION_ERROR', 502);
  }
}

export class GenerationTimeoutError extends AppError {
  constructor(message = 'Operation timed out') {
    super(message, 'GENERATION_TIMEOUT', 504);
  }
}

export class EmptyResultError extends AppError {
  constructor(message = 'No videos were generated') {
    super(message, 'EMPTY_RESULT', 502);
  }
}

/** A video result carries neither a storage URI nor inline bytes. */
export class UnsupportedEncodingError extends AppError {
  constructor(message = "Video data must contain either 'gcsUri' or 'bytesBase64Encoded'") {
    super(message, 'UNSUPPORTED_ENCODING', 502);
  }
}

export class QuotaExceededError extends AppError {
  readonly limit: number;
  readonly used: number;

  constructor(limit: number, used: number) {
    super(`Global quota of ${limit} videos reached (${used} generated)`, 'QUOTA_EXCEEDED', 429);
    this.limit = limit;
    this.used = used;
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return error === undefined || error === null ? 'Unknown error' : String(error);
};
