/**
 * @fileoverview Error codes and the error class used across the curation pipeline.
 * @module src/types-global/errors
 */

/**
 * Failure categories. Every fatal condition in a run maps to exactly one.
 */
export enum ErrorCode {
  InvalidArguments = 'INVALID_ARGUMENTS',
  ConfigurationError = 'CONFIGURATION_ERROR',
  InputNotFound = 'INPUT_NOT_FOUND',
  InputUnreadable = 'INPUT_UNREADABLE',
  MissingColumn = 'MISSING_COLUMN',
  OutputWriteFailed = 'OUTPUT_WRITE_FAILED',
  InternalError = 'INTERNAL_ERROR',
}

/**
 * Error raised for any condition that aborts a curation run.
 */
export class PipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

/**
 * Wraps an arbitrary thrown value, passing existing PipelineErrors through.
 */
export function toPipelineError(
  error: unknown,
  code: ErrorCode,
  message: string,
  data?: Record<string, unknown>,
): PipelineError {
  if (error instanceof PipelineError) return error;

  return new PipelineError(
    code,
    `${message}: ${error instanceof Error ? error.message : String(error)}`,
    {
      ...data,
      originalErrorName: error instanceof Error ? error.name : 'UnknownError',
    },
  );
}
