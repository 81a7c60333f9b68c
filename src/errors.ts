/**
 * Error classes for the question-answering flow.
 *
 * Cache failures never surface as errors; these cover configuration,
 * request validation and the upstream model.
 */

export type ErrorCode =
  | 'BAD_REQUEST'
  | 'CONFIG_ERROR'
  | 'ANSWER_FAILED'
  | 'ANSWER_TIMEOUT'
  | 'INTERNAL_ERROR';

export interface SerializedError {
  code: ErrorCode;
  message: string;
}

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request') {
    super('BAD_REQUEST', message, 400);
  }
}

/**
 * Invalid environment configuration, raised once at startup.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 500);
  }
}

/**
 * 502 - the model API failed or returned something unusable.
 */
export class AnswerGenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANSWER_FAILED', message, 502, options);
  }
}

/**
 * 504 - the model API did not answer within the configured timeout.
 */
export class AnswerTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super('ANSWER_TIMEOUT', `Answer generation timed out after ${timeoutMs}ms`, 504);
  }
}
