import { PipelineStage, StageError } from './types';

export enum ErrorCode {
  EMPTY_INPUT = 'EMPTY_INPUT',
  CLASSIFICATION_UNAVAILABLE = 'CLASSIFICATION_UNAVAILABLE',
  TRANSLATION_UNAVAILABLE = 'TRANSLATION_UNAVAILABLE',
  STAGE_TIMEOUT = 'STAGE_TIMEOUT',
  STAGE_FAILED = 'STAGE_FAILED',
  INVALID_REVIEW = 'INVALID_REVIEW',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export type PipelineErrorJSON = {
  name: string;
  code: ErrorCode;
  message: string;
  stage?: PipelineStage;
  retryable: boolean;
  cause?: string;
};

export class PipelineError extends Error {
  public readonly code: ErrorCode;
  public readonly stage?: PipelineStage;
  public readonly retryable: boolean;
  public readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      stage?: PipelineStage;
      retryable?: boolean;
      cause?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options.stage;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toStageError(): StageError {
    return {
      stage: this.stage ?? 'normalization',
      code: this.code,
      message: this.message,
    };
  }

  toJSON(): PipelineErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stage: this.stage,
      retryable: this.retryable,
      cause: this.cause?.message,
    };
  }
}

export class EmptyInputError extends PipelineError {
  constructor(message = 'Review text is empty after normalization.') {
    super(ErrorCode.EMPTY_INPUT, message, { stage: 'normalization' });
    this.name = 'EmptyInputError';
  }
}

export class ClassificationUnavailable extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(ErrorCode.CLASSIFICATION_UNAVAILABLE, message, {
      stage: 'classification',
      retryable: true,
      cause,
    });
    this.name = 'ClassificationUnavailable';
  }
}

export class TranslationUnavailable extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(ErrorCode.TRANSLATION_UNAVAILABLE, message, {
      stage: 'translation',
      retryable: true,
      cause,
    });
    this.name = 'TranslationUnavailable';
  }
}

export class StageTimeoutError extends PipelineError {
  public readonly timeoutMs: number;

  constructor(stage: PipelineStage, timeoutMs: number) {
    super(ErrorCode.STAGE_TIMEOUT, `Stage "${stage}" timed out after ${timeoutMs}ms.`, {
      stage,
      retryable: true,
    });
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ReviewValidationError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorCode.INVALID_REVIEW, message);
    this.name = 'ReviewValidationError';
    this.issues = issues;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(ErrorCode.INVALID_CONFIG, message);
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
