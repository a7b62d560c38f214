/**
 * Error taxonomy for the ranking pipeline.
 *
 * Terminal errors end a run (validation, no usable input, model load, schema).
 * The rest are recovered where they occur and surface as issues on the result.
 */

export enum ErrorCode {
  INVALID_INPUT = 'E400_INVALID_INPUT',
  FILE_NOT_FOUND = 'E404_FILE_NOT_FOUND',
  TIMEOUT = 'E408_TIMEOUT',
  UNSUPPORTED_FORMAT = 'E415_UNSUPPORTED_FORMAT',
  NO_EXTRACTABLE_TEXT = 'E422_NO_EXTRACTABLE_TEXT',
  FILE_ENCRYPTED = 'E423_FILE_ENCRYPTED',
  NO_USABLE_INPUT = 'E424_NO_USABLE_INPUT',
  PROCESSING_FAILED = 'E500_PROCESSING_FAILED',
  SCHEMA_VIOLATION = 'E500_SCHEMA_VIOLATION',
  SERVICE_UNAVAILABLE = 'E503_SERVICE_UNAVAILABLE',
  MODEL_UNAVAILABLE = 'E503_MODEL_UNAVAILABLE',
  DEADLINE_EXCEEDED = 'E504_DEADLINE_EXCEEDED'
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_INPUT]: 'Invalid input format',
  [ErrorCode.FILE_NOT_FOUND]: 'Document file not accessible',
  [ErrorCode.TIMEOUT]: 'Document processing timed out',
  [ErrorCode.UNSUPPORTED_FORMAT]: 'Unsupported document format',
  [ErrorCode.NO_EXTRACTABLE_TEXT]: 'Document contains no extractable text',
  [ErrorCode.FILE_ENCRYPTED]: 'Password-protected document',
  [ErrorCode.NO_USABLE_INPUT]: 'No document produced usable text',
  [ErrorCode.PROCESSING_FAILED]: 'Unexpected processing error',
  [ErrorCode.SCHEMA_VIOLATION]: 'Result does not match the output schema',
  [ErrorCode.SERVICE_UNAVAILABLE]: 'External service unavailable',
  [ErrorCode.MODEL_UNAVAILABLE]: 'Embedding model unavailable',
  [ErrorCode.DEADLINE_EXCEEDED]: 'Overall time budget exceeded'
};

export abstract class PipelineError extends Error {
  abstract readonly terminal: boolean;
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends PipelineError {
  readonly terminal = true;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.INVALID_INPUT);
    this.issues = issues;
  }
}

export class ConfigurationError extends PipelineError {
  readonly terminal = true;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.INVALID_INPUT);
    this.issues = issues;
  }
}

export class FormulationError extends PipelineError {
  readonly terminal = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.SERVICE_UNAVAILABLE, options);
  }
}

export class ExtractionError extends PipelineError {
  readonly terminal = false;
  readonly documentId: string;

  constructor(
    documentId: string,
    message: string,
    code: ErrorCode = ErrorCode.PROCESSING_FAILED,
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.documentId = documentId;
  }
}

export class OperationTimeoutError extends PipelineError {
  readonly terminal = false;
  readonly timeoutMs: number;

  constructor(context: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${context}`, ErrorCode.TIMEOUT);
    this.timeoutMs = timeoutMs;
  }
}

export class NoUsableInputError extends PipelineError {
  readonly terminal = true;

  constructor(message: string = ERROR_MESSAGES[ErrorCode.NO_USABLE_INPUT]) {
    super(message, ErrorCode.NO_USABLE_INPUT);
  }
}

/**
 * The embedding model could not be loaded. Fatal for the process, not just the run.
 */
export class ModelLoadError extends PipelineError {
  readonly terminal = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.MODEL_UNAVAILABLE, options);
  }
}

export class EmbeddingError extends PipelineError {
  readonly terminal = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.PROCESSING_FAILED, options);
  }
}

export class SchemaError extends PipelineError {
  readonly terminal = true;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.SCHEMA_VIOLATION);
    this.issues = issues;
  }
}

/**
 * Anything thrown during a run that is not already part of this taxonomy
 */
export class UnexpectedError extends PipelineError {
  readonly terminal = true;

  constructor(cause: unknown) {
    super(`Unexpected error: ${toErrorMessage(cause)}`, ErrorCode.PROCESSING_FAILED, { cause });
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
