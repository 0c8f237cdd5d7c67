export type PipelineErrorCode =
  | 'ConnectionUnavailable'
  | 'NoPagesOpen'
  | 'ContentTooSmall'
  | 'MalformedDocument'
  | 'StoreUnavailable'
  | 'ConstraintViolation'
  | 'StoreBusy';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  // `cause` is only set when there is one
  constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = code;
    this.code = code;
  }
}

// The control endpoint did not answer; start the browser out-of-band and retry later
export class ConnectionUnavailableError extends PipelineError {
  constructor(endpoint: string, cause?: unknown) {
    super('ConnectionUnavailable', `Cannot attach to browser at ${endpoint}`, cause);
  }
}

export class NoPagesOpenError extends PipelineError {
  constructor(detail = 'Browser has no open pages') {
    super('NoPagesOpen', detail);
  }
}

export class ContentTooSmallError extends PipelineError {
  readonly contentLength: number;
  readonly minContentLength: number;

  constructor(contentLength: number, minContentLength: number) {
    super(
      'ContentTooSmall',
      `Page content is ${contentLength} characters, expected at least ${minContentLength}`,
    );
    this.contentLength = contentLength;
    this.minContentLength = minContentLength;
  }
}

export class MalformedDocumentError extends PipelineError {
  constructor(detail: string) {
    super('MalformedDocument', detail);
  }
}

export class StoreUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('StoreUnavailable', message, cause);
  }
}

export class ConstraintViolationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('ConstraintViolation', message, cause);
  }
}

export class StoreBusyError extends PipelineError {
  readonly holder: string;

  constructor(lockName: string, holder: string) {
    super('StoreBusy', `Store lock "${lockName}" is held by ${holder}`);
    this.holder = holder;
  }
}

export function isPipelineError(error: unknown, code?: PipelineErrorCode): error is PipelineError {
  return error instanceof PipelineError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
