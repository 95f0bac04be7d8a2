/**
 * Error taxonomy for the command front-end.
 *
 * UsageError and ResolutionError are expected outcomes and map to their own
 * exit codes; anything else reaching the front-end is reported as unexpected.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ResolutionErrorKind =
  | 'not_found'
  | 'no_abstract'
  | 'http'
  | 'timeout'
  | 'unavailable'
  | 'invalid_response';

export interface ResolutionErrorOptions {
  service?: string;
  cause?: unknown;
}

export class ResolutionError extends Error {
  readonly kind: ResolutionErrorKind;
  readonly service?: string;

  constructor(kind: ResolutionErrorKind, message: string, options: ResolutionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResolutionError';
    this.kind = kind;
    this.service = options.service;
  }
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}
