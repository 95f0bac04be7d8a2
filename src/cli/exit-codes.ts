import { isResolutionError, isUsageError } from '../core/errors.js';
import { describeErrorChain, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

export enum ExitCode {
  Success = 0,
  Unexpected = 1,
  Usage = 2,
  Resolution = 3,
}

export interface ExitOutcome {
  code: ExitCode;
  diagnostic: string;
}

/**
 * Convert any failure reaching the front-end into a diagnostic line and exit code
 */
export function toExitOutcome(error: unknown): ExitOutcome {
  if (isUsageError(error)) {
    return { code: ExitCode.Usage, diagnostic: `error: ${error.message}` };
  }

  if (isResolutionError(error)) {
    if (error.cause !== undefined) {
      log.debug('Resolution failed', { kind: error.kind, service: error.service, cause: describeErrorChain(error.cause) });
    }
    return { code: ExitCode.Resolution, diagnostic: `error: ${error.message}` };
  }

  log.debug('Unexpected failure', {
    errorName: error instanceof Error ? error.name : typeof error,
    errorStack: error instanceof Error ? error.stack : undefined
  });
  return { code: ExitCode.Unexpected, diagnostic: `error: unexpected failure: ${getErrorMessage(error)}` };
}
