/**
 * Utility functions for safe error handling with proper TypeScript types
 */

export interface ErrorLike {
  message?: unknown;
  status?: unknown;
  statusCode?: unknown;
  code?: unknown;
  cause?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!isErrorLike(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Error name, including DOMException-style errors thrown by fetch aborts
 */
export function getErrorName(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Walk the `cause` chain and join the messages, e.g. "fetch failed: getaddrinfo ENOTFOUND host"
 */
export function describeErrorChain(error: unknown, maxDepth = 4): string {
  const parts: string[] = [];
  let current: unknown = error;

  for (let depth = 0; depth < maxDepth && current !== undefined && current !== null; depth++) {
    const message = getErrorMessage(current);
    if (message && !parts.includes(message)) {
      parts.push(message);
    }
    current = isErrorLike(current) ? current.cause : undefined;
  }

  return parts.join(': ');
}
