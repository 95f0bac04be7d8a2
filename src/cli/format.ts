import type { ResolvedArticle } from '../core/types.js';

export interface FormatOptions {
  abstract?: boolean;
  compact?: boolean;
}

/**
 * Render a resolved article the way the command prints or saves it
 */
export function formatResult(result: ResolvedArticle, options: FormatOptions = {}): string {
  if (options.abstract || result.annotations === null) {
    return result.abstract;
  }

  return options.compact
    ? JSON.stringify(result.annotations)
    : JSON.stringify(result.annotations, null, 2);
}

export function outputFileName(result: ResolvedArticle, options: FormatOptions = {}): string {
  const extension = options.abstract || result.annotations === null ? 'txt' : 'json';
  return `${result.identifier.value}.${extension}`;
}
