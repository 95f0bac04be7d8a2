import type { ResolutionError } from './errors.js';
import type { Pmid } from './identifier.js';

/**
 * Gilda's /annotate response. Elements are passed through as returned.
 */
export type AnnotationPayload = unknown[];

export interface ResolvedArticle {
  success: true;
  identifier: Pmid;
  abstract: string;
  /** null when annotation was skipped */
  annotations: AnnotationPayload | null;
}

export interface FailedResolution {
  success: false;
  identifier: Pmid;
  error: ResolutionError;
}

export type InvocationResult = ResolvedArticle | FailedResolution;

export interface ResolveOptions {
  /** Stop after extracting the abstract */
  abstractOnly?: boolean;
}
