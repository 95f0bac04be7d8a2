import crypto from 'crypto';
import { ResolutionError } from '../core/errors.js';
import type { Pmid } from '../core/identifier.js';
import type { AnnotationPayload, InvocationResult, ResolveOptions } from '../core/types.js';
import { Resolver } from './base.js';

export interface MockRecord {
  abstract: string;
  annotations: AnnotationPayload;
}

export interface MockResolverOptions {
  records?: Record<string, MockRecord>;
  /** What to do for identifiers without a record */
  unknown?: 'generate' | 'not_found';
}

function buildDeterministicRecord(pmid: string): MockRecord {
  const digest = crypto.createHash('sha256').update(pmid).digest('hex').slice(0, 12);
  const abstract = `Synthetic abstract ${digest} for PMID ${pmid}.`;
  return {
    abstract,
    annotations: [
      {
        text: 'PMID',
        start: abstract.indexOf('PMID'),
        end: abstract.indexOf('PMID') + 4,
        matches: []
      }
    ]
  };
}

/**
 * In-process resolver for tests and offline runs.
 * Produces the same result for the same identifier without any network access.
 */
export class MockResolver extends Resolver {
  readonly resolved: string[] = [];
  private readonly records: Record<string, MockRecord>;
  private readonly unknown: 'generate' | 'not_found';

  constructor(options: MockResolverOptions = {}) {
    super();
    this.records = options.records ?? {};
    this.unknown = options.unknown ?? 'generate';
  }

  async resolve(identifier: Pmid, options: ResolveOptions = {}): Promise<InvocationResult> {
    this.resolved.push(identifier.value);

    const record = this.records[identifier.value]
      ?? (this.unknown === 'generate' ? buildDeterministicRecord(identifier.value) : undefined);

    if (!record) {
      return {
        success: false,
        identifier,
        error: new ResolutionError('not_found', `PMID ${identifier.value} was not found in PubMed`, { service: 'mock' })
      };
    }

    return {
      success: true,
      identifier,
      abstract: record.abstract,
      annotations: options.abstractOnly ? null : record.annotations
    };
  }

  getName(): string {
    return 'mock';
  }
}
