import type { Pmid } from '../core/identifier.js';
import type { InvocationResult, ResolveOptions } from '../core/types.js';

export abstract class Resolver {
  /**
   * Map an identifier to its result. Expected failures (not found, service
   * down) come back as `{ success: false }`; the promise rejects only on
   * faults the resolver did not anticipate.
   */
  abstract resolve(identifier: Pmid, options?: ResolveOptions): Promise<InvocationResult>;
  abstract getName(): string;
}
