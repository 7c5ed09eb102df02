import type { ICriteria } from '../types.js';

/**
 * Turns a natural-language storage request into Criteria.
 * Implementations may be non-deterministic; they throw ParseError when the
 * request cannot be classified.
 */
export interface ICriteriaExtractor {
  readonly name: string;
  extract(request: string): Promise<ICriteria>;
}
