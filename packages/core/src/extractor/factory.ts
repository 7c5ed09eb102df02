/**
 * Extractor factory: returns the adapter selected by config.
 */

import type { ExtractorKind, IStoreRouterConfig } from '../types.js';
import { KeywordExtractor } from './keyword-extractor.js';
import { type ILlmExtractorOptions, LlmExtractor } from './llm-extractor.js';
import { resolveLlmConfig } from './provider.js';
import type { ICriteriaExtractor } from './types.js';

export function createExtractor(
  config: Pick<IStoreRouterConfig, 'extractor' | 'llm'>,
  kind: ExtractorKind = config.extractor,
  options: ILlmExtractorOptions = {},
): ICriteriaExtractor {
  switch (kind) {
    case 'keyword':
      return new KeywordExtractor();
    case 'llm':
      return new LlmExtractor(resolveLlmConfig(config.llm), options);
  }
}
