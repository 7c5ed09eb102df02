/**
 * Default configuration values and closed vocabularies for store-router
 */

import type {
  AccessPattern,
  DataType,
  ExtractorKind,
  HarnessPhase,
  ILlmConfig,
  LlmProvider,
  MatchMode,
  SearchIntensity,
  StorageBackend,
  StorageIntent,
  Wildcard,
} from './types.js';

// Criteria vocabulary
export const VALID_STORAGE_INTENTS: StorageIntent[] = ['memory', 'database', 'vector', 'file'];
export const VALID_ACCESS_PATTERNS: AccessPattern[] = ['crud', 'query', 'search', 'filter'];
export const VALID_DATA_TYPES: DataType[] = ['structured', 'numeric', 'text', 'binary'];
export const VALID_SEARCH_INTENSITIES: SearchIntensity[] = ['none', 'low', 'high'];
export const VALID_ANALYTIC_INTENTS: boolean[] = [true, false];

/** Canonical backend order; every target list is emitted in this order */
export const VALID_STORAGE_BACKENDS: StorageBackend[] = [
  'memory',
  'relational_store',
  'analytical_store',
  'vector_store',
  'file_store',
];

export const WILDCARD: Wildcard = '*';

// Rule sets
export const DEFAULT_RULE_SET_NAME = 'storage-selection';
export const DEFAULT_RULE_SET_VERSION = '';
export const RULES_DIR_NAME = 'rules';
export const RULE_SET_FILE_EXTENSION = '.json';

// Validation harness
export const CORPORA_DIR_NAME = 'corpora';
export const DEFAULT_CORPUS_FILE = 'reference-50.json';
export const DEFAULT_THRESHOLD = 0.9;
export const DEFAULT_STRICT_SHADOWING = false;
export const DEFAULT_CONSISTENCY_RUNS = 3;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_MATCH_MODE: MatchMode = 'exact';
export const VALID_MATCH_MODES: MatchMode[] = ['exact', 'covers'];
export const VALID_PHASES: HarnessPhase[] = ['engine', 'extractor', 'e2e'];

// Extractors
export const DATA_DIR_NAME = 'data';
export const KEYWORD_LEXICON_FILE = 'keyword-lexicon.json';
export const DEFAULT_EXTRACTOR: ExtractorKind = 'keyword';
export const VALID_EXTRACTORS: ExtractorKind[] = ['keyword', 'llm'];
export const VALID_LLM_PROVIDERS: LlmProvider[] = ['anthropic', 'openai'];
export const DEFAULT_LLM: ILlmConfig = {
  provider: 'anthropic',
  model: 'claude-3-5-haiku-latest',
  baseUrl: '',
  maxTokens: 256,
  temperature: 0,
};
export const DEFAULT_LLM_BASE_URLS: Record<LlmProvider, string> = {
  anthropic: 'https://api.anthropic.com',
  openai: 'https://api.openai.com',
};
export const LLM_RETRY_DELAYS_MS = [1_000, 2_000, 4_000];

// Files and state
export const CONFIG_FILE_NAME = 'store-router.config.json';
export const GLOBAL_CONFIG_DIR = '.store-router';
export const STATE_DB_FILE_NAME = 'state.db';
export const DEFAULT_HISTORY_LIMIT = 10;
