/**
 * Type definitions for the store-router decision table and validation harness
 */

/**
 * Where the request wants the data to live long-term
 */
export type StorageIntent = 'memory' | 'database' | 'vector' | 'file';

/**
 * How the data will be accessed once stored
 */
export type AccessPattern = 'crud' | 'query' | 'search' | 'filter';

/**
 * Shape of the data being stored
 */
export type DataType = 'structured' | 'numeric' | 'text' | 'binary';

/**
 * How often the stored content will be searched
 */
export type SearchIntensity = 'none' | 'low' | 'high';

/**
 * Closed set of backends a decision can route to
 */
export type StorageBackend =
  | 'memory'
  | 'relational_store'
  | 'analytical_store'
  | 'vector_store'
  | 'file_store';

/**
 * Classification of one storage request. Field names are the artifact vocabulary
 * shared with rule set authors, so they stay snake_case.
 */
export interface ICriteria {
  storage_intent: StorageIntent;
  access_pattern: AccessPattern;
  analytic_intent: boolean;
  data_type: DataType;
  search_intensity: SearchIntensity;
}

export type CriteriaField = keyof ICriteria;

/**
 * Criteria as received from an untyped source (JSON, CLI flags, an extractor reply).
 * Validated into ICriteria before any rule is evaluated.
 */
export type CriteriaInput = ICriteria | Readonly<Record<string, unknown>>;

/** Wildcard cell in a rule condition: matches any value of the field */
export type Wildcard = '*';

/**
 * Normalized rule condition: every field present, either a literal or the wildcard
 */
export type RuleCondition = {
  readonly [F in CriteriaField]: ICriteria[F] | Wildcard;
};

export interface IRuleOutcome {
  /** Canonical order, no duplicates, never empty */
  readonly storageTargets: readonly StorageBackend[];
  readonly operationHints: readonly string[];
  readonly rationaleTemplate: string;
}

export interface IRule {
  readonly id: string;
  /** Position in the rule list; lower is evaluated first */
  readonly priority: number;
  readonly condition: RuleCondition;
  readonly outcome: IRuleOutcome;
}

export interface IShadowedRule {
  shadowedIndex: number;
  shadowedId: string;
  shadowedByIndex: number;
  shadowedById: string;
}

/**
 * Immutable, versioned snapshot of a decision table
 */
export interface IRuleSet {
  readonly name: string;
  readonly version: string;
  readonly createdAt: string;
  readonly description: string;
  readonly rules: readonly IRule[];
  /** Rules subsumed by an earlier rule (non-fatal unless loaded in strict mode) */
  readonly shadowed: readonly IShadowedRule[];
}

export interface IDecisionResult {
  storageTargets: readonly StorageBackend[];
  operationHints: readonly string[];
  rationale: string;
  matchedRulePriority: number;
  matchedRuleId: string;
  ruleSetVersion: string;
}

/**
 * Union of every matching rule. Exploration only: there is no single rule to cite.
 */
export interface ICollectAllResult {
  storageTargets: readonly StorageBackend[];
  operationHints: readonly string[];
  matchedRulePriorities: readonly number[];
  ruleSetVersion: string;
}

/**
 * Predicted-vs-expected target comparison used by the harness.
 * exact: sets are equal. covers: every expected target is predicted.
 */
export type MatchMode = 'exact' | 'covers';

export type ExtractorKind = 'keyword' | 'llm';

export type LlmProvider = 'anthropic' | 'openai';

export type HarnessPhase = 'engine' | 'extractor' | 'e2e';

export interface ILlmConfig {
  provider: LlmProvider;
  model: string;
  /** Empty means the provider's public endpoint */
  baseUrl: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Store-router configuration, merged from defaults, the project config file and SR_* env vars
 */
export interface IStoreRouterConfig {
  /** Directory holding `<name>.<version>.json` rule set artifacts */
  rulesDir: string;
  /** Searched before rulesDir when set */
  overrideRulesDir: string;
  ruleSetName: string;
  /** Empty selects the highest available version */
  ruleSetVersion: string;
  corpusPath: string;
  /** Minimum aggregate accuracy (0..1) for the regression gate */
  threshold: number;
  /** Promote shadowed-rule warnings to load-time errors */
  strictShadowing: boolean;
  consistencyRuns: number;
  concurrency: number;
  matchMode: MatchMode;
  extractor: ExtractorKind;
  llm: ILlmConfig;
}
