/**
 * Error taxonomy for the decision table and its collaborators.
 *
 * SchemaError and RuleSetIntegrityError are defects (bad input, bad artifact);
 * ParseError means the extractor could not classify a request and the caller
 * may ask for clarification. ShadowedRuleWarning is reported at load time and
 * only thrown when strict loading promotes it.
 */

import type { IShadowedRule } from './types.js';

export type StoreRouterErrorCode =
  | 'SCHEMA_ERROR'
  | 'RULE_SET_INTEGRITY'
  | 'PARSE_ERROR'
  | 'SHADOWED_RULE';

export abstract class StoreRouterError extends Error {
  abstract readonly code: StoreRouterErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SchemaErrorReason =
  | 'not_an_object'
  | 'missing'
  | 'invalid_value'
  | 'unknown_field'
  /** A validation case lacks the request or criteria its phase reads */
  | 'missing_case_input';

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

/**
 * Criteria carries a missing, undeclared or unknown field value, or a
 * validation case lacks the input its phase reads
 */
export class SchemaError extends StoreRouterError {
  readonly code = 'SCHEMA_ERROR' as const;

  constructor(
    readonly field: string,
    readonly value: unknown,
    readonly reason: SchemaErrorReason,
  ) {
    super(SchemaError.buildMessage(field, value, reason));
  }

  private static buildMessage(field: string, value: unknown, reason: SchemaErrorReason): string {
    switch (reason) {
      case 'not_an_object':
        return `Criteria must be an object, got ${describeValue(value)}`;
      case 'missing':
        return `Criteria field "${field}" is missing`;
      case 'unknown_field':
        return `Criteria field "${field}" is not a declared field`;
      case 'invalid_value':
        return `Criteria field "${field}" has undeclared value ${describeValue(value)}`;
      case 'missing_case_input':
        return `Validation case has no ${field}`;
    }
  }
}

export type RuleSetIntegrityReason =
  | 'INVALID_ARTIFACT'
  | 'NOT_FOUND'
  | 'UNKNOWN_FIELD'
  | 'INVALID_VALUE'
  | 'INVALID_TARGET'
  | 'EMPTY_TARGETS'
  | 'DUPLICATE_RULE_ID'
  | 'MISSING_DEFAULT'
  | 'MULTIPLE_DEFAULTS'
  | 'DEFAULT_NOT_LAST'
  | 'SHADOWED_RULE'
  | 'NOT_LOADED'
  | 'NO_MATCH';

/**
 * The rule set artifact is defective, or evaluation fell through every rule
 */
export class RuleSetIntegrityError extends StoreRouterError {
  readonly code = 'RULE_SET_INTEGRITY' as const;
  readonly reason: RuleSetIntegrityReason;
  /** Offending rule position, when the defect belongs to one rule */
  readonly ruleIndex: number | undefined;
  /** Shadowing found before the defect was raised */
  readonly shadowed: readonly IShadowedRule[];

  constructor(
    reason: RuleSetIntegrityReason,
    message: string,
    details: { ruleIndex?: number; shadowed?: readonly IShadowedRule[]; cause?: unknown } = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.reason = reason;
    this.ruleIndex = details.ruleIndex;
    this.shadowed = details.shadowed ?? [];
  }
}

/**
 * The extractor could not confidently classify a request
 */
export class ParseError extends StoreRouterError {
  readonly code = 'PARSE_ERROR' as const;

  constructor(
    readonly request: string,
    message: string,
    details: { rawOutput?: string; cause?: unknown } = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.rawOutput = details.rawOutput;
  }

  readonly rawOutput: string | undefined;
}

/**
 * A rule that can never be the first hit because an earlier rule subsumes it
 */
export class ShadowedRuleWarning extends StoreRouterError {
  readonly code = 'SHADOWED_RULE' as const;

  constructor(readonly detail: IShadowedRule) {
    super(
      `Rule ${detail.shadowedIndex} (${detail.shadowedId}) is shadowed by rule ` +
        `${detail.shadowedByIndex} (${detail.shadowedById}) and can never match first`,
    );
  }
}

/**
 * Schema and integrity errors are harness hard failures, distinct from accuracy misses
 */
export function isHardFailure(err: unknown): err is SchemaError | RuleSetIntegrityError {
  return err instanceof SchemaError || err instanceof RuleSetIntegrityError;
}
