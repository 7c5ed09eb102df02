import { z } from 'zod';

/**
 * Shape of a rule set artifact on disk. Vocabulary checks (field names, field
 * values, backend ids) happen after parsing so that each defect can be reported
 * with the index of the rule that carries it.
 */

export const ConditionCellSchema = z.union([z.string(), z.boolean()]);

export const RuleOutcomeSchema = z.object({
  storage_targets: z.array(z.string().min(1)),
  operation_hints: z.array(z.string()).default([]),
  rationale_template: z.string().default(''),
});

export const RuleDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  condition: z.record(z.string(), ConditionCellSchema).default({}),
  outcome: RuleOutcomeSchema,
});

export const RuleSetDefinitionSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  created_at: z.string().min(1),
  description: z.string().default(''),
  rules: z.array(RuleDefinitionSchema).min(1),
});

export type RuleDefinitionInput = z.input<typeof RuleDefinitionSchema>;
export type RuleDefinition = z.output<typeof RuleDefinitionSchema>;
export type RuleSetDefinitionInput = z.input<typeof RuleSetDefinitionSchema>;
export type RuleSetDefinition = z.output<typeof RuleSetDefinitionSchema>;

/**
 * Pinned validation corpus. Each phase reads the fields it needs:
 * engine-only needs `criteria`, extractor-only needs `request` and `criteria`,
 * end-to-end needs `request`.
 */
export const CorpusCaseSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  request: z.string().min(1).optional(),
  criteria: z.record(z.string(), z.unknown()).optional(),
  expected_storage_targets: z.array(z.string().min(1)).min(1),
  notes: z.string().optional(),
});

export const CorpusSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  cases: z.array(CorpusCaseSchema).min(1),
});

export type CorpusCaseDefinition = z.output<typeof CorpusCaseSchema>;
export type CorpusDefinition = z.output<typeof CorpusSchema>;

/**
 * One-line rendering of the first few zod issues, `path: message; ...`
 */
export function formatIssues(error: z.ZodError, limit = 3): string {
  const lines = error.issues.slice(0, limit).map((issue) => {
    const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${at}: ${issue.message}`;
  });
  if (error.issues.length > limit) {
    lines.push(`... ${error.issues.length - limit} more`);
  }
  return lines.join('; ');
}
