import { isCriteriaField } from '../criteria/criteria.js';
import type { ICriteria, IRule } from '../types.js';

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/**
 * Fill `{field}`, `{rule_id}` and `{priority}` placeholders. Unknown placeholders stay as written.
 */
export function renderRationale(template: string, criteria: ICriteria, rule: IRule): string {
  return template.replace(PLACEHOLDER, (whole: string, name: string) => {
    if (name === 'rule_id') return rule.id;
    if (name === 'priority') return String(rule.priority);
    if (isCriteriaField(name)) return String(criteria[name]);
    return whole;
  });
}
