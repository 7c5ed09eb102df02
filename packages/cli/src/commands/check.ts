/**
 * Check command - loads a rule set and reports shadowed, unreachable and overlapping rules
 */

import { Command } from 'commander';
import {
  type IRuleSetAnalysis,
  analyzeRuleSet,
  createTable,
  header,
  label,
  loadConfig,
  loadConfiguredRuleSet,
  success,
  warn,
} from '@store-router/core';

import { type IRuleSetFlags, exitWithError, ruleSetSelection } from '../options.js';

export type ICheckOptions = IRuleSetFlags;

export function performCheck(projectDir: string, options: ICheckOptions): IRuleSetAnalysis {
  const config = loadConfig(projectDir);
  return analyzeRuleSet(loadConfiguredRuleSet(config, ruleSetSelection(projectDir, options)));
}

/**
 * Indices of rules that are never the first hit, shadowed or not
 */
export function deadRuleIndices(analysis: IRuleSetAnalysis): number[] {
  const indices = new Set([...analysis.shadowed.map((entry) => entry.shadowedIndex), ...analysis.unreachable]);
  return [...indices].sort((a, b) => a - b);
}

export function printAnalysis(analysis: IRuleSetAnalysis): void {
  header(`Rule set ${analysis.name} ${analysis.version}`);
  label('Rules', String(analysis.ruleCount));
  label('Domain', `${analysis.domainSize} criteria combinations`);
  label('Shadowed', String(analysis.shadowed.length));
  label('Unreachable', String(analysis.unreachable.length));
  label('Overlaps', String(analysis.overlaps.length));
  console.log();

  for (const entry of analysis.shadowed) {
    warn(
      `Rule ${entry.shadowedId} (#${entry.shadowedIndex}) is shadowed by ${entry.shadowedById} (#${entry.shadowedByIndex})`,
    );
  }
  for (const index of analysis.unreachable) {
    warn(`Rule ${analysis.coverage[index].id} (#${index}) is never the first hit`);
  }

  if (analysis.overlaps.length > 0) {
    const overlapTable = createTable({ head: ['Wins', 'Loses', 'Shared criteria'] });
    for (const overlap of analysis.overlaps) {
      overlapTable.push([
        `${overlap.firstId} (#${overlap.firstIndex})`,
        `${overlap.secondId} (#${overlap.secondIndex})`,
        String(overlap.sharedCombinations),
      ]);
    }
    console.log(overlapTable.toString());
  }

  const coverageTable = createTable({ head: ['#', 'Rule', 'First hits'] });
  for (const entry of analysis.coverage) {
    coverageTable.push([String(entry.index), entry.id, String(entry.firstHits)]);
  }
  console.log(coverageTable.toString());
}

/**
 * Register the check command with the program
 */
export function checkCommand(program: Command): void {
  program
    .command('check')
    .description('Load a rule set and lint it over the whole criteria domain')
    .option('--rules <file>', 'Rule set artifact to check instead of the configured one')
    .option('--rule-version <version>', 'Rule set version to resolve from the rules directories')
    .option('--strict', 'Treat shadowed and unreachable rules as errors')
    .action((options: ICheckOptions) => {
      let analysis: IRuleSetAnalysis;
      try {
        analysis = performCheck(process.cwd(), options);
      } catch (err: unknown) {
        exitWithError(err);
      }

      printAnalysis(analysis);

      const dead = deadRuleIndices(analysis);
      if (dead.length === 0) {
        success(`Rule set ${analysis.name} ${analysis.version} is valid`);
        return;
      }
      warn(`${dead.length} rule(s) can never be the first hit`);
      if (options.strict) {
        process.exit(1);
      }
    });
}
