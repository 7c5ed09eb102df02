/**
 * Builds the store-router commander program
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { Command } from 'commander';

import { checkCommand } from './commands/check.js';
import { classifyCommand } from './commands/classify.js';
import { evaluateCommand } from './commands/evaluate.js';
import { historyCommand } from './commands/history.js';
import { validateCommand } from './commands/validate.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/program.ts and dist/program.js both sit one level below package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
);

export function createProgram(): Command {
  const program = new Command();

  program
    .name('store-router')
    .description('Route storage requests through a versioned decision table and gate it on a pinned corpus')
    .version(packageJson.version);

  validateCommand(program);
  checkCommand(program);
  evaluateCommand(program);
  classifyCommand(program);
  historyCommand(program);

  return program;
}
