/**
 * Shared helpers for running commands in-process
 */

import { Command } from 'commander';
import { vi } from 'vitest';

export class ExitError extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

export interface ICapturedConsole {
  /** Every console.log call, split into lines */
  lines(): string[];
}

export function captureConsole(): ICapturedConsole {
  const calls: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    calls.push(args.map(String).join(' '));
  });
  return { lines: () => calls.join('\n').split('\n') };
}

/**
 * process.exit throws ExitError instead of ending the test run
 */
export function mockExit(): void {
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null): never => {
    throw new ExitError(code);
  });
}

export async function runCommand(register: (program: Command) => void, args: string[]): Promise<void> {
  const program = new Command().exitOverride();
  register(program);
  await program.parseAsync(args, { from: 'user' });
}
