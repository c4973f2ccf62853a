import chalk from 'chalk';
import { Command } from 'commander';
import { vi } from 'vitest';

export interface CommandRun {
  stdout: string[];
  stderr: string[];
  exitCode: typeof process.exitCode;
}

/**
 * Runs one registered command in process and captures what it prints.
 * `args` are user arguments, without the node and script entries.
 */
export async function runCommand(register: (program: Command) => void, args: string[]): Promise<CommandRun> {
  const program = new Command();
  program.exitOverride();
  register(program);

  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, 'log').mockImplementation((...values: unknown[]) => {
    stdout.push(values.map(String).join(' '));
  });
  const error = vi.spyOn(console, 'error').mockImplementation((...values: unknown[]) => {
    stderr.push(values.map(String).join(' '));
  });
  const previousLevel = chalk.level;
  const previousExitCode = process.exitCode;
  chalk.level = 0;
  process.exitCode = undefined;

  try {
    await program.parseAsync(args, { from: 'user' });
    return { stdout, stderr, exitCode: process.exitCode };
  } finally {
    process.exitCode = previousExitCode;
    chalk.level = previousLevel;
    log.mockRestore();
    error.mockRestore();
  }
}
