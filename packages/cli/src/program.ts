/**
 * @module @wasmrig/cli/program
 */

import { Command, CommanderError } from 'commander';
import type { OutputConfiguration } from 'commander';
import { registerTestCommand } from './register.js';
import type { DispatchOptions } from '@wasmrig/test-runner';
import type { Dispatcher } from './register.js';

export const VERSION = '0.4.0';

export interface ProgramOptions {
  createDispatcher?: (options: DispatchOptions) => Dispatcher;
  output?: OutputConfiguration;
}

/**
 * Parse `argv` (user arguments only) and resolve to the process exit code.
 * Usage errors resolve to commander's own exit code.
 */
export async function runCli(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name('wasmrig')
    .description('Build and test Cargo crates for asm.js and WebAssembly')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride();

  if (options.output) {
    program.configureOutput(options.output);
  }

  registerTestCommand(program, {
    createDispatcher: options.createDispatcher,
    setExitCode: (code) => {
      exitCode = code;
    },
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
