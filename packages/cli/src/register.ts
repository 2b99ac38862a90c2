/**
 * @module @wasmrig/cli/register
 * Registration of the `test` command
 */

import type { Command } from 'commander';
import { ConfigurationError, getLogger, setLogLevel } from '@wasmrig/core';
import {
  BuildExecutor,
  CargoMetadataProvider,
  CargoToolchain,
  ConfigurationBuilder,
  EmscriptenProvisioner,
  parseBuildFlags,
} from '@wasmrig/build';
import { TestDispatcher } from '@wasmrig/test-runner';
import type { DispatchOptions } from '@wasmrig/test-runner';
import { mapErrorToExitCode, printError } from './errors.js';

export type Dispatcher = Pick<TestDispatcher, 'dispatch'>;

export interface RegisterOptions {
  /** Creates the dispatcher once options are parsed */
  createDispatcher?: (options: DispatchOptions) => Dispatcher;
  /** Receives the exit code of the command */
  setExitCode: (code: number) => void;
}

export const NATIVE_WASM_BINDINGS_MESSAGE =
  'running native wasm tests needs a post-processor that generates JavaScript bindings, and none is installed; use `--no-run` to only build';

/**
 * Dispatcher wired to cargo and the prebuilt Emscripten toolchain.
 * No post-processor is installed, so native wasm artifacts can be built but not run.
 *
 * @throws ConfigurationError for a native wasm test run
 */
export function createDefaultDispatcher(options: DispatchOptions): TestDispatcher {
  if (options.flags.targetWebasm && options.nodejs && !options.noRun) {
    throw new ConfigurationError(NATIVE_WASM_BINDINGS_MESSAGE);
  }

  return new TestDispatcher({
    metadata: new CargoMetadataProvider(),
    builder: new ConfigurationBuilder({ provisioner: new EmscriptenProvisioner() }),
    executor: new BuildExecutor({ toolchain: new CargoToolchain() }),
  });
}

/**
 * Convert parsed command options into dispatch options.
 * Negated flags (`--no-default-features`, `--no-run`) arrive as
 * `defaultFeatures: false` and `run: false`.
 */
export function toDispatchOptions(opts: Record<string, unknown>, passthrough: readonly string[]): DispatchOptions {
  const { defaultFeatures, run, nodejs, ...flags } = opts;
  return {
    flags: parseBuildFlags({ ...flags, noDefaultFeatures: defaultFeatures === false }),
    nodejs: nodejs === true,
    noRun: run === false,
    passthrough: [...passthrough],
  };
}

/**
 * Run the command and resolve to its exit code.
 * Errors without an exit code mapping are rethrown.
 */
export async function runTestCommand(
  createDispatcher: (options: DispatchOptions) => Dispatcher,
  opts: Record<string, unknown>,
  passthrough: readonly string[]
): Promise<number> {
  try {
    const dispatchOptions = toDispatchOptions(opts, passthrough);
    const report = await createDispatcher(dispatchOptions).dispatch(dispatchOptions);
    return report.exitCode;
  } catch (error) {
    const exitCode = mapErrorToExitCode(error);
    if (exitCode === undefined) {
      throw error;
    }
    printError(error, getLogger('cli:test'));
    return exitCode;
  }
}

export function registerTestCommand(program: Command, options: RegisterOptions): Command {
  const createDispatcher = options.createDispatcher ?? createDefaultDispatcher;

  return program
    .command('test')
    .description('Compile and run tests')
    .argument('[passthrough...]', 'arguments passed to the test binaries (after `--`)')
    .option('-p, --package <name>', 'package to build')
    .option('--lib', 'test only this package\'s library')
    .option('--bin <name>', 'test only the specified binary')
    .option('--example <name>', 'test only the specified example')
    .option('--bench <name>', 'test only the specified benchmark')
    .option('--target-asmjs-emscripten', 'generate asm.js through Emscripten (default)')
    .option('--target-webasm-emscripten', 'generate webassembly through Emscripten')
    .option('--target-webasm', 'generate webassembly using the native backend')
    .option('--features <features>', 'space-separated list of features to also build')
    .option('--no-default-features', 'do not build the `default` feature')
    .option('--all-features', 'build all available features')
    .option('--release', 'build artifacts in release mode, with optimizations')
    .option('--use-system-emscripten', 'use the system installation of Emscripten')
    .option('--message-format <format>', 'error format: human or json')
    .option('-v, --verbose', 'use verbose output')
    .option('--nodejs', 'use Node.js to run the tests instead of a headless browser')
    .option('--no-run', 'compile, but do not run the tests')
    .action(async (passthrough: string[] | undefined, opts: Record<string, unknown>) => {
      if (opts.verbose === true) {
        setLogLevel('debug');
      }
      options.setExitCode(await runTestCommand(createDispatcher, opts, passthrough ?? []));
    });
}
