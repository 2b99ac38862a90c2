/**
 * @module @wasmrig/cli
 * Command line interface
 */

export { type ProgramOptions, VERSION, runCli } from './program.js';

export {
  type Dispatcher,
  type RegisterOptions,
  NATIVE_WASM_BINDINGS_MESSAGE,
  createDefaultDispatcher,
  registerTestCommand,
  runTestCommand,
  toDispatchOptions,
} from './register.js';

export { mapErrorToExitCode, printError } from './errors.js';
