/**
 * @module @wasmrig/test-runner
 *
 * Builds the testable targets of a package and runs them in a script
 * runtime or a headless browser harness.
 *
 * @example
 * ```typescript
 * import { TestDispatcher } from '@wasmrig/test-runner';
 *
 * const dispatcher = new TestDispatcher({ metadata, builder, executor });
 * const report = await dispatcher.dispatch({ flags, nodejs: true, noRun: false, passthrough: [] });
 * process.exitCode = report.exitCode;
 * ```
 */

export {
  type DispatchPhase,
  type DispatchOptions,
  type DispatchReport,
  type TargetOutcome,
  type ProjectConfigLoader,
  type TestDispatcherOptions,
  TestDispatcher,
} from './dispatcher.js';

export { type TestRuntime, selectTestRuntime } from './runtime-selector.js';

export {
  type ProcessRunner,
  type ProcessRunOptions,
  ExecaProcessRunner,
  scriptRuntimeCandidates,
  locateScriptRuntime,
  primaryScriptArtifact,
  scriptWorkingDirectory,
} from './script-runtime.js';

export { BROWSER_UNAVAILABLE_MESSAGE, unavailableBrowserHarness } from './browser-harness.js';

export { type WorkingDirectory, processWorkingDirectory, withWorkingDirectory } from './working-directory.js';
