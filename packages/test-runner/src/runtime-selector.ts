/**
 * @module @wasmrig/test-runner/runtime-selector
 * Select where test artifacts are executed
 */

import { ConfigurationError, isNativeWasm } from '@wasmrig/core';
import type { Triplet } from '@wasmrig/core';

export type TestRuntime = 'script' | 'browser';

/**
 * Select the runtime for a whole invocation.
 * @throws ConfigurationError for native wasm outside the script runtime
 */
export function selectTestRuntime(triplet: Triplet, nodejs: boolean): TestRuntime {
  if (nodejs) {
    return 'script';
  }
  if (isNativeWasm(triplet)) {
    throw new ConfigurationError(
      'running tests for the native wasm target is currently only supported with `--nodejs`'
    );
  }
  return 'browser';
}
