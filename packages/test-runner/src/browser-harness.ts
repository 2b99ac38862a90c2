/**
 * @module @wasmrig/test-runner/browser-harness
 */

import { ConfigurationError } from '@wasmrig/core';
import type { BrowserHarness } from '@wasmrig/core';

export const BROWSER_UNAVAILABLE_MESSAGE = 'no headless browser harness is available; run the tests with `--nodejs`';

/**
 * Harness used when no headless browser driver is installed.
 * Every run is refused with a hint to use the script runtime instead.
 */
export const unavailableBrowserHarness: BrowserHarness = {
  available: false,
  async run() {
    throw new ConfigurationError(BROWSER_UNAVAILABLE_MESSAGE);
  },
};
