/**
 * @module @wasmrig/core/errors
 *
 * Error taxonomy for the build and test layers.
 *
 * - ConfigurationError: user-correctable (unknown package, bad flags, missing tool)
 * - BuildError: opaque, the toolchain already printed the details
 * - FatalAbortError: unsafe to continue, terminates with a fixed status
 * - InternalInvariantError: contract breach between layers, not handled
 */

export type WasmrigErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'BUILD_ERROR'
  | 'FATAL_ABORT'
  | 'INTERNAL_INVARIANT';

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<WasmrigErrorCode>([
  'CONFIGURATION_ERROR',
  'BUILD_ERROR',
  'FATAL_ABORT',
  'INTERNAL_INVARIANT',
]);

/**
 * Exit status used for test failures and unrecoverable errors.
 */
export const FAILURE_EXIT_CODE = 101;

export function isKnownErrorCode(code: unknown): code is WasmrigErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * Serialized form of a WasmrigError, as produced by `JSON.stringify`.
 */
export interface SerializedError {
  message: string;
  code: WasmrigErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

export class WasmrigError extends Error {
  readonly code: WasmrigErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: WasmrigErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'WasmrigError';
    this.code = code;
    this.details = details;
  }

  toJSON(): SerializedError {
    return {
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

export function isWasmrigError(error: unknown): error is WasmrigError {
  return error instanceof WasmrigError;
}

export class ConfigurationError extends WasmrigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The toolchain has already reported what went wrong; this carries no detail.
 */
export class BuildError extends WasmrigError {
  constructor() {
    super('build failed', 'BUILD_ERROR');
    this.name = 'BuildError';
  }
}

export class FatalAbortError extends WasmrigError {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = FAILURE_EXIT_CODE) {
    super(message, 'FATAL_ABORT', { exitCode });
    this.name = 'FatalAbortError';
    this.exitCode = exitCode;
  }
}

export class InternalInvariantError extends WasmrigError {
  constructor(message: string) {
    super(`internal error: ${message}`, 'INTERNAL_INVARIANT');
    this.name = 'InternalInvariantError';
  }
}
