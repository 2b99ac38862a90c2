/**
 * @module @wasmrig/core
 * Data model, capability interfaces, errors and logging
 */

export type {
  TargetKind,
  Target,
  Package,
  Project,
  BuildType,
  Profile,
  MessageFormat,
  TargetSelector,
  BuildTarget,
  BuildConfiguration,
  BuildResult,
  BuildFlags,
  ProjectConfig,
  ProjectMetadataProvider,
  EmscriptenLocation,
  ProvisionRequest,
  ToolchainProvisioner,
  Toolchain,
  ArtifactPostProcessor,
  BrowserTestRequest,
  BrowserHarness,
} from './types.js';

export {
  type Triplet,
  type TripletKind,
  ASMJS_EMSCRIPTEN,
  WASM_EMSCRIPTEN,
  WASM_NATIVE,
  isEmscripten,
  isWasm,
  isNativeWasm,
} from './triplet.js';

export {
  type WasmrigErrorCode,
  type SerializedError,
  FAILURE_EXIT_CODE,
  WasmrigError,
  ConfigurationError,
  BuildError,
  FatalAbortError,
  InternalInvariantError,
  isWasmrigError,
  isKnownErrorCode,
} from './errors.js';

export {
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
  type LoggerConfig,
  type WritableLike,
  configureLogger,
  setLogLevel,
  getLogLevel,
  addSink,
  removeSink,
  resetLogging,
  formatRecord,
  createConsoleSink,
  createMemorySink,
  getLogger,
} from './logging.js';
