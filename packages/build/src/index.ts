/**
 * @module @wasmrig/build
 *
 * Target resolution, build configuration and toolchain execution.
 *
 * @example
 * ```typescript
 * import { ConfigurationBuilder, BuildExecutor, CargoToolchain, EmscriptenProvisioner } from '@wasmrig/build';
 *
 * const builder = new ConfigurationBuilder({ provisioner: new EmscriptenProvisioner() });
 * const executor = new BuildExecutor({ toolchain: new CargoToolchain() });
 * const result = await executor.run(await builder.build({ flags, pkg, target, profile: 'main', projectConfig }));
 * ```
 */

// Target resolution
export {
  type TargetFilter,
  selectPackage,
  selectTargets,
  resolveSelector,
  testableTarget,
} from './target-resolver.js';

// Flags
export {
  type RawBuildFlags,
  rawBuildFlagsSchema,
  parseBuildFlags,
  splitFeatures,
} from './flags.js';

// Configuration
export {
  type Environment,
  type ToolchainAugmentation,
  type AugmentOptions,
  type ConfigurationBuilderOptions,
  type ConfigurationRequest,
  ConfigurationBuilder,
  resolveTriplet,
  requestedBuildType,
  resolveBuildType,
  augmentForToolchain,
  applyUserLinkArgs,
} from './config-builder.js';

export {
  PROJECT_CONFIG_FILE,
  projectConfigSchema,
  parseProjectConfig,
  loadProjectConfig,
} from './project-config.js';

// Execution
export {
  type BuildExecutorOptions,
  BuildExecutor,
  noopPostProcessor,
  isBinaryArtifact,
} from './executor.js';

// Cargo
export {
  type CargoToolchainOptions,
  type CargoMessage,
  CargoToolchain,
  cargoBuildArgs,
  cargoEnvironment,
  parseArtifacts,
} from './cargo/toolchain.js';

export {
  type CargoMetadata,
  type CargoMetadataProviderOptions,
  CargoMetadataProvider,
  cargoMetadataSchema,
  toProject,
} from './cargo/metadata.js';

// Emscripten
export {
  type EmscriptenProvisionerOptions,
  EmscriptenProvisioner,
  defaultToolchainRoot,
} from './emscripten.js';

// Utils
export { type CommandProbe, commandExists, findFirstCommand } from './utils.js';
