/**
 * @module @wasmrig/core/types
 *
 * Data model shared by the build and test layers.
 * Everything here is value-like and owned by the invocation that created it.
 */

import type { Triplet } from './triplet.js';

// ============================================================================
// Project metadata (read-only, supplied by a ProjectMetadataProvider)
// ============================================================================

export type TargetKind = 'lib' | 'bin' | 'example' | 'bench' | 'test';

export interface Target {
  kind: TargetKind;
  name: string;
  /** Path to the crate root, when the metadata provider knows it */
  srcPath?: string;
}

export interface Package {
  name: string;
  /** Absolute path of the package manifest (Cargo.toml) */
  manifestPath: string;
  targets: readonly Target[];
}

export interface Project {
  packages: readonly Package[];
  /** Name of the package used when none is requested explicitly */
  defaultPackage: string;
}

// ============================================================================
// Build model
// ============================================================================

export type BuildType = 'debug' | 'release';

/**
 * `main` links a production artifact, `test` links the test harness
 * and needs process-exit semantics.
 */
export type Profile = 'main' | 'test';

export type MessageFormat = 'human' | 'json';

/**
 * Explicit target selection. At most one may be requested per invocation.
 */
export type TargetSelector =
  | { kind: 'lib' }
  | { kind: 'bin'; name: string }
  | { kind: 'example'; name: string }
  | { kind: 'bench'; name: string };

export interface BuildTarget {
  kind: TargetKind;
  name: string;
  profile: Profile;
}

/**
 * One canonical configuration per (target, profile) pair.
 * Frozen on construction and consumed exactly once by the executor.
 */
export interface BuildConfiguration {
  readonly triplet: Triplet;
  readonly buildType: BuildType;
  readonly packageName: string;
  readonly buildTarget: BuildTarget;
  readonly features: readonly string[];
  readonly noDefaultFeatures: boolean;
  readonly allFeatures: boolean;
  readonly extraPaths: readonly string[];
  /** `-C <flag>` pairs handed to the compiler */
  readonly extraCompilerFlags: readonly string[];
  readonly extraEnvironment: readonly (readonly [string, string])[];
  readonly messageFormat: MessageFormat;
  readonly verbose: boolean;
}

export interface BuildResult {
  artifacts: string[];
  success: boolean;
}

/**
 * Normalized command flags shared by every command that builds.
 */
export interface BuildFlags {
  packageName?: string;
  selector?: TargetSelector;
  targetWebasm: boolean;
  targetWebasmEmscripten: boolean;
  features: string[];
  noDefaultFeatures: boolean;
  allFeatures: boolean;
  release: boolean;
  useSystemEmscripten: boolean;
  messageFormat: MessageFormat;
  verbose: boolean;
}

/**
 * Project-declared configuration (wasmrig.json).
 */
export interface ProjectConfig {
  linkArgs?: string[];
}

// ============================================================================
// Capability interfaces
// ============================================================================

export interface ProjectMetadataProvider {
  load(cwd: string): Promise<Project>;
}

export interface EmscriptenLocation {
  emscriptenPath: string;
  emscriptenLlvmPath: string;
  binaryenPath?: string;
}

export interface ProvisionRequest {
  preferSystem: boolean;
  targetingWasm: boolean;
}

/**
 * Locates (or installs) the Emscripten toolchain.
 * Returns undefined when no toolchain could be found; the build then relies
 * on whatever is already on PATH.
 */
export interface ToolchainProvisioner {
  initialize(request: ProvisionRequest): Promise<EmscriptenLocation | undefined>;
}

/**
 * Underlying compiler toolchain. Reports its own diagnostics to the user.
 */
export interface Toolchain {
  build(config: BuildConfiguration): Promise<BuildResult>;
}

/**
 * Post-link processing of a produced binary.
 * Returns the paths of any files derived from it.
 */
export interface ArtifactPostProcessor {
  process(config: BuildConfiguration, artifactPath: string): Promise<string[]>;
}

export interface BrowserTestRequest {
  configuration: BuildConfiguration;
  build: BuildResult;
  passthrough: readonly string[];
}

/**
 * Loads build artifacts into a headless browser and reports pass/fail.
 */
export interface BrowserHarness {
  /** `false` when no browser can be driven; such a run is refused before building */
  readonly available?: boolean;
  run(request: BrowserTestRequest): Promise<boolean>;
}
