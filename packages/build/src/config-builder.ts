/**
 * @module @wasmrig/build/config-builder
 *
 * Turns normalized flags into one frozen BuildConfiguration per
 * (target, profile) pair, including the toolchain-specific environment
 * and compiler flags each triplet needs.
 */

import {
  ASMJS_EMSCRIPTEN,
  FatalAbortError,
  WASM_EMSCRIPTEN,
  WASM_NATIVE,
  getLogger,
  isEmscripten,
  isNativeWasm,
  isWasm,
} from '@wasmrig/core';
import type {
  BuildConfiguration,
  BuildFlags,
  BuildType,
  Logger,
  Package,
  Profile,
  ProjectConfig,
  Target,
  ToolchainProvisioner,
  Triplet,
} from '@wasmrig/core';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ToolchainAugmentation {
  extraPaths: string[];
  extraCompilerFlags: string[];
  extraEnvironment: [string, string][];
}

export function resolveTriplet(flags: Pick<BuildFlags, 'targetWebasm' | 'targetWebasmEmscripten'>): Triplet {
  if (flags.targetWebasm) {
    return WASM_NATIVE;
  }
  if (flags.targetWebasmEmscripten) {
    return WASM_EMSCRIPTEN;
  }
  return ASMJS_EMSCRIPTEN;
}

export function requestedBuildType(flags: Pick<BuildFlags, 'release'>): BuildType {
  return flags.release ? 'release' : 'debug';
}

/**
 * Debug builds are broken on the native wasm target, so they are
 * forced to release. Release is never changed.
 */
export function resolveBuildType(
  requested: BuildType,
  triplet: Triplet,
  logger: Logger = getLogger('build:config')
): BuildType {
  if (isNativeWasm(triplet) && requested === 'debug') {
    logger.warn(`debug builds on the ${triplet.name} target are currently totally broken\nforcing a release build`);
    return 'release';
  }
  return requested;
}

export interface AugmentOptions {
  triplet: Triplet;
  profile: Profile;
  requestedBuildType: BuildType;
  useSystemEmscripten: boolean;
  provisioner: ToolchainProvisioner;
  env: Environment;
}

export async function augmentForToolchain(options: AugmentOptions): Promise<ToolchainAugmentation> {
  const { triplet, profile, requestedBuildType, env } = options;
  const augmentation: ToolchainAugmentation = {
    extraPaths: [],
    extraCompilerFlags: [],
    extraEnvironment: [],
  };

  if (isEmscripten(triplet)) {
    const emscripten = await options.provisioner.initialize({
      preferSystem: options.useSystemEmscripten,
      targetingWasm: isWasm(triplet),
    });

    if (emscripten) {
      augmentation.extraPaths.push(emscripten.emscriptenPath);
      augmentation.extraEnvironment.push(
        ['EMSCRIPTEN', emscripten.emscriptenPath],
        ['EMSCRIPTEN_FASTCOMP', emscripten.emscriptenLlvmPath],
        ['LLVM', emscripten.emscriptenLlvmPath]
      );
      if (emscripten.binaryenPath) {
        augmentation.extraEnvironment.push(['BINARYEN', emscripten.binaryenPath]);
      }
    }

    // Test binaries must run their exit handlers to report a status.
    const noExitRuntime = profile === 'main' ? 1 : 0;
    augmentation.extraCompilerFlags.push('-C', 'link-arg=-s', '-C', `link-arg=NO_EXIT_RUNTIME=${noExitRuntime}`);
  }

  if (isNativeWasm(triplet) && requestedBuildType === 'debug') {
    augmentation.extraCompilerFlags.push('-C', 'debuginfo=2');
  }

  // Incremental compilation does not work with this target.
  if (isNativeWasm(triplet) && env.CARGO_INCREMENTAL !== undefined) {
    augmentation.extraEnvironment.push(['CARGO_INCREMENTAL', '0']);
  }

  return augmentation;
}

/**
 * Append project-declared linker arguments. The compiler flags are later
 * joined with spaces, so an argument containing whitespace cannot be passed
 * through and aborts the whole command.
 */
export function applyUserLinkArgs(
  augmentation: ToolchainAugmentation,
  linkArgs: readonly string[] | undefined,
  logger: Logger = getLogger('build:config')
): ToolchainAugmentation {
  const extraCompilerFlags = [...augmentation.extraCompilerFlags];

  for (const arg of linkArgs ?? []) {
    if (/\s/.test(arg)) {
      logger.error(
        'you have a space in one of the entries in `link-args` in your `wasmrig.json`;\nthis is currently unsupported - aborting!',
        { arg }
      );
      throw new FatalAbortError(`unsupported whitespace in link argument: ${JSON.stringify(arg)}`);
    }
    extraCompilerFlags.push('-C', `link-arg=${arg}`);
  }

  return { ...augmentation, extraCompilerFlags };
}

export interface ConfigurationBuilderOptions {
  provisioner: ToolchainProvisioner;
  env?: Environment;
  logger?: Logger;
}

export interface ConfigurationRequest {
  flags: BuildFlags;
  pkg: Package;
  target: Target;
  profile: Profile;
  projectConfig: ProjectConfig;
}

export class ConfigurationBuilder {
  private readonly provisioner: ToolchainProvisioner;
  private readonly env: Environment;
  private readonly logger: Logger;

  constructor(options: ConfigurationBuilderOptions) {
    this.provisioner = options.provisioner;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? getLogger('build:config');
  }

  async build(request: ConfigurationRequest): Promise<BuildConfiguration> {
    const { flags, pkg, target, profile, projectConfig } = request;
    const triplet = resolveTriplet(flags);
    const requested = requestedBuildType(flags);

    const augmentation = applyUserLinkArgs(
      await augmentForToolchain({
        triplet,
        profile,
        requestedBuildType: requested,
        useSystemEmscripten: flags.useSystemEmscripten,
        provisioner: this.provisioner,
        env: this.env,
      }),
      projectConfig.linkArgs,
      this.logger
    );

    const config: BuildConfiguration = {
      triplet,
      buildType: resolveBuildType(requested, triplet, this.logger),
      packageName: pkg.name,
      buildTarget: { kind: target.kind, name: target.name, profile },
      features: Object.freeze([...flags.features]),
      noDefaultFeatures: flags.noDefaultFeatures,
      allFeatures: flags.allFeatures,
      extraPaths: Object.freeze(augmentation.extraPaths),
      extraCompilerFlags: Object.freeze(augmentation.extraCompilerFlags),
      extraEnvironment: Object.freeze(augmentation.extraEnvironment.map((pair) => Object.freeze(pair))),
      messageFormat: flags.messageFormat,
      verbose: flags.verbose,
    };

    this.logger.debug('prepared build configuration', {
      package: config.packageName,
      target: `${target.kind}:${target.name}`,
      triplet: triplet.name,
      buildType: config.buildType,
    });

    return Object.freeze(config);
  }
}
