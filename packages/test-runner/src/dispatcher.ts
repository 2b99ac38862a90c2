/**
 * @module @wasmrig/test-runner/dispatcher
 *
 * TestDispatcher - the `test` command as a state machine.
 *
 * ## Phases
 *
 * selecting-runtime → resolving-targets → building → no-run-exit
 *                                                  → running → aggregating → done
 *
 * - The runtime is chosen once, before anything is built, and never changes.
 *   A browser harness that reports itself unavailable is refused here too,
 *   unless nothing is going to run.
 * - The script runtime executable is located on the first run and reused.
 * - Builds are sequential; the first BuildError aborts the whole dispatch.
 * - Every built target is run, even after a failure. The outcome is the OR
 *   of all failures.
 *
 * The dispatcher reports an exit code and never exits the process itself.
 */

import { ConfigurationError, FAILURE_EXIT_CODE, getLogger, isNativeWasm } from '@wasmrig/core';
import type {
  BrowserHarness,
  BuildConfiguration,
  BuildFlags,
  BuildResult,
  BuildTarget,
  Logger,
  Package,
  ProjectConfig,
  ProjectMetadataProvider,
} from '@wasmrig/core';
import {
  commandExists,
  loadProjectConfig,
  resolveTriplet,
  selectPackage,
  selectTargets,
  testableTarget,
} from '@wasmrig/build';
import type { BuildExecutor, CommandProbe, ConfigurationBuilder } from '@wasmrig/build';
import { BROWSER_UNAVAILABLE_MESSAGE, unavailableBrowserHarness } from './browser-harness.js';
import { selectTestRuntime } from './runtime-selector.js';
import type { TestRuntime } from './runtime-selector.js';
import {
  ExecaProcessRunner,
  locateScriptRuntime,
  primaryScriptArtifact,
  scriptWorkingDirectory,
} from './script-runtime.js';
import type { ProcessRunner } from './script-runtime.js';
import { processWorkingDirectory, withWorkingDirectory } from './working-directory.js';
import type { WorkingDirectory } from './working-directory.js';

// ============================================================================
// Types
// ============================================================================

export type DispatchPhase =
  | 'selecting-runtime'
  | 'resolving-targets'
  | 'building'
  | 'no-run-exit'
  | 'running'
  | 'aggregating'
  | 'done';

export interface DispatchOptions {
  flags: BuildFlags;
  /** Run in the script runtime instead of the browser harness */
  nodejs: boolean;
  /** Stop after building */
  noRun: boolean;
  /** Arguments forwarded verbatim to every test artifact */
  passthrough: readonly string[];
}

/**
 * Result for one built target. Under `--no-run` nothing is run.
 */
export type TargetOutcome =
  | { target: BuildTarget; artifacts: string[]; ran: false }
  | { target: BuildTarget; artifacts: string[]; ran: true; passed: boolean };

export interface DispatchReport {
  runtime: TestRuntime;
  /** Phases in the order they were entered */
  phases: DispatchPhase[];
  exitCode: number;
  anyFailure: boolean;
  outcomes: TargetOutcome[];
}

export type ProjectConfigLoader = (pkg: Package) => Promise<ProjectConfig>;

export interface TestDispatcherOptions {
  metadata: ProjectMetadataProvider;
  builder: Pick<ConfigurationBuilder, 'build'>;
  executor: Pick<BuildExecutor, 'run'>;
  /** Directory the project metadata is read for */
  cwd?: string;
  loadProjectConfig?: ProjectConfigLoader;
  browserHarness?: BrowserHarness;
  probe?: CommandProbe;
  runner?: ProcessRunner;
  workingDirectory?: WorkingDirectory;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

interface BuiltTarget {
  configuration: BuildConfiguration;
  build: BuildResult;
}

// ============================================================================
// Dispatcher
// ============================================================================

export class TestDispatcher {
  private readonly metadata: ProjectMetadataProvider;
  private readonly builder: Pick<ConfigurationBuilder, 'build'>;
  private readonly executor: Pick<BuildExecutor, 'run'>;
  private readonly cwd: string;
  private readonly loadProjectConfig: ProjectConfigLoader;
  private readonly browserHarness: BrowserHarness;
  private readonly probe: CommandProbe;
  private readonly runner: ProcessRunner;
  private readonly workingDirectory: WorkingDirectory;
  private readonly platform: NodeJS.Platform;
  private readonly logger: Logger;

  constructor(options: TestDispatcherOptions) {
    this.metadata = options.metadata;
    this.builder = options.builder;
    this.executor = options.executor;
    this.cwd = options.cwd ?? process.cwd();
    this.loadProjectConfig = options.loadProjectConfig ?? ((pkg) => loadProjectConfig(pkg));
    this.browserHarness = options.browserHarness ?? unavailableBrowserHarness;
    this.probe = options.probe ?? commandExists;
    this.runner = options.runner ?? new ExecaProcessRunner();
    this.workingDirectory = options.workingDirectory ?? processWorkingDirectory;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? getLogger('test-runner:dispatch');
  }

  /**
   * @throws ConfigurationError, BuildError, FatalAbortError or
   * InternalInvariantError; test failures are reported, not thrown.
   */
  async dispatch(options: DispatchOptions): Promise<DispatchReport> {
    const phases: DispatchPhase[] = [];
    const enter = (phase: DispatchPhase): void => {
      phases.push(phase);
      this.logger.debug(`phase: ${phase}`);
    };

    enter('selecting-runtime');
    const triplet = resolveTriplet(options.flags);
    const runtime = selectTestRuntime(triplet, options.nodejs);
    if (runtime === 'browser' && !options.noRun && this.browserHarness.available === false) {
      throw new ConfigurationError(BROWSER_UNAVAILABLE_MESSAGE);
    }

    enter('resolving-targets');
    const project = await this.metadata.load(this.cwd);
    const pkg = selectPackage(project, options.flags.packageName);
    const targets = selectTargets(pkg, options.flags.selector, testableTarget);
    const projectConfig = await this.loadProjectConfig(pkg);

    enter('building');
    const built: BuiltTarget[] = [];
    for (const target of targets) {
      const configuration = await this.builder.build({
        flags: options.flags,
        pkg,
        target,
        profile: 'test',
        projectConfig,
      });
      built.push({ configuration, build: await this.executor.run(configuration) });
    }

    if (options.noRun) {
      enter('no-run-exit');
      return {
        runtime,
        phases,
        exitCode: 0,
        anyFailure: false,
        outcomes: built.map(({ configuration, build }): TargetOutcome => ({
          target: configuration.buildTarget,
          artifacts: build.artifacts,
          ran: false,
        })),
      };
    }

    enter('running');
    let runtimeCommand: string | undefined;
    const outcomes: TargetOutcome[] = [];
    for (const { configuration, build } of built) {
      let passed: boolean;
      if (runtime === 'script') {
        if (runtimeCommand === undefined) {
          runtimeCommand = await locateScriptRuntime(this.probe, this.platform);
        }
        passed = await this.runScript(runtimeCommand, configuration, build, options.passthrough);
      } else {
        passed = await this.browserHarness.run({ configuration, build, passthrough: options.passthrough });
      }

      outcomes.push({ target: configuration.buildTarget, artifacts: build.artifacts, ran: true, passed });
    }

    enter('aggregating');
    let anyFailure = false;
    for (const outcome of outcomes) {
      anyFailure ||= outcome.ran && !outcome.passed;
    }

    enter('done');
    if (!anyFailure && runtime === 'script' && isNativeWasm(triplet)) {
      this.logger.info('All tests passed!');
    }

    return {
      runtime,
      phases,
      exitCode: anyFailure ? FAILURE_EXIT_CODE : 0,
      anyFailure,
      outcomes,
    };
  }

  private async runScript(
    runtimeCommand: string,
    configuration: BuildConfiguration,
    build: BuildResult,
    passthrough: readonly string[]
  ): Promise<boolean> {
    const script = primaryScriptArtifact(build.artifacts);
    const dir = scriptWorkingDirectory(configuration.triplet, build.artifacts);

    this.logger.debug('running test artifact', { runtime: runtimeCommand, script, cwd: dir });
    return withWorkingDirectory(
      dir,
      (cwd) => this.runner.run(runtimeCommand, [script, ...passthrough], { cwd }),
      this.workingDirectory
    );
  }
}
