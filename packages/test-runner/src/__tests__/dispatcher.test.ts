/**
 * @module @wasmrig/test-runner/__tests__/dispatcher
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  BuildError,
  ConfigurationError,
  FatalAbortError,
  configureLogger,
  createMemorySink,
  resetLogging,
} from '@wasmrig/core';
import type {
  BrowserHarness,
  BrowserTestRequest,
  BuildConfiguration,
  BuildResult,
  Project,
  ProjectConfig,
} from '@wasmrig/core';
import { BuildExecutor, ConfigurationBuilder, parseBuildFlags } from '@wasmrig/build';
import type { RawBuildFlags } from '@wasmrig/build';
import { unavailableBrowserHarness } from '../browser-harness.js';
import { TestDispatcher } from '../dispatcher.js';
import type { DispatchOptions } from '../dispatcher.js';
import type { ProcessRunner } from '../script-runtime.js';
import type { WorkingDirectory } from '../working-directory.js';

// ============================================================================
// Fakes
// ============================================================================

const project: Project = {
  packages: [
    {
      name: 'app',
      manifestPath: '/work/app/Cargo.toml',
      targets: [
        { kind: 'lib', name: 'app' },
        { kind: 'bin', name: 'tool' },
        { kind: 'example', name: 'demo' },
        { kind: 'test', name: 'smoke' },
      ],
    },
    {
      name: 'helper',
      manifestPath: '/work/helper/Cargo.toml',
      targets: [{ kind: 'lib', name: 'helper' }],
    },
  ],
  defaultPackage: 'app',
};

class MemoryWorkingDirectory implements WorkingDirectory {
  readonly history: string[] = [];

  constructor(private current: string) {}

  cwd(): string {
    return this.current;
  }

  chdir(dir: string): void {
    this.history.push(dir);
    this.current = dir;
  }
}

interface RunCall {
  command: string;
  args: string[];
  cwd: string;
  /** Working directory observed while the process "ran" */
  activeCwd: string;
}

/**
 * Artifacts per target: `/out/<name>/<name>.js` plus, for wasm triplets,
 * `/out/<name>/wasm/<name>.wasm`.
 */
function artifactsFor(config: BuildConfiguration): string[] {
  const { name } = config.buildTarget;
  const script = `/out/${name}/${name}.js`;
  return config.triplet.kind === 'asmjs-emscripten' ? [script] : [script, `/out/${name}/wasm/${name}.wasm`];
}

interface HarnessOptions {
  failBuildOf?: string;
  failRunOf?: string[];
  projectConfig?: ProjectConfig;
  project?: Project;
  browserHarness?: BrowserHarness;
}

function createHarness(options: HarnessOptions = {}) {
  const toolchain = {
    build: vi.fn(
      async (config: BuildConfiguration): Promise<BuildResult> => ({
        artifacts: config.buildTarget.name === options.failBuildOf ? [] : artifactsFor(config),
        success: config.buildTarget.name !== options.failBuildOf,
      })
    ),
  };
  const provisioner = { initialize: vi.fn(async () => undefined) };
  const metadata = { load: vi.fn(async (_cwd: string) => options.project ?? project) };
  const workingDirectory = new MemoryWorkingDirectory('/start');
  const calls: RunCall[] = [];
  const runner: ProcessRunner = {
    async run(command, args, runOptions) {
      calls.push({ command, args: [...args], cwd: runOptions.cwd, activeCwd: workingDirectory.cwd() });
      const script = args[0] ?? '';
      return !(options.failRunOf ?? []).some((name) => script.endsWith(`/${name}.js`));
    },
  };
  const browserHarness = { run: vi.fn(async (_request: BrowserTestRequest) => true) };
  const probe = vi.fn(async (command: string) => command === 'node');

  const dispatcher = new TestDispatcher({
    metadata,
    builder: new ConfigurationBuilder({ provisioner, env: {} }),
    executor: new BuildExecutor({ toolchain }),
    cwd: '/work/app',
    loadProjectConfig: async () => options.projectConfig ?? {},
    browserHarness: options.browserHarness ?? browserHarness,
    probe,
    runner,
    workingDirectory,
    platform: 'linux',
  });

  return { dispatcher, toolchain, metadata, workingDirectory, calls, browserHarness, probe };
}

function dispatchOptions(flags: RawBuildFlags, overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return { flags: parseBuildFlags(flags), nodejs: true, noRun: false, passthrough: [], ...overrides };
}

// ============================================================================
// Tests
// ============================================================================

describe('TestDispatcher', () => {
  let memory: ReturnType<typeof createMemorySink>;

  beforeEach(() => {
    memory = createMemorySink();
    configureLogger({ sinks: [memory.sink] });
  });

  afterEach(() => {
    resetLogging();
  });

  describe('resolving targets', () => {
    it('builds the testable targets of the default package in manifest order', async () => {
      const { dispatcher, toolchain, metadata } = createHarness();

      const report = await dispatcher.dispatch(dispatchOptions({}));

      expect(metadata.load).toHaveBeenCalledWith('/work/app');
      expect(toolchain.build.mock.calls.map(([config]) => config.buildTarget)).toEqual([
        { kind: 'lib', name: 'app', profile: 'test' },
        { kind: 'bin', name: 'tool', profile: 'test' },
        { kind: 'test', name: 'smoke', profile: 'test' },
      ]);
      expect(report.outcomes.map((outcome) => outcome.target.name)).toEqual(['app', 'tool', 'smoke']);
    });

    it('builds only the selected target', async () => {
      const { dispatcher, toolchain } = createHarness();

      await dispatcher.dispatch(dispatchOptions({ example: 'demo' }));

      expect(toolchain.build).toHaveBeenCalledTimes(1);
      expect(toolchain.build.mock.calls[0]?.[0].buildTarget).toEqual({ kind: 'example', name: 'demo', profile: 'test' });
    });

    it('uses an explicitly requested package', async () => {
      const { dispatcher, toolchain } = createHarness();

      await dispatcher.dispatch(dispatchOptions({ package: 'helper' }));

      expect(toolchain.build.mock.calls.map(([config]) => config.packageName)).toEqual(['helper']);
    });

    it('rejects a missing package instead of falling back to the default', async () => {
      const { dispatcher, toolchain } = createHarness();

      await expect(dispatcher.dispatch(dispatchOptions({ package: 'nope' }))).rejects.toThrow(
        new ConfigurationError('package `nope` not found')
      );
      expect(toolchain.build).not.toHaveBeenCalled();
    });
  });

  describe('selecting the runtime', () => {
    it('refuses native wasm without the script runtime before building anything', async () => {
      const { dispatcher, toolchain, metadata } = createHarness();

      await expect(dispatcher.dispatch(dispatchOptions({ targetWebasm: true }, { nodejs: false }))).rejects.toThrow(
        ConfigurationError
      );
      expect(metadata.load).not.toHaveBeenCalled();
      expect(toolchain.build).not.toHaveBeenCalled();
    });

    it('refuses native wasm without the script runtime even when not running', async () => {
      const { dispatcher } = createHarness();

      await expect(
        dispatcher.dispatch(dispatchOptions({ targetWebasm: true }, { nodejs: false, noRun: true }))
      ).rejects.toThrow('running tests for the native wasm target is currently only supported with `--nodejs`');
    });

    it('refuses an unavailable browser harness before building anything', async () => {
      const { dispatcher, toolchain, metadata } = createHarness({ browserHarness: unavailableBrowserHarness });

      await expect(dispatcher.dispatch(dispatchOptions({}, { nodejs: false }))).rejects.toThrow(
        new ConfigurationError('no headless browser harness is available; run the tests with `--nodejs`')
      );
      expect(metadata.load).not.toHaveBeenCalled();
      expect(toolchain.build).not.toHaveBeenCalled();
    });

    it('builds without a browser harness under --no-run', async () => {
      const { dispatcher, toolchain } = createHarness({ browserHarness: unavailableBrowserHarness });

      const report = await dispatcher.dispatch(dispatchOptions({}, { nodejs: false, noRun: true }));

      expect(report.exitCode).toBe(0);
      expect(toolchain.build).toHaveBeenCalledTimes(3);
    });

    it('delegates Emscripten targets to the browser harness by default', async () => {
      const { dispatcher, browserHarness, calls } = createHarness();

      const report = await dispatcher.dispatch(dispatchOptions({ lib: true }, { nodejs: false, passthrough: ['--quiet'] }));

      expect(report.runtime).toBe('browser');
      expect(calls).toEqual([]);
      expect(browserHarness.run).toHaveBeenCalledTimes(1);
      const request = browserHarness.run.mock.calls[0]?.[0];
      expect(request?.configuration.buildTarget.name).toBe('app');
      expect(request?.build.artifacts).toEqual(['/out/app/app.js']);
      expect(request?.passthrough).toEqual(['--quiet']);
    });
  });

  describe('building', () => {
    it('stops at the first failed build', async () => {
      const { dispatcher, toolchain, calls } = createHarness({ failBuildOf: 'tool' });

      await expect(dispatcher.dispatch(dispatchOptions({}))).rejects.toBeInstanceOf(BuildError);

      expect(toolchain.build.mock.calls.map(([config]) => config.buildTarget.name)).toEqual(['app', 'tool']);
      expect(calls).toEqual([]);
    });

    it('aborts on a link argument containing whitespace before invoking the toolchain', async () => {
      const { dispatcher, toolchain } = createHarness({ projectConfig: { linkArgs: ['-s', 'TOTAL_MEMORY=1 GB'] } });

      const error: unknown = await dispatcher.dispatch(dispatchOptions({})).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FatalAbortError);
      expect(error instanceof FatalAbortError && error.exitCode).toBe(101);
      expect(toolchain.build).not.toHaveBeenCalled();
    });

    it('exits with 0 after building under --no-run', async () => {
      const { dispatcher, toolchain, calls, probe } = createHarness({ failRunOf: ['app'] });

      const report = await dispatcher.dispatch(dispatchOptions({}, { noRun: true }));

      expect(toolchain.build).toHaveBeenCalledTimes(3);
      expect(calls).toEqual([]);
      expect(probe).not.toHaveBeenCalled();
      expect(report.exitCode).toBe(0);
      expect(report.anyFailure).toBe(false);
      expect(report.phases).toEqual(['selecting-runtime', 'resolving-targets', 'building', 'no-run-exit']);
      expect(report.outcomes.map((outcome) => [outcome.target.name, outcome.ran])).toEqual([
        ['app', false],
        ['tool', false],
        ['smoke', false],
      ]);
    });
  });

  describe('running', () => {
    it('runs every artifact with the located runtime and passthrough arguments', async () => {
      const { dispatcher, calls, probe } = createHarness();

      const report = await dispatcher.dispatch(dispatchOptions({}, { passthrough: ['--nocapture'] }));

      expect(probe.mock.calls.map(([command]) => command)).toEqual(['nodejs', 'node']);
      expect(calls.map(({ command, args }) => [command, ...args])).toEqual([
        ['node', '/out/app/app.js', '--nocapture'],
        ['node', '/out/tool/tool.js', '--nocapture'],
        ['node', '/out/smoke/smoke.js', '--nocapture'],
      ]);
      expect(report.exitCode).toBe(0);
      expect(report.phases).toEqual(['selecting-runtime', 'resolving-targets', 'building', 'running', 'aggregating', 'done']);
    });

    it('keeps running after a failure and reports 101', async () => {
      const { dispatcher, calls } = createHarness({ failRunOf: ['tool'] });

      const report = await dispatcher.dispatch(dispatchOptions({}));

      expect(calls).toHaveLength(3);
      expect(report.outcomes.map((outcome) => outcome.ran && outcome.passed)).toEqual([true, false, true]);
      expect(report.anyFailure).toBe(true);
      expect(report.exitCode).toBe(101);
    });

    it('runs asm.js artifacts next to the script', async () => {
      const { dispatcher, calls, workingDirectory } = createHarness();

      await dispatcher.dispatch(dispatchOptions({ lib: true }));

      expect(calls[0]?.activeCwd).toBe('/out/app');
      expect(workingDirectory.cwd()).toBe('/start');
    });

    it('runs Emscripten wasm artifacts next to the binary and restores the directory', async () => {
      const { dispatcher, calls, workingDirectory } = createHarness();

      await dispatcher.dispatch(dispatchOptions({ lib: true, targetWebasmEmscripten: true }));

      expect(calls[0]?.cwd).toBe('/out/app/wasm');
      expect(calls[0]?.activeCwd).toBe('/out/app/wasm');
      expect(workingDirectory.history).toEqual(['/out/app/wasm', '/start']);
      expect(workingDirectory.cwd()).toBe('/start');
    });

    it('restores the directory when the run fails', async () => {
      const { dispatcher, workingDirectory } = createHarness({ failRunOf: ['app'] });

      const report = await dispatcher.dispatch(dispatchOptions({ lib: true, targetWebasmEmscripten: true }));

      expect(report.exitCode).toBe(101);
      expect(workingDirectory.history).toEqual(['/out/app/wasm', '/start']);
      expect(workingDirectory.cwd()).toBe('/start');
    });

    it('announces success for native wasm in the script runtime', async () => {
      const { dispatcher, calls } = createHarness();

      const report = await dispatcher.dispatch(dispatchOptions({ lib: true, targetWebasm: true }));

      expect(report.exitCode).toBe(0);
      expect(calls[0]?.activeCwd).toBe('/out/app');
      expect(memory.records.filter((r) => r.level === 'info').map((r) => r.message)).toEqual(['All tests passed!']);
    });

    it('does not announce success when a native wasm run fails', async () => {
      const { dispatcher } = createHarness({ failRunOf: ['app'] });

      await dispatcher.dispatch(dispatchOptions({ lib: true, targetWebasm: true }));

      expect(memory.records.filter((r) => r.level === 'info')).toEqual([]);
    });

    it('does not look for a script runtime when nothing was built', async () => {
      const { dispatcher, probe, toolchain } = createHarness({
        project: {
          packages: [{ name: 'demos', manifestPath: '/work/demos/Cargo.toml', targets: [{ kind: 'example', name: 'demo' }] }],
          defaultPackage: 'demos',
        },
      });
      probe.mockResolvedValue(false);

      const report = await dispatcher.dispatch(dispatchOptions({}));

      expect(report.exitCode).toBe(0);
      expect(report.outcomes).toEqual([]);
      expect(toolchain.build).not.toHaveBeenCalled();
      expect(probe).not.toHaveBeenCalled();
    });

    it('fails when no script runtime is installed', async () => {
      const { dispatcher, probe, toolchain } = createHarness();
      probe.mockResolvedValue(false);

      await expect(dispatcher.dispatch(dispatchOptions({}))).rejects.toThrow(
        new ConfigurationError('node.js not found; please install it!')
      );
      expect(toolchain.build).toHaveBeenCalledTimes(3);
    });
  });
});
