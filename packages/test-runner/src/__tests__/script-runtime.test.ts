import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ASMJS_EMSCRIPTEN,
  ConfigurationError,
  InternalInvariantError,
  WASM_EMSCRIPTEN,
  WASM_NATIVE,
  configureLogger,
  createMemorySink,
  resetLogging,
} from '@wasmrig/core';

const execaMock = vi.hoisted(() => vi.fn());

vi.mock('execa', () => ({
  execa: execaMock,
}));

import {
  ExecaProcessRunner,
  locateScriptRuntime,
  primaryScriptArtifact,
  scriptRuntimeCandidates,
  scriptWorkingDirectory,
} from '../script-runtime.js';

describe('scriptRuntimeCandidates()', () => {
  it('only tries node.exe on Windows', () => {
    expect(scriptRuntimeCandidates('win32')).toEqual(['node.exe', 'nodejs', 'node']);
    expect(scriptRuntimeCandidates('linux')).toEqual(['nodejs', 'node']);
    expect(scriptRuntimeCandidates('darwin')).toEqual(['nodejs', 'node']);
  });
});

describe('locateScriptRuntime()', () => {
  it('prefers nodejs over node', async () => {
    await expect(locateScriptRuntime(async () => true, 'linux')).resolves.toBe('nodejs');
  });

  it('falls back to node', async () => {
    await expect(locateScriptRuntime(async (command) => command === 'node', 'linux')).resolves.toBe('node');
  });

  it('fails when nothing can be spawned', async () => {
    const error: unknown = await locateScriptRuntime(async () => false, 'win32').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error && error.message).toBe('node.js not found; please install it!');
  });
});

describe('primaryScriptArtifact()', () => {
  it('picks the first .js artifact', () => {
    expect(primaryScriptArtifact(['/out/app.wasm', '/out/app.js', '/out/other.js'])).toBe('/out/app.js');
  });

  it('treats a missing script as an internal error', () => {
    expect(() => primaryScriptArtifact(['/out/app.wasm'])).toThrow(InternalInvariantError);
  });
});

describe('scriptWorkingDirectory()', () => {
  const artifacts = ['/out/deps/app.js', '/out/deps/wasm/app.wasm'];

  it('uses the binary directory for Emscripten wasm', () => {
    expect(scriptWorkingDirectory(WASM_EMSCRIPTEN, artifacts)).toBe('/out/deps/wasm');
  });

  it('uses the script directory otherwise', () => {
    expect(scriptWorkingDirectory(ASMJS_EMSCRIPTEN, ['/out/deps/app.js'])).toBe('/out/deps');
    expect(scriptWorkingDirectory(WASM_NATIVE, artifacts)).toBe('/out/deps');
  });

  it('requires a binary for Emscripten wasm', () => {
    expect(() => scriptWorkingDirectory(WASM_EMSCRIPTEN, ['/out/deps/app.js'])).toThrow(
      'internal error: no .wasm file found among the build artifacts'
    );
  });
});

describe('ExecaProcessRunner', () => {
  let memory: ReturnType<typeof createMemorySink>;

  beforeEach(() => {
    execaMock.mockReset();
    memory = createMemorySink();
    configureLogger({ sinks: [memory.sink] });
  });

  afterEach(() => {
    resetLogging();
  });

  it('passes on a zero exit code', async () => {
    execaMock.mockResolvedValue({ command: 'node app.js', exitCode: 0, failed: false });

    await expect(new ExecaProcessRunner().run('node', ['/out/app.js', '--quiet'], { cwd: '/out' })).resolves.toBe(true);
    expect(execaMock).toHaveBeenCalledWith('node', ['/out/app.js', '--quiet'], {
      cwd: '/out',
      stdio: 'inherit',
      reject: false,
    });
  });

  it('fails on a non-zero exit code', async () => {
    execaMock.mockResolvedValue({ command: 'node app.js', exitCode: 101, failed: true });

    await expect(new ExecaProcessRunner().run('node', ['/out/app.js'], { cwd: '/out' })).resolves.toBe(false);
    expect(memory.records).toEqual([]);
  });

  it('fails and logs when the process cannot be spawned', async () => {
    execaMock.mockResolvedValue({ command: 'node app.js', exitCode: undefined, failed: true });

    await expect(new ExecaProcessRunner().run('node', ['/out/app.js'], { cwd: '/out' })).resolves.toBe(false);
    expect(memory.records.map((r) => [r.level, r.message])).toEqual([['error', 'failed to run `node app.js`']]);
  });
});
