/**
 * @module @wasmrig/test-runner/script-runtime
 *
 * Running test artifacts in a standalone script runtime (Node.js).
 */

import path from 'node:path';
import { execa } from 'execa';
import { ConfigurationError, InternalInvariantError, getLogger } from '@wasmrig/core';
import type { Logger, Triplet } from '@wasmrig/core';
import { commandExists, findFirstCommand, isBinaryArtifact } from '@wasmrig/build';
import type { CommandProbe } from '@wasmrig/build';

/**
 * Executable names tried, in order, when locating the runtime.
 */
export function scriptRuntimeCandidates(platform: NodeJS.Platform = process.platform): string[] {
  const candidates = ['nodejs', 'node'];
  return platform === 'win32' ? ['node.exe', ...candidates] : candidates;
}

/**
 * @throws ConfigurationError when no candidate can be spawned
 */
export async function locateScriptRuntime(
  probe: CommandProbe = commandExists,
  platform: NodeJS.Platform = process.platform
): Promise<string> {
  const runtime = await findFirstCommand(scriptRuntimeCandidates(platform), probe);
  if (runtime === undefined) {
    throw new ConfigurationError('node.js not found; please install it!');
  }
  return runtime;
}

/**
 * The script the runtime is started with: the first `.js` artifact.
 */
export function primaryScriptArtifact(artifacts: readonly string[]): string {
  const script = artifacts.find((artifact) => path.extname(artifact) === '.js');
  if (script === undefined) {
    throw new InternalInvariantError('no .js file found among the build artifacts');
  }
  return script;
}

/**
 * Directory a test artifact runs in. Emscripten wasm output loads its
 * `.wasm` file relative to the working directory.
 */
export function scriptWorkingDirectory(triplet: Triplet, artifacts: readonly string[]): string {
  if (triplet.kind === 'wasm-emscripten') {
    const binary = artifacts.find(isBinaryArtifact);
    if (binary === undefined) {
      throw new InternalInvariantError('no .wasm file found among the build artifacts');
    }
    return path.dirname(binary);
  }
  return path.dirname(primaryScriptArtifact(artifacts));
}

export interface ProcessRunOptions {
  cwd: string;
}

/**
 * Spawns a child process with inherited stdio and reports whether it passed.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<boolean>;
}

export class ExecaProcessRunner implements ProcessRunner {
  private readonly logger: Logger;

  constructor(logger: Logger = getLogger('test-runner:process')) {
    this.logger = logger;
  }

  async run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<boolean> {
    const result = await execa(command, args, {
      cwd: options.cwd,
      stdio: 'inherit',
      reject: false,
    });

    if (result.failed && typeof result.exitCode !== 'number') {
      this.logger.error(`failed to run \`${result.command}\``);
      return false;
    }
    return result.exitCode === 0;
  }
}
