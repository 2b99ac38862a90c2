/**
 * @module @wasmrig/build/cargo/toolchain
 *
 * Toolchain implementation driving `cargo build` / `cargo test --no-run`.
 *
 * Diagnostics are rendered by cargo itself on stderr, which is inherited.
 * Machine-readable messages on stdout are parsed for the produced artifacts;
 * under `--message-format json` they are also streamed through as they arrive.
 */

import path from 'node:path';
import { execa } from 'execa';
import { z } from 'zod';
import { getLogger } from '@wasmrig/core';
import type { BuildConfiguration, BuildResult, BuildTarget, Logger, Toolchain, WritableLike } from '@wasmrig/core';
import type { Environment } from '../config-builder.js';

const NON_LIB_KINDS = new Set(['bin', 'example', 'bench', 'test', 'custom-build']);

export const cargoMessageSchema = z
  .object({
    reason: z.string(),
    target: z
      .object({
        name: z.string(),
        kind: z.array(z.string()),
      })
      .passthrough()
      .optional(),
    profile: z.object({ test: z.boolean() }).passthrough().optional(),
    filenames: z.array(z.string()).optional(),
  })
  .passthrough();

export type CargoMessage = z.infer<typeof cargoMessageSchema>;

function targetSelectionArgs(target: BuildTarget): string[] {
  switch (target.kind) {
    case 'lib':
      return ['--lib'];
    case 'bin':
    case 'example':
    case 'bench':
    case 'test':
      return [`--${target.kind}`, target.name];
  }
}

export function cargoBuildArgs(config: BuildConfiguration): string[] {
  const args = config.buildTarget.profile === 'test' ? ['test', '--no-run'] : ['build'];

  args.push(...targetSelectionArgs(config.buildTarget));
  args.push('--target', config.triplet.name);
  args.push('--package', config.packageName);

  if (config.buildType === 'release') {
    args.push('--release');
  }
  if (config.features.length > 0) {
    args.push('--features', config.features.join(' '));
  }
  if (config.noDefaultFeatures) {
    args.push('--no-default-features');
  }
  if (config.allFeatures) {
    args.push('--all-features');
  }
  if (config.verbose) {
    args.push('--verbose');
  }
  // Diagnostics stay JSON when the caller asked for machine-readable output.
  args.push(config.messageFormat === 'json' ? '--message-format=json' : '--message-format=json-render-diagnostics');

  return args;
}

/**
 * Variables layered over the inherited environment.
 */
export function cargoEnvironment(config: BuildConfiguration, env: Environment): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [name, value] of config.extraEnvironment) {
    result[name] = value;
  }

  if (config.extraCompilerFlags.length > 0) {
    result.RUSTFLAGS = [env.RUSTFLAGS, ...config.extraCompilerFlags]
      .filter((flag): flag is string => flag !== undefined && flag.trim().length > 0)
      .join(' ');
  }

  if (config.extraPaths.length > 0) {
    result.PATH = [...config.extraPaths, env.PATH]
      .filter((entry): entry is string => entry !== undefined && entry.length > 0)
      .join(path.delimiter);
  }

  return result;
}

function normalizeCrateName(name: string): string {
  return name.replace(/-/g, '_');
}

function belongsTo(message: CargoMessage, target: BuildTarget): boolean {
  if (!message.target || normalizeCrateName(message.target.name) !== normalizeCrateName(target.name)) {
    return false;
  }
  const isTestBuild = message.profile?.test ?? false;
  if (isTestBuild !== (target.profile === 'test')) {
    return false;
  }
  if (target.kind === 'lib') {
    return message.target.kind.every((kind) => !NON_LIB_KINDS.has(kind));
  }
  return message.target.kind.includes(target.kind);
}

/**
 * Collect the files produced for `target` from cargo's JSON message stream.
 * Lines that are not JSON messages are ignored.
 */
export function parseArtifacts(stdout: string, target: BuildTarget): string[] {
  const artifacts: string[] = [];

  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('{')) {
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      continue;
    }

    const parsed = cargoMessageSchema.safeParse(json);
    if (!parsed.success || parsed.data.reason !== 'compiler-artifact') {
      continue;
    }
    if (belongsTo(parsed.data, target)) {
      artifacts.push(...(parsed.data.filenames ?? []));
    }
  }

  return artifacts;
}

export interface CargoToolchainOptions {
  cargo?: string;
  cwd?: string;
  env?: Environment;
  /** Receives raw messages under `--message-format json` */
  stdout?: WritableLike;
  logger?: Logger;
}

export class CargoToolchain implements Toolchain {
  private readonly cargo: string;
  private readonly cwd: string;
  private readonly env: Environment;
  private readonly stdout: WritableLike;
  private readonly logger: Logger;

  constructor(options: CargoToolchainOptions = {}) {
    this.cargo = options.cargo ?? 'cargo';
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.stdout = options.stdout ?? process.stdout;
    this.logger = options.logger ?? getLogger('build:cargo');
  }

  async build(config: BuildConfiguration): Promise<BuildResult> {
    const args = cargoBuildArgs(config);
    this.logger.debug('running cargo', { args });

    const subprocess = execa(this.cargo, args, {
      cwd: this.cwd,
      env: cargoEnvironment(config, this.env),
      stdin: 'inherit',
      stderr: 'inherit',
      reject: false,
    });

    if (config.messageFormat === 'json') {
      subprocess.stdout?.on('data', (data: Buffer) => {
        this.stdout.write(data.toString());
      });
    }

    const result = await subprocess;

    if (result.failed && typeof result.exitCode !== 'number') {
      this.logger.error(`failed to run \`${result.command}\``);
      return { artifacts: [], success: false };
    }

    return {
      artifacts: parseArtifacts(result.stdout, config.buildTarget),
      success: result.exitCode === 0,
    };
  }
}
