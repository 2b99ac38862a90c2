/**
 * @module @wasmrig/build/cargo/metadata
 * Project metadata read from `cargo metadata`
 */

import path from 'node:path';
import { execa } from 'execa';
import { z } from 'zod';
import { ConfigurationError, getLogger } from '@wasmrig/core';
import type { Logger, Package, Project, ProjectMetadataProvider, Target, TargetKind } from '@wasmrig/core';

const cargoTargetSchema = z
  .object({
    name: z.string(),
    kind: z.array(z.string()),
    src_path: z.string().optional(),
  })
  .passthrough();

const cargoPackageSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    manifest_path: z.string(),
    targets: z.array(cargoTargetSchema),
  })
  .passthrough();

export const cargoMetadataSchema = z
  .object({
    packages: z.array(cargoPackageSchema),
    workspace_members: z.array(z.string()),
    workspace_root: z.string().optional(),
  })
  .passthrough();

export type CargoMetadata = z.infer<typeof cargoMetadataSchema>;

const LIB_KINDS = new Set(['lib', 'rlib', 'dylib', 'cdylib', 'staticlib', 'proc-macro']);
const DIRECT_KINDS = new Set<string>(['bin', 'example', 'bench', 'test']);

function isDirectKind(kind: string): kind is Exclude<TargetKind, 'lib'> {
  return DIRECT_KINDS.has(kind);
}

function toTargetKind(kinds: readonly string[]): TargetKind | undefined {
  for (const kind of kinds) {
    if (isDirectKind(kind)) {
      return kind;
    }
  }
  if (kinds.some((kind) => LIB_KINDS.has(kind))) {
    return 'lib';
  }
  // custom-build and anything unknown
  return undefined;
}

/**
 * Convert validated metadata into the project model. Only workspace members
 * are kept. The default package is the member whose manifest sits in `cwd`,
 * else the first member.
 */
export function toProject(metadata: CargoMetadata, cwd: string): Project {
  const members = new Set(metadata.workspace_members);
  const packages: Package[] = metadata.packages
    .filter((pkg) => members.has(pkg.id))
    .map((pkg) => ({
      name: pkg.name,
      manifestPath: pkg.manifest_path,
      targets: pkg.targets.flatMap((target): Target[] => {
        const kind = toTargetKind(target.kind);
        return kind ? [{ kind, name: target.name, srcPath: target.src_path }] : [];
      }),
    }));

  const first = packages[0];
  if (!first) {
    throw new ConfigurationError('no packages found in the workspace');
  }

  const local = packages.find((pkg) => path.resolve(path.dirname(pkg.manifestPath)) === path.resolve(cwd));
  return {
    packages,
    defaultPackage: (local ?? first).name,
  };
}

export interface CargoMetadataProviderOptions {
  cargo?: string;
  logger?: Logger;
}

export class CargoMetadataProvider implements ProjectMetadataProvider {
  private readonly cargo: string;
  private readonly logger: Logger;

  constructor(options: CargoMetadataProviderOptions = {}) {
    this.cargo = options.cargo ?? 'cargo';
    this.logger = options.logger ?? getLogger('build:metadata');
  }

  async load(cwd: string): Promise<Project> {
    const result = await execa(this.cargo, ['metadata', '--format-version', '1', '--no-deps'], {
      cwd,
      reject: false,
    });

    if (result.failed || result.exitCode !== 0) {
      throw new ConfigurationError(`failed to read project metadata: ${result.stderr.trim() || result.command}`, {
        exitCode: result.exitCode,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new ConfigurationError(
        `failed to parse project metadata: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = cargoMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError('unexpected project metadata format', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const project = toProject(parsed.data, cwd);
    this.logger.debug('loaded project metadata', {
      packages: project.packages.map((pkg) => pkg.name),
      defaultPackage: project.defaultPackage,
    });
    return project;
  }
}
