/**
 * @module @wasmrig/build/flags
 * Normalization of raw command options into BuildFlags
 */

import { z } from 'zod';
import { ConfigurationError } from '@wasmrig/core';
import type { BuildFlags, TargetSelector } from '@wasmrig/core';

export const rawBuildFlagsSchema = z
  .object({
    package: z.string().min(1).optional(),
    lib: z.boolean().optional(),
    bin: z.string().min(1).optional(),
    example: z.string().min(1).optional(),
    bench: z.string().min(1).optional(),
    targetAsmjsEmscripten: z.boolean().optional(),
    targetWebasmEmscripten: z.boolean().optional(),
    targetWebasm: z.boolean().optional(),
    features: z.string().optional(),
    noDefaultFeatures: z.boolean().optional(),
    allFeatures: z.boolean().optional(),
    release: z.boolean().optional(),
    useSystemEmscripten: z.boolean().optional(),
    messageFormat: z.enum(['human', 'json']).optional(),
    verbose: z.boolean().optional(),
  })
  .passthrough();

export type RawBuildFlags = z.input<typeof rawBuildFlagsSchema>;

function selectorFrom(raw: z.output<typeof rawBuildFlagsSchema>): TargetSelector | undefined {
  const selectors: TargetSelector[] = [];
  if (raw.lib) {
    selectors.push({ kind: 'lib' });
  }
  if (raw.bin !== undefined) {
    selectors.push({ kind: 'bin', name: raw.bin });
  }
  if (raw.example !== undefined) {
    selectors.push({ kind: 'example', name: raw.example });
  }
  if (raw.bench !== undefined) {
    selectors.push({ kind: 'bench', name: raw.bench });
  }

  if (selectors.length > 1) {
    const given = selectors.map((s) => `--${s.kind}`).join(', ');
    throw new ConfigurationError(`only one of --lib, --bin, --example or --bench may be given (got ${given})`);
  }
  return selectors[0];
}

function checkTripletFlags(raw: z.output<typeof rawBuildFlagsSchema>): void {
  const given = [
    raw.targetAsmjsEmscripten ? '--target-asmjs-emscripten' : undefined,
    raw.targetWebasmEmscripten ? '--target-webasm-emscripten' : undefined,
    raw.targetWebasm ? '--target-webasm' : undefined,
  ].filter((flag): flag is string => flag !== undefined);

  if (given.length > 1) {
    throw new ConfigurationError(`conflicting target flags: ${given.join(', ')}`);
  }
}

/**
 * Split a whitespace-separated feature list.
 */
export function splitFeatures(features: string | undefined): string[] {
  if (!features) {
    return [];
  }
  return features.split(/\s+/).filter((feature) => feature.length > 0);
}

/**
 * Validate raw options and reject contradictory combinations up front.
 */
export function parseBuildFlags(input: unknown): BuildFlags {
  const parsed = rawBuildFlagsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'flags'}: ${issue.message}`);
    throw new ConfigurationError(`invalid flags: ${issues.join('; ')}`, { issues });
  }

  const raw = parsed.data;
  checkTripletFlags(raw);

  return {
    packageName: raw.package,
    selector: selectorFrom(raw),
    targetWebasm: raw.targetWebasm ?? false,
    targetWebasmEmscripten: raw.targetWebasmEmscripten ?? false,
    features: splitFeatures(raw.features),
    noDefaultFeatures: raw.noDefaultFeatures ?? false,
    allFeatures: raw.allFeatures ?? false,
    release: raw.release ?? false,
    useSystemEmscripten: raw.useSystemEmscripten ?? false,
    messageFormat: raw.messageFormat ?? 'human',
    verbose: raw.verbose ?? false,
  };
}
