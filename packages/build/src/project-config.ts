/**
 * @module @wasmrig/build/project-config
 * Project-declared configuration read from `wasmrig.json` next to the package manifest
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, getLogger } from '@wasmrig/core';
import type { Logger, Package, ProjectConfig } from '@wasmrig/core';

export const PROJECT_CONFIG_FILE = 'wasmrig.json';

const KNOWN_KEYS = new Set(['link-args']);

export const projectConfigSchema = z
  .object({
    'link-args': z.array(z.string()).optional(),
  })
  .passthrough();

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse the contents of a config file. Unknown keys produce warnings.
 */
export function parseProjectConfig(
  source: string,
  configPath: string,
  logger: Logger = getLogger('build:project-config')
): ProjectConfig {
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    throw new ConfigurationError(
      `failed to parse \`${configPath}\`: ${error instanceof Error ? error.message : String(error)}`,
      { path: configPath }
    );
  }

  const parsed = projectConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`invalid \`${configPath}\`: ${issues.join('; ')}`, { path: configPath, issues });
  }

  for (const key of Object.keys(parsed.data)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`unknown key \`${key}\` in \`${configPath}\``);
    }
  }

  return { linkArgs: parsed.data['link-args'] };
}

/**
 * Load the config of a package; a missing file yields the default (empty) config.
 */
export async function loadProjectConfig(
  pkg: Package,
  logger: Logger = getLogger('build:project-config')
): Promise<ProjectConfig> {
  const configPath = path.join(path.dirname(pkg.manifestPath), PROJECT_CONFIG_FILE);

  let source: string;
  try {
    source = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }

  logger.debug('loaded project config', { path: configPath });
  return parseProjectConfig(source, configPath, logger);
}
