/**
 * @module @wasmrig/build/executor
 *
 * Runs the toolchain for one configuration and merges the files derived
 * by the artifact post-processor into the result.
 */

import path from 'node:path';
import { BuildError, getLogger } from '@wasmrig/core';
import type { ArtifactPostProcessor, BuildConfiguration, BuildResult, Logger, Toolchain } from '@wasmrig/core';

/**
 * Post-processor that derives nothing.
 */
export const noopPostProcessor: ArtifactPostProcessor = {
  async process() {
    return [];
  },
};

/**
 * Artifacts the post-processor is offered.
 */
export function isBinaryArtifact(artifactPath: string): boolean {
  return path.extname(artifactPath) === '.wasm';
}

export interface BuildExecutorOptions {
  toolchain: Toolchain;
  postProcessor?: ArtifactPostProcessor;
  logger?: Logger;
}

export class BuildExecutor {
  private readonly toolchain: Toolchain;
  private readonly postProcessor: ArtifactPostProcessor;
  private readonly logger: Logger;

  constructor(options: BuildExecutorOptions) {
    this.toolchain = options.toolchain;
    this.postProcessor = options.postProcessor ?? noopPostProcessor;
    this.logger = options.logger ?? getLogger('build:executor');
  }

  /**
   * @throws BuildError when the toolchain reports failure; it has already
   * printed the diagnostics.
   */
  async run(config: BuildConfiguration): Promise<BuildResult> {
    const result = await this.toolchain.build(config);
    if (!result.success) {
      throw new BuildError();
    }

    const artifacts = [...result.artifacts];
    for (const artifact of result.artifacts) {
      if (!isBinaryArtifact(artifact)) {
        continue;
      }
      const derived = await this.postProcessor.process(config, artifact);
      if (derived.length > 0) {
        this.logger.debug('post-processed artifact', { artifact, derived });
      }
      artifacts.push(...derived);
    }

    return { artifacts, success: true };
  }
}
