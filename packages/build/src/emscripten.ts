/**
 * @module @wasmrig/build/emscripten
 *
 * Locates a prebuilt Emscripten toolchain.
 *
 * Layout of a toolchain directory (one per flavour, `asmjs` or `wasm`):
 *
 *   <root>/<flavour>/emscripten/
 *   <root>/<flavour>/emscripten-fastcomp/
 *   <root>/<flavour>/binaryen/            (optional)
 *
 * Installing the toolchain is not done here.
 */

import { stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { getLogger } from '@wasmrig/core';
import type { EmscriptenLocation, Logger, ProvisionRequest, ToolchainProvisioner } from '@wasmrig/core';

export function defaultToolchainRoot(): string {
  return path.join(os.homedir(), '.wasmrig', 'emscripten');
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export interface EmscriptenProvisionerOptions {
  root?: string;
  logger?: Logger;
}

export class EmscriptenProvisioner implements ToolchainProvisioner {
  private readonly root: string;
  private readonly logger: Logger;

  constructor(options: EmscriptenProvisionerOptions = {}) {
    this.root = options.root ?? defaultToolchainRoot();
    this.logger = options.logger ?? getLogger('build:emscripten');
  }

  /**
   * With `preferSystem` the toolchain on PATH is used as-is and nothing is
   * exported. Otherwise the prebuilt toolchain for the requested flavour is
   * returned when it is present.
   */
  async initialize(request: ProvisionRequest): Promise<EmscriptenLocation | undefined> {
    if (request.preferSystem) {
      this.logger.debug('using the system Emscripten installation');
      return undefined;
    }

    const base = path.join(this.root, request.targetingWasm ? 'wasm' : 'asmjs');
    const emscriptenPath = path.join(base, 'emscripten');
    const emscriptenLlvmPath = path.join(base, 'emscripten-fastcomp');

    if (!(await isDirectory(emscriptenPath)) || !(await isDirectory(emscriptenLlvmPath))) {
      this.logger.warn(`no prebuilt Emscripten toolchain in \`${base}\`\nfalling back to the system installation`);
      return undefined;
    }

    const binaryenPath = path.join(base, 'binaryen');
    const location: EmscriptenLocation = { emscriptenPath, emscriptenLlvmPath };
    if (await isDirectory(binaryenPath)) {
      location.binaryenPath = binaryenPath;
    }

    this.logger.debug('using prebuilt Emscripten toolchain', { ...location });
    return location;
  }
}
