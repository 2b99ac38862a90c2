import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ConfigurationError, configureLogger, createMemorySink, resetLogging } from '@wasmrig/core';
import type { Package } from '@wasmrig/core';
import { loadProjectConfig, parseProjectConfig } from '../project-config.js';

describe('loadProjectConfig()', () => {
  let workdir: string;
  let pkg: Package;
  let memory: ReturnType<typeof createMemorySink>;

  beforeEach(async () => {
    workdir = await mkdtemp(path.join(tmpdir(), 'wasmrig-project-config-'));
    pkg = { name: 'app', manifestPath: path.join(workdir, 'Cargo.toml'), targets: [] };
    memory = createMemorySink();
    configureLogger({ sinks: [memory.sink] });
  });

  afterEach(async () => {
    resetLogging();
    await rm(workdir, { recursive: true, force: true });
  });

  it('returns the default config when the file is missing', async () => {
    await expect(loadProjectConfig(pkg)).resolves.toEqual({});
  });

  it('reads link-args next to the manifest', async () => {
    await writeFile(path.join(workdir, 'wasmrig.json'), JSON.stringify({ 'link-args': ['--no-entry'] }));

    await expect(loadProjectConfig(pkg)).resolves.toEqual({ linkArgs: ['--no-entry'] });
  });

  it('warns about unknown keys', async () => {
    await writeFile(path.join(workdir, 'wasmrig.json'), JSON.stringify({ 'link-args': [], 'prepend-js': 'x.js' }));

    await loadProjectConfig(pkg);

    const configPath = path.join(workdir, 'wasmrig.json');
    expect(memory.records.map((r) => [r.level, r.message])).toEqual([
      ['warn', `unknown key \`prepend-js\` in \`${configPath}\``],
    ]);
  });
});

describe('parseProjectConfig()', () => {
  it('rejects malformed JSON', () => {
    expect(() => parseProjectConfig('{', '/work/wasmrig.json')).toThrow(ConfigurationError);
    expect(() => parseProjectConfig('{', '/work/wasmrig.json')).toThrow(/^failed to parse `\/work\/wasmrig.json`/);
  });

  it('rejects link-args that are not strings', () => {
    expect(() => parseProjectConfig('{"link-args": [1]}', '/work/wasmrig.json')).toThrow(
      /^invalid `\/work\/wasmrig.json`: link-args\.0: /
    );
  });
});
