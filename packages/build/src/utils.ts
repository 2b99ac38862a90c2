/**
 * @module @wasmrig/build/utils
 */

import { execa } from 'execa';

/**
 * Probe whether a command can be spawned, by running it with `--version`.
 */
export async function commandExists(command: string, args: string[] = ['--version']): Promise<boolean> {
  const result = await execa(command, args, { reject: false, stdio: 'ignore' });
  return !result.failed && result.exitCode === 0;
}

export type CommandProbe = (command: string) => Promise<boolean>;

/**
 * First candidate the probe accepts, if any.
 */
export async function findFirstCommand(
  candidates: readonly string[],
  probe: CommandProbe = commandExists
): Promise<string | undefined> {
  for (const candidate of candidates) {
    if (await probe(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
