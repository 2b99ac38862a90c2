/**
 * @module @wasmrig/test-runner/working-directory
 *
 * The process working directory is the only shared mutable resource of a
 * test run. It is only ever changed through `withWorkingDirectory`.
 */

/**
 * Access to a working directory. `processWorkingDirectory` is the real one;
 * tests supply an in-memory implementation.
 */
export interface WorkingDirectory {
  cwd(): string;
  chdir(dir: string): void;
}

export const processWorkingDirectory: WorkingDirectory = {
  cwd: () => process.cwd(),
  chdir: (dir) => process.chdir(dir),
};

/**
 * Run `fn` with `dir` as the working directory.
 * The previous directory is restored however `fn` settles.
 */
export async function withWorkingDirectory<T>(
  dir: string,
  fn: (dir: string) => Promise<T>,
  workingDirectory: WorkingDirectory = processWorkingDirectory
): Promise<T> {
  const previous = workingDirectory.cwd();
  workingDirectory.chdir(dir);
  try {
    return await fn(dir);
  } finally {
    workingDirectory.chdir(previous);
  }
}
