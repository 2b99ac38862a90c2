/**
 * @module @wasmrig/build/target-resolver
 *
 * Resolves the package and the compilation targets an invocation works on.
 */

import { ConfigurationError } from '@wasmrig/core';
import type { Package, Project, Target, TargetKind, TargetSelector } from '@wasmrig/core';

export type TargetFilter = (target: Target) => boolean;

/**
 * Look up a package by name, or return the project's default package.
 * An explicit name that does not exist is an error, never a fallback.
 */
export function selectPackage(project: Project, name?: string): Package {
  if (name !== undefined) {
    const found = project.packages.find((pkg) => pkg.name === name);
    if (!found) {
      throw new ConfigurationError(`package \`${name}\` not found`, { package: name });
    }
    return found;
  }

  const fallback = project.packages.find((pkg) => pkg.name === project.defaultPackage);
  if (!fallback) {
    throw new ConfigurationError(`default package \`${project.defaultPackage}\` not found`, {
      package: project.defaultPackage,
    });
  }
  return fallback;
}

function findTarget(pkg: Package, kind: TargetKind, name?: string): Target | undefined {
  return pkg.targets.find((target) => target.kind === kind && (name === undefined || target.name === name));
}

/**
 * Resolve an explicit selector to its single target.
 */
export function resolveSelector(pkg: Package, selector: TargetSelector): Target {
  switch (selector.kind) {
    case 'lib': {
      const target = findTarget(pkg, 'lib');
      if (!target) {
        throw new ConfigurationError('no library targets found', { package: pkg.name });
      }
      return target;
    }
    case 'bin':
    case 'example':
    case 'bench': {
      const target = findTarget(pkg, selector.kind, selector.name);
      if (!target) {
        throw new ConfigurationError(`no ${selector.kind} target named \`${selector.name}\``, {
          package: pkg.name,
          kind: selector.kind,
          name: selector.name,
        });
      }
      return target;
    }
  }
}

/**
 * With a selector, exactly the selected target. Without one, every target
 * accepted by `filter` in manifest order (possibly none).
 */
export function selectTargets(pkg: Package, selector: TargetSelector | undefined, filter: TargetFilter): Target[] {
  if (selector) {
    return [resolveSelector(pkg, selector)];
  }
  return pkg.targets.filter(filter);
}

/**
 * Kinds that are run by the test command. Examples and benches never are.
 */
export const testableTarget: TargetFilter = (target) =>
  target.kind === 'lib' || target.kind === 'bin' || target.kind === 'test';
