// Add-on Resolver - which add-ons are active, and where they mount
//
// Pure functions over the static add-on configuration:
// - resolveAddons: fixpoint closure of the enabled set under prerequisites
// - resolveMountOrder: prerequisites before dependents
// - mountPath / isAddonEnabled: lookups against the result

import {
  collectAddonNames,
  ConfigurationError,
  DependencyCycleError,
  findDependencyCycle,
  prerequisitesOf,
  type AddonDependencies,
  type AddonFlags,
  type AddonMounts,
  type AddonName,
  type ResolvedAddons,
} from '@fastapp/protocol';

function assertNonEmptyName(name: string): void {
  if (name.trim().length === 0) {
    throw new ConfigurationError('Add-on name must be a non-empty string', { name });
  }
}

/**
 * Compute the set of active add-ons.
 *
 * Starts from every add-on whose flag is true, then repeatedly adds the
 * prerequisites of every member until a full pass adds nothing. A prerequisite
 * is enabled even when its own flag is false or absent.
 *
 * @returns The resolved set, iterating in lexicographic order
 * @throws ConfigurationError for an empty name, or if no fixpoint is reached
 *   within as many passes as there are distinct names
 * @throws DependencyCycleError if the resolved add-ons depend on each other in a cycle
 */
export function resolveAddons(
  enabled: AddonFlags,
  dependencies: AddonDependencies = {}
): ResolvedAddons {
  const names = collectAddonNames({ enabled, dependencies });
  names.forEach(assertNonEmptyName);

  const resolved = new Set<AddonName>(
    Object.keys(enabled).filter((name) => enabled[name] === true)
  );

  const maxPasses = names.length;
  let passes = 0;

  while (true) {
    let changed = false;
    for (const name of Array.from(resolved)) {
      for (const prerequisite of prerequisitesOf(dependencies, name)) {
        if (!resolved.has(prerequisite)) {
          resolved.add(prerequisite);
          changed = true;
        }
      }
    }

    if (!changed) {
      break;
    }

    passes++;
    if (passes > maxPasses) {
      throw new ConfigurationError(
        `Add-on resolution did not settle within ${maxPasses} passes`,
        { passes, names }
      );
    }
  }

  const cycle = findDependencyCycle(dependencies, resolved);
  if (cycle) {
    throw new DependencyCycleError(cycle);
  }

  return new Set(Array.from(resolved).sort());
}

/**
 * Order resolved add-ons so every prerequisite comes before its dependents.
 * Siblings are visited in lexicographic order.
 *
 * @throws DependencyCycleError if a cycle is found
 */
export function resolveMountOrder(
  resolved: ResolvedAddons,
  dependencies: AddonDependencies = {}
): AddonName[] {
  const sorted: AddonName[] = [];
  const visited = new Set<AddonName>();
  const visiting = new Set<AddonName>();

  function visit(name: AddonName, path: AddonName[] = []): void {
    if (visited.has(name)) {
      return;
    }

    if (visiting.has(name)) {
      throw new DependencyCycleError([...path.slice(path.indexOf(name)), name]);
    }

    if (!resolved.has(name)) {
      // Not active: nothing to mount
      return;
    }

    visiting.add(name);

    for (const prerequisite of [...prerequisitesOf(dependencies, name)].sort()) {
      visit(prerequisite, [...path, name]);
    }

    visiting.delete(name);
    visited.add(name);
    sorted.push(name);
  }

  for (const name of Array.from(resolved).sort()) {
    visit(name);
  }

  return sorted;
}

/**
 * URL prefix for an add-on: the configured mount, else "/" + name.
 *
 * @throws ConfigurationError for an empty name
 */
export function mountPath(name: AddonName, mounts: AddonMounts = {}): string {
  assertNonEmptyName(name);
  return Object.hasOwn(mounts, name) ? mounts[name] : `/${name}`;
}

/**
 * Membership test against a resolved set.
 */
export function isAddonEnabled(name: AddonName, resolved: ResolvedAddons): boolean {
  return resolved.has(name);
}
