// Add-on Configuration Validation
//
// Validates the static add-on configuration before it is resolved.
// A config that validates here can still fail resolution only through
// programming errors; cycles and malformed names are reported up front.

import {
  collectAddonNames,
  isValidAddonName,
  prerequisitesOf,
  type AddonConfig,
  type AddonDependencies,
  type AddonName,
} from '../types/addons.js';

/**
 * Result of validating an add-on configuration.
 * `config` is present only when `valid` is true.
 */
export type AddonConfigValidationResult = {
  valid: boolean;
  errors: AddonConfigValidationError[];
  warnings: AddonConfigValidationWarning[];
  config?: AddonConfig;
};

/**
 * A validation error (configuration cannot be used)
 */
export type AddonConfigValidationError = {
  path: string;
  message: string;
  code: AddonConfigValidationErrorCode;
};

/**
 * A validation warning (configuration is usable but probably not what was meant)
 */
export type AddonConfigValidationWarning = {
  path: string;
  message: string;
  code: AddonConfigValidationWarningCode;
};

export type AddonConfigValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_NAME'
  | 'INVALID_VALUE'
  | 'DUPLICATE_DEFINITION'
  | 'CIRCULAR_DEPENDENCY';

export type AddonConfigValidationWarningCode = 'UNKNOWN_DEPENDENCY' | 'UNUSED_MOUNT';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find a dependency cycle reachable from the given roots.
 *
 * @param dependencies - add-on -> prerequisites
 * @param roots - where to start; defaults to every add-on with prerequisites
 * @returns The cycle as a path that starts and ends on the same add-on, or null
 */
export function findDependencyCycle(
  dependencies: AddonDependencies,
  roots: Iterable<AddonName> = Object.keys(dependencies)
): AddonName[] | null {
  const done = new Set<AddonName>();
  const visiting = new Set<AddonName>();

  function visit(name: AddonName, path: AddonName[]): AddonName[] | null {
    if (done.has(name)) {
      return null;
    }

    if (visiting.has(name)) {
      return [...path.slice(path.indexOf(name)), name];
    }

    visiting.add(name);
    for (const prerequisite of prerequisitesOf(dependencies, name)) {
      const cycle = visit(prerequisite, [...path, name]);
      if (cycle) {
        return cycle;
      }
    }
    visiting.delete(name);
    done.add(name);
    return null;
  }

  for (const root of Array.from(roots).sort()) {
    const cycle = visit(root, []);
    if (cycle) {
      return cycle;
    }
  }

  return null;
}

/**
 * Validate an add-on configuration object.
 *
 * @param value - Parsed configuration (e.g., the contents of config/addons.json)
 * @returns Validation result with errors, warnings and, when valid, the typed config
 */
export function validateAddonConfig(value: unknown): AddonConfigValidationResult {
  const errors: AddonConfigValidationError[] = [];
  const warnings: AddonConfigValidationWarning[] = [];

  if (!isPlainObject(value)) {
    errors.push({
      path: 'config',
      message: 'Add-on configuration must be an object',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors, warnings };
  }

  const enabled: Record<AddonName, boolean> = {};
  const dependencies: Record<AddonName, AddonName[]> = {};
  const mounts: Record<AddonName, string> = {};

  // Enabled flags
  if (value.enabled === undefined) {
    errors.push({
      path: 'config.enabled',
      message: 'Add-on configuration must have an "enabled" map',
      code: 'MISSING_FIELD',
    });
  } else if (!isPlainObject(value.enabled)) {
    errors.push({
      path: 'config.enabled',
      message: '"enabled" must map add-on names to booleans',
      code: 'INVALID_TYPE',
    });
  } else {
    for (const [name, flag] of Object.entries(value.enabled)) {
      const path = `config.enabled.${name}`;
      if (!isValidAddonName(name)) {
        errors.push({ path, message: `Invalid add-on name: "${name}"`, code: 'INVALID_NAME' });
      } else if (typeof flag !== 'boolean') {
        errors.push({ path, message: `Flag for "${name}" must be a boolean`, code: 'INVALID_TYPE' });
      } else {
        enabled[name] = flag;
      }
    }
  }

  // Dependencies
  if (value.dependencies !== undefined) {
    if (!isPlainObject(value.dependencies)) {
      errors.push({
        path: 'config.dependencies',
        message: '"dependencies" must map add-on names to lists of add-on names',
        code: 'INVALID_TYPE',
      });
    } else {
      for (const [name, prerequisites] of Object.entries(value.dependencies)) {
        const path = `config.dependencies.${name}`;
        if (!isValidAddonName(name)) {
          errors.push({ path, message: `Invalid add-on name: "${name}"`, code: 'INVALID_NAME' });
          continue;
        }
        if (!Array.isArray(prerequisites)) {
          errors.push({
            path,
            message: `Prerequisites of "${name}" must be a list`,
            code: 'INVALID_TYPE',
          });
          continue;
        }

        const valid: AddonName[] = [];
        prerequisites.forEach((prerequisite: unknown, index) => {
          if (typeof prerequisite !== 'string' || !isValidAddonName(prerequisite)) {
            errors.push({
              path: `${path}[${index}]`,
              message: `Invalid prerequisite name: ${JSON.stringify(prerequisite)}`,
              code: 'INVALID_NAME',
            });
          } else if (!valid.includes(prerequisite)) {
            valid.push(prerequisite);
          }
        });
        dependencies[name] = valid;
      }
    }
  }

  // Mount points
  if (value.mounts !== undefined) {
    if (!isPlainObject(value.mounts)) {
      errors.push({
        path: 'config.mounts',
        message: '"mounts" must map add-on names to URL path prefixes',
        code: 'INVALID_TYPE',
      });
    } else {
      const owners = new Map<string, AddonName>();
      for (const [name, mount] of Object.entries(value.mounts)) {
        const path = `config.mounts.${name}`;
        if (!isValidAddonName(name)) {
          errors.push({ path, message: `Invalid add-on name: "${name}"`, code: 'INVALID_NAME' });
          continue;
        }
        if (typeof mount !== 'string' || !mount.startsWith('/')) {
          errors.push({
            path,
            message: `Mount path for "${name}" must be a string starting with "/"`,
            code: 'INVALID_VALUE',
          });
          continue;
        }

        const owner = owners.get(mount);
        if (owner) {
          errors.push({
            path,
            message: `Mount path "${mount}" is already used by "${owner}"`,
            code: 'DUPLICATE_DEFINITION',
          });
          continue;
        }
        owners.set(mount, name);
        mounts[name] = mount;
      }
    }
  }

  const cycle = findDependencyCycle(dependencies);
  if (cycle) {
    errors.push({
      path: 'config.dependencies',
      message: `Circular dependency: ${cycle.join(' -> ')}`,
      code: 'CIRCULAR_DEPENDENCY',
    });
  }

  // Warnings
  for (const [name, prerequisites] of Object.entries(dependencies)) {
    for (const prerequisite of prerequisites) {
      if (!Object.hasOwn(enabled, prerequisite)) {
        warnings.push({
          path: `config.dependencies.${name}`,
          message: `"${prerequisite}" has no flag and will be enabled whenever "${name}" is`,
          code: 'UNKNOWN_DEPENDENCY',
        });
      }
    }
  }

  const referenced = new Set(collectAddonNames({ enabled, dependencies }));
  for (const name of Object.keys(mounts)) {
    if (!referenced.has(name)) {
      warnings.push({
        path: `config.mounts.${name}`,
        message: `Mount for "${name}" is never used`,
        code: 'UNUSED_MOUNT',
      });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings, config: { enabled, dependencies, mounts } };
}
