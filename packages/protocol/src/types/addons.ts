// Add-on types - optional feature domains layered over the core
//
// Naming conventions:
// - Add-on names: lowercase, start with a letter, then letters, digits,
//   dashes or underscores (e.g., "lms", "commerce", "health-tracker")
// - Mount paths: URL path prefixes starting with "/" (e.g., "/shop")

/**
 * Add-on identifier
 */
export type AddonName = string;

/**
 * Explicit on/off switch per add-on. Names are unique keys; order is irrelevant.
 */
export type AddonFlags = Readonly<Record<AddonName, boolean>>;

/**
 * Prerequisites per add-on (add-on -> required add-ons).
 * Prerequisites need not appear in AddonFlags themselves.
 */
export type AddonDependencies = Readonly<Record<AddonName, readonly AddonName[]>>;

/**
 * URL mount prefix per add-on. Absent entries default to "/" + name.
 */
export type AddonMounts = Readonly<Record<AddonName, string>>;

/**
 * Static add-on configuration, as stored in config/addons.json.
 */
export type AddonConfig = {
  enabled: AddonFlags;
  dependencies: AddonDependencies;
  mounts: AddonMounts;
};

/**
 * Fixpoint closure of the enabled flags under the dependency graph.
 * Iteration order is lexicographic.
 */
export type ResolvedAddons = ReadonlySet<AddonName>;

const ADDON_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

/**
 * Check whether a string is a well-formed add-on name.
 */
export function isValidAddonName(name: string): boolean {
  return ADDON_NAME_PATTERN.test(name);
}

/**
 * Every add-on name mentioned anywhere in the config, sorted.
 */
export function collectAddonNames(config: {
  enabled: AddonFlags;
  dependencies: AddonDependencies;
  mounts?: AddonMounts;
}): AddonName[] {
  const names = new Set<AddonName>(Object.keys(config.enabled));
  for (const [addon, prerequisites] of Object.entries(config.dependencies)) {
    names.add(addon);
    for (const prerequisite of prerequisites) {
      names.add(prerequisite);
    }
  }
  for (const addon of Object.keys(config.mounts ?? {})) {
    names.add(addon);
  }
  return Array.from(names).sort();
}

/**
 * Prerequisites declared for an add-on (own properties only).
 */
export function prerequisitesOf(
  dependencies: AddonDependencies,
  name: AddonName
): readonly AddonName[] {
  return Object.hasOwn(dependencies, name) ? dependencies[name] : [];
}
