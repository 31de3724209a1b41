import { GUARD } from "../config.js";

/**
 * Normalise a textual or symbolic identifier into the plugin short name.
 *
 * Invariant: the result never starts with the canonical prefix, so `"guard-rspec"` and `"rspec"` agree.
 *
 * @param rawName - Identifier as supplied by the caller.
 * @returns Short plugin name.
 */
export function pluginShortName(rawName: string | symbol): string {
  const text = typeof rawName === "symbol" ? rawName.description ?? "" : rawName;
  return text.startsWith(GUARD.PREFIX) ? text.slice(GUARD.PREFIX.length) : text;
}

/**
 * Canonical lookup key of the code unit defining a plugin, e.g. `guard/dashed-class-name`.
 */
export function pluginKey(name: string): string {
  return `${GUARD.NAMESPACE}/${name.toLowerCase()}`;
}

/**
 * Package name a plugin is published under by convention.
 */
export function pluginPackageName(name: string): string {
  return `${GUARD.PREFIX}${name}`;
}

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1);
}

function camelize(name: string, separator: string): string {
  return name
    .split(separator)
    .filter(segment => segment.length > 0)
    .map(capitalize)
    .join("");
}

/**
 * Class names to try for a short name, in precedence order:
 * exact, dash-to-CamelCase, underscore-to-CamelCase, both camel-cased, capitalised.
 *
 * @param name - Plugin short name.
 * @returns Distinct candidates, first match wins.
 */
export function classNameCandidates(name: string): string[] {
  const candidates = [name, camelize(name, "-"), camelize(name, "_"), constantName(name), capitalize(name)];
  return [...new Set(candidates.filter(candidate => candidate.length > 0))];
}

/**
 * Display form used in diagnostics: both dashes and underscores camel-cased.
 */
export function constantName(name: string): string {
  return camelize(camelize(name, "-"), "_");
}
