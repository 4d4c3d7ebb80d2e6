import type { PreparedPackage } from "../types/index.js";

export function normalizeVersion(version: string): string {
  return version.startsWith("v") ? version.slice(1) : version;
}

export function isSameVersion(a: string, b: string): boolean {
  return normalizeVersion(a) === normalizeVersion(b);
}

/** The version to install: the fixed override when present, otherwise the latest release. */
export function targetVersion(pkg: PreparedPackage, latest: string): string {
  return pkg.descriptor.version.fixed ?? latest;
}

export function isAlreadyLatest(
  current: string | undefined,
  pkg: PreparedPackage,
  latest: string,
): boolean {
  if (current === undefined) return false;
  return isSameVersion(current, targetVersion(pkg, latest));
}

/**
 * Substitutes a version into a download URL template.
 * `%v` becomes the version with a "v" prefix, `%n` the bare number.
 */
export function expandDownloadUrl(template: string, version: string): string {
  const bare = normalizeVersion(version);
  return template.replaceAll("%v", `v${bare}`).replaceAll("%n", bare);
}
