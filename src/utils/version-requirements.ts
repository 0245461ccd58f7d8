import * as semver from 'semver';

/**
 * Component version requirements
 *
 * Requirements follow npm semver range syntax with one difference: a bare
 * version such as `1.2.0` means "compatible with 1.2.0" (`^1.2.0`), the way
 * component pins are written in flows. Use `=1.2.0` to pin exactly.
 */

export const ANY_VERSION = '*';

/**
 * Normalize a requirement into a semver range, or null when it cannot be parsed
 */
export function normalizeVersionRequirement(requirement: string | undefined): string | null {
  const trimmed = (requirement ?? '').trim();
  if (trimmed === '') {
    return ANY_VERSION;
  }
  if (semver.valid(trimmed)) {
    return `^${trimmed}`;
  }
  return semver.validRange(trimmed) ? trimmed : null;
}

export function isValidVersionRequirement(requirement: string | undefined): boolean {
  return normalizeVersionRequirement(requirement) !== null;
}

export interface VersionSelection {
  version: string | null;
  satisfying: string[];
}

/**
 * Pick the highest version satisfying the requirement.
 * Prereleases are only considered when the requirement names one.
 */
export function selectHighestSatisfying(versions: readonly string[], requirement: string): VersionSelection {
  const range = normalizeVersionRequirement(requirement);
  if (range === null) {
    return { version: null, satisfying: [] };
  }

  const satisfying = versions
    .filter(version => semver.valid(version) && semver.satisfies(version, range))
    .sort(semver.rcompare);

  return { version: satisfying[0] ?? null, satisfying };
}

/**
 * Sort versions ascending for display
 */
export function sortVersions(versions: Iterable<string>): string[] {
  return Array.from(new Set(versions)).filter(v => semver.valid(v)).sort(semver.compare);
}
