/**
 * Version helpers for upgrade applicability decisions.
 */

import * as semver from 'semver';
import { ErrorCode } from '../errors/error-codes';
import { LintError } from '../errors/lint-error';

export type Version = semver.SemVer;

/**
 * Parse a version leniently: a leading "v" and missing minor/patch parts are
 * accepted ("3.0" → 3.0.0). Pre-release tags are kept.
 */
export function parseVersion(input: string): Version {
  const trimmed = input.trim().replace(/^v/, '');
  const strict = semver.parse(trimmed);
  if (strict) {
    return strict;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const coerced = semver.coerce(trimmed);
    if (coerced) {
      return coerced;
    }
  }

  throw new LintError(ErrorCode.L103_INVALID_VERSION, `"${input}"`);
}

/**
 * Same as parseVersion, but undefined for empty or unparseable input.
 */
export function tryParseVersion(input: string | undefined): Version | undefined {
  if (!input) {
    return undefined;
  }
  try {
    return parseVersion(input);
  } catch {
    return undefined;
  }
}

/**
 * Upgrade from any 2.x to any 3.x. Later majors may carry different rules.
 */
export function isUpgradeFrom2xTo3x(from: Version | undefined, to: Version | undefined): boolean {
  if (!from || !to) {
    return false;
  }
  return from.major === 2 && to.major === 3;
}

/**
 * major.minor comparison; patch is ignored.
 */
export function isVersionAtLeast(version: Version | undefined, major: number, minor: number): boolean {
  if (!version) {
    return false;
  }
  if (version.major > major) {
    return true;
  }
  return version.major === major && version.minor >= minor;
}

export function sameMajorMinor(a: Version, b: Version): boolean {
  return a.major === b.major && a.minor === b.minor;
}

export function majorMinorLabel(version: Version): string {
  return `${version.major}.${version.minor}`;
}
