/**
 * Comparable version values
 *
 * Parses the canonical text produced by {@link normalizeVersion} into a
 * release tuple plus an optional post-release number, and orders them.
 * Release tuples compare numerically with missing trailing components
 * treated as zero (1.2 == 1.2.0); a post-release sorts after its base
 * release (1.2.0 < 1.2.0.post0 < 1.2.0.post1).
 */

import { normalizeVersion } from './normalize.js';

/** Markers that identify prerelease tags in raw upstream text */
export const PRERELEASE_MARKERS = ['alpha', 'beta', 'rc', '-pre', '.pre'] as const;

export interface NormalizedVersion {
  /** Release components (major, minor, patch, ...); date-stamped tags exceed 2^53 */
  release: bigint[];
  /** Post-release number, when the tag carried a numeric build suffix */
  post?: bigint;
  /** Whether the raw tag carries a prerelease marker */
  prerelease: boolean;
}

const CANONICAL = /^(\d+(?:\.\d+)*)(?:\.post(\d+))?$/;

/**
 * Whether the raw tag text carries a prerelease marker (case-insensitive).
 */
export function hasPrereleaseMarker(tag: string): boolean {
  const lower = tag.toLowerCase();
  return PRERELEASE_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Parse canonical version text.
 *
 * @returns null for empty or malformed text such as `1.` or `1..2`
 */
export function parseCanonical(text: string, prerelease = false): NormalizedVersion | null {
  const match = CANONICAL.exec(text);
  if (!match) {
    return null;
  }

  const version: NormalizedVersion = {
    release: match[1].split('.').map((part) => BigInt(part)),
    prerelease,
  };
  if (match[2] !== undefined) {
    version.post = BigInt(match[2]);
  }
  return version;
}

/**
 * Normalize and parse a raw tag.
 *
 * Unparseable input is not an error; callers exclude it.
 */
export function parseVersion(tag: string): NormalizedVersion | null {
  const normalized = normalizeVersion(tag);
  if (!normalized) {
    return null;
  }
  return parseCanonical(normalized, hasPrereleaseMarker(tag));
}

function compareComponents(a: bigint, b: bigint): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

/**
 * Total order over parsed versions.
 *
 * @returns negative when a < b, zero when equal, positive when a > b
 */
export function compareVersions(a: NormalizedVersion, b: NormalizedVersion): number {
  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i++) {
    const diff = compareComponents(a.release[i] ?? 0n, b.release[i] ?? 0n);
    if (diff !== 0) {
      return diff;
    }
  }

  const postDiff = compareComponents(a.post ?? -1n, b.post ?? -1n);
  if (postDiff !== 0) {
    return postDiff;
  }

  // A prerelease of an otherwise equal version sorts first
  return Number(!a.prerelease) - Number(!b.prerelease);
}

/**
 * Major component of a parsed version.
 */
export function majorOf(version: NormalizedVersion): bigint {
  return version.release[0] ?? 0n;
}

/**
 * Render a parsed version back to canonical text.
 */
export function formatVersion(version: NormalizedVersion): string {
  const release = version.release.join('.');
  return version.post === undefined ? release : `${release}.post${version.post}`;
}
