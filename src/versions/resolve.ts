/**
 * Resolution policy
 *
 * Given the tag currently pinned in a manifest and every tag published
 * upstream, pick the best tag within the current major version (the only
 * value ever applied automatically) and the best tag overall (reported as
 * an available major upgrade, never applied).
 */

import { isCandidate } from './candidate.js';
import { extractVariant } from './variant.js';
import {
  compareVersions,
  hasPrereleaseMarker,
  majorOf,
  parseVersion,
  type NormalizedVersion,
} from './version.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Predicate that removes upstream tags before candidate filtering.
 * Returns true for tags that must not be considered.
 */
export type CandidateExclusion = (tag: string) => boolean;

interface Candidate {
  tag: string;
  version: NormalizedVersion;
}

export interface Resolution {
  /** Parsed current version; null when the current tag has no numeric core */
  current: NormalizedVersion | null;
  /** Variant of the current tag */
  currentVariant?: string;
  /** Best candidate sharing the current major */
  bestSameMajor?: string;
  /** Best candidate of any major */
  bestOverall?: string;
  /** Whether candidates were taken without the variant filter */
  variantFallback: boolean;
  /** Number of accepted candidates */
  candidateCount: number;
  /** Latest stable upstream tag, used when the current tag cannot be parsed */
  latestStable?: string;
}

export type UpdateDecision =
  | { action: 'update'; from: string; to: string }
  | { action: 'up-to-date' }
  | { action: 'skip'; reason: string };

/**
 * Informational notice for a newer major version
 */
export interface MajorUpgradeNotice {
  id: string;
  currentTag: string;
  availableTag: string;
  currentMajor: number;
  newMajor: number;
}

// =============================================================================
// Helpers
// =============================================================================

function collectCandidates(tags: string[], requiredVariant: string | undefined): Candidate[] {
  const candidates: Candidate[] = [];
  for (const tag of tags) {
    if (!isCandidate(tag, requiredVariant)) {
      continue;
    }
    const version = parseVersion(tag);
    if (version) {
      candidates.push({ tag, version });
    }
  }
  return candidates;
}

function maxCandidate(candidates: Candidate[]): Candidate | undefined {
  let best: Candidate | undefined;
  for (const candidate of candidates) {
    if (!best || compareVersions(candidate.version, best.version) > 0) {
      best = candidate;
    }
  }
  return best;
}

// =============================================================================
// Policy
// =============================================================================

/**
 * Latest stable tag among `versions`, ignoring prerelease-marked and
 * unparseable entries.
 *
 * @example
 * latestStable(['1.0.0', '1.1.0', '2.0.0-rc1']) // '1.1.0'
 */
export function latestStable(versions: string[]): string | undefined {
  const stable: Candidate[] = [];
  for (const tag of versions) {
    if (hasPrereleaseMarker(tag)) {
      continue;
    }
    const version = parseVersion(tag);
    if (version && !version.prerelease) {
      stable.push({ tag, version });
    }
  }
  return maxCandidate(stable)?.tag;
}

/**
 * Resolve the best same-major and overall candidates for a current tag.
 */
export function resolveVersions(
  currentTag: string,
  availableTags: string[],
  exclude?: CandidateExclusion
): Resolution {
  const pool = exclude ? availableTags.filter((tag) => !exclude(tag)) : availableTags;
  const current = parseVersion(currentTag);

  if (!current) {
    return {
      current: null,
      variantFallback: false,
      candidateCount: 0,
      latestStable: latestStable(pool),
    };
  }

  const currentVariant = extractVariant(currentTag);
  let candidates = collectCandidates(pool, currentVariant);
  let variantFallback = false;

  // Only when nothing matches the variant at all
  if (candidates.length === 0 && currentVariant !== undefined) {
    candidates = collectCandidates(pool, undefined);
    variantFallback = candidates.length > 0;
  }

  const currentMajor = majorOf(current);
  const sameMajor = candidates.filter((c) => majorOf(c.version) === currentMajor);

  return {
    current,
    currentVariant,
    bestSameMajor: maxCandidate(sameMajor)?.tag,
    bestOverall: maxCandidate(candidates)?.tag,
    variantFallback,
    candidateCount: candidates.length,
  };
}

/**
 * Turn a resolution into the action to take for the pinned value.
 */
export function decideUpdate(currentTag: string, resolution: Resolution): UpdateDecision {
  const { current } = resolution;

  if (!current) {
    if (resolution.latestStable !== undefined && resolution.latestStable === currentTag) {
      return { action: 'up-to-date' };
    }
    return { action: 'skip', reason: `cannot parse current version '${currentTag}'` };
  }

  if (resolution.candidateCount === 0) {
    const variantNote = resolution.currentVariant ? ` with variant '${resolution.currentVariant}'` : '';
    return { action: 'skip', reason: `no parseable candidate versions${variantNote}` };
  }

  if (resolution.bestSameMajor === undefined) {
    return { action: 'skip', reason: `no candidate within major ${majorOf(current)}` };
  }

  const target = parseVersion(resolution.bestSameMajor);
  if (!target || compareVersions(target, current) <= 0) {
    return { action: 'up-to-date' };
  }

  return { action: 'update', from: currentTag, to: resolution.bestSameMajor };
}

/**
 * Notice for a newer major, when the best overall candidate crosses one.
 */
export function majorUpgradeNotice(
  id: string,
  currentTag: string,
  resolution: Resolution
): MajorUpgradeNotice | undefined {
  if (!resolution.current || resolution.bestOverall === undefined) {
    return undefined;
  }
  const overall = parseVersion(resolution.bestOverall);
  if (!overall) {
    return undefined;
  }

  const currentMajor = majorOf(resolution.current);
  const newMajor = majorOf(overall);
  if (newMajor <= currentMajor) {
    return undefined;
  }

  return {
    id,
    currentTag,
    availableTag: resolution.bestOverall,
    currentMajor: Number(currentMajor),
    newMajor: Number(newMajor),
  };
}
