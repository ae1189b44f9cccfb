/**
 * Candidate eligibility for automatic updates
 */

import { extractVariant } from './variant.js';

const BUILD_TAG = /^\d+\.\d+\.\d+-b(\d+)?$/;
const REJECTED_MARKERS = ['alpha', 'beta', 'rc'];

/**
 * Decide whether an upstream tag may be proposed as an update.
 *
 * Rules, in order:
 * 1. `X.Y.Z-b` / `X.Y.Z-bN` build tags are always accepted.
 * 2. Tags containing alpha, beta or rc (any case) are rejected.
 * 3. The tag's variant must equal `requiredVariant`; an absent variant
 *    only matches an absent variant.
 */
export function isCandidate(tag: string, requiredVariant: string | undefined): boolean {
  if (BUILD_TAG.test(tag)) {
    return true;
  }

  const lower = tag.toLowerCase();
  if (REJECTED_MARKERS.some((marker) => lower.includes(marker))) {
    return false;
  }

  return extractVariant(tag) === requiredVariant;
}
