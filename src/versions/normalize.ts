/**
 * Tag normalization
 *
 * Converts the tag dialects found on container registries and chart
 * repositories into a canonical dotted-decimal form with an optional
 * `.postN` suffix:
 *
 * - Image patch builds:  v1.24.1-p1 → 1.24.1.post1
 * - Package revisions:   v1.24.1-2  → 1.24.1.post2
 * - Plain releases:      v1.24.1    → 1.24.1
 * - Variant tags:        1.24.1-alpine3.19 → 1.24.1
 */

// Order matters: the suffix dialects must win over the plain triplet and the
// leading-digits fallback, which would drop the post-release number.
const PATCH_SUFFIX = /^v?(\d+\.\d+\.\d+)-p(\d+)$/;
const REVISION_SUFFIX = /^v?(\d+\.\d+\.\d+)-(\d+)$/;
const PLAIN_RELEASE = /^v?(\d+\.\d+\.\d+)$/;

/**
 * Longest prefix of `text` made only of digits and dots.
 */
export function leadingVersionCore(text: string): string {
  const match = /^[\d.]*/.exec(text);
  return match ? match[0] : '';
}

/**
 * Normalize a tag into canonical version text.
 *
 * @returns the canonical form, or an empty string when no numeric content is recoverable
 *
 * @example
 * normalizeVersion('v1.24.1-p2') // '1.24.1.post2'
 * normalizeVersion('latest')     // ''
 */
export function normalizeVersion(tag: string): string {
  let match = PATCH_SUFFIX.exec(tag);
  if (match) {
    return `${match[1]}.post${match[2]}`;
  }

  match = REVISION_SUFFIX.exec(tag);
  if (match) {
    return `${match[1]}.post${match[2]}`;
  }

  match = PLAIN_RELEASE.exec(tag);
  if (match) {
    return match[1];
  }

  return leadingVersionCore(tag.replace(/^v/, ''));
}
