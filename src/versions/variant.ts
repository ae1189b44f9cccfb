/**
 * Build-variant classification (alpine, slim, debian, ...)
 */

import { leadingVersionCore } from './normalize.js';

/**
 * Extract the build variant that follows a tag's numeric core.
 *
 * @returns the lower-cased alphabetic label, or undefined when the tag has none
 *
 * @example
 * extractVariant('18.1-alpine3.22')      // 'alpine'
 * extractVariant('1.2.3-slim-bookworm')  // 'slim'
 * extractVariant('1.2.3')                // undefined
 */
export function extractVariant(tag: string): string | undefined {
  const text = tag.replace(/^v/, '');
  const core = leadingVersionCore(text);
  if (!core) {
    return undefined;
  }

  let remainder = text.slice(core.length);
  if (!remainder) {
    return undefined;
  }

  // One separator character
  if (/^[^A-Za-z0-9]/.test(remainder)) {
    remainder = remainder.slice(1);
  }
  if (!remainder) {
    return undefined;
  }

  const match = /^[A-Za-z]+/.exec(remainder);
  return match ? match[0].toLowerCase() : undefined;
}
