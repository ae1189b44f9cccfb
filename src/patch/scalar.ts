/**
 * Format-preserving scalar replacement
 *
 * Rewrites a single `key: value` pair in raw YAML text. The document is
 * never re-serialized: comments, key order, indentation and the quoting
 * style around the value are left exactly as written.
 */

export interface ScalarPatch {
  /** Resulting text (unchanged when nothing matched) */
  text: string;
  /** 1 when a qualifying line was rewritten, 0 otherwise */
  occurrenceCount: 0 | 1;
}

/**
 * Outcome of patching a value inside a file
 */
export interface PatchResult {
  applied: boolean;
  previousValue: string;
  newValue: string;
  occurrenceCount: 0 | 1;
}

const QUOTE_STYLES = ['', '"', "'"] as const;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A value ends where the scalar ends; `1.0` must not match inside `1.0.1`.
 */
function endsScalar(text: string, index: number): boolean {
  return index >= text.length || !/[\w.\-+:/@]/.test(text[index]);
}

/**
 * Replace the first `key: oldValue` occurrence with `key: newValue`.
 *
 * Matching an unchanged value (oldValue === newValue) still counts as one
 * occurrence, so callers can verify the key is patchable.
 */
export function patchScalar(
  text: string,
  key: string,
  oldValue: string,
  newValue: string
): ScalarPatch {
  const pattern = new RegExp(
    `^(\\s*${escapeRegExp(key)}\\s*:\\s*)(["']?)${escapeRegExp(oldValue)}\\2(?=\\s|$)(.*)$`,
    'm'
  );

  const match = pattern.exec(text);
  if (match) {
    const [whole, prefix, quote, suffix] = match;
    const replaced = `${prefix}${quote}${newValue}${quote}${suffix}`;
    return {
      text: text.slice(0, match.index) + replaced + text.slice(match.index + whole.length),
      occurrenceCount: 1,
    };
  }

  // Narrower literal forms, e.g. inside a flow mapping
  for (const quote of QUOTE_STYLES) {
    const needle = `${key}: ${quote}${oldValue}${quote}`;
    let index = text.indexOf(needle);
    while (index !== -1 && !endsScalar(text, index + needle.length)) {
      index = text.indexOf(needle, index + 1);
    }
    if (index !== -1) {
      return {
        text:
          text.slice(0, index) +
          `${key}: ${quote}${newValue}${quote}` +
          text.slice(index + needle.length),
        occurrenceCount: 1,
      };
    }
  }

  return { text, occurrenceCount: 0 };
}

/**
 * Apply {@link patchScalar} to a slice of `text`, leaving the rest untouched.
 */
export function patchScalarInRange(
  text: string,
  range: readonly [number, number] | undefined,
  key: string,
  oldValue: string,
  newValue: string
): ScalarPatch {
  if (!range) {
    return patchScalar(text, key, oldValue, newValue);
  }

  const [start, end] = range;
  const patched = patchScalar(text.slice(start, end), key, oldValue, newValue);
  if (patched.occurrenceCount === 0) {
    return { text, occurrenceCount: 0 };
  }
  return {
    text: text.slice(0, start) + patched.text + text.slice(end),
    occurrenceCount: 1,
  };
}
