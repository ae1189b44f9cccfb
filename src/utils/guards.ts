/**
 * Narrowing helpers for parsed YAML and JSON
 */

export type Fields = Record<string, unknown>;

export function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Non-empty string field, or undefined
 */
export function stringProp(record: Fields, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * The string members of a list; anything else yields an empty list
 */
export function stringItems(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item: unknown): item is string => typeof item === 'string');
}
