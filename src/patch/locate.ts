/**
 * Structural lookup of pinned scalars
 *
 * The YAML model is only read, never written back: it tells us where a
 * value lives so the text patch can be confined to the owning node.
 */

import { isNode, isScalar, parseAllDocuments, type Document } from 'yaml';

/** Path of keys and sequence indexes inside one YAML document */
export type YamlPath = Array<string | number>;

export interface LocatedScalar {
  /** Scalar value as written (numbers keep their source spelling) */
  value: string;
  /** Text offsets of the collection that owns the scalar */
  range?: [number, number];
}

/**
 * Parse every document of a multi-document YAML file.
 *
 * Documents with parse errors are returned as undefined so indexes stay
 * aligned with the source.
 */
export function parseManifestDocuments(text: string): Array<Document.Parsed | undefined> {
  return parseAllDocuments(text).map((doc) => (doc.errors.length > 0 ? undefined : doc));
}

/**
 * Parse a manifest into plain JavaScript values, one per document.
 */
export function loadManifestValues(text: string): unknown[] {
  return parseManifestDocuments(text).map((doc) => (doc ? doc.toJS() : undefined));
}

/**
 * Find the scalar at `path` and the text range of its parent collection.
 */
export function locateScalar(
  text: string,
  doc: Document.Parsed,
  path: YamlPath
): LocatedScalar | undefined {
  const node = doc.getIn(path, true);
  if (!isScalar(node)) {
    return undefined;
  }

  let value: string;
  if (typeof node.value === 'string') {
    value = node.value;
  } else if (node.range) {
    value = text.slice(node.range[0], node.range[1]).replace(/^["']|["']$/g, '');
  } else {
    value = String(node.value);
  }

  const parent = path.length > 1 ? doc.getIn(path.slice(0, -1), true) : doc.contents;
  const range: [number, number] | undefined =
    isNode(parent) && parent.range ? [parent.range[0], parent.range[2]] : undefined;

  return { value, range };
}
