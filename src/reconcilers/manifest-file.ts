/**
 * Manifest file access for reconcilers
 *
 * Every read-patch-write cycle runs under one process-wide mutex so two
 * artifacts pinned in the same file never lose each other's edit. The
 * file is re-read inside the lock and the value re-located, since an
 * earlier edit may have shifted offsets.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import type { Document } from 'yaml';
import { Mutex } from '../concurrency/gate.js';
import { locateScalar, parseManifestDocuments, type LocatedScalar, type YamlPath } from '../patch/locate.js';
import { patchScalarInRange, type PatchResult } from '../patch/scalar.js';

/**
 * A scalar inside a manifest file
 */
export interface ScalarLocation {
  /** Path relative to the repository root */
  file: string;
  /** Document index in a multi-document file */
  document: number;
  path: YamlPath;
}

export interface LoadedManifest {
  text: string;
  /** Parsed documents; undefined where a document failed to parse */
  documents: Array<Document.Parsed | undefined>;
  /** Plain values of each document */
  values: unknown[];
}

export interface ManifestEditorOptions {
  /** Patch in memory only */
  dryRun?: boolean;
  /** Shared file lock (default: a new one) */
  mutex?: Mutex;
}

export class ManifestEditor {
  readonly dryRun: boolean;
  private readonly mutex: Mutex;

  constructor(
    private readonly root: string,
    options: ManifestEditorOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
    this.mutex = options.mutex ?? new Mutex();
  }

  resolvePath(file: string): string {
    return isAbsolute(file) ? file : join(this.root, file);
  }

  async load(file: string): Promise<LoadedManifest> {
    const text = await readFile(this.resolvePath(file), 'utf-8');
    const documents = parseManifestDocuments(text);
    const values: unknown[] = documents.map((doc) => (doc ? doc.toJS() : undefined));
    return { text, documents, values };
  }

  /**
   * Current value at a location of an already loaded manifest.
   */
  static locate(manifest: LoadedManifest, location: ScalarLocation): LocatedScalar | undefined {
    const doc = manifest.documents[location.document];
    return doc ? locateScalar(manifest.text, doc, location.path) : undefined;
  }

  /**
   * Replace `expected` with `next` at a location.
   *
   * Nothing is applied when the value has changed since it was read or
   * the patcher finds no qualifying line. In dry-run the file is never
   * written.
   */
  replace(location: ScalarLocation, expected: string, next: string): Promise<PatchResult> {
    const notApplied: PatchResult = {
      applied: false,
      previousValue: expected,
      newValue: next,
      occurrenceCount: 0,
    };
    const key = location.path[location.path.length - 1];
    if (typeof key !== 'string') {
      return Promise.resolve(notApplied);
    }

    return this.mutex.run(async () => {
      const manifest = await this.load(location.file);
      const located = ManifestEditor.locate(manifest, location);
      if (!located || located.value !== expected) {
        return notApplied;
      }

      const patched = patchScalarInRange(manifest.text, located.range, key, expected, next);
      if (patched.occurrenceCount === 0) {
        return notApplied;
      }

      if (!this.dryRun) {
        await writeFile(this.resolvePath(location.file), patched.text, 'utf-8');
      }
      return { applied: true, previousValue: expected, newValue: next, occurrenceCount: 1 };
    });
  }
}
