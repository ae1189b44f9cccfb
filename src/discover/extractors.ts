/**
 * Per-format inventory extractors
 *
 * Each extractor receives one manifest file as parsed documents and
 * returns the references it recognises. Grouping, de-duplication and
 * sorting happen in {@link discoverInventory}.
 */

import type { YamlPath } from '../patch/locate.js';
import { isRecord, stringProp } from '../utils/guards.js';
import { imageId, isTrackableImage, parseImageReference } from './image-ref.js';
import type { ArgoAppEntry, ImageEntry } from '../config/types.js';

/** One chart reference found in one file */
export interface ChartReference {
  name: string;
  repoUrl: string;
  file: string;
}

/** Kinds whose documents carry container images */
export const WORKLOAD_KINDS: ReadonlySet<string> = new Set([
  'Deployment',
  'StatefulSet',
  'DaemonSet',
  'Job',
  'CronJob',
  'Pod',
  'ReplicaSet',
  'ReplicationController',
]);

function isHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Argo CD Applications sourcing a chart from an HTTP Helm repository.
 */
export function extractArgoApps(file: string, documents: unknown[]): ArgoAppEntry[] {
  const apps: ArgoAppEntry[] = [];
  for (const doc of documents) {
    if (!isRecord(doc) || doc.kind !== 'Application' || !isRecord(doc.spec)) {
      continue;
    }
    const source = doc.spec.source;
    if (!isRecord(source)) {
      continue;
    }
    const chart = stringProp(source, 'chart');
    const repoUrl = stringProp(source, 'repoURL');
    // Git sources have no Helm index to query
    if (chart && repoUrl && isHttpUrl(repoUrl) && !repoUrl.endsWith('.git')) {
      apps.push({ name: chart, repoUrl, file });
    }
  }
  return apps;
}

function chartList(
  file: string,
  documents: unknown[],
  listKey: string,
  repoKey: string,
  requireHttp: boolean
): ChartReference[] {
  const doc = documents[0];
  const list = isRecord(doc) ? doc[listKey] : undefined;
  if (!Array.isArray(list)) {
    return [];
  }

  const refs: ChartReference[] = [];
  for (const item of list) {
    if (!isRecord(item)) continue;
    const name = stringProp(item, 'name');
    const repoUrl = stringProp(item, repoKey);
    if (!name || !repoUrl || (requireHttp && !isHttpUrl(repoUrl))) {
      continue;
    }
    refs.push({ name, repoUrl, file });
  }
  return refs;
}

/**
 * `helmCharts[]` entries of a kustomization.yaml.
 */
export function extractKustomizeCharts(file: string, documents: unknown[]): ChartReference[] {
  return chartList(file, documents, 'helmCharts', 'repo', false);
}

/**
 * `dependencies[]` of a Chart.yaml; local (`file://`, alias) repositories are skipped.
 */
export function extractChartDependencies(file: string, documents: unknown[]): ChartReference[] {
  return chartList(file, documents, 'dependencies', 'repository', true);
}

/**
 * Every string `image` field in a document, with its path.
 */
export function findImageFields(value: unknown, path: YamlPath = []): Array<{ path: YamlPath; image: string }> {
  const found: Array<{ path: YamlPath; image: string }> = [];

  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => {
      found.push(...findImageFields(item, [...path, index]));
    });
  } else if (isRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      if (key === 'image' && typeof child === 'string') {
        found.push({ path: [...path, key], image: child });
      } else {
        found.push(...findImageFields(child, [...path, key]));
      }
    }
  }

  return found;
}

/**
 * Tagged container images of the workload documents in a file.
 */
export function extractImages(file: string, documents: unknown[]): ImageEntry[] {
  const images: ImageEntry[] = [];

  documents.forEach((doc, index) => {
    if (!isRecord(doc) || typeof doc.kind !== 'string' || !WORKLOAD_KINDS.has(doc.kind)) {
      return;
    }

    for (const { path, image } of findImageFields(doc)) {
      if (!isTrackableImage(image)) {
        continue;
      }
      const { registry, repository } = parseImageReference(image);
      const entry: ImageEntry = {
        id: imageId(repository),
        registry,
        repository,
        file,
        yamlPath: path,
      };
      if (index > 0) {
        entry.document = index;
      }
      images.push(entry);
    }
  });

  return images;
}
