/**
 * Helm chart reconciliation
 *
 * A chart entry may be pinned in several files (and several times in one
 * kustomization or Chart.yaml). The chart index is fetched once per
 * entry; each location is then resolved and patched on its own.
 */

import type { ChartEntry, UpdateConfig } from '../config/types.js';
import { HELM_REGISTRY_CLASS } from '../concurrency/registry-gates.js';
import { candidateExclusion, shouldIgnore, type ArtifactIdentity } from '../ignore/rules.js';
import { isRecord } from '../utils/guards.js';
import {
  decideUpdate,
  majorUpgradeNotice,
  resolveVersions,
  type MajorUpgradeNotice,
} from '../versions/resolve.js';
import { NO_VERSIONS_REASON, skippedResult, summarizeOutcomes, type ReconcileContext } from './context.js';
import { ManifestEditor, type ScalarLocation } from './manifest-file.js';
import type { ArtifactResult, ChartSourceKind, LocationOutcome } from './types.js';

/**
 * One chart inventory entry, whatever section it came from
 */
export interface ChartArtifact {
  source: ChartSourceKind;
  name: string;
  repoUrl: string;
  files: string[];
}

interface ChartTarget {
  location: ScalarLocation;
  current: string;
}

/**
 * Flatten the chart sections of a config into artifacts.
 */
export function chartArtifacts(config: UpdateConfig): ChartArtifact[] {
  const fromEntries = (source: ChartSourceKind, entries: ChartEntry[] | undefined): ChartArtifact[] =>
    (entries ?? []).map((entry) => ({ source, name: entry.name, repoUrl: entry.repoUrl, files: entry.files }));

  return [
    ...(config.argoApps ?? []).map(
      (app): ChartArtifact => ({ source: 'argoApplication', name: app.name, repoUrl: app.repoUrl, files: [app.file] })
    ),
    ...fromEntries('kustomizeHelm', config.kustomizeHelmCharts),
    ...fromEntries('chartDependency', config.chartDependencies),
  ];
}

/**
 * Paths of the version scalars for `chart` in one file's documents.
 *
 * @returns the paths, or a reason when the file has none
 */
export function findChartVersionPaths(
  source: ChartSourceKind,
  chart: string,
  values: unknown[]
): Array<Omit<ScalarLocation, 'file'>> | string {
  if (source === 'argoApplication') {
    const found: Array<Omit<ScalarLocation, 'file'>> = [];
    let sawSource = false;
    values.forEach((doc, document) => {
      if (!isRecord(doc) || doc.kind !== 'Application' || !isRecord(doc.spec) || !isRecord(doc.spec.source)) {
        return;
      }
      sawSource = true;
      if (doc.spec.source.chart === chart) {
        found.push({ document, path: ['spec', 'source', 'targetRevision'] });
      }
    });
    if (found.length > 0) return found;
    return sawSource ? `spec.source.chart does not match ${chart}` : 'no spec.source';
  }

  const listKey = source === 'kustomizeHelm' ? 'helmCharts' : 'dependencies';
  const doc = values[0];
  const list = isRecord(doc) ? doc[listKey] : undefined;
  if (!Array.isArray(list)) {
    return `no ${listKey} list`;
  }

  const found: Array<Omit<ScalarLocation, 'file'>> = [];
  list.forEach((item: unknown, index: number) => {
    if (isRecord(item) && item.name === chart) {
      found.push({ document: 0, path: [listKey, index, 'version'] });
    }
  });
  return found.length > 0 ? found : `no ${listKey} entry for ${chart}`;
}

async function collectTargets(
  artifact: ChartArtifact,
  editor: ManifestEditor
): Promise<{ targets: ChartTarget[]; problems: string[] }> {
  const targets: ChartTarget[] = [];
  const problems: string[] = [];

  for (const file of artifact.files) {
    const manifest = await editor.load(file);
    const paths = findChartVersionPaths(artifact.source, artifact.name, manifest.values);
    if (typeof paths === 'string') {
      problems.push(`${file}: ${paths}`);
      continue;
    }
    for (const { document, path } of paths) {
      const location: ScalarLocation = { file, document, path };
      const current = ManifestEditor.locate(manifest, location)?.value;
      if (current) {
        targets.push({ location, current });
      } else {
        problems.push(`${file}: empty ${String(path[path.length - 1])} for ${artifact.name}`);
      }
    }
  }

  return { targets, problems };
}

export async function reconcileChart(artifact: ChartArtifact, ctx: ReconcileContext): Promise<ArtifactResult> {
  const startedAt = Date.now();
  const base = { type: 'chart' as const, name: artifact.name, source: artifact.source };
  const log = ctx.logger.child({ chart: artifact.name, source: artifact.source });

  // Ignored charts are never read
  const identity: ArtifactIdentity = { kind: 'helm-chart', name: artifact.name };
  const ignored = shouldIgnore(identity, '', ctx.rules);
  if (ignored.ignored) {
    log.info(`Skipping: ${ignored.reason}`);
    return skippedResult(base, ignored.reason ?? 'ignored', startedAt);
  }

  const { targets, problems } = await collectTargets(artifact, ctx.editor);
  for (const problem of problems) {
    log.warn(problem);
  }
  if (targets.length === 0) {
    return skippedResult(base, problems[0] ?? 'no files', startedAt);
  }

  const versions = await ctx.gates.run(HELM_REGISTRY_CLASS, () =>
    ctx.provider.listChartVersions(artifact.repoUrl, artifact.name)
  );
  if (versions.length === 0) {
    log.warn(`No versions found in ${artifact.repoUrl}`);
    return skippedResult(base, NO_VERSIONS_REASON, startedAt);
  }

  const exclude = candidateExclusion(identity, ctx.rules);
  const outcomes: LocationOutcome[] = problems.map((reason) => ({ status: 'skipped', reason }));
  let majorUpgrade: MajorUpgradeNotice | undefined;
  let variantFallback = false;

  for (const { location, current } of targets) {
    const resolution = resolveVersions(current, versions, exclude);
    if (resolution.variantFallback) {
      variantFallback = true;
      log.warn(`No '${resolution.currentVariant}' versions, resolved across variants`, { file: location.file });
    }
    if (!majorUpgrade) {
      majorUpgrade = majorUpgradeNotice(artifact.name, current, resolution);
    }

    const decision = decideUpdate(current, resolution);
    log.debug(`${location.file}: current=${current}`, { decision: decision.action });

    if (decision.action === 'up-to-date') {
      outcomes.push({ status: 'up-to-date' });
      continue;
    }
    if (decision.action === 'skip') {
      outcomes.push({ status: 'skipped', reason: decision.reason });
      continue;
    }

    const patched = await ctx.editor.replace(location, decision.from, decision.to);
    if (!patched.applied) {
      log.warn(`Could not apply ${decision.from} → ${decision.to} in ${location.file}`);
      outcomes.push({ status: 'skipped', reason: `could not apply: no matching line in ${location.file}` });
      continue;
    }

    log.info(`${location.file}: ${decision.from} → ${decision.to}`);
    outcomes.push({
      status: 'applied',
      change: {
        type: 'chart',
        kind: artifact.source,
        name: artifact.name,
        file: location.file,
        from: decision.from,
        to: decision.to,
      },
    });
  }

  return summarizeOutcomes(base, outcomes, { majorUpgrade, variantFallback, startedAt });
}
