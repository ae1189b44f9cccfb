/**
 * Container image reconciliation
 */

import type { ImageEntry } from '../config/types.js';
import { splitImageTag } from '../discover/image-ref.js';
import { candidateExclusion, shouldIgnore, type ArtifactIdentity } from '../ignore/rules.js';
import { registryClassOf } from '../registries/index.js';
import { decideUpdate, majorUpgradeNotice, resolveVersions } from '../versions/resolve.js';
import { NO_VERSIONS_REASON, skippedResult, summarizeOutcomes, type ReconcileContext } from './context.js';
import { ManifestEditor, type ScalarLocation } from './manifest-file.js';
import type { ArtifactResult, LocationOutcome } from './types.js';

function formatPath(location: ScalarLocation): string {
  const path = location.path.map(String).join('.');
  return location.document > 0 ? `document ${location.document} ${path}` : path;
}

export async function reconcileImage(entry: ImageEntry, ctx: ReconcileContext): Promise<ArtifactResult> {
  const startedAt = Date.now();
  const base = { type: 'image' as const, name: entry.id, source: 'dockerImage' as const };
  const log = ctx.logger.child({ image: entry.id, registry: entry.registry });

  const identity: ArtifactIdentity = { kind: 'container-image', id: entry.id, repository: entry.repository };
  const ignored = shouldIgnore(identity, '', ctx.rules);
  if (ignored.ignored) {
    log.info(`Skipping: ${ignored.reason}`);
    return skippedResult(base, ignored.reason ?? 'ignored', startedAt);
  }

  const location: ScalarLocation = { file: entry.file, document: entry.document ?? 0, path: entry.yamlPath };
  const manifest = await ctx.editor.load(entry.file);
  const image = ManifestEditor.locate(manifest, location)?.value;
  if (!image) {
    const reason = `no image at ${formatPath(location)} in ${entry.file}`;
    log.warn(reason);
    return skippedResult(base, reason, startedAt);
  }

  const { name, tag } = splitImageTag(image);
  if (!tag) {
    const reason = `no tag in image '${image}'`;
    log.warn(reason);
    return skippedResult(base, reason, startedAt);
  }


  const tags = await ctx.gates.run(registryClassOf(entry.registry), () =>
    ctx.provider.listImageTags(entry.registry, entry.repository)
  );
  if (tags.length === 0) {
    log.warn(`No tags found for ${entry.repository}`);
    return skippedResult(base, NO_VERSIONS_REASON, startedAt);
  }

  const resolution = resolveVersions(tag, tags, candidateExclusion(identity, ctx.rules));
  if (resolution.variantFallback) {
    log.warn(`No '${resolution.currentVariant}' tags, resolved across variants`);
  }

  const majorUpgrade = majorUpgradeNotice(entry.id, tag, resolution);
  if (majorUpgrade) {
    log.info(
      `New major available: ${majorUpgrade.availableTag} ` +
        `(current major ${majorUpgrade.currentMajor}, new major ${majorUpgrade.newMajor})`
    );
  }

  const decision = decideUpdate(tag, resolution);
  let outcome: LocationOutcome;
  if (decision.action === 'up-to-date') {
    log.debug(`Up to date at ${tag}`);
    outcome = { status: 'up-to-date' };
  } else if (decision.action === 'skip') {
    log.info(`Skipping: ${decision.reason}`);
    outcome = { status: 'skipped', reason: decision.reason };
  } else {
    const next = `${name}:${decision.to}`;
    const patched = await ctx.editor.replace(location, image, next);
    if (patched.applied) {
      log.info(`${entry.file}: ${image} → ${next}`);
      outcome = { status: 'applied', change: { type: 'image', id: entry.id, file: entry.file, from: image, to: next } };
    } else {
      log.warn(`Could not replace image '${image}' in ${entry.file}`);
      outcome = { status: 'skipped', reason: `could not apply: no matching line in ${entry.file}` };
    }
  }

  return summarizeOutcomes(base, [outcome], {
    majorUpgrade,
    variantFallback: resolution.variantFallback,
    startedAt,
  });
}
