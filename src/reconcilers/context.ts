/**
 * Shared reconciliation plumbing
 */

import type { ApiLogger } from '../api/logger.js';
import type { RegistryGates } from '../concurrency/registry-gates.js';
import type { IgnoreRuleSet } from '../ignore/rules.js';
import type { VersionProvider } from '../registries/index.js';
import type { MajorUpgradeNotice } from '../versions/resolve.js';
import type { ManifestEditor } from './manifest-file.js';
import type { ArtifactResult, ArtifactStatus, LocationOutcome, VersionChange } from './types.js';

/** Reason reported when a provider returns nothing */
export const NO_VERSIONS_REASON = 'no versions available';

export interface ReconcileContext {
  editor: ManifestEditor;
  provider: VersionProvider;
  gates: RegistryGates;
  rules: IgnoreRuleSet;
  logger: ApiLogger;
}

/**
 * Fold per-location outcomes into one artifact result.
 *
 * Any applied edit makes the artifact applied; otherwise the first skip
 * reason wins over up-to-date locations.
 */
export function summarizeOutcomes(
  base: Pick<ArtifactResult, 'type' | 'name' | 'source'>,
  outcomes: LocationOutcome[],
  extras: { majorUpgrade?: MajorUpgradeNotice; variantFallback: boolean; startedAt: number }
): ArtifactResult {
  const changes: VersionChange[] = [];
  let reason: string | undefined;
  for (const outcome of outcomes) {
    if (outcome.status === 'applied') {
      changes.push(outcome.change);
    } else if (outcome.status === 'skipped' && reason === undefined) {
      reason = outcome.reason;
    }
  }

  let status: ArtifactStatus;
  if (changes.length > 0) {
    status = 'applied';
  } else if (reason !== undefined) {
    status = 'skipped';
  } else {
    status = 'up-to-date';
  }

  const result: ArtifactResult = {
    ...base,
    status,
    changes,
    variantFallback: extras.variantFallback,
    durationMs: Date.now() - extras.startedAt,
  };
  if (status === 'skipped') {
    result.reason = reason;
  }
  if (extras.majorUpgrade) {
    result.majorUpgrade = extras.majorUpgrade;
  }
  return result;
}

/**
 * Result for an artifact skipped before any location was resolved.
 */
export function skippedResult(
  base: Pick<ArtifactResult, 'type' | 'name' | 'source'>,
  reason: string,
  startedAt: number
): ArtifactResult {
  return {
    ...base,
    status: 'skipped',
    reason,
    changes: [],
    variantFallback: false,
    durationMs: Date.now() - startedAt,
  };
}
