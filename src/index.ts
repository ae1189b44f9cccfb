/**
 * manifest-bumper library entry point
 *
 * The CLI lives in cli.ts; everything it does is available here for
 * programmatic use.
 */

// Version resolution
export { normalizeVersion, leadingVersionCore } from './versions/normalize.js';
export {
  parseVersion,
  parseCanonical,
  compareVersions,
  majorOf,
  formatVersion,
  hasPrereleaseMarker,
  PRERELEASE_MARKERS,
  type NormalizedVersion,
} from './versions/version.js';
export { extractVariant } from './versions/variant.js';
export { isCandidate } from './versions/candidate.js';
export {
  resolveVersions,
  decideUpdate,
  latestStable,
  majorUpgradeNotice,
  type CandidateExclusion,
  type Resolution,
  type UpdateDecision,
  type MajorUpgradeNotice,
} from './versions/resolve.js';

// Patching
export { patchScalar, patchScalarInRange, type ScalarPatch, type PatchResult } from './patch/scalar.js';
export { locateScalar, parseManifestDocuments, loadManifestValues, type YamlPath, type LocatedScalar } from './patch/locate.js';

// Ignore rules
export {
  compileIgnoreRules,
  compilePattern,
  shouldIgnore,
  candidateExclusion,
  type IgnoreRule,
  type IgnoreRuleSet,
  type ArtifactIdentity,
  type IgnoreDecision,
} from './ignore/rules.js';

// Config
export * from './config/types.js';
export {
  CONFIG_FILE,
  loadUpdateConfig,
  loadUpdateConfigIfPresent,
  parseUpdateConfig,
  resolveConfigPath,
  stringifyUpdateConfig,
  writeUpdateConfig,
  type LoadedConfig,
} from './config/loader.js';

// Concurrency
export { Gate, Mutex } from './concurrency/gate.js';
export {
  RegistryGates,
  DEFAULT_REGISTRY_LIMITS,
  DEFAULT_REGISTRY_LIMIT,
  AUTHENTICATED_DOCKERHUB_LIMIT,
  HELM_REGISTRY_CLASS,
  type RegistryGateOptions,
} from './concurrency/registry-gates.js';

// Registries, discovery, reconciliation
export * from './api/index.js';
export * from './registries/index.js';
export * from './discover/index.js';
export * from './reconcilers/index.js';

// Commands
export * from './commands/index.js';
export type { GlobalOptions, CommandContext, CommandResult, OutputFormat } from './types.js';
export { VERSION } from './version.js';
