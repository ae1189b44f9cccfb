/**
 * Ignore rules
 *
 * Rules come from the `ignore` section of the update config and are
 * compiled once per run into two lookup maps (charts by name, images by
 * id or repository). A rule without a pattern excludes the artifact
 * outright; a rule with a pattern only removes matching upstream
 * versions from the candidate pool.
 */

import type { IgnoreConfig } from '../config/types.js';
import type { CandidateExclusion } from '../versions/resolve.js';

// =============================================================================
// Types
// =============================================================================

export type IgnoreTarget = 'chart' | 'image';

/** Field of the inventory entry a rule is keyed on */
export type IgnoreField = 'name' | 'id' | 'repository';

export type IgnoreRule =
  | {
      kind: 'artifact';
      target: IgnoreTarget;
      field: IgnoreField;
      key: string;
      /** Set when the rule's pattern failed to compile */
      invalidPattern?: string;
    }
  | {
      kind: 'scoped';
      target: IgnoreTarget;
      field: IgnoreField;
      key: string;
      pattern: RegExp;
      source: string;
    };

export interface IgnoreRuleSet {
  /** Chart rules keyed by chart name */
  charts: Map<string, IgnoreRule[]>;
  /** Image rules keyed by `id:<id>` or `repository:<repository>` */
  images: Map<string, IgnoreRule[]>;
}

export type ArtifactIdentity =
  | { kind: 'helm-chart'; name: string }
  | { kind: 'container-image'; id: string; repository: string };

export interface IgnoreDecision {
  ignored: boolean;
  reason?: string;
}

export interface CompiledIgnoreRules {
  ruleSet: IgnoreRuleSet;
  /** One entry per rule whose pattern failed to compile */
  warnings: string[];
}

// =============================================================================
// Compilation
// =============================================================================

/**
 * Compile a pattern anchored at the start of the tested string.
 */
export function compilePattern(source: string): RegExp {
  return new RegExp(`^(?:${source})`);
}

function imageKey(field: IgnoreField, value: string): string {
  return `${field}:${value}`;
}

/** Compiled pattern of one config entry; `null` when it failed to compile */
type EntryPattern = { source: string; regex: RegExp | null } | undefined;

function compileEntryPattern(
  patternSource: string | undefined,
  target: IgnoreTarget,
  field: IgnoreField,
  key: string,
  warnings: string[]
): EntryPattern {
  if (patternSource === undefined) {
    return undefined;
  }
  try {
    return { source: patternSource, regex: compilePattern(patternSource) };
  } catch (err) {
    warnings.push(
      `Invalid pattern '${patternSource}' in ignore rule for ${target} ${field} '${key}': ` +
        `${err instanceof Error ? err.message : String(err)}; the rule ignores the whole ${target}`
    );
    return { source: patternSource, regex: null };
  }
}

function buildRule(target: IgnoreTarget, field: IgnoreField, key: string, pattern: EntryPattern): IgnoreRule {
  if (pattern === undefined) {
    return { kind: 'artifact', target, field, key };
  }
  if (pattern.regex === null) {
    return { kind: 'artifact', target, field, key, invalidPattern: pattern.source };
  }
  return { kind: 'scoped', target, field, key, pattern: pattern.regex, source: pattern.source };
}

function addRule(map: Map<string, IgnoreRule[]>, key: string, rule: IgnoreRule): void {
  const existing = map.get(key);
  if (existing) {
    existing.push(rule);
  } else {
    map.set(key, [rule]);
  }
}

/**
 * Compile the ignore section of the config into lookup maps.
 */
export function compileIgnoreRules(config: IgnoreConfig | undefined): CompiledIgnoreRules {
  const ruleSet: IgnoreRuleSet = { charts: new Map(), images: new Map() };
  const warnings: string[] = [];

  for (const entry of config?.helmCharts ?? []) {
    const pattern = compileEntryPattern(entry.versionPattern, 'chart', 'name', entry.name, warnings);
    addRule(ruleSet.charts, entry.name, buildRule('chart', 'name', entry.name, pattern));
  }

  for (const entry of config?.dockerImages ?? []) {
    // One compilation per entry, shared by its id and repository keys
    const field: IgnoreField = entry.id !== undefined ? 'id' : 'repository';
    const key = entry.id ?? entry.repository;
    if (key === undefined) {
      continue;
    }
    const pattern = compileEntryPattern(entry.tagPattern, 'image', field, key, warnings);
    if (entry.id !== undefined) {
      addRule(ruleSet.images, imageKey('id', entry.id), buildRule('image', 'id', entry.id, pattern));
    }
    if (entry.repository !== undefined) {
      addRule(
        ruleSet.images,
        imageKey('repository', entry.repository),
        buildRule('image', 'repository', entry.repository, pattern)
      );
    }
  }

  return { ruleSet, warnings };
}

// =============================================================================
// Matching
// =============================================================================

function rulesFor(identity: ArtifactIdentity, ruleSet: IgnoreRuleSet): IgnoreRule[] {
  if (identity.kind === 'helm-chart') {
    return ruleSet.charts.get(identity.name) ?? [];
  }
  return [
    ...(ruleSet.images.get(imageKey('id', identity.id)) ?? []),
    ...(ruleSet.images.get(imageKey('repository', identity.repository)) ?? []),
  ];
}

/**
 * Whether an artifact is excluded as a whole.
 *
 * Scoped rules never exclude the artifact; see {@link candidateExclusion}.
 */
export function shouldIgnore(
  identity: ArtifactIdentity,
  currentValue: string,
  ruleSet: IgnoreRuleSet
): IgnoreDecision {
  for (const rule of rulesFor(identity, ruleSet)) {
    if (rule.kind !== 'artifact') {
      continue;
    }
    let reason = `ignored by ${rule.field}: ${rule.key}`;
    if (rule.invalidPattern !== undefined) {
      reason += ` (invalid pattern '${rule.invalidPattern}')`;
    }
    if (currentValue) {
      reason += ` at ${currentValue}`;
    }
    return { ignored: true, reason };
  }
  return { ignored: false };
}

/**
 * Predicate removing upstream versions matched by scoped rules.
 *
 * @returns undefined when no scoped rule applies to the artifact
 */
export function candidateExclusion(
  identity: ArtifactIdentity,
  ruleSet: IgnoreRuleSet
): CandidateExclusion | undefined {
  const patterns: RegExp[] = [];
  for (const rule of rulesFor(identity, ruleSet)) {
    if (rule.kind === 'scoped') {
      patterns.push(rule.pattern);
    }
  }
  if (patterns.length === 0) {
    return undefined;
  }
  return (tag) => patterns.some((pattern) => pattern.test(tag));
}

