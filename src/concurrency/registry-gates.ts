/**
 * Per-registry request limits
 *
 * Each registry class gets its own gate so a strict registry (Docker Hub)
 * cannot starve or be starved by a lenient one. Built once per run and
 * handed to the reconciliation driver.
 */

import { Gate } from './gate.js';

/** Registry class used for gating: `helm`, `dockerhub`, or a registry host */
export type RegistryClass = string;

export const HELM_REGISTRY_CLASS = 'helm';

/**
 * Conservative defaults that stay well below published rate limits
 */
export const DEFAULT_REGISTRY_LIMITS: Readonly<Record<RegistryClass, number>> = {
  dockerhub: 3,
  'ghcr.io': 10,
  'quay.io': 5,
  'gcr.io': 5,
  [HELM_REGISTRY_CLASS]: 10,
};

/** Docker Hub limit when credentials are configured */
export const AUTHENTICATED_DOCKERHUB_LIMIT = 5;

/** Limit for registries without a specific entry */
export const DEFAULT_REGISTRY_LIMIT = 5;

export interface RegistryGateOptions {
  /** Overrides merged over {@link DEFAULT_REGISTRY_LIMITS} */
  limits?: Record<RegistryClass, number>;
  /** Limit for registries without an entry */
  defaultLimit?: number;
  /** Whether Docker Hub credentials are present */
  dockerHubAuthenticated?: boolean;
}

export class RegistryGates {
  private readonly gates = new Map<RegistryClass, Gate>();
  private readonly defaultLimit: number;

  constructor(options: RegistryGateOptions = {}) {
    const limits: Record<RegistryClass, number> = { ...DEFAULT_REGISTRY_LIMITS };
    if (options.dockerHubAuthenticated) {
      limits.dockerhub = AUTHENTICATED_DOCKERHUB_LIMIT;
    }
    Object.assign(limits, options.limits);

    for (const [registry, limit] of Object.entries(limits)) {
      this.gates.set(registry, new Gate(limit));
    }
    this.defaultLimit = options.defaultLimit ?? DEFAULT_REGISTRY_LIMIT;
  }

  /**
   * Gate for a registry class; unknown registries get their own gate on
   * first use.
   */
  gateFor(registry: RegistryClass): Gate {
    let gate = this.gates.get(registry);
    if (!gate) {
      gate = new Gate(this.defaultLimit);
      this.gates.set(registry, gate);
    }
    return gate;
  }

  /**
   * Run a registry request under that registry's gate.
   */
  run<T>(registry: RegistryClass, task: () => Promise<T>): Promise<T> {
    return this.gateFor(registry).run(task);
  }

  /**
   * Current limits, for the startup summary.
   */
  limits(): Record<RegistryClass, number> {
    const result: Record<RegistryClass, number> = {};
    for (const [registry, gate] of this.gates) {
      result[registry] = gate.limit;
    }
    return result;
  }
}
