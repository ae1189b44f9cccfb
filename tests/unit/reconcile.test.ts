/**
 * Tests for batch reconciliation
 *
 * Uses a temporary repository and an in-memory version provider.
 *
 * Covers:
 * - Applying same-major updates for Argo, kustomize and image pins
 * - Two images pinned in the same file
 * - Dry-run leaving files untouched
 * - Idempotency of a second run
 * - Ignore rules (whole artifact and scoped)
 * - Failure isolation and skip reasons
 * - Variant fallback warnings
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { createLogger } from '../../src/api/logger.js';
import type { UpdateConfig } from '../../src/config/types.js';
import type { VersionProvider } from '../../src/registries/index.js';
import { reconcileAll } from '../../src/reconcilers/batch.js';
import { findChartVersionPaths } from '../../src/reconcilers/charts.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const ARGO_APP_YAML = `apiVersion: argoproj.io/v1alpha1
kind: Application
metadata:
  name: cert-manager
spec:
  source:
    chart: cert-manager
    repoURL: https://charts.jetstack.io
    targetRevision: v1.14.4  # pinned
`;

const KUSTOMIZATION_YAML = `helmCharts:
  - name: loki
    repo: https://grafana.github.io/helm-charts
    version: 5.47.2
  - name: promtail
    repo: https://grafana.github.io/helm-charts
    version: 6.15.5
`;

const APP_YAML = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: app
spec:
  template:
    spec:
      containers:
        - name: web
          image: nginx:1.25.3-alpine
        - name: db
          image: "postgres:16.2"
`;

const IMAGE_PATH = ['spec', 'template', 'spec', 'containers'];

const BASE_CONFIG: UpdateConfig = {
  argoApps: [{ name: 'cert-manager', repoUrl: 'https://charts.jetstack.io', file: 'apps/cert-manager.yaml' }],
  kustomizeHelmCharts: [
    { name: 'loki', repoUrl: 'https://grafana.github.io/helm-charts', files: ['monitoring/kustomization.yaml'] },
  ],
  dockerImages: [
    {
      id: 'nginx',
      registry: 'dockerhub',
      repository: 'library/nginx',
      file: 'workloads/app.yaml',
      yamlPath: [...IMAGE_PATH, 0, 'image'],
    },
    {
      id: 'postgres',
      registry: 'dockerhub',
      repository: 'library/postgres',
      file: 'workloads/app.yaml',
      yamlPath: [...IMAGE_PATH, 1, 'image'],
    },
  ],
};

const CHART_VERSIONS: Record<string, string[]> = {
  'cert-manager': ['v1.14.4', 'v1.14.5', 'v1.15.0', 'v2.0.0', 'v1.16.0-alpha.1'],
  loki: ['5.47.2', '5.48.0', '6.0.0'],
};

const IMAGE_TAGS: Record<string, string[]> = {
  'library/nginx': ['1.25.3-alpine', '1.25.4-alpine', '1.25.5', '1.27.0-alpine'],
  'library/postgres': ['16.2', '16.3', '17.0', '16.4-alpine'],
};

// =============================================================================
// Helper Functions
// =============================================================================

const silent = createLogger({ level: 'error', sink: () => {} });

class FakeProvider implements VersionProvider {
  readonly imageCalls: string[] = [];

  constructor(
    private readonly images: Record<string, string[]> = IMAGE_TAGS,
    private readonly charts: Record<string, string[]> = CHART_VERSIONS,
    private readonly failing: Set<string> = new Set()
  ) {}

  async listImageTags(registry: string, repository: string): Promise<string[]> {
    this.imageCalls.push(`${registry}/${repository}`);
    if (this.failing.has(repository)) {
      throw new Error('registry exploded');
    }
    return this.images[repository] ?? [];
  }

  async listChartVersions(_repoUrl: string, chart: string): Promise<string[]> {
    return this.charts[chart] ?? [];
  }
}

function createTempDir(): string {
  const dir = join(tmpdir(), `reconcile-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeManifest(root: string, relative: string, content: string): void {
  const path = join(root, relative);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function readManifest(root: string, relative: string): string {
  return readFileSync(join(root, relative), 'utf-8');
}

// =============================================================================
// Tests
// =============================================================================

describe('reconcileAll', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
    writeManifest(root, 'apps/cert-manager.yaml', ARGO_APP_YAML);
    writeManifest(root, 'monitoring/kustomization.yaml', KUSTOMIZATION_YAML);
    writeManifest(root, 'workloads/app.yaml', APP_YAML);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('applies same-major updates and reports newer majors', async () => {
    const result = await reconcileAll(BASE_CONFIG, { root, provider: new FakeProvider(), logger: silent });

    expect(result.success).toBe(true);
    expect(result.stats).toMatchObject({
      total: 4,
      applied: 4,
      upToDate: 0,
      skipped: 0,
      failed: 0,
      majorUpgrades: 3,
    });
    expect(result.chartChanges).toEqual([
      {
        type: 'chart',
        kind: 'argoApplication',
        name: 'cert-manager',
        file: 'apps/cert-manager.yaml',
        from: 'v1.14.4',
        to: 'v1.15.0',
      },
      {
        type: 'chart',
        kind: 'kustomizeHelm',
        name: 'loki',
        file: 'monitoring/kustomization.yaml',
        from: '5.47.2',
        to: '5.48.0',
      },
    ]);
    expect(result.imageChanges).toEqual([
      { type: 'image', id: 'nginx', file: 'workloads/app.yaml', from: 'nginx:1.25.3-alpine', to: 'nginx:1.27.0-alpine' },
      { type: 'image', id: 'postgres', file: 'workloads/app.yaml', from: 'postgres:16.2', to: 'postgres:16.3' },
    ]);
    expect(result.majorUpgrades).toEqual([
      { id: 'cert-manager', currentTag: 'v1.14.4', availableTag: 'v2.0.0', currentMajor: 1, newMajor: 2 },
      { id: 'loki', currentTag: '5.47.2', availableTag: '6.0.0', currentMajor: 5, newMajor: 6 },
      { id: 'postgres', currentTag: '16.2', availableTag: '17.0', currentMajor: 16, newMajor: 17 },
    ]);
    expect(result.changedFiles).toEqual([
      'apps/cert-manager.yaml',
      'monitoring/kustomization.yaml',
      'workloads/app.yaml',
    ]);
  });

  it('rewrites only the pinned values', async () => {
    await reconcileAll(BASE_CONFIG, { root, provider: new FakeProvider(), logger: silent });

    expect(readManifest(root, 'apps/cert-manager.yaml')).toBe(
      ARGO_APP_YAML.replace('targetRevision: v1.14.4  # pinned', 'targetRevision: v1.15.0  # pinned')
    );
    expect(readManifest(root, 'monitoring/kustomization.yaml')).toBe(
      KUSTOMIZATION_YAML.replace('version: 5.47.2', 'version: 5.48.0')
    );
    expect(readManifest(root, 'workloads/app.yaml')).toBe(
      APP_YAML.replace('image: nginx:1.25.3-alpine', 'image: nginx:1.27.0-alpine').replace(
        'image: "postgres:16.2"',
        'image: "postgres:16.3"'
      )
    );
  });

  it('writes nothing in dry-run', async () => {
    const result = await reconcileAll(BASE_CONFIG, {
      root,
      provider: new FakeProvider(),
      logger: silent,
      dryRun: true,
    });

    expect(result.dryRun).toBe(true);
    expect(result.stats.applied).toBe(4);
    expect(readManifest(root, 'apps/cert-manager.yaml')).toBe(ARGO_APP_YAML);
    expect(readManifest(root, 'workloads/app.yaml')).toBe(APP_YAML);
  });

  it('is up to date on a second run', async () => {
    const provider = new FakeProvider();
    await reconcileAll(BASE_CONFIG, { root, provider, logger: silent });

    const second = await reconcileAll(BASE_CONFIG, { root, provider, logger: silent });

    expect(second.stats).toMatchObject({ applied: 0, upToDate: 4 });
    expect(second.changedFiles).toEqual([]);
    expect(second.majorUpgrades.map((notice) => notice.id)).toEqual(['cert-manager', 'loki', 'postgres']);
  });

  it('restricts the run to one family', async () => {
    const result = await reconcileAll(BASE_CONFIG, {
      root,
      provider: new FakeProvider(),
      logger: silent,
      only: 'images',
    });

    expect(result.stats.total).toBe(2);
    expect(result.chartChanges).toEqual([]);
  });

  it('skips ignored artifacts and filters scoped versions', async () => {
    const config: UpdateConfig = {
      ...BASE_CONFIG,
      ignore: {
        helmCharts: [{ name: 'loki' }],
        dockerImages: [{ id: 'postgres', tagPattern: '16\\.3' }],
      },
    };

    const result = await reconcileAll(config, { root, provider: new FakeProvider(), logger: silent });
    const loki = result.results.find((r) => r.name === 'loki');
    const postgres = result.results.find((r) => r.name === 'postgres');

    expect(loki).toMatchObject({ status: 'skipped', reason: 'ignored by name: loki' });
    expect(postgres).toMatchObject({ status: 'up-to-date', changes: [] });
    expect(postgres?.majorUpgrade?.availableTag).toBe('17.0');
  });

  it('skips ignored artifacts without reading their files', async () => {
    const config: UpdateConfig = {
      ignore: { helmCharts: [{ name: 'grafana' }], dockerImages: [{ repository: 'acme/gone' }] },
      kustomizeHelmCharts: [
        { name: 'grafana', repoUrl: 'https://grafana.github.io/helm-charts', files: ['missing/kustomization.yaml'] },
      ],
      dockerImages: [
        { id: 'gone', registry: 'ghcr.io', repository: 'acme/gone', file: 'missing/app.yaml', yamlPath: ['image'] },
      ],
    };

    const result = await reconcileAll(config, { root, provider: new FakeProvider(), logger: silent });

    expect(result.stats).toMatchObject({ total: 2, skipped: 2, failed: 0 });
    expect(result.results.map((r) => r.reason).sort()).toEqual([
      'ignored by name: grafana',
      'ignored by repository: acme/gone',
    ]);
  });

  it('isolates a failing artifact', async () => {
    const provider = new FakeProvider(IMAGE_TAGS, CHART_VERSIONS, new Set(['library/nginx']));

    const result = await reconcileAll(BASE_CONFIG, { root, provider, logger: silent });
    const nginx = result.results.find((r) => r.name === 'nginx');

    expect(result.success).toBe(false);
    expect(result.stats).toMatchObject({ applied: 3, failed: 1 });
    expect(nginx).toMatchObject({ status: 'failed', error: 'registry exploded', changes: [] });
  });

  it('skips artifacts without versions', async () => {
    const provider = new FakeProvider({ 'library/nginx': IMAGE_TAGS['library/nginx'] }, {});

    const result = await reconcileAll(BASE_CONFIG, { root, provider, logger: silent });

    expect(result.results.find((r) => r.name === 'postgres')).toMatchObject({
      status: 'skipped',
      reason: 'no versions available',
    });
    expect(result.results.find((r) => r.name === 'loki')).toMatchObject({
      status: 'skipped',
      reason: 'no versions available',
    });
  });

  it('skips entries whose location no longer exists', async () => {
    const config: UpdateConfig = {
      argoApps: [{ name: 'vault', repoUrl: 'https://helm.releases.hashicorp.com', file: 'apps/cert-manager.yaml' }],
      dockerImages: [
        {
          id: 'redis',
          registry: 'dockerhub',
          repository: 'library/redis',
          file: 'workloads/app.yaml',
          yamlPath: [...IMAGE_PATH, 5, 'image'],
        },
      ],
    };
    const provider = new FakeProvider();

    const result = await reconcileAll(config, { root, provider, logger: silent });

    expect(result.results.find((r) => r.name === 'vault')).toMatchObject({
      status: 'skipped',
      reason: 'apps/cert-manager.yaml: spec.source.chart does not match vault',
    });
    expect(result.results.find((r) => r.name === 'redis')).toMatchObject({
      status: 'skipped',
      reason: 'no image at spec.template.spec.containers.5.image in workloads/app.yaml',
    });
    expect(provider.imageCalls).toEqual([]);
  });

  it('warns when resolving across variants', async () => {
    const provider = new FakeProvider({ 'library/nginx': ['1.25.5', '1.26.0'], 'library/postgres': ['16.2'] });

    const result = await reconcileAll(BASE_CONFIG, { root, provider, logger: silent, only: 'images' });

    expect(result.imageChanges[0]).toMatchObject({ id: 'nginx', to: 'nginx:1.26.0' });
    expect(result.warnings).toEqual(['nginx: no versions share the current variant, resolved across variants']);
  });

  it('reports each artifact as it completes', async () => {
    const completed: string[] = [];

    await reconcileAll(BASE_CONFIG, {
      root,
      provider: new FakeProvider(),
      logger: silent,
      concurrency: 1,
      onArtifactComplete: (result) => completed.push(result.name),
    });

    expect(completed).toEqual(['cert-manager', 'loki', 'nginx', 'postgres']);
  });
});

// =============================================================================
// Chart Locations
// =============================================================================

describe('findChartVersionPaths', () => {
  it('finds every matching kustomize entry', () => {
    const values = [{ helmCharts: [{ name: 'loki' }, { name: 'tempo' }, { name: 'loki' }] }];

    expect(findChartVersionPaths('kustomizeHelm', 'loki', values)).toEqual([
      { document: 0, path: ['helmCharts', 0, 'version'] },
      { document: 0, path: ['helmCharts', 2, 'version'] },
    ]);
  });

  it('finds Argo applications in any document', () => {
    const values = [
      { kind: 'Namespace' },
      { kind: 'Application', spec: { source: { chart: 'redis' } } },
    ];

    expect(findChartVersionPaths('argoApplication', 'redis', values)).toEqual([
      { document: 1, path: ['spec', 'source', 'targetRevision'] },
    ]);
    expect(findChartVersionPaths('argoApplication', 'redis', [{ kind: 'Namespace' }])).toBe('no spec.source');
  });

  it('explains missing dependency lists', () => {
    expect(findChartVersionPaths('chartDependency', 'postgresql', [{ name: 'web' }])).toBe('no dependencies list');
    expect(findChartVersionPaths('chartDependency', 'postgresql', [{ dependencies: [{ name: 'redis' }] }])).toBe(
      'no dependencies entry for postgresql'
    );
  });
});
