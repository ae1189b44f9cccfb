/**
 * Tests for the discover and update commands
 *
 * Commands run with JSON output so nothing is printed, against a
 * temporary repository and an in-memory version provider.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { createLogger } from '../../src/api/logger.js';
import { discoverCommand, updateCommand } from '../../src/commands/index.js';
import { loadUpdateConfig, writeUpdateConfig } from '../../src/config/loader.js';
import type { VersionProvider } from '../../src/registries/index.js';
import type { CommandContext } from '../../src/types.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const DEPLOYMENT_YAML = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: api
spec:
  template:
    spec:
      containers:
        - name: api
          image: ghcr.io/acme/api:2.3.0
`;

const KUSTOMIZATION_YAML = `helmCharts:
  - name: redis
    repo: https://charts.bitnami.com/bitnami
    version: 18.1.0
`;

const provider: VersionProvider = {
  listImageTags: async () => ['2.3.0', '2.4.0', '3.0.0'],
  listChartVersions: async () => ['18.1.0', '18.2.0'],
};

// =============================================================================
// Helper Functions
// =============================================================================

function createContext(root: string): CommandContext {
  return {
    options: { json: true, verbose: false, quiet: false },
    outputFormat: 'json',
    root,
    configPath: join(root, '.update-config.yaml'),
    logger: createLogger({ level: 'error', sink: () => {} }),
  };
}

function writeManifest(root: string, relative: string, content: string): void {
  const path = join(root, relative);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

// =============================================================================
// Tests
// =============================================================================

describe('commands', () => {
  let root: string;
  let ctx: CommandContext;

  beforeEach(() => {
    root = join(tmpdir(), `commands-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(root, { recursive: true });
    writeManifest(root, 'apps/api.yaml', DEPLOYMENT_YAML);
    writeManifest(root, 'cache/kustomization.yaml', KUSTOMIZATION_YAML);
    ctx = createContext(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('discoverCommand', () => {
    it('creates the config from discovered resources', async () => {
      const result = await discoverCommand(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe(`Created ${ctx.configPath}`);
      expect(result.data?.counts).toEqual({
        argoApps: 0,
        kustomizeHelmCharts: 1,
        chartDependencies: 0,
        dockerImages: 1,
      });

      const loaded = await loadUpdateConfig(ctx.configPath);
      expect(loaded.config.dockerImages).toEqual([
        {
          id: 'api',
          registry: 'ghcr.io',
          repository: 'acme/api',
          file: 'apps/api.yaml',
          yamlPath: ['spec', 'template', 'spec', 'containers', 0, 'image'],
        },
      ]);
    });

    it('merges into an existing config and keeps ignore rules', async () => {
      await writeUpdateConfig(ctx.configPath, { ignore: { helmCharts: [{ name: 'redis' }] } });

      const result = await discoverCommand(ctx);

      expect(result.message).toBe(`Merged into ${ctx.configPath}`);
      expect(result.data?.merged).toBe(true);
      expect(result.data?.skipped).toEqual([
        { section: 'kustomizeHelmCharts', name: 'redis', reason: 'ignored by name: redis' },
      ]);
      const loaded = await loadUpdateConfig(ctx.configPath);
      expect(loaded.config.ignore).toEqual({ helmCharts: [{ name: 'redis' }] });
      expect(loaded.config.kustomizeHelmCharts).toEqual([]);
    });

    it('writes nothing in dry-run', async () => {
      const result = await discoverCommand(ctx, { dryRun: true });

      expect(result.message).toBe(`Would write ${ctx.configPath}`);
      expect(result.data?.written).toBe(false);
      expect(existsSync(ctx.configPath)).toBe(false);
    });
  });

  describe('updateCommand', () => {
    beforeEach(async () => {
      await discoverCommand(ctx);
    });

    it('applies updates and writes the report', async () => {
      const result = await updateCommand(ctx, { provider, credentials: {} });

      expect(result.success).toBe(true);
      expect(result.message).toMatch(/^2\/2 artifacts updated, 0 up to date, 0 skipped, 0 failed \(/);
      expect(result.errors).toBeUndefined();
      expect(result.data?.report).toBe('written');
      expect(result.data?.reportPath).toBe(join(root, '.update-report.txt'));
      expect(readFileSync(join(root, 'apps/api.yaml'), 'utf-8')).toContain('image: ghcr.io/acme/api:2.4.0');
      expect(readFileSync(join(root, '.update-report.txt'), 'utf-8')).toContain(
        '- api: 2.3.0 → 3.0.0 (major 2 → 3)'
      );
    });

    it('does not write files or the report in dry-run', async () => {
      const result = await updateCommand(ctx, { provider, credentials: {}, dryRun: true });

      expect(result.message).toMatch(/^\[DRY RUN\] 2\/2 artifacts would update/);
      expect(result.data?.report).toBe('skipped');
      expect(readFileSync(join(root, 'apps/api.yaml'), 'utf-8')).toBe(DEPLOYMENT_YAML);
      expect(existsSync(join(root, '.update-report.txt'))).toBe(false);
    });

    it('writes the report to a custom path', async () => {
      const result = await updateCommand(ctx, { provider, credentials: {}, report: 'out/report.txt', only: 'charts' });

      expect(result.data?.stats.total).toBe(1);
      expect(result.data?.reportPath).toBe(join(root, 'out/report.txt'));
      expect(result.data?.report).toBe('written');
      expect(readFileSync(join(root, 'out/report.txt'), 'utf-8')).toContain('Helm charts updated: 1');
    });

    it('completes the run when the report cannot be written', async () => {
      writeFileSync(join(root, 'blocker'), 'not a directory');

      const result = await updateCommand(ctx, { provider, credentials: {}, report: 'blocker/report.txt' });

      expect(result.success).toBe(true);
      expect(result.data?.report).toBe('failed');
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings?.[0]).toMatch(/^report: /);
      expect(readFileSync(join(root, 'apps/api.yaml'), 'utf-8')).toContain('image: ghcr.io/acme/api:2.4.0');
    });

    it('reports failed artifacts without failing the command', async () => {
      const failing: VersionProvider = {
        listImageTags: async () => Promise.reject(new Error('registry exploded')),
        listChartVersions: async () => ['18.1.0'],
      };

      const result = await updateCommand(ctx, { provider: failing, credentials: {} });

      expect(result.success).toBe(true);
      expect(result.errors).toEqual(['api: registry exploded']);
      expect(result.data?.report).toBe('unchanged');
    });
  });

  it('fails when the config is missing', async () => {
    await expect(updateCommand(ctx, { provider, credentials: {} })).rejects.toMatchObject({
      code: 'CONFIG_NOT_FOUND',
    });
  });
});
