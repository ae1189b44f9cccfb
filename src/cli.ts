#!/usr/bin/env node
/**
 * manifest-bumper CLI - Keep GitOps manifests pinned to current versions
 *
 * Commands:
 * - discover: Scan the repository and generate .update-config.yaml
 * - update: Bump chart and image versions within their current major
 */

import { resolve } from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { discoverCommand, updateCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './api/logger.js';
import { resolveConfigPath } from './config/loader.js';
import { resolveRepoRoot } from './discover/repo-root.js';
import type { ArtifactScope } from './reconcilers/index.js';
import { VERSION } from './version.js';

interface DiscoverCliOptions {
  dryRun: boolean;
}

interface UpdateCliOptions {
  dryRun: boolean;
  report?: string;
  concurrency: number;
  timeout: number;
  only?: ArtifactScope;
  cache: boolean;
  cacheDir: string;
  cacheTtl: number;
}

/**
 * Parse a positive integer option value
 */
function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  } else if (options.quiet) {
    logger.setConfig({ level: 'warn' });
  }

  const root = options.root ? resolve(options.root) : resolveRepoRoot(process.cwd());
  logger.debug('Resolved repository root', { root });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    root,
    configPath: resolveConfigPath(root, options.config),
    logger,
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('manifest-bumper')
  .description('Keep Helm chart and container image versions in GitOps manifests up to date')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--root <dir>', 'Repository root (default: nearest .git ancestor, else cwd)'))
  .addOption(new Option('--config <path>', 'Update config file').default('.update-config.yaml'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable debug logging').default(false))
  .addOption(new Option('-q, --quiet', 'Only log warnings and errors').default(false));

/**
 * discover command - Build the inventory
 */
program
  .command('discover')
  .description('Scan the repository for charts and images and write the update config')
  .option('--dry-run', 'Print the resulting config instead of writing it', false)
  .action(async (cmdOpts: DiscoverCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await discoverCommand(ctx, { dryRun: cmdOpts.dryRun });
      printResult(result, ctx.outputFormat);
      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Discover failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * update command - Apply version bumps
 */
program
  .command('update')
  .description('Bump pinned versions to the newest release within the current major')
  .option('--dry-run', 'Resolve updates without writing files or the report', false)
  .option('--report <path>', 'Report file (default: .update-report.txt)')
  .addOption(
    new Option('--concurrency <n>', 'Artifacts processed at once')
      .argParser(parsePositiveInt)
      .default(10)
  )
  .addOption(
    new Option('--timeout <ms>', 'Per-request timeout in milliseconds')
      .argParser(parsePositiveInt)
      .default(10000)
  )
  .addOption(new Option('--only <scope>', 'Only update one artifact family').choices(['charts', 'images']))
  .option('--cache-dir <dir>', 'Registry response cache directory', '.registry_cache')
  .addOption(
    new Option('--cache-ttl <seconds>', 'Reuse cached registry responses for this long')
      .argParser(parsePositiveInt)
      .default(21600)
  )
  .option('--no-cache', 'Always query the registries')
  .action(async (cmdOpts: UpdateCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await updateCommand(ctx, {
        dryRun: cmdOpts.dryRun,
        report: cmdOpts.report,
        concurrency: cmdOpts.concurrency,
        timeoutMs: cmdOpts.timeout,
        only: cmdOpts.only,
        cache: cmdOpts.cache,
        cacheDir: cmdOpts.cacheDir,
        cacheTtlMs: cmdOpts.cacheTtl * 1000,
      });

      printResult(result, ctx.outputFormat);
      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Update failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
program.parse();
