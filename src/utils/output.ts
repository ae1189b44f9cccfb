/**
 * Output formatting utilities for consistent CLI output
 *
 * Human-readable lines go to stdout; with --json only the result object
 * is printed there.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ReconcileStats, VersionChange } from '../reconcilers/types.js';
import type { MajorUpgradeNotice } from '../versions/resolve.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.warnings && result.warnings.length > 0) {
    console.log(chalk.yellow('\nWarnings:'));
    result.warnings.forEach((warning) => {
      console.log(chalk.yellow('  !'), warning);
    });
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print version changes, grouped by artifact type
 */
export function printChanges(changes: VersionChange[], dryRun: boolean): void {
  if (changes.length === 0) {
    return;
  }

  console.log(chalk.bold(`\n${changes.length} update(s)${dryRun ? ' (would apply)' : ''}:\n`));
  for (const change of changes) {
    const label =
      change.type === 'chart' ? `${change.name} ${chalk.gray(`(${change.kind})`)}` : `${change.id}`;
    console.log(`  ${chalk.cyan('↑')} ${label} ${chalk.red(change.from)} → ${chalk.green(change.to)}`);
    console.log(chalk.gray(`      ${change.file}`));
  }
}

/**
 * Print available major upgrades (never applied automatically)
 */
export function printMajorUpgrades(notices: MajorUpgradeNotice[]): void {
  if (notices.length === 0) {
    return;
  }

  console.log(chalk.yellow.bold('\nMajor version upgrades available (not auto-updated):\n'));
  for (const notice of notices) {
    console.log(
      `  ${chalk.yellow('⚠')} ${notice.id}: ${notice.currentTag} → ${notice.availableTag} ` +
        chalk.gray(`(major ${notice.currentMajor} → ${notice.newMajor})`)
    );
  }
}

/**
 * Print run statistics
 */
export function printStats(stats: ReconcileStats): void {
  console.log(chalk.bold('\nSummary:\n'));
  console.log(`  Total artifacts:  ${chalk.cyan(stats.total)}`);
  console.log(`  Updated:          ${stats.applied > 0 ? chalk.green(stats.applied) : chalk.gray('0')}`);
  console.log(`  Up to date:       ${chalk.gray(stats.upToDate)}`);
  console.log(`  Skipped:          ${chalk.gray(stats.skipped)}`);
  console.log(`  Failed:           ${stats.failed > 0 ? chalk.red(stats.failed) : chalk.gray('0')}`);
  if (stats.majorUpgrades > 0) {
    console.log(`  Major available:  ${chalk.yellow(stats.majorUpgrades)}`);
  }
}

/**
 * Print a list of files
 */
export function printFiles(title: string, files: string[]): void {
  console.log(chalk.bold(`\n${title}`));
  for (const file of files) {
    console.log(`  ${file}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
