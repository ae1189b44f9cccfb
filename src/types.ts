/**
 * Core types for the manifest-bumper CLI
 */

import type { ApiLogger } from './api/logger.js';

// ============================================================================
// CLI Types
// ============================================================================

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Repository root (default: nearest directory with .git, else cwd) */
  root?: string;
  /** Config file path, relative to the root unless absolute */
  config?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable debug logging */
  verbose: boolean;
  /** Only log warnings and errors */
  quiet: boolean;
}

/**
 * Result returned by every command
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  warnings?: string[];
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Absolute repository root */
  root: string;
  /** Absolute config file path */
  configPath: string;
  logger: ApiLogger;
}
