/**
 * Reconcilers: resolve and apply version bumps for inventory artifacts
 */

export * from './types.js';
export { reconcileAll, summarizeRun, DEFAULT_CONCURRENCY, type ReconcileOptions, type ArtifactScope } from './batch.js';
export { reconcileChart, chartArtifacts, findChartVersionPaths, type ChartArtifact } from './charts.js';
export { reconcileImage } from './images.js';
export { ManifestEditor, type ScalarLocation, type LoadedManifest } from './manifest-file.js';
export { NO_VERSIONS_REASON, type ReconcileContext } from './context.js';
export {
  renderReport,
  writeReport,
  formatCompactSummary,
  formatDuration,
  REPORT_FILE,
  type ReportWriteOutcome,
} from './report.js';
