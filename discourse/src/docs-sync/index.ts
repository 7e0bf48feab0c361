// Docs sync module entry point.
// Re-exports the public API for docs directory -> Discourse synchronization.

export { runDocsSync, type RunDocsSyncOptions } from './run.js'
export { scanDocs, flattenDocTree } from './scanner.js'
export {
  buildIndexBody,
  navigationEntry,
  parseIndexBody,
  parseNavigationTable,
  serializeNavigationTable,
} from './navigation-table.js'
export { createDiscourseClient, type DiscourseClient } from './discourse-client.js'
export { planReconciliation } from './plan.js'
export { applyReconciliation } from './reconcile.js'
export {
  createResultReporter,
  formatReportSummary,
  hasFailures,
  reportOutputs,
} from './reporter.js'
export { readDocsMetadata } from './metadata.js'
export * from './types.js'
