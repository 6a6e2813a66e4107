/**
 * CLI Module Exports
 *
 * Barrel export for all CLI components.
 */

// ============================================
// Program Configuration
// ============================================

export {
  createProgram,
  parseCliOptions,
  getPackageVersion,
  type CommandHandlers,
  type ReadOptions,
  type ScrapeOptions,
} from './program.js';

// ============================================
// Pre-flight Checks
// ============================================

export { runPreflightChecks, type PreflightResult } from './preflight.js';

// ============================================
// Command Execution
// ============================================

export {
  runBatch,
  fetchAll,
  toFetchInputs,
  mergeWithBlanks,
  resolveOutputFormat,
  type BatchDependencies,
  type BatchRunResult,
} from './runBatch.js';

export {
  readCommand,
  checkAuthCommand,
  cookieHelpCommand,
  setCookiesCommand,
  versionCommand,
  type Printer,
  type ReadClient,
} from './commands.js';

// ============================================
// Error Handling
// ============================================

export {
  withErrorHandling,
  EXIT_CODES,
  isConfigError,
  getExitCode,
  getBatchExitCode,
  type ExitCode,
  type ErrorHandlingResult,
} from './errorHandler.js';
