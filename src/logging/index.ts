/**
 * Logging Module Index
 */

export {
  LintLogger,
  createConsoleSubscriber,
  LOG_LEVEL_ORDER,
  type LintLogLevel,
  type LintLogCategory,
  type LintLogEntry,
  type LintLogSubscriber,
} from './lint-logger';
