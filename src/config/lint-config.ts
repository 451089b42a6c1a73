/**
 * Lint Config Loader
 * Loads and validates lint.yaml configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { LintError, errorMessage } from '../errors/lint-error';
import type { LintLogger, LintLogLevel } from '../logging/lint-logger';

export type OutputFormat = 'table' | 'json' | 'yaml';

/** Lowest impact that fails the run; 'none' never fails on results */
export type FailOn = 'blocking' | 'advisory' | 'none';

export interface LintConfig {
  timeout_seconds: number;
  checks: string[];
  output: OutputFormat;
  verbose: boolean;
  log_level: LintLogLevel;
  fail_on: FailOn;
}

export const DEFAULT_CONFIG: LintConfig = {
  timeout_seconds: 300,
  checks: ['*'],
  output: 'table',
  verbose: false,
  log_level: 'warn',
  fail_on: 'blocking',
};

const OUTPUT_FORMATS: readonly string[] = ['table', 'json', 'yaml'];
const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];
const FAIL_ON_VALUES: readonly string[] = ['blocking', 'advisory', 'none'];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.includes(value);
}

function isLogLevel(value: string): value is LintLogLevel {
  return LOG_LEVELS.includes(value);
}

function isFailOn(value: string): value is FailOn {
  return FAIL_ON_VALUES.includes(value);
}

function invalid(field: string, problem: string): LintError {
  return new LintError(ErrorCode.L102_CONFIG_SCHEMA_VALIDATION_FAILURE, `${field}: ${problem}`, { field });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed document and merge it over the defaults.
 * An empty document (null) yields the defaults.
 */
export function parseLintConfig(parsed: unknown): LintConfig {
  if (parsed === null || parsed === undefined) {
    return { ...DEFAULT_CONFIG, checks: [...DEFAULT_CONFIG.checks] };
  }
  if (!isRecord(parsed)) {
    throw invalid('(root)', 'expected a mapping');
  }

  const config: LintConfig = { ...DEFAULT_CONFIG, checks: [...DEFAULT_CONFIG.checks] };

  const timeout = parsed.timeout_seconds;
  if (timeout !== undefined) {
    if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
      throw invalid('timeout_seconds', 'must be a positive number');
    }
    config.timeout_seconds = timeout;
  }

  const checks = parsed.checks;
  if (checks !== undefined) {
    if (!Array.isArray(checks) || checks.length === 0) {
      throw invalid('checks', 'must be a non-empty list of selectors');
    }
    const selectors: string[] = [];
    for (const selector of checks) {
      if (typeof selector !== 'string' || selector === '') {
        throw invalid('checks', 'every selector must be a non-empty string');
      }
      selectors.push(selector);
    }
    config.checks = selectors;
  }

  const output = parsed.output;
  if (output !== undefined) {
    if (typeof output !== 'string' || !isOutputFormat(output)) {
      throw invalid('output', `must be one of ${OUTPUT_FORMATS.join(', ')}`);
    }
    config.output = output;
  }

  const verbose = parsed.verbose;
  if (verbose !== undefined) {
    if (typeof verbose !== 'boolean') {
      throw invalid('verbose', 'must be true or false');
    }
    config.verbose = verbose;
  }

  const logLevel = parsed.log_level;
  if (logLevel !== undefined) {
    if (typeof logLevel !== 'string' || !isLogLevel(logLevel)) {
      throw invalid('log_level', `must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.log_level = logLevel;
  }

  const failOn = parsed.fail_on;
  if (failOn !== undefined) {
    if (typeof failOn !== 'string' || !isFailOn(failOn)) {
      throw invalid('fail_on', `must be one of ${FAIL_ON_VALUES.join(', ')}`);
    }
    config.fail_on = failOn;
  }

  return config;
}

/**
 * Load lint configuration from YAML.
 *
 * Search order: `configPath` (must exist when given), ./config/lint.yaml,
 * ./config/lint.yml, then the package's own config/lint.yaml. No file found
 * means defaults.
 */
export function loadLintConfig(configPath?: string, logger?: LintLogger): LintConfig {
  if (configPath !== undefined && !fs.existsSync(configPath)) {
    throw new LintError(ErrorCode.L101_CONFIG_FILE_UNREADABLE, `${configPath} does not exist`, {
      path: configPath,
    });
  }

  const searchPaths = [
    configPath,
    path.join(process.cwd(), 'config', 'lint.yaml'),
    path.join(process.cwd(), 'config', 'lint.yml'),
    path.join(__dirname, '..', '..', 'config', 'lint.yaml'),
  ].filter((p): p is string => p !== undefined);

  const usedPath = searchPaths.find(p => fs.existsSync(p));
  if (!usedPath) {
    logger?.log('debug', 'CONFIG', 'Config file not found, using defaults');
    return parseLintConfig(undefined);
  }

  let content: string;
  try {
    content = fs.readFileSync(usedPath, 'utf-8');
  } catch (err) {
    throw new LintError(ErrorCode.L101_CONFIG_FILE_UNREADABLE, `${usedPath}: ${errorMessage(err)}`, {
      path: usedPath,
    });
  }

  logger?.log('debug', 'CONFIG', `Loading config from: ${usedPath}`);

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    throw new LintError(ErrorCode.L102_CONFIG_SCHEMA_VALIDATION_FAILURE, `invalid YAML in ${usedPath}: ${errorMessage(err)}`, {
      path: usedPath,
    });
  }

  return parseLintConfig(parsed);
}
