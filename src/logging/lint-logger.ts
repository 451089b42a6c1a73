/**
 * Lint Logger - structured log of executor and command decisions
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent entries
 * - Subscriber pattern for streaming entries to an output sink
 * - Check-scoped log retrieval
 */

export type LintLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LintLogCategory =
  | 'CONFIG'
  | 'SELECTION'
  | 'APPLICABILITY'
  | 'EXECUTION_START'
  | 'EXECUTION_END'
  | 'EXECUTION_ERROR'
  | 'INVALID_RESULT'
  | 'CANCELLED'
  | 'OUTPUT';

export interface LintLogEntry {
  timestamp: string;
  level: LintLogLevel;
  category: LintLogCategory;
  message: string;
  details?: Record<string, unknown>;
  checkId?: string;
}

export interface LintLogSubscriber {
  onLog(entry: LintLogEntry): void;
}

export const LOG_LEVEL_ORDER: Record<LintLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class LintLogger {
  private entries: LintLogEntry[] = [];
  private subscribers: Set<LintLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  log(
    level: LintLogLevel,
    category: LintLogCategory,
    message: string,
    options: {
      details?: Record<string, unknown>;
      checkId?: string;
    } = {}
  ): LintLogEntry {
    const entry: LintLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      checkId: options.checkId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch {
        // subscriber failures are ignored
      }
    }

    return entry;
  }

  logSkipped(checkId: string, reason: string, details?: Record<string, unknown>): LintLogEntry {
    return this.log('debug', 'APPLICABILITY', `Skipping ${checkId}: ${reason}`, { checkId, details });
  }

  logExecutionStart(checkId: string): LintLogEntry {
    return this.log('info', 'EXECUTION_START', `Running ${checkId}`, { checkId });
  }

  logExecutionEnd(checkId: string, durationMs: number, conditionCount: number): LintLogEntry {
    return this.log('info', 'EXECUTION_END', `Completed ${checkId} in ${durationMs}ms`, {
      checkId,
      details: { durationMs, conditionCount },
    });
  }

  logExecutionError(checkId: string, reason: string, error: string): LintLogEntry {
    return this.log('warn', 'EXECUTION_ERROR', `Check ${checkId} failed (${reason}): ${error}`, {
      checkId,
      details: { reason, error },
    });
  }

  logInvalidResult(checkId: string, error: string): LintLogEntry {
    return this.log('warn', 'INVALID_RESULT', `Check ${checkId} returned an invalid result: ${error}`, {
      checkId,
      details: { error },
    });
  }

  logCancelled(completed: number, remaining: number, reason: string): LintLogEntry {
    return this.log('warn', 'CANCELLED', `Run stopped after ${completed} check(s): ${reason}`, {
      details: { completed, remaining, reason },
    });
  }

  /**
   * Get entries, optionally scoped to one check or a minimum level
   */
  getEntries(filter: { checkId?: string; minLevel?: LintLogLevel; limit?: number } = {}): LintLogEntry[] {
    let result = this.entries;

    if (filter.checkId !== undefined) {
      result = result.filter(e => e.checkId === filter.checkId);
    }

    if (filter.minLevel !== undefined) {
      const min = LOG_LEVEL_ORDER[filter.minLevel];
      result = result.filter(e => LOG_LEVEL_ORDER[e.level] >= min);
    }

    if (filter.limit !== undefined && result.length > filter.limit) {
      result = result.slice(-filter.limit);
    }

    return [...result];
  }

  subscribe(subscriber: LintLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Subscriber writing entries at or above `minLevel` to a line sink
 * (stderr by default).
 */
export function createConsoleSubscriber(
  minLevel: LintLogLevel,
  write: (line: string) => void = line => console.error(line)
): LintLogSubscriber {
  const min = LOG_LEVEL_ORDER[minLevel];
  return {
    onLog(entry: LintLogEntry): void {
      if (LOG_LEVEL_ORDER[entry.level] < min) {
        return;
      }
      write(`[lint] ${entry.level.toUpperCase()} ${entry.message}`);
    },
  };
}
