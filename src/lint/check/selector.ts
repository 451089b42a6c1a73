/**
 * Check selection by pattern.
 *
 * A pattern can be:
 * - "*": every check
 * - a group shortcut: "components", "services", "workloads", "dependencies"
 * - an exact check ID: "components.dashboard"
 * - a shell-style glob over the ID: "components.*", "*dashboard*", "*.removal"
 */

import { minimatch, type MinimatchOptions } from 'minimatch';
import { ErrorCode } from '../../errors/error-codes';
import { LintError } from '../../errors/lint-error';
import { GROUP_SELECTORS } from './constants';
import type { Check } from './types';

// Plain shell glob: no braces, extglobs, negation, comments or globstar
const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  nonegate: true,
  nocomment: true,
  noglobstar: true,
};

/**
 * Reject patterns a shell glob cannot parse: an unterminated or empty
 * character class, a dangling range, or a trailing escape.
 * Returns the problem, or undefined for a well-formed pattern.
 */
export function globSyntaxError(pattern: string): string | undefined {
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '\\') {
      if (i + 1 >= pattern.length) {
        return 'trailing escape character';
      }
      i += 2;
      continue;
    }

    if (ch !== '[') {
      i++;
      continue;
    }

    i++;
    if (pattern[i] === '^' || pattern[i] === '!') {
      i++;
    }

    let items = 0;
    for (;;) {
      if (i >= pattern.length) {
        return 'unterminated character class';
      }
      if (pattern[i] === ']') {
        if (items === 0) {
          return 'empty character class';
        }
        i++;
        break;
      }

      // range start (possibly escaped)
      if (pattern[i] === '\\') {
        i++;
        if (i >= pattern.length) {
          return 'trailing escape character';
        }
      } else if (pattern[i] === '-') {
        return 'character range without a start';
      }
      i++;

      if (pattern[i] === '-') {
        i++;
        if (i >= pattern.length) {
          return 'unterminated character class';
        }
        if (pattern[i] === ']') {
          return 'character range without an end';
        }
        if (pattern[i] === '\\') {
          i++;
          if (i >= pattern.length) {
            return 'trailing escape character';
          }
        }
        i++;
      }

      items++;
    }
  }

  return undefined;
}

/**
 * Throw LintError(L202) if `pattern` would fail to parse as a glob.
 * Shortcuts and "*" are always valid.
 */
export function assertValidPattern(pattern: string): void {
  if (pattern === '*' || GROUP_SELECTORS.has(pattern)) {
    return;
  }
  const problem = globSyntaxError(pattern);
  if (problem) {
    throw new LintError(ErrorCode.L202_INVALID_SELECTOR_PATTERN, `"${pattern}": ${problem}`, { pattern });
  }
}

/**
 * Whether `check` matches `pattern`. Group shortcuts are tested before any
 * ID matching. Throws LintError(L202) for an unparseable glob.
 */
export function matchesPattern(check: Check, pattern: string): boolean {
  if (pattern === '*') {
    return true;
  }

  const group = GROUP_SELECTORS.get(pattern);
  if (group !== undefined) {
    return check.group === group;
  }

  if (pattern === check.id) {
    return true;
  }

  assertValidPattern(pattern);

  return minimatch(check.id, pattern, GLOB_OPTIONS);
}
