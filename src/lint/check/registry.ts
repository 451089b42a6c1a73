/**
 * Check Registry
 *
 * Catalogue of checks keyed by ID. Built once by a composition root and
 * passed to whatever runs checks; there is no process-wide instance.
 *
 * All operations are synchronous, so each call runs to completion on the
 * event loop before another initializer can observe or mutate the map.
 */

import { ErrorCode } from '../../errors/error-codes';
import { LintError } from '../../errors/lint-error';
import type { CheckGroup } from './constants';
import { assertValidPattern, matchesPattern } from './selector';
import type { Check } from './types';

export class CheckRegistry {
  private checks: Map<string, Check> = new Map();

  /**
   * Add a check. Throws LintError(L201) if the ID is already taken; the
   * registry is left unchanged in that case.
   */
  register(check: Check): void {
    if (this.checks.has(check.id)) {
      throw new LintError(ErrorCode.L201_DUPLICATE_CHECK_ID, `check with ID ${check.id} already registered`, {
        id: check.id,
      });
    }
    this.checks.set(check.id, check);
  }

  /**
   * Non-throwing variant of register: false when the ID is already taken.
   */
  tryRegister(check: Check): boolean {
    if (this.checks.has(check.id)) {
      return false;
    }
    this.checks.set(check.id, check);
    return true;
  }

  /**
   * Register several checks; stops at the first duplicate.
   */
  registerMany(checks: Check[]): void {
    for (const check of checks) {
      this.register(check);
    }
  }

  get(id: string): Check | undefined {
    return this.checks.get(id);
  }

  has(id: string): boolean {
    return this.checks.has(id);
  }

  count(): number {
    return this.checks.size;
  }

  /**
   * Fresh array of every registered check. No ordering guarantee.
   */
  listAll(): Check[] {
    return Array.from(this.checks.values());
  }

  listByGroup(group: CheckGroup): Check[] {
    return this.listAll().filter(c => c.group === group);
  }

  /**
   * Checks matching `pattern`, restricted to `group` when one is given.
   * Throws LintError(L202) if the pattern is not a valid glob.
   */
  listByPattern(pattern: string, group?: CheckGroup): Check[] {
    return this.listByPatterns([pattern], group);
  }

  /**
   * De-duplicated union of the checks matching any of `patterns`,
   * restricted to `group` when one is given. Every pattern is checked for
   * glob syntax before any check is matched.
   */
  listByPatterns(patterns: string[], group?: CheckGroup): Check[] {
    for (const pattern of patterns) {
      assertValidPattern(pattern);
    }

    const selected = new Map<string, Check>();

    for (const check of this.checks.values()) {
      if (group && check.group !== group) {
        continue;
      }
      if (patterns.some(pattern => matchesPattern(check, pattern))) {
        selected.set(check.id, check);
      }
    }

    return Array.from(selected.values());
  }
}
