/**
 * Division Error Types
 *
 * Lookup failures are always raised to the caller, never defaulted.
 * Search never raises on "no match": an empty result is the answer.
 */

import type { DivisionKind, Generation } from './types.js';

/**
 * Base class for all errors raised by the library
 */
export class DivisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DivisionError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A current-generation code is absent from the registry
 */
export class UnknownCodeError extends DivisionError {
  readonly generation: Generation = 'current';

  constructor(
    public readonly kind: DivisionKind,
    public readonly code: number
  ) {
    super(`${capitalize(kind)} code ${code} is invalid.`);
    this.name = 'UnknownCodeError';
  }
}

/**
 * A legacy code is absent from the legacy registry or the cross-reference table
 */
export class LegacyCodeNotFoundError extends DivisionError {
  readonly generation: Generation = 'legacy';

  constructor(
    public readonly kind: DivisionKind,
    public readonly code: number,
    reason = 'is not a known legacy code'
  ) {
    super(`Legacy ${kind} code ${code} ${reason}.`);
    this.name = 'LegacyCodeNotFoundError';
  }
}

/**
 * The canonical dataset is missing or malformed.
 *
 * Raised on the first load attempt. No partial tables are ever served.
 *
 * RECOVERY:
 * - Run `vn-divisions-tools validate <dir>` to list every issue
 * - Regenerate the dataset from the source CSV files
 * - Check VN_DIVISIONS_DATA_DIR points at a complete dataset directory
 */
export class DataLoadError extends DivisionError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'DataLoadError';
  }

  /**
   * Formatted list of the issues, truncated after `limit` entries
   */
  getSummary(limit = 20): string {
    const lines: string[] = [`${this.message} (${this.issues.length} issues)`];

    for (const issue of this.issues.slice(0, limit)) {
      lines.push(`  - ${issue}`);
    }

    if (this.issues.length > limit) {
      lines.push(`  ... and ${this.issues.length - limit} more issues`);
    }

    return lines.join('\n');
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
