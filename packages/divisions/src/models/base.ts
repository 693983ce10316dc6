import type { DivisionRegistry } from '../core/registry.js';
import type { DivisionRecord, DivisionType } from '../core/types.js';

/**
 * Legacy lookup by code (takes precedence when positive) or by name
 */
export interface LegacyQuery {
  readonly name?: string;
  readonly code?: number;
}

/**
 * Common fields of every division model. Two models are equal when they
 * are the same class (generation and kind) and share a code.
 */
export abstract class Division {
  readonly name: string;
  readonly code: number;
  readonly divisionType: DivisionType;
  readonly codename: string;

  protected constructor(
    record: DivisionRecord,
    protected readonly registry: DivisionRegistry
  ) {
    this.name = record.name;
    this.code = record.code;
    this.divisionType = record.divisionType;
    this.codename = record.codename;
  }

  equals(other: Division): boolean {
    return other.constructor === this.constructor && other.code === this.code;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Keep the first model for each code, preserving order
 */
export function uniqueByCode<T extends Division>(models: readonly T[]): T[] {
  const seen = new Set<number>();
  return models.filter((model) => {
    if (seen.has(model.code)) return false;
    seen.add(model.code);
    return true;
  });
}
