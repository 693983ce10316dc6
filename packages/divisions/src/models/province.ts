/**
 * Current Province
 *
 * Province-level unit of the two-level administration effective 2025-07-01.
 *
 * @example
 * ```typescript
 * const laoCai = Province.fromCode(15);
 * laoCai.phoneCode;                              // 214
 * laoCai.getLegacySources().map((p) => p.code);  // [10, 15]
 * Province.fromAlias('LAO_CAI').equals(laoCai);  // true
 * ```
 */

import { DivisionError } from '../core/errors.js';
import { getDefaultRegistry, type DivisionRegistry } from '../core/registry.js';
import type { ProvinceRecord } from '../core/types.js';
import { toAlias } from '../core/utils/text.js';
import { Division, uniqueByCode, type LegacyQuery } from './base.js';
import { LegacyProvince } from './legacy/province.js';
import { Ward } from './ward.js';

export class Province extends Division {
  readonly phoneCode: number;

  constructor(record: ProvinceRecord, registry: DivisionRegistry = getDefaultRegistry()) {
    super(record, registry);
    this.phoneCode = record.phoneCode;
  }

  /** Descriptive alias, e.g. 'HA_NOI' */
  get alias(): string {
    return toAlias(this.codename);
  }

  /**
   * @throws UnknownCodeError
   */
  static fromCode(code: number): Province {
    const registry = getDefaultRegistry();
    return new Province(registry.current.get('province', code), registry);
  }

  /**
   * @throws DivisionError for an unknown alias
   */
  static fromAlias(alias: string): Province {
    const registry = getDefaultRegistry();
    const record = registry.current.provinceFromAlias(alias);
    if (record === undefined) {
      throw new DivisionError(`Province alias ${alias} is invalid.`);
    }
    return new Province(record, registry);
  }

  static *iterAll(): Generator<Province> {
    const registry = getDefaultRegistry();
    for (const record of registry.current.iterAll('province')) {
      yield new Province(record, registry);
    }
  }

  static search(query: string): Province[] {
    const registry = getDefaultRegistry();
    return registry.search
      .search('current', 'province', query)
      .map((record) => new Province(record, registry));
  }

  /**
   * Current provinces formed from legacy provinces matching the query.
   *
   * Each matching legacy unit contributes its primary and partial targets,
   * ascending by code. By name, matches are taken in legacy code order and
   * repeated targets dropped. An unknown legacy code yields no result.
   */
  static searchFromLegacy(query: LegacyQuery): Province[] {
    const registry = getDefaultRegistry();

    if (query.code !== undefined && query.code > 0) {
      if (registry.xref.recordFor('province', query.code) === undefined) {
        return [];
      }
      return registry.xref
        .allCurrentForLegacy('province', query.code)
        .map((record) => new Province(record, registry));
    }

    if (query.name === undefined) {
      return [];
    }

    return uniqueByCode(
      registry.search
        .searchLegacy('province', query.name)
        .flatMap((legacy) => registry.xref.allCurrentForLegacy('province', legacy.code))
        .map((record) => new Province(record, registry))
    );
  }

  /**
   * Legacy provinces merged into this one, ascending by code
   */
  getLegacySources(): LegacyProvince[] {
    return this.registry.xref
      .legacySourcesFor('province', this.code)
      .map((record) => new LegacyProvince(record, this.registry));
  }

  getWards(): Ward[] {
    return [...this.registry.current.iterWardsOfProvince(this.code)].map(
      (record) => new Ward(record, this.registry)
    );
  }
}
