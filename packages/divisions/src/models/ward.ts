/**
 * Current Ward
 *
 * Lowest-level unit (phường, xã or đặc khu) of the current administration,
 * attached directly to a province.
 */

import { getDefaultRegistry, type DivisionRegistry } from '../core/registry.js';
import type { WardRecord } from '../core/types.js';
import { Division, uniqueByCode, type LegacyQuery } from './base.js';
import { LegacyWard } from './legacy/ward.js';
import { Province } from './province.js';

export class Ward extends Division {
  readonly shortCodename: string;
  readonly provinceCode: number;

  constructor(record: WardRecord, registry: DivisionRegistry = getDefaultRegistry()) {
    super(record, registry);
    this.shortCodename = record.shortCodename;
    this.provinceCode = record.provinceCode;
  }

  /**
   * @throws UnknownCodeError
   */
  static fromCode(code: number): Ward {
    const registry = getDefaultRegistry();
    return new Ward(registry.current.get('ward', code), registry);
  }

  static *iterAll(): Generator<Ward> {
    const registry = getDefaultRegistry();
    for (const record of registry.current.iterAll('ward')) {
      yield new Ward(record, registry);
    }
  }

  /**
   * @throws UnknownCodeError if the province does not exist
   */
  static *iterByProvince(provinceCode: number): Generator<Ward> {
    const registry = getDefaultRegistry();
    for (const record of registry.current.iterWardsOfProvince(provinceCode)) {
      yield new Ward(record, registry);
    }
  }

  static search(query: string): Ward[] {
    const registry = getDefaultRegistry();
    return registry.search
      .search('current', 'ward', query)
      .map((record) => new Ward(record, registry));
  }

  /**
   * Current wards formed from legacy wards matching the query.
   *
   * Each matching legacy unit contributes its primary and partial targets,
   * ascending by code. By name, matches are taken in legacy code order and
   * repeated targets dropped. An unknown legacy code yields no result.
   */
  static searchFromLegacy(query: LegacyQuery): Ward[] {
    const registry = getDefaultRegistry();

    if (query.code !== undefined && query.code > 0) {
      if (registry.xref.recordFor('ward', query.code) === undefined) {
        return [];
      }
      return registry.xref
        .allCurrentForLegacy('ward', query.code)
        .map((record) => new Ward(record, registry));
    }

    if (query.name === undefined) {
      return [];
    }

    return uniqueByCode(
      registry.search
        .searchLegacy('ward', query.name)
        .flatMap((legacy) => registry.xref.allCurrentForLegacy('ward', legacy.code))
        .map((record) => new Ward(record, registry))
    );
  }

  /**
   * Current wards now covering a legacy district, ascending by code.
   * By name, the first matching district (lowest code) is used.
   */
  static searchFromLegacyDistrict(query: LegacyQuery): Ward[] {
    const registry = getDefaultRegistry();

    let records: readonly WardRecord[];
    if (query.code !== undefined && query.code > 0) {
      records = registry.legacy.find('district', query.code) === undefined
        ? []
        : registry.xref.currentWardsForLegacyDistrict(query.code);
    } else if (query.name !== undefined) {
      records = registry.search.searchLegacyDistrictToCurrent(query.name);
    } else {
      records = [];
    }

    return records.map((record) => new Ward(record, registry));
  }

  getProvince(): Province {
    return new Province(this.registry.current.get('province', this.provinceCode), this.registry);
  }

  /**
   * Legacy wards merged into this one, ascending by code
   */
  getLegacySources(): LegacyWard[] {
    return this.registry.xref
      .legacySourcesFor('ward', this.code)
      .map((record) => new LegacyWard(record, this.registry));
  }
}
