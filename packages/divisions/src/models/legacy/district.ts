import { getDefaultRegistry, type DivisionRegistry } from '../../core/registry.js';
import type { LegacyDistrictRecord } from '../../core/types.js';
import { Division } from '../base.js';
import { Ward } from '../ward.js';
import { LegacyProvince } from './province.js';
import { LegacyWard } from './ward.js';

/**
 * District (quận, huyện, thị xã, thành phố thuộc tỉnh). Districts were
 * dissolved on 2025-07-01 and have no current counterpart of their own.
 */
export class LegacyDistrict extends Division {
  readonly provinceCode: number;

  constructor(record: LegacyDistrictRecord, registry: DivisionRegistry = getDefaultRegistry()) {
    super(record, registry);
    this.provinceCode = record.provinceCode;
  }

  /**
   * @throws LegacyCodeNotFoundError
   */
  static fromCode(code: number): LegacyDistrict {
    const registry = getDefaultRegistry();
    return new LegacyDistrict(registry.legacy.get('district', code), registry);
  }

  static *iterAll(): Generator<LegacyDistrict> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterAll('district')) {
      yield new LegacyDistrict(record, registry);
    }
  }

  /**
   * @throws LegacyCodeNotFoundError if the province does not exist
   */
  static *iterByProvince(provinceCode: number): Generator<LegacyDistrict> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterDistrictsOfProvince(provinceCode)) {
      yield new LegacyDistrict(record, registry);
    }
  }

  static search(query: string): LegacyDistrict[] {
    const registry = getDefaultRegistry();
    return registry.search
      .search('legacy', 'district', query)
      .map((record) => new LegacyDistrict(record, registry));
  }

  getProvince(): LegacyProvince {
    return new LegacyProvince(this.registry.legacy.get('province', this.provinceCode), this.registry);
  }

  *iterWards(): Generator<LegacyWard> {
    for (const record of this.registry.legacy.iterWardsOfDistrict(this.code)) {
      yield new LegacyWard(record, this.registry);
    }
  }

  /**
   * Current wards covering any part of this district, ascending by code
   */
  getCurrentWards(): Ward[] {
    return this.registry.xref
      .currentWardsForLegacyDistrict(this.code)
      .map((record) => new Ward(record, this.registry));
  }
}
