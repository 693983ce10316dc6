import { getDefaultRegistry, type DivisionRegistry } from '../../core/registry.js';
import type { LegacyProvinceRecord } from '../../core/types.js';
import { Division } from '../base.js';
import { Province } from '../province.js';
import { LegacyDistrict } from './district.js';

/**
 * Province of the three-level administration in force before 2025-07-01
 */
export class LegacyProvince extends Division {
  readonly phoneCode: number;

  constructor(record: LegacyProvinceRecord, registry: DivisionRegistry = getDefaultRegistry()) {
    super(record, registry);
    this.phoneCode = record.phoneCode;
  }

  /**
   * @throws LegacyCodeNotFoundError
   */
  static fromCode(code: number): LegacyProvince {
    const registry = getDefaultRegistry();
    return new LegacyProvince(registry.legacy.get('province', code), registry);
  }

  static *iterAll(): Generator<LegacyProvince> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterAll('province')) {
      yield new LegacyProvince(record, registry);
    }
  }

  static search(query: string): LegacyProvince[] {
    const registry = getDefaultRegistry();
    return registry.search
      .search('legacy', 'province', query)
      .map((record) => new LegacyProvince(record, registry));
  }

  *iterDistricts(): Generator<LegacyDistrict> {
    for (const record of this.registry.legacy.iterDistrictsOfProvince(this.code)) {
      yield new LegacyDistrict(record, this.registry);
    }
  }

  /**
   * Current province this one was merged into
   */
  getCurrent(): Province {
    return new Province(this.registry.xref.currentForLegacy('province', this.code).current, this.registry);
  }

  /** True when part of the area went to another current province */
  isPartlyMerged(): boolean {
    return this.registry.xref.isPartlyMerged('province', this.code);
  }
}
