import { getDefaultRegistry, type DivisionRegistry } from '../../core/registry.js';
import type { LegacyWardRecord } from '../../core/types.js';
import { Division } from '../base.js';
import { Ward } from '../ward.js';
import { LegacyDistrict } from './district.js';
import { LegacyProvince } from './province.js';

export class LegacyWard extends Division {
  readonly districtCode: number;
  readonly provinceCode: number;

  constructor(record: LegacyWardRecord, registry: DivisionRegistry = getDefaultRegistry()) {
    super(record, registry);
    this.districtCode = record.districtCode;
    this.provinceCode = record.provinceCode;
  }

  /**
   * @throws LegacyCodeNotFoundError
   */
  static fromCode(code: number): LegacyWard {
    const registry = getDefaultRegistry();
    return new LegacyWard(registry.legacy.get('ward', code), registry);
  }

  static *iterAll(): Generator<LegacyWard> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterAll('ward')) {
      yield new LegacyWard(record, registry);
    }
  }

  /**
   * @throws LegacyCodeNotFoundError if the district does not exist
   */
  static *iterByDistrict(districtCode: number): Generator<LegacyWard> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterWardsOfDistrict(districtCode)) {
      yield new LegacyWard(record, registry);
    }
  }

  /**
   * @throws LegacyCodeNotFoundError if the province does not exist
   */
  static *iterByProvince(provinceCode: number): Generator<LegacyWard> {
    const registry = getDefaultRegistry();
    for (const record of registry.legacy.iterWardsOfProvince(provinceCode)) {
      yield new LegacyWard(record, registry);
    }
  }

  static search(query: string): LegacyWard[] {
    const registry = getDefaultRegistry();
    return registry.search
      .search('legacy', 'ward', query)
      .map((record) => new LegacyWard(record, registry));
  }

  getDistrict(): LegacyDistrict {
    return new LegacyDistrict(this.registry.legacy.get('district', this.districtCode), this.registry);
  }

  getProvince(): LegacyProvince {
    return new LegacyProvince(this.registry.legacy.get('province', this.provinceCode), this.registry);
  }

  /**
   * Current ward this one was merged into (the primary target when split)
   */
  getCurrent(): Ward {
    return new Ward(this.registry.xref.currentForLegacy('ward', this.code).current, this.registry);
  }

  /**
   * Primary and partial targets, ascending by code
   */
  getAllCurrent(): Ward[] {
    return this.registry.xref
      .allCurrentForLegacy('ward', this.code)
      .map((record) => new Ward(record, this.registry));
  }

  isPartlyMerged(): boolean {
    return this.registry.xref.isPartlyMerged('ward', this.code);
  }
}
