/**
 * Lookup Tables
 *
 * Immutable code-indexed tables for both generations, built once from a
 * validated dataset. Iteration is always ascending by code and restartable:
 * every `iterAll` call returns a fresh iterator over the same frozen array.
 */

import { LegacyCodeNotFoundError, UnknownCodeError, type DivisionError } from './errors.js';
import type {
  CurrentEntityMap,
  CurrentKind,
  DivisionKind,
  LegacyDistrictRecord,
  LegacyEntityMap,
  LegacyKind,
  LegacyProvinceRecord,
  LegacyWardRecord,
  ProvinceRecord,
  WardRecord,
} from './types.js';
import { toAlias } from './utils/text.js';

interface Coded {
  readonly code: number;
}

/**
 * One (generation, kind) table
 */
export class LookupTable<T extends Coded> {
  private readonly byCode: ReadonlyMap<number, T>;
  private readonly ordered: readonly T[];

  constructor(
    records: readonly T[],
    private readonly missError: (code: number) => DivisionError
  ) {
    this.ordered = Object.freeze([...records].sort((a, b) => a.code - b.code));
    this.byCode = new Map(this.ordered.map((record) => [record.code, record]));
  }

  get size(): number {
    return this.ordered.length;
  }

  has(code: number): boolean {
    return this.byCode.has(code);
  }

  /**
   * @throws DivisionError subclass supplied at construction when absent
   */
  get(code: number): T {
    const record = this.byCode.get(code);
    if (record === undefined) {
      throw this.missError(code);
    }
    return record;
  }

  find(code: number): T | undefined {
    return this.byCode.get(code);
  }

  iterAll(): IterableIterator<T> {
    return this.ordered.values();
  }

  /** Frozen array of all records in code order */
  all(): readonly T[] {
    return this.ordered;
  }
}

/**
 * Group records by a parent code, keeping code order inside each group
 */
function groupBy<T extends Coded>(
  records: Iterable<T>,
  parentOf: (record: T) => number
): ReadonlyMap<number, readonly T[]> {
  const groups = new Map<number, T[]>();
  for (const record of records) {
    const parent = parentOf(record);
    const group = groups.get(parent);
    if (group) {
      group.push(record);
    } else {
      groups.set(parent, [record]);
    }
  }
  for (const group of groups.values()) {
    Object.freeze(group);
  }
  return groups;
}

const EMPTY: readonly never[] = Object.freeze([]);

// ============================================================================
// Current Generation
// ============================================================================

type CurrentTableMap = {
  readonly [P in CurrentKind]: LookupTable<CurrentEntityMap[P]>;
};

export class CurrentLookupTables {
  private readonly tables: CurrentTableMap;
  private readonly wardsByProvince: ReadonlyMap<number, readonly WardRecord[]>;
  private readonly provincesByAlias: ReadonlyMap<string, ProvinceRecord>;

  constructor(provinces: readonly ProvinceRecord[], wards: readonly WardRecord[]) {
    this.tables = {
      province: new LookupTable(provinces, (code) => new UnknownCodeError('province', code)),
      ward: new LookupTable(wards, (code) => new UnknownCodeError('ward', code)),
    };
    this.wardsByProvince = groupBy(this.tables.ward.iterAll(), (ward) => ward.provinceCode);
    this.provincesByAlias = new Map(
      this.tables.province.all().map((province) => [toAlias(province.codename), province])
    );
  }

  table<K extends CurrentKind>(kind: K): LookupTable<CurrentEntityMap[K]> {
    return this.tables[kind];
  }

  /**
   * @throws UnknownCodeError
   */
  get<K extends CurrentKind>(kind: K, code: number): CurrentEntityMap[K] {
    return this.tables[kind].get(code);
  }

  find<K extends CurrentKind>(kind: K, code: number): CurrentEntityMap[K] | undefined {
    return this.tables[kind].find(code);
  }

  has(kind: DivisionKind, code: number): boolean {
    return kind !== 'district' && this.tables[kind].has(code);
  }

  iterAll<K extends CurrentKind>(kind: K): IterableIterator<CurrentEntityMap[K]> {
    return this.tables[kind].iterAll();
  }

  /**
   * Wards of a current province, ascending by code
   *
   * @throws UnknownCodeError if the province does not exist
   */
  iterWardsOfProvince(provinceCode: number): IterableIterator<WardRecord> {
    this.tables.province.get(provinceCode);
    return (this.wardsByProvince.get(provinceCode) ?? EMPTY).values();
  }

  /**
   * Resolve a descriptive alias such as 'HA_NOI' (case-insensitive)
   */
  provinceFromAlias(alias: string): ProvinceRecord | undefined {
    return this.provincesByAlias.get(alias.trim().toUpperCase());
  }
}

// ============================================================================
// Legacy Generation
// ============================================================================

type LegacyTableMap = {
  readonly [P in LegacyKind]: LookupTable<LegacyEntityMap[P]>;
};

export class LegacyLookupTables {
  private readonly tables: LegacyTableMap;
  private readonly districtsByProvince: ReadonlyMap<number, readonly LegacyDistrictRecord[]>;
  private readonly wardsByDistrict: ReadonlyMap<number, readonly LegacyWardRecord[]>;
  private readonly wardsByProvince: ReadonlyMap<number, readonly LegacyWardRecord[]>;

  constructor(
    provinces: readonly LegacyProvinceRecord[],
    districts: readonly LegacyDistrictRecord[],
    wards: readonly LegacyWardRecord[]
  ) {
    this.tables = {
      province: new LookupTable(provinces, (code) => new LegacyCodeNotFoundError('province', code)),
      district: new LookupTable(districts, (code) => new LegacyCodeNotFoundError('district', code)),
      ward: new LookupTable(wards, (code) => new LegacyCodeNotFoundError('ward', code)),
    };
    this.districtsByProvince = groupBy(this.tables.district.iterAll(), (d) => d.provinceCode);
    this.wardsByDistrict = groupBy(this.tables.ward.iterAll(), (w) => w.districtCode);
    this.wardsByProvince = groupBy(this.tables.ward.iterAll(), (w) => w.provinceCode);
  }

  table<K extends LegacyKind>(kind: K): LookupTable<LegacyEntityMap[K]> {
    return this.tables[kind];
  }

  /**
   * @throws LegacyCodeNotFoundError
   */
  get<K extends LegacyKind>(kind: K, code: number): LegacyEntityMap[K] {
    return this.tables[kind].get(code);
  }

  find<K extends LegacyKind>(kind: K, code: number): LegacyEntityMap[K] | undefined {
    return this.tables[kind].find(code);
  }

  has(kind: LegacyKind, code: number): boolean {
    return this.tables[kind].has(code);
  }

  iterAll<K extends LegacyKind>(kind: K): IterableIterator<LegacyEntityMap[K]> {
    return this.tables[kind].iterAll();
  }

  /**
   * @throws LegacyCodeNotFoundError if the province does not exist
   */
  iterDistrictsOfProvince(provinceCode: number): IterableIterator<LegacyDistrictRecord> {
    this.tables.province.get(provinceCode);
    return (this.districtsByProvince.get(provinceCode) ?? EMPTY).values();
  }

  /**
   * @throws LegacyCodeNotFoundError if the district does not exist
   */
  iterWardsOfDistrict(districtCode: number): IterableIterator<LegacyWardRecord> {
    this.tables.district.get(districtCode);
    return (this.wardsByDistrict.get(districtCode) ?? EMPTY).values();
  }

  /**
   * @throws LegacyCodeNotFoundError if the province does not exist
   */
  iterWardsOfProvince(provinceCode: number): IterableIterator<LegacyWardRecord> {
    this.tables.province.get(provinceCode);
    return (this.wardsByProvince.get(provinceCode) ?? EMPTY).values();
  }
}
