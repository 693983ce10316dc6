/**
 * Legacy Cross-Reference Index
 *
 * Maps legacy provinces and wards to the current unit they were merged into,
 * and current units back to the legacy units whose primary target they are.
 *
 * A legacy unit split across several current units has one primary target
 * (`currentCode`) and zero or more `partialTargets`. Forward resolution
 * always answers with the primary target; `allCurrentForLegacy` includes
 * the partial ones.
 */

import { LegacyCodeNotFoundError } from './errors.js';
import type { CurrentLookupTables, LegacyLookupTables } from './lookup-tables.js';
import type {
  CrossRefKind,
  CrossReferenceRecord,
  CurrentEntityMap,
  CurrentWithSource,
  LegacyEntityMap,
  LegacyResolution,
  WardRecord,
} from './types.js';

type ByKind<V> = { readonly [P in CrossRefKind]: V };

export class LegacyXrefIndex {
  private readonly byLegacy: ByKind<ReadonlyMap<number, CrossReferenceRecord>>;
  private readonly sourcesByCurrent: ByKind<ReadonlyMap<number, readonly number[]>>;

  constructor(
    records: readonly CrossReferenceRecord[],
    private readonly current: CurrentLookupTables,
    private readonly legacy: LegacyLookupTables
  ) {
    this.byLegacy = {
      province: indexByLegacy(records, 'province'),
      ward: indexByLegacy(records, 'ward'),
    };
    this.sourcesByCurrent = {
      province: indexSources(records, 'province'),
      ward: indexSources(records, 'ward'),
    };
  }

  /**
   * Current unit a legacy ward was merged into
   *
   * @throws LegacyCodeNotFoundError when no cross-reference record exists
   */
  currentForLegacy(legacyCode: number): CurrentWithSource<'ward'>;
  /**
   * Current unit a legacy province or ward was merged into
   *
   * @throws LegacyCodeNotFoundError when no cross-reference record exists
   */
  currentForLegacy<K extends CrossRefKind>(kind: K, legacyCode: number): CurrentWithSource<K>;
  currentForLegacy(kindOrCode: CrossRefKind | number, legacyCode?: number): CurrentWithSource {
    if (typeof kindOrCode === 'number') {
      return this.resolve('ward', kindOrCode);
    }
    if (legacyCode === undefined) {
      throw new TypeError(`A legacy ${kindOrCode} code is required`);
    }
    return this.resolve(kindOrCode, legacyCode);
  }

  /**
   * The cross-reference record for a legacy unit, if any
   */
  recordFor(kind: CrossRefKind, legacyCode: number): CrossReferenceRecord | undefined {
    return this.byLegacy[kind].get(legacyCode);
  }

  isPartlyMerged(kind: CrossRefKind, legacyCode: number): boolean {
    return this.requireRecord(kind, legacyCode).partialTargets.length > 0;
  }

  /**
   * Primary and partial targets, ascending by code
   *
   * @throws LegacyCodeNotFoundError when no cross-reference record exists
   */
  allCurrentForLegacy<K extends CrossRefKind>(kind: K, legacyCode: number): readonly CurrentEntityMap[K][] {
    const record = this.requireRecord(kind, legacyCode);
    const codes = [record.currentCode, ...record.partialTargets].sort((a, b) => a - b);
    return codes.map((code) => this.current.get(kind, code));
  }

  /**
   * Legacy units whose primary target is the given current unit,
   * ascending by legacy code. Empty when none are recorded.
   *
   * @throws UnknownCodeError if the current code does not exist
   */
  legacySourcesFor<K extends CrossRefKind>(kind: K, currentCode: number): readonly LegacyEntityMap[K][] {
    this.current.get(kind, currentCode);
    const codes = this.sourcesByCurrent[kind].get(currentCode) ?? [];
    return codes.map((code) => this.legacy.get(kind, code));
  }

  /**
   * Every legacy ward of a legacy district, resolved to its current ward
   *
   * @throws LegacyCodeNotFoundError if the district does not exist
   */
  legacyDistrictToCurrent(districtCode: number): readonly LegacyResolution<'ward'>[] {
    const resolutions: LegacyResolution<'ward'>[] = [];
    for (const ward of this.legacy.iterWardsOfDistrict(districtCode)) {
      resolutions.push([ward.code, this.resolve('ward', ward.code)]);
    }
    return resolutions;
  }

  /**
   * Distinct current wards covering any part of a legacy district,
   * partial targets included, ascending by code
   *
   * @throws LegacyCodeNotFoundError if the district does not exist
   */
  currentWardsForLegacyDistrict(districtCode: number): readonly WardRecord[] {
    const codes = new Set<number>();
    for (const ward of this.legacy.iterWardsOfDistrict(districtCode)) {
      const record = this.requireRecord('ward', ward.code);
      codes.add(record.currentCode);
      for (const target of record.partialTargets) {
        codes.add(target);
      }
    }
    return [...codes].sort((a, b) => a - b).map((code) => this.current.get('ward', code));
  }

  private resolve<K extends CrossRefKind>(kind: K, legacyCode: number): CurrentWithSource<K> {
    const record = this.requireRecord(kind, legacyCode);
    return {
      current: this.current.get(kind, record.currentCode),
      legacy: this.legacy.get(kind, legacyCode),
      isPartial: record.partialTargets.length > 0,
    };
  }

  private requireRecord(kind: CrossRefKind, legacyCode: number): CrossReferenceRecord {
    const record = this.byLegacy[kind].get(legacyCode);
    if (record !== undefined) {
      return record;
    }
    if (this.legacy.has(kind, legacyCode)) {
      throw new LegacyCodeNotFoundError(kind, legacyCode, 'has no cross-reference record');
    }
    throw new LegacyCodeNotFoundError(kind, legacyCode);
  }
}

function indexByLegacy(
  records: readonly CrossReferenceRecord[],
  kind: CrossRefKind
): ReadonlyMap<number, CrossReferenceRecord> {
  return new Map(
    records
      .filter((record) => record.legacyKind === kind)
      .map((record) => [record.legacyCode, record])
  );
}

function indexSources(
  records: readonly CrossReferenceRecord[],
  kind: CrossRefKind
): ReadonlyMap<number, readonly number[]> {
  const sources = new Map<number, number[]>();
  for (const record of records) {
    if (record.currentKind !== kind) continue;
    const list = sources.get(record.currentCode);
    if (list) {
      list.push(record.legacyCode);
    } else {
      sources.set(record.currentCode, [record.legacyCode]);
    }
  }
  for (const list of sources.values()) {
    list.sort((a, b) => a - b);
    Object.freeze(list);
  }
  return sources;
}
