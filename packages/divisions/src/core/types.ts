/**
 * Core Types for Vietnam Administrative Divisions
 *
 * Two data generations coexist:
 * - current: Province -> Ward (effective 2025-07-01)
 * - legacy:  Province -> District -> Ward (before 2025-07-01)
 *
 * Entity identity is the integer `code`, unique within a (generation, kind).
 * Names and codenames are NOT unique and never identify an entity.
 *
 * TYPE SAFETY: All records are readonly and frozen after load.
 */

// ============================================================================
// Generations and Kinds
// ============================================================================

export type Generation = 'current' | 'legacy';

export type DivisionKind = 'province' | 'district' | 'ward';

/**
 * Kinds that exist in the current generation (districts were dissolved)
 */
export type CurrentKind = 'province' | 'ward';

export type LegacyKind = DivisionKind;

/**
 * Kinds recorded in the legacy cross-reference table
 */
export type CrossRefKind = 'province' | 'ward';

export const GENERATIONS: readonly Generation[] = ['current', 'legacy'];

export const KINDS_BY_GENERATION: Readonly<Record<Generation, readonly DivisionKind[]>> = {
  current: ['province', 'ward'],
  legacy: ['province', 'district', 'ward'],
};

// ============================================================================
// Division Types
// ============================================================================

/**
 * Administrative rank of a unit, as written in Vietnamese.
 *
 * `thành phố trung ương` is a centrally-governed city (province level),
 * `thành phố` a provincial city (legacy district level),
 * `đặc khu` a special zone (current ward level).
 */
export const DIVISION_TYPES = [
  'tỉnh',
  'thành phố trung ương',
  'thành phố',
  'huyện',
  'quận',
  'thị xã',
  'xã',
  'phường',
  'thị trấn',
  'đặc khu',
] as const;

export type DivisionType = (typeof DIVISION_TYPES)[number];

// ============================================================================
// Entity Records
// ============================================================================

export interface DivisionRecord {
  /** Full official name, including the rank prefix ("Tỉnh", "Phường", ...) */
  readonly name: string;
  readonly code: number;
  readonly divisionType: DivisionType;
  /** ASCII slug derived from the name, e.g. "phuong_ba_dinh" */
  readonly codename: string;
}

export interface ProvinceRecord extends DivisionRecord {
  /** Fixed-line telephone area code */
  readonly phoneCode: number;
}

export interface WardRecord extends DivisionRecord {
  /** Codename without the rank prefix, e.g. "ba_dinh" */
  readonly shortCodename: string;
  readonly provinceCode: number;
}

export type LegacyProvinceRecord = ProvinceRecord;

export interface LegacyDistrictRecord extends DivisionRecord {
  readonly provinceCode: number;
}

export interface LegacyWardRecord extends DivisionRecord {
  readonly districtCode: number;
  readonly provinceCode: number;
}

export interface CurrentEntityMap {
  readonly province: ProvinceRecord;
  readonly ward: WardRecord;
}

export interface LegacyEntityMap {
  readonly province: LegacyProvinceRecord;
  readonly district: LegacyDistrictRecord;
  readonly ward: LegacyWardRecord;
}

export type CurrentEntity = CurrentEntityMap[CurrentKind];

export type LegacyEntity = LegacyEntityMap[LegacyKind];

// ============================================================================
// Cross-Reference
// ============================================================================

/**
 * One legacy unit and the current unit it was merged into.
 *
 * `partialTargets` lists other current units that received part of the
 * legacy unit's area. The primary target (`currentCode`) is the answer
 * to "what is this legacy unit now".
 */
export interface CrossReferenceRecord {
  readonly legacyCode: number;
  readonly legacyKind: CrossRefKind;
  readonly currentCode: number;
  readonly currentKind: CrossRefKind;
  readonly partialTargets: readonly number[];
}

/**
 * A resolved current unit paired with the legacy unit it was resolved from
 */
export interface CurrentWithSource<K extends CrossRefKind = CrossRefKind> {
  readonly current: CurrentEntityMap[K];
  readonly legacy: LegacyEntityMap[K];
  /** True when the legacy unit was split across several current units */
  readonly isPartial: boolean;
}

/**
 * `[legacyCode, resolution]` pair returned by bulk and search resolutions
 */
export type LegacyResolution<K extends CrossRefKind = CrossRefKind> = readonly [
  legacyCode: number,
  resolution: CurrentWithSource<K>,
];

// ============================================================================
// Dataset Metadata
// ============================================================================

export interface DatasetMetadata {
  /** Opaque marker consumers compare to detect dataset updates */
  readonly dataVersion: string;
  /** Date the reorganization took effect (YYYY-MM-DD) */
  readonly effectiveDate: string;
  readonly description: string;
  readonly source: string;
}
