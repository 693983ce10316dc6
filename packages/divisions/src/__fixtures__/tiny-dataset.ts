/**
 * Tiny in-memory dataset for registry and loader tests.
 *
 * Every call returns fresh objects, so tests may replace parts freely.
 */

import type {
  ConversionFileJson,
  CrossReferenceJson,
  LegacyNestedDivisionsJson,
  LegacyProvinceJson,
  LegacyWardJson,
  MetadataJson,
  NestedDivisionsJson,
  ProvinceJson,
  WardJson,
} from '../core/schemas.js';
import { shortCodename, toCodename } from '../core/utils/text.js';

export interface TinyDataset {
  current: NestedDivisionsJson;
  legacy: LegacyNestedDivisionsJson;
  conversion: ConversionFileJson;
  metadata: MetadataJson;
}

export function currentWard(code: number, name: string, overrides: Partial<WardJson> = {}): WardJson {
  return {
    name,
    code,
    codename: toCodename(name),
    division_type: 'phường',
    short_codename: shortCodename(name, 'phường'),
    province_code: 1,
    ...overrides,
  };
}

export function legacyWard(code: number, name: string, overrides: Partial<LegacyWardJson> = {}): LegacyWardJson {
  return {
    name,
    code,
    codename: toCodename(name),
    division_type: 'phường',
    district_code: 1,
    ...overrides,
  };
}

export function crossRef(legacyCode: number, currentCode: number, partialTargets?: number[]): CrossReferenceJson {
  return {
    legacy_code: legacyCode,
    legacy_kind: 'ward',
    current_code: currentCode,
    current_kind: 'ward',
    ...(partialTargets ? { partial_targets: partialTargets } : {}),
  };
}

/**
 * Current Hà Nội with wards 4, 8 and 25 unless given others
 */
export function currentHanoi(wards?: WardJson[]): ProvinceJson {
  return {
    name: 'Thành phố Hà Nội',
    code: 1,
    codename: 'ha_noi',
    division_type: 'thành phố trung ương',
    phone_code: 24,
    wards: wards ?? [
      currentWard(4, 'Phường Ba Đình'),
      currentWard(8, 'Phường Ngọc Hà'),
      currentWard(25, 'Phường Giảng Võ'),
    ],
  };
}

/**
 * Legacy Hà Nội with district 1 (wards 4, 6, 16) unless given other wards
 */
export function legacyHanoi(wards?: LegacyWardJson[], districtProvinceCode = 1): LegacyProvinceJson {
  return {
    name: 'Thành phố Hà Nội',
    code: 1,
    codename: 'thanh_pho_ha_noi',
    division_type: 'thành phố trung ương',
    phone_code: 24,
    districts: [
      {
        name: 'Quận Ba Đình',
        code: 1,
        codename: 'quan_ba_dinh',
        division_type: 'quận',
        province_code: districtProvinceCode,
        wards: wards ?? [
          legacyWard(4, 'Phường Trúc Bạch'),
          legacyWard(6, 'Phường Vĩnh Phúc'),
          legacyWard(16, 'Phường Ngọc Hà'),
        ],
      },
    ],
  };
}

/**
 * Legacy 4 -> 4, 6 -> 8, 16 -> 8 (partly to 4). Current ward 25 has no sources.
 */
export function tinyDataset(): TinyDataset {
  return {
    current: [currentHanoi()],
    legacy: [legacyHanoi()],
    conversion: {
      effective_date: '2025-07-01',
      description: 'test cross-reference',
      records: [
        { legacy_code: 1, legacy_kind: 'province', current_code: 1, current_kind: 'province' },
        crossRef(4, 4),
        crossRef(6, 8),
        crossRef(16, 8, [4]),
      ],
    },
    metadata: {
      data_version: 'test-1',
      effective_date: '2025-07-01',
      description: 'tiny dataset',
      source: 'unit tests',
    },
  };
}
