/**
 * Lookup Table Tests
 *
 * Exact code lookups, ordered iteration and by-parent iteration over the
 * bundled dataset.
 */

import { describe, it, expect } from 'vitest';
import { BUNDLED_DATA_DIR } from './config.js';
import { LegacyCodeNotFoundError, UnknownCodeError } from './errors.js';
import { createRegistry } from './registry.js';

const registry = createRegistry({ source: BUNDLED_DATA_DIR });

const codesOf = (records: Iterable<{ readonly code: number }>): number[] =>
  [...records].map((record) => record.code);

// ============================================================================
// Current Generation
// ============================================================================

describe('CurrentLookupTables', () => {
  it('should return the province for a valid code', () => {
    const province = registry.current.get('province', 15);

    expect(province).toEqual({
      name: 'Tỉnh Lào Cai',
      code: 15,
      divisionType: 'tỉnh',
      codename: 'lao_cai',
      phoneCode: 214,
    });
  });

  it('should return the ward for a valid code', () => {
    const ward = registry.current.get('ward', 4);

    expect(ward.name).toBe('Phường Ba Đình');
    expect(ward.shortCodename).toBe('ba_dinh');
    expect(ward.provinceCode).toBe(1);
  });

  it('should throw UnknownCodeError for an unknown code', () => {
    expect(() => registry.current.get('ward', 9999)).toThrow(UnknownCodeError);
    expect(() => registry.current.get('ward', 9999)).toThrow('Ward code 9999 is invalid.');
  });

  it('should not resolve a legacy-only code in the current tables', () => {
    // Ward 1 (Phúc Xá) exists only before 2025
    expect(registry.current.find('ward', 1)).toBeUndefined();
    expect(registry.legacy.find('ward', 1)?.name).toBe('Phường Phúc Xá');
  });

  it('should iterate provinces in ascending code order', () => {
    const codes = codesOf(registry.current.iterAll('province'));

    expect(codes).toHaveLength(34);
    expect(codes[0]).toBe(1);
    expect(codes[codes.length - 1]).toBe(96);
    expect(codes).toEqual([...codes].sort((a, b) => a - b));
  });

  it('should restart iteration on every call', () => {
    const first = codesOf(registry.current.iterAll('ward'));
    const second = codesOf(registry.current.iterAll('ward'));

    expect(first).toEqual([4, 8, 25, 37, 70, 82, 2641, 2650, 4249, 26704, 26710]);
    expect(second).toEqual(first);
  });

  it('should iterate the wards of one province', () => {
    expect(codesOf(registry.current.iterWardsOfProvince(15))).toEqual([2641, 2650, 4249]);
    expect(codesOf(registry.current.iterWardsOfProvince(4))).toEqual([]);
  });

  it('should throw when iterating wards of an unknown province', () => {
    expect(() => registry.current.iterWardsOfProvince(3)).toThrow(UnknownCodeError);
  });

  it('should resolve descriptive aliases', () => {
    expect(registry.current.provinceFromAlias('LAO_CAI')?.code).toBe(15);
    expect(registry.current.provinceFromAlias('lao_cai')?.code).toBe(15);
    expect(registry.current.provinceFromAlias('HO_CHI_MINH')?.code).toBe(79);
    expect(registry.current.provinceFromAlias('HUE')?.code).toBe(46);
    expect(registry.current.provinceFromAlias('ATLANTIS')).toBeUndefined();
  });

  it('should serve frozen records', () => {
    const ward = registry.current.get('ward', 70);

    expect(Object.isFrozen(ward)).toBe(true);
  });
});

// ============================================================================
// Legacy Generation
// ============================================================================

describe('LegacyLookupTables', () => {
  it('should return the legacy province for a valid code', () => {
    const province = registry.legacy.get('province', 77);

    expect(province.name).toBe('Tỉnh Bà Rịa - Vũng Tàu');
    expect(province.codename).toBe('tinh_ba_ria_vung_tau');
    expect(province.phoneCode).toBe(254);
  });

  it('should keep the full codename of legacy provinces', () => {
    expect(registry.legacy.get('province', 1).codename).toBe('thanh_pho_ha_noi');
    expect(registry.current.get('province', 1).codename).toBe('ha_noi');
  });

  it('should attach both parents to legacy wards', () => {
    const ward = registry.legacy.get('ward', 2662);

    expect(ward).toEqual({
      name: 'Xã Cam Đường',
      code: 2662,
      divisionType: 'xã',
      codename: 'xa_cam_duong',
      districtCode: 80,
      provinceCode: 10,
    });
  });

  it('should throw LegacyCodeNotFoundError for an unknown code', () => {
    expect(() => registry.legacy.get('district', 9999)).toThrow(LegacyCodeNotFoundError);
    expect(() => registry.legacy.get('district', 9999)).toThrow(
      'Legacy district code 9999 is not a known legacy code.'
    );
  });

  it('should iterate districts of a province and wards of a district', () => {
    expect(codesOf(registry.legacy.iterDistrictsOfProvince(1))).toEqual([1, 2]);
    expect(codesOf(registry.legacy.iterWardsOfDistrict(754))).toEqual([26704, 26707, 26710, 26713, 26716]);
    expect(codesOf(registry.legacy.iterWardsOfProvince(15))).toEqual([4249, 4252, 4255, 4258]);
  });

  it('should return nothing for a province without recorded districts', () => {
    expect(codesOf(registry.legacy.iterDistrictsOfProvince(2))).toEqual([]);
  });

  it('should iterate every legacy kind in ascending order', () => {
    for (const kind of ['province', 'district', 'ward'] as const) {
      const codes = codesOf(registry.legacy.iterAll(kind));
      expect(codes).toEqual([...codes].sort((a, b) => a - b));
    }
    expect(codesOf(registry.legacy.iterAll('district'))).toEqual([1, 2, 80, 132, 754]);
  });
});
