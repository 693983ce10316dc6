/**
 * Current Ward Model Tests
 */

import { describe, it, expect } from 'vitest';
import { UnknownCodeError } from '../core/errors.js';
import { Ward } from './ward.js';

const codesOf = (models: Iterable<{ readonly code: number }>): number[] =>
  [...models].map((model) => model.code);

describe('Ward', () => {
  it('should load a ward by code', () => {
    const ward = Ward.fromCode(26710);

    expect(ward.name).toBe('Phường Tân Hải');
    expect(ward.divisionType).toBe('phường');
    expect(ward.codename).toBe('phuong_tan_hai');
    expect(ward.shortCodename).toBe('tan_hai');
    expect(ward.provinceCode).toBe(79);
    expect(ward.getProvince().name).toBe('Thành phố Hồ Chí Minh');
  });

  it('should throw UnknownCodeError for an unknown code', () => {
    expect(() => Ward.fromCode(1)).toThrow(UnknownCodeError);
  });

  it('should iterate wards overall and by province', () => {
    expect(codesOf(Ward.iterAll())).toHaveLength(11);
    expect(codesOf(Ward.iterByProvince(79))).toEqual([26704, 26710]);
  });

  it('should search by folded name', () => {
    expect(codesOf(Ward.search('Giảng Võ'))).toEqual([25]);
  });

  it('should list its legacy sources', () => {
    const sources = Ward.fromCode(4).getLegacySources();

    expect(codesOf(sources)).toEqual([4, 10, 13, 19]);
    expect(sources.map((w) => w.name)).toEqual([
      'Phường Trúc Bạch',
      'Phường Nguyễn Trung Trực',
      'Phường Quán Thánh',
      'Phường Điện Biên',
    ]);
  });
});

describe('Ward.searchFromLegacy()', () => {
  it('should resolve a legacy name', () => {
    expect(codesOf(Ward.searchFromLegacy({ name: 'phu my' }))).toEqual([26704]);
  });

  it('should return distinct current wards in legacy code order', () => {
    // Hàng Mã ... Hàng Trống went to Hoàn Kiếm (70); Hàng Bông and Hàng Bài to Cửa Nam (82)
    expect(codesOf(Ward.searchFromLegacy({ name: 'hang' }))).toEqual([70, 82]);
  });

  it('should resolve a legacy code with its partial targets', () => {
    expect(codesOf(Ward.searchFromLegacy({ code: 26713 }))).toEqual([26704, 26710]);
    expect(codesOf(Ward.searchFromLegacy({ code: 26707 }))).toEqual([26710]);
  });

  it('should include partial targets when resolving by name', () => {
    expect(codesOf(Ward.searchFromLegacy({ name: 'Mỹ Xuân' }))).toEqual([26704, 26710]);
    expect(codesOf(Ward.searchFromLegacy({ name: 'Mỹ Xuân' }))).toEqual(
      codesOf(Ward.searchFromLegacy({ code: 26713 }))
    );
  });

  it('should return nothing for an unknown legacy code', () => {
    expect(Ward.searchFromLegacy({ code: 22855 })).toEqual([]);
  });
});

describe('Ward.searchFromLegacyDistrict()', () => {
  it('should resolve a legacy district code', () => {
    expect(codesOf(Ward.searchFromLegacyDistrict({ code: 754 }))).toEqual([26704, 26710]);
  });

  it('should resolve a legacy district name', () => {
    expect(codesOf(Ward.searchFromLegacyDistrict({ name: 'Thị xã Phú Mỹ' }))).toEqual([26704, 26710]);
  });

  it('should return nothing for an unknown district', () => {
    expect(Ward.searchFromLegacyDistrict({ code: 9999 })).toEqual([]);
    expect(Ward.searchFromLegacyDistrict({ name: 'atlantis' })).toEqual([]);
    expect(Ward.searchFromLegacyDistrict({})).toEqual([]);
  });
});
