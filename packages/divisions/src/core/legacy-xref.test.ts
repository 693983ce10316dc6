/**
 * Legacy Cross-Reference Tests
 *
 * Forward resolution (legacy -> current), reverse lookup (current -> legacy
 * sources) and district expansion over the bundled dataset.
 */

import { describe, it, expect } from 'vitest';
import { tinyDataset } from '../__fixtures__/tiny-dataset.js';
import { BUNDLED_DATA_DIR } from './config.js';
import { LegacyCodeNotFoundError, UnknownCodeError } from './errors.js';
import { createRegistry } from './registry.js';

const registry = createRegistry({ source: BUNDLED_DATA_DIR });
const xref = registry.xref;

const codesOf = (records: readonly { readonly code: number }[]): number[] =>
  records.map((record) => record.code);

describe('currentForLegacy()', () => {
  it('should resolve a merged legacy ward', () => {
    const result = xref.currentForLegacy('ward', 26707);

    expect(result.current.code).toBe(26710);
    expect(result.current.name).toBe('Phường Tân Hải');
    expect(result.legacy.name).toBe('Phường Tân Hòa');
    expect(result.isPartial).toBe(false);
  });

  it('should default to the ward kind', () => {
    expect(xref.currentForLegacy(26707).current.code).toBe(26710);
  });

  it('should resolve a legacy province', () => {
    const result = xref.currentForLegacy('province', 77);

    expect(result.current.code).toBe(79);
    expect(result.current.name).toBe('Thành phố Hồ Chí Minh');
    expect(result.legacy.name).toBe('Tỉnh Bà Rịa - Vũng Tàu');
  });

  it('should keep province and ward codes apart', () => {
    // Code 10 is Lào Cai province and Nguyễn Trung Trực ward
    expect(xref.currentForLegacy('province', 10).current.code).toBe(15);
    expect(xref.currentForLegacy('ward', 10).current.code).toBe(4);
  });

  it('should answer with the primary target of a split unit', () => {
    const result = xref.currentForLegacy('ward', 16);

    expect(result.current.code).toBe(8);
    expect(result.isPartial).toBe(true);
  });

  it('should throw LegacyCodeNotFoundError for an unknown legacy code', () => {
    expect(() => xref.currentForLegacy('ward', 999999)).toThrow(LegacyCodeNotFoundError);
    expect(() => xref.currentForLegacy('province', 3)).toThrow(
      'Legacy province code 3 is not a known legacy code.'
    );
  });
});

describe('legacySourcesFor()', () => {
  it('should list the legacy wards merged into a current ward, ascending', () => {
    const sources = xref.legacySourcesFor('ward', 4);

    expect(codesOf(sources)).toEqual([4, 10, 13, 19]);
    expect(sources.map((ward) => ward.name)).toEqual([
      'Phường Trúc Bạch',
      'Phường Nguyễn Trung Trực',
      'Phường Quán Thánh',
      'Phường Điện Biên',
    ]);
  });

  it('should exclude units for which this ward is only a partial target', () => {
    // 16, 22, 28 and 73 each send part of their area to ward 4
    const codes = codesOf(xref.legacySourcesFor('ward', 4));

    expect(codes).not.toContain(16);
    expect(codes).not.toContain(73);
  });

  it('should list legacy provinces merged into a current province', () => {
    expect(codesOf(xref.legacySourcesFor('province', 79))).toEqual([74, 77, 79]);
    expect(codesOf(xref.legacySourcesFor('province', 15))).toEqual([10, 15]);
    expect(codesOf(xref.legacySourcesFor('province', 80))).toEqual([72, 80]);
    expect(codesOf(xref.legacySourcesFor('province', 4))).toEqual([4]);
  });

  it('should throw UnknownCodeError for an unknown current code', () => {
    expect(() => xref.legacySourcesFor('ward', 999)).toThrow(UnknownCodeError);
  });

  it('should return an empty list for a current unit without sources', () => {
    const tiny = createRegistry({ source: tinyDataset() });

    expect(tiny.xref.legacySourcesFor('ward', 25)).toEqual([]);
  });

  it('should round-trip every legacy unit through its primary target', () => {
    for (const kind of ['province', 'ward'] as const) {
      for (const legacy of registry.legacy.iterAll(kind)) {
        const { current } = xref.currentForLegacy(kind, legacy.code);
        const sources = codesOf(xref.legacySourcesFor(kind, current.code));
        expect(sources, `${kind} ${legacy.code}`).toContain(legacy.code);
      }
    }
  });
});

describe('legacyDistrictToCurrent()', () => {
  it('should resolve every ward of the district in legacy code order', () => {
    const pairs = xref.legacyDistrictToCurrent(754).map(
      ([legacyCode, resolution]) => [legacyCode, resolution.current.code]
    );

    expect(pairs).toEqual([
      [26704, 26704],
      [26707, 26710],
      [26710, 26710],
      [26713, 26704],
      [26716, 26704],
    ]);
  });

  it('should throw LegacyCodeNotFoundError for an unknown district', () => {
    expect(() => xref.legacyDistrictToCurrent(9999)).toThrow(LegacyCodeNotFoundError);
  });
});

describe('allCurrentForLegacy()', () => {
  it('should include partial targets in ascending order', () => {
    expect(codesOf(xref.allCurrentForLegacy('ward', 26713))).toEqual([26704, 26710]);
    expect(codesOf(xref.allCurrentForLegacy('ward', 76))).toEqual([70, 82]);
    expect(codesOf(xref.allCurrentForLegacy('province', 82))).toEqual([80, 82]);
  });

  it('should return only the primary target for a whole merge', () => {
    expect(codesOf(xref.allCurrentForLegacy('ward', 26707))).toEqual([26710]);
  });
});

describe('isPartlyMerged()', () => {
  it('should flag split units', () => {
    expect(xref.isPartlyMerged('ward', 76)).toBe(true);
    expect(xref.isPartlyMerged('ward', 26707)).toBe(false);
    expect(xref.isPartlyMerged('province', 82)).toBe(true);
    expect(xref.isPartlyMerged('province', 77)).toBe(false);
  });
});

describe('currentWardsForLegacyDistrict()', () => {
  it('should list distinct current wards covering the district', () => {
    expect(codesOf(xref.currentWardsForLegacyDistrict(754))).toEqual([26704, 26710]);
    expect(codesOf(xref.currentWardsForLegacyDistrict(80))).toEqual([2641, 2650]);
    expect(codesOf(xref.currentWardsForLegacyDistrict(1))).toEqual([4, 8, 25, 37]);
  });

  it('should include wards reached only through partial targets', () => {
    // No Hoàn Kiếm ward has ward 4 as its primary target; Cửa Nam (73) sends part there
    expect(codesOf(xref.currentWardsForLegacyDistrict(2))).toEqual([4, 37, 70, 82]);
  });
});
