/**
 * Name Search Index Tests
 */

import { describe, it, expect } from 'vitest';
import { BUNDLED_DATA_DIR } from './config.js';
import { createRegistry } from './registry.js';

const registry = createRegistry({ source: BUNDLED_DATA_DIR });
const index = registry.search;

const codesOf = (records: readonly { readonly code: number }[]): number[] =>
  records.map((record) => record.code);

describe('search()', () => {
  it('should match folded substrings of current ward names', () => {
    expect(codesOf(index.search('current', 'ward', 'ba dinh'))).toEqual([4]);
  });

  it('should ignore case and diacritics in the query', () => {
    expect(codesOf(index.search('current', 'ward', 'HOÀN KIẾM'))).toEqual([70]);
    expect(codesOf(index.search('current', 'ward', 'hoan kiem'))).toEqual([70]);
    expect(codesOf(index.search('legacy', 'district', 'Hoàn Kiếm'))).toEqual([2]);
  });

  it('should treat separators in names as spaces', () => {
    expect(codesOf(index.search('legacy', 'province', 'ba ria vung tau'))).toEqual([77]);
    expect(codesOf(index.search('legacy', 'province', 'Bà Rịa - Vũng Tàu'))).toEqual([77]);
  });

  it('should fold the ð lookalike like đ', () => {
    expect(codesOf(index.search('current', 'ward', 'Ðình'))).toEqual(
      codesOf(index.search('current', 'ward', 'Đình'))
    );
    expect(codesOf(index.search('current', 'ward', 'Ba Ðình'))).toEqual([4]);
  });

  it('should fold đ to d on both sides', () => {
    expect(codesOf(index.search('legacy', 'ward', 'Đồng'))).toEqual([40, 55, 4258]);
    expect(codesOf(index.search('legacy', 'ward', 'dong'))).toEqual([40, 55, 4258]);
  });

  it('should return matches in ascending code order', () => {
    const codes = codesOf(index.search('legacy', 'ward', 'hang'));

    expect(codes).toEqual([43, 46, 49, 52, 61, 64, 70, 76, 88]);
  });

  it('should search provinces of both generations', () => {
    expect(codesOf(index.search('current', 'province', 'Lào Cai'))).toEqual([15]);
    expect(codesOf(index.search('legacy', 'province', 'lao cai'))).toEqual([10]);
    expect(codesOf(index.search('current', 'province', 'ho chi minh'))).toEqual([79]);
  });

  it('should return an empty list for an empty or blank query', () => {
    expect(index.search('current', 'ward', '')).toEqual([]);
    expect(index.search('legacy', 'ward', '   ')).toEqual([]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(index.search('current', 'province', 'atlantis')).toEqual([]);
  });

  it('should find no current districts', () => {
    expect(index.search('current', 'district', 'ba dinh')).toEqual([]);
  });

  it('should only return names containing the folded query', () => {
    for (const ward of index.search('legacy', 'ward', 'phường')) {
      expect(ward.name.startsWith('Phường')).toBe(true);
    }
  });
});

describe('findExact()', () => {
  it('should match the whole folded name', () => {
    expect(codesOf(index.findExact('current', 'ward', 'phuong ngoc ha'))).toEqual([8]);
    expect(codesOf(index.findExact('legacy', 'ward', 'Phường Ngọc Hà'))).toEqual([16]);
  });

  it('should not match a fragment', () => {
    expect(index.findExact('current', 'ward', 'ngoc ha')).toEqual([]);
  });

  it('should return an empty list for a blank name', () => {
    expect(index.findExact('legacy', 'province', ' ')).toEqual([]);
  });

  it('should hand out frozen groups', () => {
    const found = index.findExact('current', 'ward', 'Phường Ba Đình');

    expect(Object.isFrozen(found)).toBe(true);
    expect(Reflect.set(found, 'length', 0)).toBe(false);
    expect(codesOf(index.findExact('current', 'ward', 'Phường Ba Đình'))).toEqual([4]);
  });
});

describe('searchFromLegacy()', () => {
  it('should pair each matching legacy ward with its current ward', () => {
    const pairs = index.searchFromLegacy('ward', 'Cửa').map(
      ([legacyCode, resolution]) => [legacyCode, resolution.current.code]
    );

    expect(pairs).toEqual([
      [55, 70],
      [73, 82],
    ]);
  });

  it('should resolve legacy provinces by name', () => {
    const [match] = index.searchFromLegacy('province', 'vung tau');

    expect(match?.[0]).toBe(77);
    expect(match?.[1].current.code).toBe(79);
  });

  it('should return an empty list for no match', () => {
    expect(index.searchFromLegacy('ward', 'atlantis')).toEqual([]);
  });
});

describe('searchLegacyDistrictToCurrent()', () => {
  it('should expand the first matching district', () => {
    expect(codesOf(index.searchLegacyDistrictToCurrent('lào cai'))).toEqual([2641, 2650]);
    expect(codesOf(index.searchLegacyDistrictToCurrent('ba dinh'))).toEqual([4, 8, 25, 37]);
  });

  it('should return an empty list when no district matches', () => {
    expect(index.searchLegacyDistrictToCurrent('atlantis')).toEqual([]);
  });
});
