/**
 * Vietnamese text utilities
 *
 * Folding, codename derivation, and division-type parsing from name prefixes.
 * Shared by the search index and the dataset conversion tool.
 */

import type { DivisionKind, DivisionType } from '../types.js';

const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Fold a name for comparison.
 *
 * NFD-decompose, drop combining marks, lowercase, map đ (and its
 * lookalike ð) to d, turn separators such as " - " into spaces, collapse
 * whitespace runs to one space and trim. Apostrophes are kept.
 *
 * @example
 * foldName('  Phường  Đống Đa ')     // 'phuong dong da'
 * foldName('Tỉnh Bà Rịa - Vũng Tàu') // 'tinh ba ria vung tau'
 */
export function foldName(text: string): string {
  return text
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(/đ/g, 'd')
    .replace(/ð/g, 'd')
    .replace(/[^\p{L}\p{N}'’]+/gu, ' ')
    .trim();
}

/**
 * ASCII slug of a name: folded words joined by underscores.
 *
 * Hyphens and dots separate words; apostrophes are dropped.
 *
 * @example
 * toCodename('Tỉnh Bà Rịa - Vũng Tàu') // 'tinh_ba_ria_vung_tau'
 * toCodename("Xã Ea H'leo")           // 'xa_ea_hleo'
 */
export function toCodename(name: string): string {
  return foldName(name)
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter((word) => word.length > 0)
    .join('_');
}

/**
 * Descriptive alias of a current province, e.g. 'LAO_CAI'
 */
export function toAlias(codename: string): string {
  return codename.toUpperCase();
}

// ============================================================================
// Division Types
// ============================================================================

/**
 * Name prefix for each division type. Both city ranks are written "Thành phố".
 */
export const NAME_PREFIXES: Readonly<Record<DivisionType, string>> = {
  'tỉnh': 'Tỉnh',
  'thành phố trung ương': 'Thành phố',
  'thành phố': 'Thành phố',
  'huyện': 'Huyện',
  'quận': 'Quận',
  'thị xã': 'Thị xã',
  'xã': 'Xã',
  'phường': 'Phường',
  'thị trấn': 'Thị trấn',
  'đặc khu': 'Đặc khu',
};

// Matched in order against the folded name
const PREFIXES_BY_KIND: Readonly<Record<DivisionKind, readonly (readonly [string, DivisionType])[]>> = {
  province: [
    ['thanh pho', 'thành phố trung ương'],
    ['tinh', 'tỉnh'],
  ],
  district: [
    ['thanh pho', 'thành phố'],
    ['thi xa', 'thị xã'],
    ['huyen', 'huyện'],
    ['quan', 'quận'],
  ],
  ward: [
    ['thi tran', 'thị trấn'],
    ['dac khu', 'đặc khu'],
    ['phuong', 'phường'],
    ['xa', 'xã'],
  ],
};

/**
 * Division type from the rank prefix of a name, or undefined when the
 * name carries no prefix valid for the kind.
 *
 * @example
 * parseDivisionType('Thành phố Hà Nội', 'province')  // 'thành phố trung ương'
 * parseDivisionType('Thành phố Lào Cai', 'district') // 'thành phố'
 */
export function parseDivisionType(name: string, kind: DivisionKind): DivisionType | undefined {
  const folded = foldName(name);
  for (const [prefix, divisionType] of PREFIXES_BY_KIND[kind]) {
    if (folded === prefix || folded.startsWith(`${prefix} `)) {
      return divisionType;
    }
  }
  return undefined;
}

/**
 * Codename with the rank prefix removed.
 *
 * Numbered units keep their prefix: "Phường 1" stays 'phuong_1'.
 *
 * @example
 * shortCodename('Phường Ba Đình', 'phường') // 'ba_dinh'
 * shortCodename('Phường 12', 'phường')      // 'phuong_12'
 */
export function shortCodename(name: string, divisionType: DivisionType): string {
  const codename = toCodename(name);
  const prefix = `${toCodename(NAME_PREFIXES[divisionType])}_`;

  if (!codename.startsWith(prefix)) {
    return codename;
  }

  const rest = codename.slice(prefix.length);
  if (rest.length === 0 || /^[0-9]/.test(rest)) {
    return codename;
  }
  return rest;
}
