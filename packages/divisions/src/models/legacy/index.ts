/**
 * Pre-2025 divisions: Province -> District -> Ward
 *
 * @example
 * ```typescript
 * import { legacy } from 'vn-divisions';
 *
 * legacy.Ward.fromCode(26707).getCurrent().name; // 'Phường Tân Hải'
 * ```
 */

export { LegacyProvince as Province } from './province.js';
export { LegacyDistrict as District } from './district.js';
export { LegacyWard as Ward } from './ward.js';
