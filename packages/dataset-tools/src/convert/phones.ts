/**
 * Phone Area Codes
 *
 * Reads the fixed-line area code table (order, province name, code) and
 * matches its province names against division names. The table spells
 * some provinces differently from the division list, so names are
 * compared on their codename with the rank prefix removed.
 */

import { z } from 'zod';
import { toCodename } from 'vn-divisions';
import { CodeCellSchema, NameCellSchema, parseRows, type RowParseResult } from './rows.js';

export interface PhoneCode {
  readonly provinceName: string;
  readonly code: number;
}

const PhoneCodeRowSchema = z.object({
  provinceName: NameCellSchema,
  code: CodeCellSchema,
});

// Spellings that differ between the phone table and the division lists
const KEY_ALIASES: Readonly<Record<string, string>> = {
  hue: 'thua_thien_hue',
  thua_thien_hue: 'hue',
  bac_kan: 'bac_can',
  bac_can: 'bac_kan',
};

const RANK_PREFIXES = ['thanh_pho_', 'tinh_', 'tp_'];

/**
 * Matching key of a province name: 'Tỉnh Bà Rịa - Vũng Tàu' -> 'ba_ria_vung_tau'
 */
export function phoneKey(provinceName: string): string {
  const codename = toCodename(provinceName);
  const prefix = RANK_PREFIXES.find((p) => codename.startsWith(p));
  return prefix === undefined ? codename : codename.slice(prefix.length);
}

export function parsePhoneCodeRows(cells: readonly (readonly string[])[]): RowParseResult<PhoneCode> {
  return parseRows(
    cells,
    PhoneCodeRowSchema,
    (row) => ({ provinceName: row[1], code: row[2] }),
    { headerRows: 1, minColumns: 3 }
  );
}

export class PhoneCodeTable {
  private readonly byKey = new Map<string, number>();

  constructor(entries: readonly PhoneCode[]) {
    for (const entry of entries) {
      this.byKey.set(phoneKey(entry.provinceName), entry.code);
    }
  }

  get size(): number {
    return this.byKey.size;
  }

  /**
   * Area code for a province name, or undefined when the table has none
   */
  lookup(provinceName: string): number | undefined {
    const key = phoneKey(provinceName);
    const direct = this.byKey.get(key);
    if (direct !== undefined) {
      return direct;
    }
    const alias = KEY_ALIASES[key];
    return alias === undefined ? undefined : this.byKey.get(alias);
  }
}
