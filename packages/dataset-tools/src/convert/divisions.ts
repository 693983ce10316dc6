/**
 * Current Division Conversion
 *
 * Turns the current-generation CSV export (province name, province code,
 * ward name, ward code) into `nested-divisions.json`, or into the flat
 * `flat-divisions.json` variant.
 */

import { z } from 'zod';
import {
  FlatDivisionsSchema,
  NestedDivisionsSchema,
  formatIssues,
  parseDivisionType,
  shortCodename,
  toCodename,
  type FlatWardJson,
  type NestedDivisionsJson,
  type ProvinceJson,
  type WardJson,
} from 'vn-divisions';
import { ConversionError } from './errors.js';
import type { PhoneCodeTable } from './phones.js';
import {
  CodeCellSchema,
  NameCellSchema,
  parseRows,
  type ConversionOutput,
  type ParsedRow,
  type RowParseResult,
} from './rows.js';

export const CURRENT_COLUMNS = ['province_name', 'province_code', 'ward_name', 'ward_code'] as const;

const CurrentWardRowSchema = z.object({
  provinceName: NameCellSchema,
  provinceCode: CodeCellSchema,
  wardName: NameCellSchema,
  wardCode: CodeCellSchema,
});

export type CurrentWardRow = z.infer<typeof CurrentWardRowSchema>;

export function parseCurrentRows(cells: readonly (readonly string[])[]): RowParseResult<CurrentWardRow> {
  return parseRows(
    cells,
    CurrentWardRowSchema,
    (row) => ({ provinceName: row[0], provinceCode: row[1], wardName: row[2], wardCode: row[3] }),
    { headerRows: 1, minColumns: CURRENT_COLUMNS.length }
  );
}

interface ProvinceDraft {
  readonly line: number;
  readonly name: string;
  readonly wards: Map<number, WardJson>;
}

/**
 * Group ward rows by province and derive codenames, division types and
 * phone codes.
 *
 * Without a phone table every province gets phone code 0.
 *
 * @throws ConversionError on conflicting rows, names without a rank
 *   prefix, or provinces missing from the phone table
 */
export function buildNestedDivisions(
  rows: readonly ParsedRow<CurrentWardRow>[],
  phones: PhoneCodeTable | null
): ConversionOutput<NestedDivisionsJson> {
  const issues: string[] = [];
  const warnings: string[] = [];
  const provinces = new Map<number, ProvinceDraft>();
  const wardLines = new Map<number, number>();

  for (const { line, value: row } of rows) {
    let province = provinces.get(row.provinceCode);
    if (province === undefined) {
      province = { line, name: row.provinceName, wards: new Map() };
      provinces.set(row.provinceCode, province);
    } else if (province.name !== row.provinceName) {
      issues.push(
        `line ${line}: province ${row.provinceCode} is named "${row.provinceName}" but "${province.name}" on line ${province.line}`
      );
      continue;
    }

    const firstLine = wardLines.get(row.wardCode);
    if (firstLine !== undefined) {
      issues.push(`line ${line}: ward ${row.wardCode} already listed on line ${firstLine}`);
      continue;
    }
    wardLines.set(row.wardCode, line);

    let divisionType = parseDivisionType(row.wardName, 'ward');
    if (divisionType === undefined) {
      warnings.push(`line ${line}: ward "${row.wardName}" has no rank prefix, using xã`);
      divisionType = 'xã';
    }

    province.wards.set(row.wardCode, {
      name: row.wardName,
      code: row.wardCode,
      codename: toCodename(row.wardName),
      division_type: divisionType,
      short_codename: shortCodename(row.wardName, divisionType),
      province_code: row.provinceCode,
    });
  }

  const data: ProvinceJson[] = [];
  for (const [code, province] of [...provinces].sort(([a], [b]) => a - b)) {
    const divisionType = parseDivisionType(province.name, 'province');
    if (divisionType === undefined) {
      issues.push(`line ${province.line}: province "${province.name}" has no rank prefix`);
      continue;
    }

    let phoneCode = 0;
    if (phones !== null) {
      const found = phones.lookup(province.name);
      if (found === undefined) {
        issues.push(`province ${code} "${province.name}" has no phone code`);
      } else {
        phoneCode = found;
      }
    }

    data.push({
      name: province.name,
      code,
      codename: shortCodename(province.name, divisionType),
      division_type: divisionType,
      phone_code: phoneCode,
      wards: [...province.wards.values()].sort((a, b) => a.code - b.code),
    });
  }

  if (issues.length > 0) {
    throw new ConversionError('Division CSV could not be converted', issues);
  }

  const checked = NestedDivisionsSchema.safeParse(data);
  if (!checked.success) {
    throw new ConversionError(
      'Converted divisions failed schema validation',
      formatIssues('nested-divisions.json', checked.error)
    );
  }

  return { data: checked.data, warnings };
}

/**
 * One row per ward, ascending by ward code, carrying its province name
 */
export function flattenDivisions(provinces: NestedDivisionsJson): FlatWardJson[] {
  const flat = provinces.flatMap((province) =>
    province.wards.map((ward) => ({ ...ward, province_name: province.name }))
  );
  flat.sort((a, b) => a.code - b.code);
  return FlatDivisionsSchema.parse(flat);
}
