/**
 * Legacy Division Conversion
 *
 * Turns the pre-2025 three-tier CSV export into
 * `legacy-nested-divisions.json`. A row without ward columns still creates
 * its district, which then has no wards (Huyện Bạch Long Vĩ, for one).
 */

import { z } from 'zod';
import {
  LegacyNestedDivisionsSchema,
  formatIssues,
  parseDivisionType,
  toCodename,
  type LegacyDistrictJson,
  type LegacyNestedDivisionsJson,
  type LegacyProvinceJson,
  type LegacyWardJson,
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

export const LEGACY_COLUMNS = [
  'province_name',
  'province_code',
  'district_name',
  'district_code',
  'ward_name',
  'ward_code',
] as const;

const LegacyRowSchema = z
  .object({
    provinceName: NameCellSchema,
    provinceCode: CodeCellSchema,
    districtName: NameCellSchema,
    districtCode: CodeCellSchema,
    wardName: NameCellSchema.optional(),
    wardCode: CodeCellSchema.optional(),
  })
  .refine(
    (row) => (row.wardName === undefined) === (row.wardCode === undefined),
    'ward name and ward code must be given together'
  );

export type LegacyRow = z.infer<typeof LegacyRowSchema>;

const blankToUndefined = (cell: string | undefined): string | undefined =>
  cell === undefined || cell === '' ? undefined : cell;

export function parseLegacyRows(cells: readonly (readonly string[])[]): RowParseResult<LegacyRow> {
  return parseRows(
    cells,
    LegacyRowSchema,
    (row) => ({
      provinceName: row[0],
      provinceCode: row[1],
      districtName: row[2],
      districtCode: row[3],
      wardName: blankToUndefined(row[4]),
      wardCode: blankToUndefined(row[5]),
    }),
    // District-only rows may stop after the district columns
    { headerRows: 1, minColumns: 4 }
  );
}

interface DistrictDraft {
  readonly line: number;
  readonly json: Omit<LegacyDistrictJson, 'wards'>;
  readonly wards: Map<number, LegacyWardJson>;
}

interface ProvinceDraft {
  readonly line: number;
  readonly name: string;
  readonly districts: Map<number, DistrictDraft>;
}

/**
 * Nest legacy rows into provinces, districts and wards.
 *
 * @throws ConversionError on conflicting rows, province names without a
 *   rank prefix, or provinces missing from the phone table
 */
export function buildLegacyDivisions(
  rows: readonly ParsedRow<LegacyRow>[],
  phones: PhoneCodeTable | null
): ConversionOutput<LegacyNestedDivisionsJson> {
  const issues: string[] = [];
  const warnings: string[] = [];
  const provinces = new Map<number, ProvinceDraft>();
  const districtOwners = new Map<number, number>();
  const wardLines = new Map<number, number>();

  for (const { line, value: row } of rows) {
    let province = provinces.get(row.provinceCode);
    if (province === undefined) {
      province = { line, name: row.provinceName, districts: new Map() };
      provinces.set(row.provinceCode, province);
    } else if (province.name !== row.provinceName) {
      issues.push(
        `line ${line}: province ${row.provinceCode} is named "${row.provinceName}" but "${province.name}" on line ${province.line}`
      );
      continue;
    }

    const owner = districtOwners.get(row.districtCode);
    if (owner !== undefined && owner !== row.provinceCode) {
      issues.push(`line ${line}: district ${row.districtCode} already belongs to province ${owner}`);
      continue;
    }
    districtOwners.set(row.districtCode, row.provinceCode);

    let district = province.districts.get(row.districtCode);
    if (district === undefined) {
      let districtType = parseDivisionType(row.districtName, 'district');
      if (districtType === undefined) {
        warnings.push(`line ${line}: district "${row.districtName}" has no rank prefix, using huyện`);
        districtType = 'huyện';
      }
      district = {
        line,
        json: {
          name: row.districtName,
          code: row.districtCode,
          codename: toCodename(row.districtName),
          division_type: districtType,
          province_code: row.provinceCode,
        },
        wards: new Map(),
      };
      province.districts.set(row.districtCode, district);
    } else if (district.json.name !== row.districtName) {
      issues.push(
        `line ${line}: district ${row.districtCode} is named "${row.districtName}" but "${district.json.name}" on line ${district.line}`
      );
      continue;
    }

    if (row.wardName === undefined || row.wardCode === undefined) {
      continue;
    }

    const firstLine = wardLines.get(row.wardCode);
    if (firstLine !== undefined) {
      issues.push(`line ${line}: ward ${row.wardCode} already listed on line ${firstLine}`);
      continue;
    }
    wardLines.set(row.wardCode, line);

    let wardType = parseDivisionType(row.wardName, 'ward');
    if (wardType === undefined) {
      warnings.push(`line ${line}: ward "${row.wardName}" has no rank prefix, using xã`);
      wardType = 'xã';
    }
    district.wards.set(row.wardCode, {
      name: row.wardName,
      code: row.wardCode,
      codename: toCodename(row.wardName),
      division_type: wardType,
      district_code: row.districtCode,
    });
  }

  const data: LegacyProvinceJson[] = [];
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

    const districts = [...province.districts.values()]
      .sort((a, b) => a.json.code - b.json.code)
      .map((district) => ({
        ...district.json,
        wards: [...district.wards.values()].sort((a, b) => a.code - b.code),
      }));

    data.push({
      name: province.name,
      code,
      codename: toCodename(province.name),
      division_type: divisionType,
      phone_code: phoneCode,
      districts,
    });
  }

  if (issues.length > 0) {
    throw new ConversionError('Legacy division CSV could not be converted', issues);
  }

  const checked = LegacyNestedDivisionsSchema.safeParse(data);
  if (!checked.success) {
    throw new ConversionError(
      'Converted legacy divisions failed schema validation',
      formatIssues('legacy-nested-divisions.json', checked.error)
    );
  }

  return { data: checked.data, warnings };
}
