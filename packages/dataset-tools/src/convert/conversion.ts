/**
 * Cross-Reference Conversion
 *
 * Turns the ward conversion table published with the 2025 reorganization
 * into `conversion-2025.json`. The table has two header rows, then one row
 * per (new ward, old ward) pair:
 *
 *   new province "Name (code)", new ward name, new ward code,
 *   old ward name, old ward code, note, old district "Name (code)",
 *   old province "Name (code)"
 *
 * A legacy ward listed under several new wards was split. Its record names
 * one primary target and lists the others as partial targets. Province
 * records are derived from the ward rows.
 */

import { z } from 'zod';
import {
  ConversionFileSchema,
  formatIssues,
  parseDivisionType,
  shortCodename,
  toCodename,
  type ConversionFileJson,
  type CrossRefKind,
  type CrossReferenceJson,
} from 'vn-divisions';
import { ConversionError } from './errors.js';
import {
  CodeCellSchema,
  NameCellSchema,
  parseRows,
  type ConversionOutput,
  type ParsedRow,
  type RowParseResult,
} from './rows.js';

const HEADER_ROWS = 2;
const COLUMN_COUNT = 8;
const ENTIRE_MARKER = 'toàn bộ';

/**
 * Code from a label such as 'Thành phố Hà Nội (01)', falling back to the
 * first digit run ('00004'). Undefined when the label has no digits.
 */
export function extractCode(label: string): number | undefined {
  const match = /\((\d+)\)/.exec(label) ?? /(\d+)/.exec(label);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}

/**
 * A row is partial unless its note says the whole unit ("toàn bộ") moved
 */
export function isPartialNote(note: string): boolean {
  return !note.normalize('NFC').toLowerCase().includes(ENTIRE_MARKER);
}

const LabelCodeSchema = z.string().transform((label, ctx) => {
  const code = extractCode(label);
  if (code === undefined || code === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `no code in "${label}"` });
    return z.NEVER;
  }
  return code;
});

const ConversionRowSchema = z
  .object({
    newProvinceCode: LabelCodeSchema,
    newWardName: NameCellSchema,
    newWardCode: CodeCellSchema,
    oldWardName: NameCellSchema,
    oldWardCode: CodeCellSchema,
    note: z.string(),
    oldDistrictCode: LabelCodeSchema,
    oldProvinceCode: LabelCodeSchema,
  })
  .transform(({ note, ...row }) => ({ ...row, isPartial: isPartialNote(note) }));

export type ConversionRow = z.infer<typeof ConversionRowSchema>;

export function parseConversionRows(cells: readonly (readonly string[])[]): RowParseResult<ConversionRow> {
  return parseRows(
    cells,
    ConversionRowSchema,
    (row) => ({
      newProvinceCode: row[0],
      newWardName: row[1],
      newWardCode: row[2],
      oldWardName: row[3],
      oldWardCode: row[4],
      note: row[5],
      oldDistrictCode: row[6],
      oldProvinceCode: row[7],
    }),
    { headerRows: HEADER_ROWS, minColumns: COLUMN_COUNT }
  );
}

export interface CrossReferenceOptions {
  readonly effectiveDate: string;
  readonly description: string;
}

// Name without its rank, so "Xã Tân Hải" and "Phường Tân Hải" compare equal
function bareName(name: string): string {
  const divisionType = parseDivisionType(name, 'ward');
  return divisionType === undefined ? toCodename(name) : shortCodename(name, divisionType);
}

function crossRef(
  kind: CrossRefKind,
  legacyCode: number,
  currentCode: number,
  partialTargets: readonly number[]
): CrossReferenceJson {
  return {
    legacy_code: legacyCode,
    legacy_kind: kind,
    current_code: currentCode,
    current_kind: kind,
    ...(partialTargets.length > 0 ? { partial_targets: [...partialTargets] } : {}),
  };
}

interface WardResolution {
  readonly legacyCode: number;
  readonly primary: ParsedRow<ConversionRow>;
  readonly targets: readonly ParsedRow<ConversionRow>[];
}

/**
 * Primary target of one legacy ward: the row whose new ward carries the old
 * ward's name, else the first row listed.
 */
function resolveWard(
  legacyCode: number,
  group: readonly ParsedRow<ConversionRow>[],
  warnings: string[]
): WardResolution | undefined {
  const first = group[0];
  if (first === undefined) {
    return undefined;
  }

  const targets: ParsedRow<ConversionRow>[] = [];
  for (const row of group) {
    if (!targets.some((target) => target.value.newWardCode === row.value.newWardCode)) {
      targets.push(row);
    }
  }

  const oldName = bareName(first.value.oldWardName);
  const primary = targets.find((row) => bareName(row.value.newWardName) === oldName) ?? first;

  if (targets.length > 1) {
    const entire = group.find((row) => !row.value.isPartial);
    if (entire !== undefined) {
      warnings.push(
        `legacy ward ${legacyCode}: split across ${targets.length} wards but line ${entire.line} says "${ENTIRE_MARKER}"`
      );
    }
  }

  return { legacyCode, primary, targets };
}

/**
 * Build the cross-reference file from parsed conversion rows.
 *
 * A legacy province's primary target is the current province that
 * received most of its wards (lowest code on a tie). Every other current
 * province that received any of its area is a partial target.
 *
 * @throws ConversionError when a legacy ward is listed under two legacy
 *   provinces, or the result fails schema validation
 */
export function buildCrossReference(
  rows: readonly ParsedRow<ConversionRow>[],
  options: CrossReferenceOptions
): ConversionOutput<ConversionFileJson> {
  const issues: string[] = [];
  const warnings: string[] = [];

  const groups = new Map<number, ParsedRow<ConversionRow>[]>();
  for (const row of rows) {
    const group = groups.get(row.value.oldWardCode);
    if (group === undefined) {
      groups.set(row.value.oldWardCode, [row]);
      continue;
    }
    const first = group[0];
    if (first !== undefined && first.value.oldProvinceCode !== row.value.oldProvinceCode) {
      issues.push(
        `line ${row.line}: legacy ward ${row.value.oldWardCode} is under province ${row.value.oldProvinceCode} but ${first.value.oldProvinceCode} on line ${first.line}`
      );
      continue;
    }
    group.push(row);
  }

  if (issues.length > 0) {
    throw new ConversionError('Conversion CSV could not be converted', issues);
  }

  const wardRecords: CrossReferenceJson[] = [];
  // legacy province -> current province -> legacy wards whose primary went there
  const provinceShares = new Map<number, Map<number, number>>();
  const provinceReach = new Map<number, Set<number>>();

  for (const [legacyCode, group] of [...groups].sort(([a], [b]) => a - b)) {
    const resolution = resolveWard(legacyCode, group, warnings);
    if (resolution === undefined) {
      continue;
    }
    const { primary, targets } = resolution;

    const partial = targets
      .map((row) => row.value.newWardCode)
      .filter((code) => code !== primary.value.newWardCode)
      .sort((a, b) => a - b);
    wardRecords.push(crossRef('ward', legacyCode, primary.value.newWardCode, partial));

    const legacyProvince = primary.value.oldProvinceCode;
    const shares = provinceShares.get(legacyProvince) ?? new Map<number, number>();
    shares.set(primary.value.newProvinceCode, (shares.get(primary.value.newProvinceCode) ?? 0) + 1);
    provinceShares.set(legacyProvince, shares);

    const reach = provinceReach.get(legacyProvince) ?? new Set<number>();
    for (const row of targets) {
      reach.add(row.value.newProvinceCode);
    }
    provinceReach.set(legacyProvince, reach);
  }

  const provinceRecords: CrossReferenceJson[] = [];
  for (const [legacyCode, shares] of [...provinceShares].sort(([a], [b]) => a - b)) {
    let best: readonly [number, number] | undefined;
    for (const [currentCode, count] of shares) {
      if (best === undefined || count > best[1] || (count === best[1] && currentCode < best[0])) {
        best = [currentCode, count];
      }
    }
    if (best === undefined) {
      continue;
    }
    const primaryCode = best[0];
    const partial = [...(provinceReach.get(legacyCode) ?? [])]
      .filter((code) => code !== primaryCode)
      .sort((a, b) => a - b);
    provinceRecords.push(crossRef('province', legacyCode, primaryCode, partial));
  }

  const file = {
    effective_date: options.effectiveDate,
    description: options.description,
    records: [...provinceRecords, ...wardRecords],
  };

  const checked = ConversionFileSchema.safeParse(file);
  if (!checked.success) {
    throw new ConversionError(
      'Converted cross-reference failed schema validation',
      formatIssues('conversion-2025.json', checked.error)
    );
  }

  return { data: checked.data, warnings };
}
