/**
 * Canonical Dataset Loader
 *
 * Reads and validates the four canonical JSON files, then flattens them into
 * frozen, code-sorted record lists for the lookup tables.
 *
 * ARCHITECTURE:
 * - JSON data stored in src/data/canonical/ (see DATASET_FILES)
 * - Zod schemas (core/schemas.ts) check shape and field types
 * - Structural checks run after parsing: duplicate codes, parent
 *   back-references, unique province codenames, cross-reference coverage
 * - Any issue aborts the load with a DataLoadError listing every issue
 *
 * USAGE:
 * ```typescript
 * import { loadDataset } from './dataset-loader.js';
 *
 * const dataset = loadDataset('/path/to/canonical');
 * dataset.wards.length; // current wards, ascending by code
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DATASET_FILES, type DatasetFile } from '../../core/config.js';
import { DataLoadError } from '../../core/errors.js';
import {
  ConversionFileSchema,
  LegacyNestedDivisionsSchema,
  MetadataJsonSchema,
  NestedDivisionsSchema,
  formatIssues,
  type ConversionFileJson,
  type LegacyNestedDivisionsJson,
  type MetadataJson,
  type NestedDivisionsJson,
} from '../../core/schemas.js';
import type {
  CrossRefKind,
  CrossReferenceRecord,
  DatasetMetadata,
  LegacyDistrictRecord,
  LegacyProvinceRecord,
  LegacyWardRecord,
  ProvinceRecord,
  WardRecord,
} from '../../core/types.js';
import { toAlias } from '../../core/utils/text.js';

/**
 * Unvalidated file contents, keyed like DATASET_FILES
 */
export type RawDataset = { readonly [F in DatasetFile]: unknown };

/**
 * Validated, flattened dataset
 */
export interface Dataset {
  readonly provinces: readonly ProvinceRecord[];
  readonly wards: readonly WardRecord[];
  readonly legacyProvinces: readonly LegacyProvinceRecord[];
  readonly legacyDistricts: readonly LegacyDistrictRecord[];
  readonly legacyWards: readonly LegacyWardRecord[];
  readonly crossReferences: readonly CrossReferenceRecord[];
  readonly metadata: DatasetMetadata;
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Read the dataset files from a directory without validating them
 *
 * @throws DataLoadError listing every missing or unparsable file
 */
export function readDatasetFiles(dataDir: string): RawDataset {
  const issues: string[] = [];

  const read = (file: DatasetFile): unknown => {
    const path = join(dataDir, DATASET_FILES[file]);
    if (!existsSync(path)) {
      issues.push(`${DATASET_FILES[file]}: file not found in ${dataDir}`);
      return undefined;
    }
    try {
      return JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      issues.push(`${DATASET_FILES[file]}: malformed JSON: ${message}`);
      return undefined;
    }
  };

  const raw: RawDataset = {
    current: read('current'),
    legacy: read('legacy'),
    conversion: read('conversion'),
    metadata: read('metadata'),
  };

  if (issues.length > 0) {
    throw new DataLoadError(`Failed to read dataset from ${dataDir}`, issues);
  }
  return raw;
}

// ============================================================================
// Validation
// ============================================================================

interface ParsedFiles {
  readonly current: NestedDivisionsJson;
  readonly legacy: LegacyNestedDivisionsJson;
  readonly conversion: ConversionFileJson;
  readonly metadata: MetadataJson;
}

function parseFiles(raw: RawDataset): ParsedFiles {
  const current = NestedDivisionsSchema.safeParse(raw.current);
  const legacy = LegacyNestedDivisionsSchema.safeParse(raw.legacy);
  const conversion = ConversionFileSchema.safeParse(raw.conversion);
  const metadata = MetadataJsonSchema.safeParse(raw.metadata);

  if (current.success && legacy.success && conversion.success && metadata.success) {
    return {
      current: current.data,
      legacy: legacy.data,
      conversion: conversion.data,
      metadata: metadata.data,
    };
  }

  const issues = [
    ...(current.success ? [] : formatIssues(DATASET_FILES.current, current.error)),
    ...(legacy.success ? [] : formatIssues(DATASET_FILES.legacy, legacy.error)),
    ...(conversion.success ? [] : formatIssues(DATASET_FILES.conversion, conversion.error)),
    ...(metadata.success ? [] : formatIssues(DATASET_FILES.metadata, metadata.error)),
  ];
  throw new DataLoadError('Dataset failed schema validation', issues);
}

/**
 * Tracks seen codes per table and reports duplicates
 */
class DuplicateTracker {
  private readonly seen = new Set<number>();

  constructor(
    private readonly label: string,
    private readonly issues: string[]
  ) {}

  add(code: number): void {
    if (this.seen.has(code)) {
      this.issues.push(`${this.label}: duplicate code ${code}`);
    }
    this.seen.add(code);
  }
}

function byCode<T extends { readonly code: number }>(records: T[]): readonly T[] {
  records.sort((a, b) => a.code - b.code);
  for (const record of records) {
    Object.freeze(record);
  }
  return Object.freeze(records);
}

/**
 * Validate raw file contents and flatten them into a Dataset
 *
 * @throws DataLoadError listing every schema and structural issue
 */
export function parseDataset(raw: RawDataset): Dataset {
  const files = parseFiles(raw);
  const issues: string[] = [];

  // Current generation
  const provinces: ProvinceRecord[] = [];
  const wards: WardRecord[] = [];
  const provinceCodes = new DuplicateTracker(`${DATASET_FILES.current}: province`, issues);
  const wardCodes = new DuplicateTracker(`${DATASET_FILES.current}: ward`, issues);
  const aliases = new Map<string, number>();

  for (const province of files.current) {
    provinceCodes.add(province.code);

    const alias = toAlias(province.codename);
    const holder = aliases.get(alias);
    if (holder !== undefined) {
      issues.push(
        `${DATASET_FILES.current}: province ${province.code} codename "${province.codename}" already used by province ${holder}`
      );
    } else {
      aliases.set(alias, province.code);
    }

    provinces.push({
      name: province.name,
      code: province.code,
      divisionType: province.division_type,
      codename: province.codename,
      phoneCode: province.phone_code,
    });

    for (const ward of province.wards) {
      wardCodes.add(ward.code);
      if (ward.province_code !== province.code) {
        issues.push(
          `${DATASET_FILES.current}: ward ${ward.code} has province_code ${ward.province_code} but is listed under province ${province.code}`
        );
      }
      wards.push({
        name: ward.name,
        code: ward.code,
        divisionType: ward.division_type,
        codename: ward.codename,
        shortCodename: ward.short_codename,
        provinceCode: province.code,
      });
    }
  }

  // Legacy generation
  const legacyProvinces: LegacyProvinceRecord[] = [];
  const legacyDistricts: LegacyDistrictRecord[] = [];
  const legacyWards: LegacyWardRecord[] = [];
  const legacyProvinceCodes = new DuplicateTracker(`${DATASET_FILES.legacy}: province`, issues);
  const legacyDistrictCodes = new DuplicateTracker(`${DATASET_FILES.legacy}: district`, issues);
  const legacyWardCodes = new DuplicateTracker(`${DATASET_FILES.legacy}: ward`, issues);

  for (const province of files.legacy) {
    legacyProvinceCodes.add(province.code);
    legacyProvinces.push({
      name: province.name,
      code: province.code,
      divisionType: province.division_type,
      codename: province.codename,
      phoneCode: province.phone_code,
    });

    for (const district of province.districts) {
      legacyDistrictCodes.add(district.code);
      if (district.province_code !== province.code) {
        issues.push(
          `${DATASET_FILES.legacy}: district ${district.code} has province_code ${district.province_code} but is listed under province ${province.code}`
        );
      }
      legacyDistricts.push({
        name: district.name,
        code: district.code,
        divisionType: district.division_type,
        codename: district.codename,
        provinceCode: province.code,
      });

      for (const ward of district.wards) {
        legacyWardCodes.add(ward.code);
        if (ward.district_code !== district.code) {
          issues.push(
            `${DATASET_FILES.legacy}: ward ${ward.code} has district_code ${ward.district_code} but is listed under district ${district.code}`
          );
        }
        legacyWards.push({
          name: ward.name,
          code: ward.code,
          divisionType: ward.division_type,
          codename: ward.codename,
          districtCode: district.code,
          provinceCode: province.code,
        });
      }
    }
  }

  const crossReferences = checkCrossReferences(
    files.conversion,
    {
      province: new Set(provinces.map((p) => p.code)),
      ward: new Set(wards.map((w) => w.code)),
    },
    {
      province: new Set(legacyProvinces.map((p) => p.code)),
      ward: new Set(legacyWards.map((w) => w.code)),
    },
    issues
  );

  if (files.metadata.effective_date !== files.conversion.effective_date) {
    issues.push(
      `${DATASET_FILES.metadata}: effective_date ${files.metadata.effective_date} differs from ${DATASET_FILES.conversion} (${files.conversion.effective_date})`
    );
  }

  if (issues.length > 0) {
    throw new DataLoadError('Dataset failed integrity checks', issues);
  }

  return {
    provinces: byCode(provinces),
    wards: byCode(wards),
    legacyProvinces: byCode(legacyProvinces),
    legacyDistricts: byCode(legacyDistricts),
    legacyWards: byCode(legacyWards),
    crossReferences: Object.freeze(crossReferences),
    metadata: Object.freeze({
      dataVersion: files.metadata.data_version,
      effectiveDate: files.metadata.effective_date,
      description: files.metadata.description,
      source: files.metadata.source,
    }),
  };
}

type CodeSets = { readonly [P in CrossRefKind]: ReadonlySet<number> };

/**
 * Every legacy province and ward needs exactly one record, and every
 * target must exist in the current tables
 */
function checkCrossReferences(
  conversion: ConversionFileJson,
  current: CodeSets,
  legacy: CodeSets,
  issues: string[]
): CrossReferenceRecord[] {
  const file = DATASET_FILES.conversion;
  const records: CrossReferenceRecord[] = [];
  const covered: { [P in CrossRefKind]: Set<number> } = {
    province: new Set(),
    ward: new Set(),
  };

  for (const entry of conversion.records) {
    const kind = entry.legacy_kind;
    const label = `${file}: legacy ${kind} ${entry.legacy_code}`;

    if (covered[kind].has(entry.legacy_code)) {
      issues.push(`${label}: more than one record`);
    }
    covered[kind].add(entry.legacy_code);

    if (!legacy[kind].has(entry.legacy_code)) {
      issues.push(`${label}: not a known legacy ${kind}`);
    }

    const partialTargets = [...(entry.partial_targets ?? [])].sort((a, b) => a - b);
    for (const target of [entry.current_code, ...partialTargets]) {
      if (!current[entry.current_kind].has(target)) {
        issues.push(`${label}: target ${entry.current_kind} ${target} does not exist`);
      }
    }

    records.push(Object.freeze({
      legacyCode: entry.legacy_code,
      legacyKind: kind,
      currentCode: entry.current_code,
      currentKind: entry.current_kind,
      partialTargets: Object.freeze(partialTargets),
    }));
  }

  for (const kind of ['province', 'ward'] as const) {
    for (const code of [...legacy[kind]].sort((a, b) => a - b)) {
      if (!covered[kind].has(code)) {
        issues.push(`${file}: legacy ${kind} ${code} has no cross-reference record`);
      }
    }
  }

  return records;
}

/**
 * Read and validate the dataset stored in a directory
 *
 * @throws DataLoadError
 */
export function loadDataset(dataDir: string): Dataset {
  return parseDataset(readDatasetFiles(dataDir));
}
