/**
 * Canonical Dataset Schemas
 *
 * Zod schemas for the JSON files shipped in `src/data/canonical`.
 * Keys are snake_case on disk; the loader maps them to camelCase records.
 *
 * The same schemas validate the conversion tool's output before it is written.
 */

import { z } from 'zod';
import { DIVISION_TYPES } from './types.js';

// ============================================================================
// Primitives
// ============================================================================

export const CodeSchema = z.number()
  .int('Code must be an integer')
  .positive('Code must be positive');

export const CodenameSchema = z.string()
  .regex(/^[a-z0-9]+(_[a-z0-9]+)*$/, 'Codename must be lowercase ASCII words joined by underscores');

export const DivisionTypeSchema = z.enum(DIVISION_TYPES);

export const IsoDateSchema = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD');

const NameSchema = z.string()
  .min(1, 'Name must not be empty')
  .refine((val) => val.trim() === val, 'Name must not have surrounding whitespace');

// ============================================================================
// Current Generation (nested-divisions.json)
// ============================================================================

export const WardJsonSchema = z.object({
  name: NameSchema,
  code: CodeSchema,
  codename: CodenameSchema,
  division_type: DivisionTypeSchema,
  short_codename: CodenameSchema,
  province_code: CodeSchema,
});

export const ProvinceJsonSchema = z.object({
  name: NameSchema,
  code: CodeSchema,
  codename: CodenameSchema,
  division_type: DivisionTypeSchema,
  phone_code: z.number().int().nonnegative(),
  wards: z.array(WardJsonSchema),
});

export const NestedDivisionsSchema = z.array(ProvinceJsonSchema);

/**
 * One row of `flat-divisions.json`, the tool's alternative output format
 */
export const FlatWardJsonSchema = WardJsonSchema.extend({
  province_name: NameSchema,
});

export const FlatDivisionsSchema = z.array(FlatWardJsonSchema);

export type WardJson = z.infer<typeof WardJsonSchema>;
export type ProvinceJson = z.infer<typeof ProvinceJsonSchema>;
export type NestedDivisionsJson = z.infer<typeof NestedDivisionsSchema>;
export type FlatWardJson = z.infer<typeof FlatWardJsonSchema>;

// ============================================================================
// Legacy Generation (legacy-nested-divisions.json)
// ============================================================================

export const LegacyWardJsonSchema = z.object({
  name: NameSchema,
  code: CodeSchema,
  codename: CodenameSchema,
  division_type: DivisionTypeSchema,
  district_code: CodeSchema,
});

export const LegacyDistrictJsonSchema = z.object({
  name: NameSchema,
  code: CodeSchema,
  codename: CodenameSchema,
  division_type: DivisionTypeSchema,
  province_code: CodeSchema,
  wards: z.array(LegacyWardJsonSchema),
});

export const LegacyProvinceJsonSchema = z.object({
  name: NameSchema,
  code: CodeSchema,
  codename: CodenameSchema,
  division_type: DivisionTypeSchema,
  phone_code: z.number().int().nonnegative(),
  districts: z.array(LegacyDistrictJsonSchema),
});

export const LegacyNestedDivisionsSchema = z.array(LegacyProvinceJsonSchema);

export type LegacyWardJson = z.infer<typeof LegacyWardJsonSchema>;
export type LegacyDistrictJson = z.infer<typeof LegacyDistrictJsonSchema>;
export type LegacyProvinceJson = z.infer<typeof LegacyProvinceJsonSchema>;
export type LegacyNestedDivisionsJson = z.infer<typeof LegacyNestedDivisionsSchema>;

// ============================================================================
// Cross-Reference (conversion-2025.json)
// ============================================================================

export const CrossRefKindSchema = z.enum(['province', 'ward']);

export const CrossReferenceJsonSchema = z.object({
  legacy_code: CodeSchema,
  legacy_kind: CrossRefKindSchema,
  current_code: CodeSchema,
  current_kind: CrossRefKindSchema,
  partial_targets: z.array(CodeSchema).optional(),
})
  .refine(
    (record) => record.legacy_kind === record.current_kind,
    'legacy_kind and current_kind must match'
  )
  .refine(
    (record) => !(record.partial_targets ?? []).includes(record.current_code),
    'partial_targets must not repeat current_code'
  );

export const ConversionFileSchema = z.object({
  effective_date: IsoDateSchema,
  description: z.string(),
  records: z.array(CrossReferenceJsonSchema),
});

export type CrossReferenceJson = z.infer<typeof CrossReferenceJsonSchema>;
export type ConversionFileJson = z.infer<typeof ConversionFileSchema>;

// ============================================================================
// Metadata (metadata.json)
// ============================================================================

export const MetadataJsonSchema = z.object({
  data_version: z.string().min(1, 'data_version must not be empty'),
  effective_date: IsoDateSchema,
  description: z.string(),
  source: z.string(),
});

export type MetadataJson = z.infer<typeof MetadataJsonSchema>;

/**
 * Flatten zod issues into `file: path: message` lines
 */
export function formatIssues(file: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${file}: ${path}: ${issue.message}`;
  });
}
