/**
 * Row validation shared by the CSV converters
 */

import { z } from 'zod';

/**
 * Name cell: inner whitespace collapsed, must not be empty
 */
export const NameCellSchema = z
  .string()
  .transform((value) => value.replace(/\s+/g, ' ').trim())
  .pipe(z.string().min(1, 'name is empty'));

/**
 * Numeric code cell; leading zeros are allowed ("00004")
 */
export const CodeCellSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'code is not numeric')
  .transform(Number)
  .pipe(z.number().int().positive('code must be positive'));

export interface ParsedRow<T> {
  /** 1-based position among the non-blank CSV lines */
  readonly line: number;
  readonly value: T;
}

export interface RowParseResult<T> {
  readonly rows: readonly ParsedRow<T>[];
  /** One message per dropped row */
  readonly skipped: readonly string[];
}

export interface ConversionOutput<T> {
  readonly data: T;
  /** Problems that did not stop the conversion */
  readonly warnings: readonly string[];
}

export interface RowParseOptions {
  readonly headerRows: number;
  readonly minColumns: number;
}

/**
 * Validate data rows against a schema. Rows that are too short or fail the
 * schema are dropped and reported, the rest kept in input order.
 */
export function parseRows<S extends z.ZodTypeAny>(
  cells: readonly (readonly string[])[],
  schema: S,
  toRecord: (row: readonly string[]) => unknown,
  options: RowParseOptions
): RowParseResult<z.infer<S>> {
  const rows: ParsedRow<z.infer<S>>[] = [];
  const skipped: string[] = [];

  cells.forEach((row, index) => {
    const line = index + 1;
    if (index < options.headerRows) {
      return;
    }
    if (row.length < options.minColumns) {
      skipped.push(`line ${line}: expected ${options.minColumns} columns, found ${row.length}`);
      return;
    }

    const result = schema.safeParse(toRecord(row));
    if (result.success) {
      rows.push({ line, value: result.data });
    } else {
      const reasons = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      skipped.push(`line ${line}: ${reasons.join('; ')}`);
    }
  });

  return { rows, skipped };
}
