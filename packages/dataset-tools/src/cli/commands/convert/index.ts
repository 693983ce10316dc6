/**
 * Convert Commands
 *
 * Registers the CSV-to-dataset conversions:
 * - divisions: current provinces and wards
 * - legacy: pre-2025 provinces, districts and wards
 * - conversion: legacy-to-current cross-reference, plus metadata.json
 *
 * Usage:
 *   vn-divisions-tools convert divisions -i wards.csv [-o dir] [--format flat-json] [--phones phones.csv]
 *   vn-divisions-tools convert legacy -i legacy.csv [-o dir] [--phones phones.csv]
 *   vn-divisions-tools convert conversion -i conversion.csv [-o dir]
 */

import { InvalidArgumentError, type Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DATASET_FILES, DataLoadError } from 'vn-divisions';
import { buildCrossReference, parseConversionRows } from '../../../convert/conversion.js';
import { buildNestedDivisions, flattenDivisions, parseCurrentRows } from '../../../convert/divisions.js';
import { buildLegacyDivisions, parseLegacyRows } from '../../../convert/legacy.js';
import { buildMetadata } from '../../../convert/metadata.js';
import { PhoneCodeTable, parsePhoneCodeRows } from '../../../convert/phones.js';
import type { RowParseResult } from '../../../convert/rows.js';
import { atomicWriteJSON } from '../../lib/atomic-write.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../../lib/config.js';
import { EXIT_CODES, getGlobalContext, type CLIContext, type ExitCode } from '../../lib/context.js';
import { parseCSV } from '../../lib/csv.js';
import type { CLILogger } from '../../lib/logger.js';

export const FLAT_DIVISIONS_FILE = 'flat-divisions.json';

export interface ConvertOptions {
  /** Source CSV */
  readonly input: string;
  /** Output directory (default: configured output path) */
  readonly output?: string;
  /** Phone area code CSV (default: configured phones path) */
  readonly phones?: string;
  readonly format?: OutputFormat;
}

function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Register all convert subcommands
 */
export function registerConvertCommands(program: Command): void {
  const convert = program
    .command('convert')
    .description('Convert government CSV exports into dataset JSON files');

  convert
    .command('divisions')
    .description('Current provinces and wards -> nested-divisions.json')
    .requiredOption('-i, --input <csv>', 'Ward CSV: province_name, province_code, ward_name, ward_code')
    .option('-o, --output <dir>', 'Output directory')
    .option('--format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, parseFormat)
    .option('--phones <csv>', 'Phone area code CSV')
    .action(async (options: ConvertOptions) => {
      process.exitCode = await runConvertDivisions(options, getGlobalContext());
    });

  convert
    .command('legacy')
    .description('Pre-2025 provinces, districts and wards -> legacy-nested-divisions.json')
    .requiredOption('-i, --input <csv>', 'Legacy CSV: province, district and ward names and codes')
    .option('-o, --output <dir>', 'Output directory')
    .option('--phones <csv>', 'Phone area code CSV')
    .action(async (options: ConvertOptions) => {
      process.exitCode = await runConvertLegacy(options, getGlobalContext());
    });

  convert
    .command('conversion')
    .description('Ward conversion table -> conversion-2025.json and metadata.json')
    .requiredOption('-i, --input <csv>', 'Conversion table CSV')
    .option('-o, --output <dir>', 'Output directory')
    .action(async (options: ConvertOptions) => {
      process.exitCode = await runConvertConversion(options, getGlobalContext());
    });
}

// ============================================================================
// Execution
// ============================================================================

export async function runConvertDivisions(options: ConvertOptions, context: CLIContext): Promise<ExitCode> {
  const { config, logger } = context;
  const format = options.format ?? config.format;

  return runConversion(context, 'convert divisions', options, async (outputDir) => {
    const rows = reportSkipped(parseCurrentRows(await readCSV(options.input)), logger);
    const phones = await loadPhones(options.phones ?? config.paths.phones, logger);
    const { data, warnings } = buildNestedDivisions(rows, phones);
    reportWarnings(warnings, logger);

    if (format === 'flat-json') {
      const path = join(outputDir, FLAT_DIVISIONS_FILE);
      await atomicWriteJSON(path, flattenDivisions(data));
      return [path];
    }
    const path = join(outputDir, DATASET_FILES.current);
    await atomicWriteJSON(path, data);
    return [path];
  });
}

export async function runConvertLegacy(options: ConvertOptions, context: CLIContext): Promise<ExitCode> {
  const { config, logger } = context;

  return runConversion(context, 'convert legacy', options, async (outputDir) => {
    const rows = reportSkipped(parseLegacyRows(await readCSV(options.input)), logger);
    const phones = await loadPhones(options.phones ?? config.paths.phones, logger);
    const { data, warnings } = buildLegacyDivisions(rows, phones);
    reportWarnings(warnings, logger);

    const path = join(outputDir, DATASET_FILES.legacy);
    await atomicWriteJSON(path, data);
    return [path];
  });
}

export async function runConvertConversion(options: ConvertOptions, context: CLIContext): Promise<ExitCode> {
  const { config, logger } = context;

  return runConversion(context, 'convert conversion', options, async (outputDir) => {
    const rows = reportSkipped(parseConversionRows(await readCSV(options.input)), logger);
    const metadata = buildMetadata(config.dataset);
    const { data, warnings } = buildCrossReference(rows, {
      effectiveDate: metadata.effective_date,
      description: `Legacy to current unit cross-reference for the reorganization effective ${metadata.effective_date}`,
    });
    reportWarnings(warnings, logger);

    const conversionPath = join(outputDir, DATASET_FILES.conversion);
    const metadataPath = join(outputDir, DATASET_FILES.metadata);
    await atomicWriteJSON(conversionPath, data);
    await atomicWriteJSON(metadataPath, metadata);
    return [conversionPath, metadataPath];
  });
}

/**
 * Run one conversion with command logging and exit-code mapping
 */
async function runConversion(
  context: CLIContext,
  command: string,
  options: ConvertOptions,
  convert: (outputDir: string) => Promise<readonly string[]>
): Promise<ExitCode> {
  const { config, logger } = context;
  const outputDir = options.output ?? config.paths.output;
  logger.commandStart(command, { input: options.input, output: outputDir });

  try {
    const written = await convert(outputDir);
    logger.commandEnd(true, { written });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof DataLoadError) {
      logger.error(error.getSummary(), { issues: error.issues.length });
      logger.commandEnd(false);
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }
}

async function readCSV(path: string): Promise<string[][]> {
  return parseCSV(await readFile(path, 'utf-8'));
}

async function loadPhones(path: string | null, logger: CLILogger): Promise<PhoneCodeTable | null> {
  if (path === null) {
    logger.warn('No phone code table given, provinces get phone code 0');
    return null;
  }
  const rows = reportSkipped(parsePhoneCodeRows(await readCSV(path)), logger);
  const table = new PhoneCodeTable(rows.map((row) => row.value));
  logger.debug('Loaded phone codes', { path, provinces: table.size });
  return table;
}

function reportSkipped<T>(result: RowParseResult<T>, logger: CLILogger): RowParseResult<T>['rows'] {
  if (result.skipped.length > 0) {
    logger.warn(`Skipped ${result.skipped.length} rows`);
    for (const message of result.skipped) {
      logger.debug(message);
    }
  }
  return result.rows;
}

function reportWarnings(warnings: readonly string[], logger: CLILogger): void {
  for (const warning of warnings) {
    logger.warn(warning);
  }
}
