/**
 * Validate Command
 *
 * Loads a dataset directory through the library's loader, exactly as the
 * runtime would, and reports record counts or every integrity issue.
 *
 * Usage:
 *   vn-divisions-tools validate [dir]
 */

import type { Command } from 'commander';
import { DataLoadError, loadDataset, type Dataset } from 'vn-divisions';
import { EXIT_CODES, getGlobalContext, type CLIContext, type ExitCode } from '../../lib/context.js';

/**
 * Register the validate command
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate [dir]')
    .description('Check a dataset directory before publishing it')
    .action(async (dir: string | undefined) => {
      process.exitCode = await runValidate(dir, getGlobalContext());
    });
}

/**
 * Record counts per dataset table
 */
export function datasetCounts(dataset: Dataset): Record<string, number> {
  return {
    provinces: dataset.provinces.length,
    wards: dataset.wards.length,
    legacy_provinces: dataset.legacyProvinces.length,
    legacy_districts: dataset.legacyDistricts.length,
    legacy_wards: dataset.legacyWards.length,
    cross_references: dataset.crossReferences.length,
  };
}

export async function runValidate(dir: string | undefined, context: CLIContext): Promise<ExitCode> {
  const { config, logger } = context;
  const dataDir = dir ?? config.paths.output;
  logger.commandStart('validate', { dir: dataDir });

  try {
    const dataset = loadDataset(dataDir);
    logger.table([datasetCounts(dataset)]);
    logger.commandEnd(true, {
      data_version: dataset.metadata.dataVersion,
      effective_date: dataset.metadata.effectiveDate,
    });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof DataLoadError) {
      logger.error(error.getSummary(Number.POSITIVE_INFINITY), { issues: error.issues.length });
      logger.commandEnd(false);
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }
}
