import { MetadataJsonSchema, formatIssues, type MetadataJson } from 'vn-divisions';
import type { DatasetConfig } from '../cli/lib/config.js';
import { ConversionError } from './errors.js';

/**
 * Contents of `metadata.json` for a converted dataset
 *
 * @throws ConversionError when the configured version or date is malformed
 */
export function buildMetadata(dataset: DatasetConfig): MetadataJson {
  const result = MetadataJsonSchema.safeParse({
    data_version: dataset.version,
    effective_date: dataset.effectiveDate,
    description: dataset.description,
    source: dataset.source,
  });
  if (!result.success) {
    throw new ConversionError('Dataset metadata is invalid', formatIssues('metadata.json', result.error));
  }
  return result.data;
}
