/**
 * Bundled Dataset Metadata
 *
 * Version constants of the dataset shipped with the package. A registry
 * built over another data directory reports that directory's metadata
 * through `registry.dataVersion` / `registry.effectiveDate` instead.
 */

import metadataRaw from '../canonical/metadata.json' with { type: 'json' };
import { MetadataJsonSchema } from '../../core/schemas.js';

const metadata = MetadataJsonSchema.parse(metadataRaw);

/**
 * Opaque version marker of the bundled dataset, e.g. '2025.07.1'
 */
export const DATA_VERSION: string = metadata.data_version;

/**
 * Date the 2025 reorganization took effect (YYYY-MM-DD)
 */
export const EFFECTIVE_DATE: string = metadata.effective_date;
