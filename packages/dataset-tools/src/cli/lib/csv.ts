/**
 * CSV Reading
 *
 * Minimal reader for the government CSV exports: comma separated,
 * double-quoted fields, one record per line.
 *
 * @module cli/lib/csv
 */

/**
 * Split CSV content into rows of trimmed fields. Blank lines are dropped.
 */
export function parseCSV(content: string): string[][] {
  return content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(parseCSVLine);
}

/**
 * Parse a single CSV line handling quoted values.
 *
 * A doubled quote inside a quoted field is a literal quote.
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}
