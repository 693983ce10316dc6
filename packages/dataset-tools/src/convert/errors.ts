import { DataLoadError } from 'vn-divisions';

/**
 * CSV input that cannot be turned into a consistent dataset file.
 *
 * Carries every problem found in one pass over the input; commands report
 * it like any other dataset integrity failure.
 */
export class ConversionError extends DataLoadError {
  constructor(message: string, issues: readonly string[] = []) {
    super(message, issues);
    this.name = 'ConversionError';
  }
}
