import { ConversionError } from '../errors.js';

/**
 * Issues of the ConversionError thrown by `run`
 */
export function conversionIssues(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConversionError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConversionError');
}
