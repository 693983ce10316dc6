import { describe, it, expect } from 'vitest';
import { DataLoadError, DivisionError, LegacyCodeNotFoundError, UnknownCodeError } from './errors.js';

describe('error types', () => {
  it('should share the DivisionError base', () => {
    expect(new UnknownCodeError('ward', 5)).toBeInstanceOf(DivisionError);
    expect(new LegacyCodeNotFoundError('district', 5)).toBeInstanceOf(DivisionError);
    expect(new DataLoadError('bad')).toBeInstanceOf(DivisionError);
  });

  it('should carry the kind and code', () => {
    const error = new UnknownCodeError('province', 3);

    expect(error.name).toBe('UnknownCodeError');
    expect(error.kind).toBe('province');
    expect(error.code).toBe(3);
    expect(error.generation).toBe('current');
    expect(error.message).toBe('Province code 3 is invalid.');
  });

  it('should describe a legacy code missing from the cross-reference table', () => {
    const error = new LegacyCodeNotFoundError('ward', 4, 'has no cross-reference record');

    expect(error.generation).toBe('legacy');
    expect(error.message).toBe('Legacy ward code 4 has no cross-reference record.');
  });
});

describe('DataLoadError.getSummary()', () => {
  it('should list every issue', () => {
    const error = new DataLoadError('Dataset failed integrity checks', ['first', 'second']);

    expect(error.getSummary()).toBe(
      'Dataset failed integrity checks (2 issues)\n  - first\n  - second'
    );
  });

  it('should truncate after the limit', () => {
    const error = new DataLoadError('Bad', ['a', 'b', 'c']);

    expect(error.getSummary(2)).toBe('Bad (3 issues)\n  - a\n  - b\n  ... and 1 more issues');
  });
});
