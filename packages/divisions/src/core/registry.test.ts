/**
 * Division Registry Tests
 *
 * Lazy one-time build, cached failures and the default singleton.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { tinyDataset } from '../__fixtures__/tiny-dataset.js';
import { BUNDLED_DATA_DIR } from './config.js';
import { DataLoadError } from './errors.js';
import {
  createRegistry,
  defaultLoader,
  getDefaultRegistry,
  resetDefaultRegistry,
} from './registry.js';

describe('DivisionRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should not load anything until first access', () => {
    const loader = vi.fn(defaultLoader);
    const registry = createRegistry({ source: tinyDataset(), loader });

    expect(registry.isLoaded).toBe(false);
    expect(loader).not.toHaveBeenCalled();
  });

  it('should build the tables exactly once', () => {
    const loader = vi.fn(defaultLoader);
    const registry = createRegistry({ source: tinyDataset(), loader });

    const first = registry.current;
    registry.legacy.get('ward', 4);
    registry.xref.currentForLegacy('ward', 6);
    registry.search.search('current', 'ward', 'ba dinh');
    const second = registry.current;

    expect(loader).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(registry.isLoaded).toBe(true);
  });

  it('should expose dataset metadata', () => {
    const registry = createRegistry({ source: tinyDataset() });

    expect(registry.dataVersion).toBe('test-1');
    expect(registry.effectiveDate).toBe('2025-07-01');
  });

  it('should rethrow the same failure without reloading', () => {
    const data = tinyDataset();
    data.metadata = { ...data.metadata, data_version: '' };
    const loader = vi.fn(defaultLoader);
    const registry = createRegistry({ source: data, loader });

    let firstError: unknown;
    let secondError: unknown;
    try {
      registry.current;
    } catch (error) {
      firstError = error;
    }
    try {
      registry.search;
    } catch (error) {
      secondError = error;
    }

    expect(firstError).toBeInstanceOf(DataLoadError);
    expect(secondError).toBe(firstError);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(registry.isLoaded).toBe(false);
  });

  it('should wrap unexpected loader errors in DataLoadError', () => {
    const registry = createRegistry({
      loader: () => {
        throw new Error('disk unavailable');
      },
    });

    expect(() => registry.codes).toThrow(DataLoadError);
    expect(() => registry.codes).toThrow('Failed to load dataset: disk unavailable');
  });

  it('should load the bundled dataset from a directory', () => {
    const registry = createRegistry({ source: BUNDLED_DATA_DIR });

    expect(registry.dataVersion).toBe('2025.07.1');
    expect(registry.current.table('province').size).toBe(34);
  });
});

describe('getDefaultRegistry()', () => {
  afterEach(() => {
    resetDefaultRegistry();
  });

  it('should return the same instance until reset', () => {
    const first = getDefaultRegistry();

    expect(getDefaultRegistry()).toBe(first);

    resetDefaultRegistry();

    expect(getDefaultRegistry()).not.toBe(first);
  });
});
