import { describe, it, expect } from 'vitest';
import { BUNDLED_DATA_DIR } from './config.js';
import { LegacyCodeNotFoundError, UnknownCodeError } from './errors.js';
import { createRegistry } from './registry.js';
import { GENERATIONS, KINDS_BY_GENERATION } from './types.js';

const registry = createRegistry({ source: BUNDLED_DATA_DIR });

describe('CodeRegistry', () => {
  it('should validate codes per generation and kind', () => {
    const codes = registry.codes;

    expect(codes.isValid('current', 'province', 1)).toBe(true);
    expect(codes.isValid('current', 'ward', 26710)).toBe(true);
    expect(codes.isValid('current', 'ward', 1)).toBe(false);
    expect(codes.isValid('legacy', 'ward', 1)).toBe(true);
    expect(codes.isValid('legacy', 'district', 754)).toBe(true);
    expect(codes.isValid('legacy', 'province', 3)).toBe(false);
  });

  it('should have no districts in the current generation', () => {
    expect(registry.codes.isValid('current', 'district', 1)).toBe(false);
    expect([...registry.codes.codes('current', 'district')]).toEqual([]);
  });

  it('should list codes in ascending order', () => {
    expect([...registry.codes.codes('current', 'ward')]).toEqual([
      4, 8, 25, 37, 70, 82, 2641, 2650, 4249, 26704, 26710,
    ]);
    expect([...registry.codes.codes('legacy', 'district')]).toEqual([1, 2, 80, 132, 754]);
  });

  it('should list the same codes on every enumeration', () => {
    const codes = registry.codes.codes('legacy', 'ward');

    expect([...codes]).toEqual([...codes]);
    expect([...codes]).toHaveLength(50);
  });

  it('should resolve every listed code through the lookup tables', () => {
    for (const generation of GENERATIONS) {
      for (const kind of KINDS_BY_GENERATION[generation]) {
        for (const code of registry.codes.codes(generation, kind)) {
          const found = generation === 'current'
            ? kind !== 'district' && registry.current.find(kind, code) !== undefined
            : registry.legacy.find(kind, code) !== undefined;
          expect(found, `${generation} ${kind} ${code}`).toBe(true);
        }
      }
    }
  });

  it('should raise the error matching the generation', () => {
    expect(() => registry.codes.assertValid('current', 'ward', 5)).toThrow(UnknownCodeError);
    expect(() => registry.codes.assertValid('legacy', 'ward', 5)).toThrow(LegacyCodeNotFoundError);
    expect(() => registry.codes.assertValid('legacy', 'ward', 4)).not.toThrow();
  });
});
