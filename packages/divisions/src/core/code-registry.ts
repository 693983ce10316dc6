/**
 * Code Registry
 *
 * Answers "is this a valid code" for every (generation, kind) pair and
 * enumerates valid codes in ascending order. `current` has no districts:
 * every district code is invalid there and its code list is empty.
 */

import { LegacyCodeNotFoundError, UnknownCodeError } from './errors.js';
import type { CurrentLookupTables, LegacyLookupTables } from './lookup-tables.js';
import type { DivisionKind, Generation } from './types.js';

type CodeKey = `${Generation}:${DivisionKind}`;

export class CodeRegistry {
  private readonly codeLists = new Map<CodeKey, readonly number[]>();
  private readonly codeSets = new Map<CodeKey, ReadonlySet<number>>();

  constructor(current: CurrentLookupTables, legacy: LegacyLookupTables) {
    this.register('current', 'province', current.table('province').all());
    this.register('current', 'ward', current.table('ward').all());
    this.register('legacy', 'province', legacy.table('province').all());
    this.register('legacy', 'district', legacy.table('district').all());
    this.register('legacy', 'ward', legacy.table('ward').all());
  }

  private register(
    generation: Generation,
    kind: DivisionKind,
    records: readonly { readonly code: number }[]
  ): void {
    const key: CodeKey = `${generation}:${kind}`;
    const codes = Object.freeze(records.map((record) => record.code));
    this.codeLists.set(key, codes);
    this.codeSets.set(key, new Set(codes));
  }

  isValid(generation: Generation, kind: DivisionKind, code: number): boolean {
    return this.codeSets.get(`${generation}:${kind}`)?.has(code) ?? false;
  }

  /**
   * Valid codes in ascending order. The returned array is frozen and can be
   * iterated any number of times.
   */
  codes(generation: Generation, kind: DivisionKind): readonly number[] {
    return this.codeLists.get(`${generation}:${kind}`) ?? [];
  }

  /**
   * @throws UnknownCodeError for a current code, LegacyCodeNotFoundError for a legacy one
   */
  assertValid(generation: Generation, kind: DivisionKind, code: number): void {
    if (this.isValid(generation, kind, code)) {
      return;
    }
    throw generation === 'current'
      ? new UnknownCodeError(kind, code)
      : new LegacyCodeNotFoundError(kind, code);
  }
}
