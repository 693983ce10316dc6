/**
 * Name Search Index
 *
 * Diacritic-insensitive name search over both generations.
 *
 * MATCHING POLICY:
 * - Query and names are folded with `foldName` (no marks, đ -> d, lowercase)
 * - A name matches when its folded form contains the folded query
 * - Results are ascending by code; no ranking is applied
 * - An empty or whitespace-only query matches nothing
 *
 * @example
 * ```typescript
 * index.search('current', 'ward', 'ba dinh');  // [Phường Ba Đình]
 * index.search('legacy', 'ward', 'Phú Mỹ');    // [Phường Phú Mỹ (legacy)]
 * ```
 */

import type { LegacyXrefIndex } from './legacy-xref.js';
import type { CurrentLookupTables, LegacyLookupTables } from './lookup-tables.js';
import type {
  CrossRefKind,
  CurrentEntity,
  CurrentEntityMap,
  CurrentKind,
  DivisionKind,
  Generation,
  LegacyEntity,
  LegacyEntityMap,
  LegacyKind,
  LegacyResolution,
  WardRecord,
} from './types.js';
import { createLogger } from './utils/logger.js';
import { foldName } from './utils/text.js';

const logger = createLogger({ module: 'search' });

interface Named {
  readonly name: string;
  readonly code: number;
}

/**
 * Folded names of one (generation, kind) table
 */
class SearchBucket<T extends Named> {
  private readonly entries: readonly { readonly folded: string; readonly record: T }[];
  private readonly exact: ReadonlyMap<string, readonly T[]>;

  constructor(records: Iterable<T>) {
    const entries: { folded: string; record: T }[] = [];
    const exact = new Map<string, T[]>();

    for (const record of records) {
      const folded = foldName(record.name);
      entries.push({ folded, record });
      const group = exact.get(folded);
      if (group) {
        group.push(record);
      } else {
        exact.set(folded, [record]);
      }
    }

    this.entries = Object.freeze(entries);
    this.exact = new Map(
      [...exact].map(([folded, group]): [string, readonly T[]] => [folded, Object.freeze(group)])
    );
  }

  /** Records are fed in code order, so results stay in code order */
  search(foldedQuery: string): readonly T[] {
    return this.entries
      .filter((entry) => entry.folded.includes(foldedQuery))
      .map((entry) => entry.record);
  }

  findExact(foldedName: string): readonly T[] {
    return this.exact.get(foldedName) ?? [];
  }
}

type CurrentBuckets = { readonly [P in CurrentKind]: SearchBucket<CurrentEntityMap[P]> };
type LegacyBuckets = { readonly [P in LegacyKind]: SearchBucket<LegacyEntityMap[P]> };

export class NameSearchIndex {
  private readonly current: CurrentBuckets;
  private readonly legacy: LegacyBuckets;

  constructor(
    currentTables: CurrentLookupTables,
    legacyTables: LegacyLookupTables,
    private readonly xref: LegacyXrefIndex
  ) {
    this.current = {
      province: new SearchBucket(currentTables.iterAll('province')),
      ward: new SearchBucket(currentTables.iterAll('ward')),
    };
    this.legacy = {
      province: new SearchBucket(legacyTables.iterAll('province')),
      district: new SearchBucket(legacyTables.iterAll('district')),
      ward: new SearchBucket(legacyTables.iterAll('ward')),
    };
  }

  search<K extends CurrentKind>(generation: 'current', kind: K, query: string): readonly CurrentEntityMap[K][];
  search<K extends LegacyKind>(generation: 'legacy', kind: K, query: string): readonly LegacyEntityMap[K][];
  search(generation: Generation, kind: DivisionKind, query: string): readonly (CurrentEntity | LegacyEntity)[];
  search(generation: Generation, kind: DivisionKind, query: string): readonly (CurrentEntity | LegacyEntity)[] {
    if (generation === 'legacy') {
      return this.searchLegacy(kind, query);
    }
    if (kind === 'district') {
      return [];
    }
    return this.searchCurrent(kind, query);
  }

  searchCurrent<K extends CurrentKind>(kind: K, query: string): readonly CurrentEntityMap[K][] {
    const folded = foldName(query);
    if (folded.length === 0) {
      logger.debug('Empty search query', { generation: 'current', kind });
      return [];
    }
    return this.current[kind].search(folded);
  }

  searchLegacy<K extends LegacyKind>(kind: K, query: string): readonly LegacyEntityMap[K][] {
    const folded = foldName(query);
    if (folded.length === 0) {
      logger.debug('Empty search query', { generation: 'legacy', kind });
      return [];
    }
    return this.legacy[kind].search(folded);
  }

  /**
   * Units whose whole folded name equals the folded query
   */
  findExact<K extends CurrentKind>(generation: 'current', kind: K, name: string): readonly CurrentEntityMap[K][];
  findExact<K extends LegacyKind>(generation: 'legacy', kind: K, name: string): readonly LegacyEntityMap[K][];
  findExact(generation: Generation, kind: DivisionKind, name: string): readonly (CurrentEntity | LegacyEntity)[] {
    const folded = foldName(name);
    if (folded.length === 0) {
      return [];
    }
    if (generation === 'legacy') {
      return this.legacy[kind].findExact(folded);
    }
    if (kind === 'district') {
      return [];
    }
    return this.current[kind].findExact(folded);
  }

  /**
   * Legacy units matching `name`, each resolved to its current unit,
   * ascending by legacy code
   */
  searchFromLegacy<K extends CrossRefKind>(kind: K, name: string): readonly LegacyResolution<K>[] {
    return this.searchLegacy(kind, name).map(
      (legacy): LegacyResolution<K> => [legacy.code, this.xref.currentForLegacy(kind, legacy.code)]
    );
  }

  /**
   * Current wards covering the first legacy district (by code) whose name matches
   */
  searchLegacyDistrictToCurrent(name: string): readonly WardRecord[] {
    const [district] = this.searchLegacy('district', name);
    if (district === undefined) {
      logger.debug('No legacy district matches', { query: name });
      return [];
    }
    return this.xref.currentWardsForLegacyDistrict(district.code);
  }
}
