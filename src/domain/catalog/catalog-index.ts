/**
 * Catalog Index
 *
 * Immutable, validated set of catalog items. Built once from tabular records
 * and passed by reference to the ranker; nothing mutates it afterwards.
 */

import { CatalogLoadError, type CatalogIssue } from '../errors.js';
import { createTraitSpace, type TraitSpace, type TraitVector } from '../profile/trait-space.js';

export type CatalogRecord = Readonly<Record<string, string | number | undefined>>;

export interface CatalogItem {
  readonly id: string;
  readonly displayFields: Readonly<Record<string, string>>;
  readonly vector: TraitVector;
  /** Position in load order, used as the ranking tie-break */
  readonly index: number;
}

export interface CatalogColumns {
  idColumn: string;
  displayColumns: readonly string[];
}

export interface CatalogIndexOptions extends CatalogColumns {
  traitSpace: TraitSpace;
}

export const DEFAULT_CATALOG_COLUMNS: CatalogColumns = {
  idColumn: 'id',
  displayColumns: ['program_name', 'institution'],
};

/**
 * Every header column that is neither the id nor a display column is a
 * trait column; header order is the trait order.
 */
export function inferTraitSpaceFromHeader(header: readonly string[], columns: CatalogColumns): TraitSpace {
  const names = header.map((column) => column.trim());

  if (!names.includes(columns.idColumn)) {
    throw new CatalogLoadError([{ column: columns.idColumn, message: 'id column is missing from the header' }]);
  }

  const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new CatalogLoadError(
      Array.from(new Set(duplicates)).map((column) => ({ column, message: 'duplicate column in header' }))
    );
  }

  const traits = names.filter((name) => name !== columns.idColumn && !columns.displayColumns.includes(name));
  if (traits.length === 0) {
    throw new CatalogLoadError([{ message: 'header has no trait columns' }]);
  }

  try {
    return createTraitSpace(traits);
  } catch (error) {
    throw new CatalogLoadError([{ message: error instanceof Error ? error.message : String(error) }]);
  }
}

function parseTraitValue(raw: string | number | undefined): number | string {
  if (raw === undefined) {
    return 'value is missing';
  }
  if (typeof raw === 'string' && raw.trim() === '') {
    return 'value is empty';
  }
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isFinite(value)) {
    return `'${raw}' is not a number`;
  }
  if (value < 0) {
    return `${value} is negative`;
  }
  return value;
}

export class CatalogIndex implements Iterable<CatalogItem> {
  readonly traitSpace: TraitSpace;
  readonly items: readonly CatalogItem[];
  private readonly byId: ReadonlyMap<string, CatalogItem>;

  private constructor(traitSpace: TraitSpace, items: readonly CatalogItem[]) {
    this.traitSpace = traitSpace;
    this.items = Object.freeze(items);
    this.byId = new Map(items.map((item) => [item.id, item]));
    Object.freeze(this);
  }

  /**
   * Validate every record before building anything; one bad record fails
   * the whole load and every problem found is reported.
   */
  static fromRecords(records: readonly CatalogRecord[], options: CatalogIndexOptions): CatalogIndex {
    const { traitSpace, idColumn, displayColumns } = options;
    const issues: CatalogIssue[] = [];
    const items: CatalogItem[] = [];
    const seen = new Set<string>();

    records.forEach((record, index) => {
      const row = index + 1;
      const rawId = record[idColumn];
      const id = rawId === undefined ? '' : String(rawId).trim();

      if (!id) {
        issues.push({ row, column: idColumn, message: 'identifier is missing' });
      } else if (seen.has(id)) {
        issues.push({ row, column: idColumn, message: `duplicate identifier '${id}'` });
      }
      seen.add(id);

      const vector: number[] = [];
      for (const trait of traitSpace.dimensions) {
        const parsed = parseTraitValue(record[trait]);
        if (typeof parsed === 'string') {
          issues.push({ row, column: trait, message: parsed });
        } else {
          vector.push(parsed);
        }
      }

      const displayFields: Record<string, string> = {};
      for (const column of displayColumns) {
        const value = record[column];
        displayFields[column] = value === undefined ? '' : String(value).trim();
      }

      items.push(
        Object.freeze({
          id,
          displayFields: Object.freeze(displayFields),
          vector: Object.freeze(vector),
          index,
        })
      );
    });

    if (issues.length > 0) {
      throw new CatalogLoadError(issues);
    }

    return new CatalogIndex(traitSpace, items);
  }

  static empty(traitSpace: TraitSpace): CatalogIndex {
    return new CatalogIndex(traitSpace, []);
  }

  get size(): number {
    return this.items.length;
  }

  get(id: string): CatalogItem | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  [Symbol.iterator](): Iterator<CatalogItem> {
    return this.items[Symbol.iterator]();
  }
}
