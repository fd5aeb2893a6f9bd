import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import {
  CatalogIndex,
  DEFAULT_CATALOG_COLUMNS,
  inferTraitSpaceFromHeader,
  type CatalogColumns,
  type CatalogRecord,
} from '../../domain/catalog/catalog-index.js';
import { CatalogLoadError, type CatalogIssue } from '../../domain/errors.js';

export interface CatalogLoadOptions extends Partial<CatalogColumns> {
  logger?: Pick<Console, 'info' | 'warn'>;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

function parseRows(content: string): string[][] {
  let rows: unknown;
  try {
    rows = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new CatalogLoadError([{ message: `CSV syntax error: ${error instanceof Error ? error.message : String(error)}` }]);
  }

  if (!isStringMatrix(rows)) {
    throw new CatalogLoadError([{ message: 'CSV parser returned an unexpected shape' }]);
  }
  return rows;
}

/**
 * Build a catalog index from CSV text. The header row names the id column,
 * the display columns and, in order, every trait column.
 */
export function parseCatalogCsv(content: string, options: CatalogLoadOptions = {}): CatalogIndex {
  const columns: CatalogColumns = {
    idColumn: options.idColumn ?? DEFAULT_CATALOG_COLUMNS.idColumn,
    displayColumns: options.displayColumns ?? DEFAULT_CATALOG_COLUMNS.displayColumns,
  };

  const [header, ...body] = parseRows(content);
  if (!header) {
    throw new CatalogLoadError([{ message: 'catalog is empty (no header row)' }]);
  }

  const traitSpace = inferTraitSpaceFromHeader(header, columns);

  const lengthIssues: CatalogIssue[] = [];
  const records = body.map((cells, index): CatalogRecord => {
    if (cells.length > header.length) {
      lengthIssues.push({
        row: index + 1,
        message: `has ${cells.length} values but the header has ${header.length} columns`,
      });
    }
    const record: Record<string, string | undefined> = {};
    header.forEach((column, position) => {
      record[column] = cells[position];
    });
    return record;
  });

  if (lengthIssues.length > 0) {
    throw new CatalogLoadError(lengthIssues);
  }

  return CatalogIndex.fromRecords(records, { traitSpace, ...columns });
}

export function loadCatalogFile(filePath: string, options: CatalogLoadOptions = {}): CatalogIndex {
  const logger = options.logger ?? console;

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new CatalogLoadError([
      { message: `cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }

  const catalog = parseCatalogCsv(content, options);
  if (catalog.size === 0) {
    logger.warn(`[CatalogLoader] ${filePath} has no programmes; every ranking will be empty`);
  }
  logger.info(
    `[CatalogLoader] Loaded ${catalog.size} programmes with traits: ${catalog.traitSpace.dimensions.join(', ')}`
  );
  return catalog;
}
