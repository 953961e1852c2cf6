import { statSync } from 'node:fs';
import type { Cell, FieldTable, HoldingField, HoldingRecord, HoldingRow, PeriodLabel, SourceTable } from '../types';
import { COLUMN_POSITIONS, HOLDING_FIELDS, SKIPPED_ROWS } from '../config/sourceTemplate';
import { NoDataError, SourceNotFoundError, StructureError } from './errors';
import { hasRequiredFields, normalizePeriodLabel } from './validator';
import { readSourceTable } from './spreadsheet';
import { logger, perf } from './logger';

export interface ExtractedPeriod {
  period: PeriodLabel;
  records: HoldingRecord[];
}

function isEmptyCell(cell: Cell): boolean {
  return cell === null || cell === '';
}

export function cellToText(cell: Cell): string {
  if (cell === null) return '';
  if (cell instanceof Date) return cell.toISOString().split('T')[0];
  return String(cell).trim();
}

// Anything that is not a finite number (blank, text, "1,234") becomes 0
export function cellToNumber(cell: Cell): number {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : 0;
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    if (!trimmed) return 0;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : 0;
  }
  return 0;
}

// Cut the template region out of the raw sheet and name its columns.
// Positions past the sheet's widest row are left unbound.
export function sliceHoldingsTable(table: SourceTable): FieldTable<HoldingRow> {
  const width = table.rows.reduce((widest, row) => Math.max(widest, row.length), table.header.length);

  const fields: string[] = HOLDING_FIELDS.filter(field => COLUMN_POSITIONS[field] < width);

  const rows = table.rows.slice(SKIPPED_ROWS).map((row): HoldingRow => {
    const cell = (field: HoldingField): Cell => row[COLUMN_POSITIONS[field]] ?? null;
    return {
      name: cell('name'),
      identifier: cell('identifier'),
      category: cell('category'),
      quantity: cell('quantity'),
      marketValue: cell('marketValue'),
      percentOfNav: cell('percentOfNav'),
    };
  });

  return { fields, rows };
}

export function extract(sourceTable: SourceTable): HoldingRecord[] {
  const table = sliceHoldingsTable(sourceTable);
  if (!hasRequiredFields(table, HOLDING_FIELDS)) {
    const missing = HOLDING_FIELDS.filter(f => !table.fields.includes(f));
    throw new StructureError(`Source sheet is missing required columns: ${missing.join(', ')}`);
  }

  const records: HoldingRecord[] = [];
  for (const row of table.rows) {
    if (HOLDING_FIELDS.every(field => isEmptyCell(row[field]))) continue;

    const identityKey = cellToText(row.identifier);
    if (!identityKey) continue;

    records.push({
      identityKey,
      name: cellToText(row.name),
      category: cellToText(row.category),
      quantity: cellToNumber(row.quantity),
      marketValue: cellToNumber(row.marketValue),
      percentOfNav: cellToNumber(row.percentOfNav),
    });
  }

  if (records.length === 0) {
    throw new NoDataError();
  }
  return records;
}

function assertSourceExists(sourcePath: string): void {
  const stats = statSync(sourcePath, { throwIfNoEntry: false });
  if (!stats || !stats.isFile()) {
    throw new SourceNotFoundError(sourcePath);
  }
}

// Label check happens before the file is touched, existence before parsing
export function extractFromSource(
  sourcePath: string,
  period: string,
  readTable: (path: string) => SourceTable = readSourceTable
): ExtractedPeriod {
  const label = normalizePeriodLabel(period);
  assertSourceExists(sourcePath);

  const records = perf.measureSync('extract:total', () => extract(readTable(sourcePath)));
  logger.info(`Extracted ${records.length} holdings for ${label} from ${sourcePath}`);
  return { period: label, records };
}
