import { readFileSync } from 'node:fs';
import { read, utils } from 'xlsx';
import type { Cell, SourceTable } from '../types';
import { StructureError, describeError } from './errors';

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

// First worksheet as header + rows, anchored at A1; blank cells are null and
// blank rows are kept so the fixed row offsets of the template still line up.
export function readSourceTable(sourcePath: string): SourceTable {
  let sheetRows: unknown[][];
  try {
    const workbook = read(readFileSync(sourcePath), { type: 'buffer', cellDates: true });
    const firstSheetName = workbook.SheetNames[0];
    const sheet = firstSheetName === undefined ? undefined : workbook.Sheets[firstSheetName];
    if (!sheet) {
      throw new StructureError(`Workbook has no worksheets: ${sourcePath}`);
    }
    // Count rows and columns from A1 even when the stored range starts later (e.g. B2:H500)
    const range = utils.decode_range(sheet['!ref'] ?? 'A1');
    range.s = { r: 0, c: 0 };
    sheetRows = utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: true, raw: true, range });
  } catch (error) {
    if (error instanceof StructureError) throw error;
    throw new StructureError(`Could not parse spreadsheet ${sourcePath}: ${describeError(error)}`, { cause: error });
  }

  const [header = [], ...rows] = sheetRows.map(row => row.map(toCell));
  return { header, rows };
}
