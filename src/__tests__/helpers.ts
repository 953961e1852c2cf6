import type { Cell, HoldingRecord, SourceTable } from '../types';

// --- Test data factories ---

export function makeRecord(overrides: Partial<HoldingRecord> & { identityKey: string }): HoldingRecord {
  return {
    name: `Fund ${overrides.identityKey}`,
    category: 'Banks',
    quantity: 0,
    marketValue: 0,
    percentOfNav: 0,
    ...overrides,
  };
}

// Columns A-H as in the monthly disclosure: serial, code, name, ISIN, industry, qty, value, % NAV
export function holdingRow(
  name: Cell,
  isin: Cell,
  industry: Cell,
  quantity: Cell,
  marketValue: Cell,
  percentOfNav: Cell
): Cell[] {
  return [1, 'EQ', name, isin, industry, quantity, marketValue, percentOfNav];
}

export function blankRow(width = 8): Cell[] {
  return Array.from({ length: width }, () => null);
}

// Header row plus the 6 title/caption rows that precede the data
export function makeSourceTable(dataRows: Cell[][]): SourceTable {
  return {
    header: ['Monthly Portfolio Statement', null, null, null, null, null, null, null],
    rows: [
      ['Sample Equity Fund', null, null, null, null, null, null, null],
      ['Portfolio as on 30-Sep-2024', null, null, null, null, null, null, null],
      blankRow(),
      ['Sr', 'Code', 'Name of the Instrument', 'ISIN', 'Industry', 'Quantity', 'Market value (Rs. in Lakhs)', '% to NAV'],
      ['', '', 'Equity & Equity related', null, null, null, null, null],
      blankRow(),
      ...dataRows,
    ],
  };
}
