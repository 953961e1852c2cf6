export type Cell = string | number | boolean | Date | null;

// Raw sheet as handed over by the spreadsheet reader: first row is the header
export interface SourceTable {
  header: Cell[];
  rows: Cell[][];
}

export type HoldingField =
  | 'name'
  | 'identifier'
  | 'category'
  | 'quantity'
  | 'marketValue'
  | 'percentOfNav';

export type HoldingRow = Record<HoldingField, Cell>;

export interface FieldTable<Row> {
  fields: string[];
  rows: Row[];
}
