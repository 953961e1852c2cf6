/**
 * Layout of the monthly portfolio disclosure sheet.
 *
 * Row 1 is read as the header row. The next 6 rows carry the scheme title,
 * the as-of date and the printed column captions, so data starts on sheet
 * row 8. Columns A and B hold serial numbers and codes that are not used.
 *
 *   C: Name   D: ISIN   E: Industry   F: Quantity   G: Market value (lakhs)   H: % to NAV
 */

import type { HoldingField } from '../types';

export const SKIPPED_ROWS = 6;

// 0-based column positions
export const COLUMN_POSITIONS: Readonly<Record<HoldingField, number>> = {
  name: 2,
  identifier: 3,
  category: 4,
  quantity: 5,
  marketValue: 6,
  percentOfNav: 7,
};

export const HOLDING_FIELDS: readonly HoldingField[] = [
  'name',
  'identifier',
  'category',
  'quantity',
  'marketValue',
  'percentOfNav',
];
