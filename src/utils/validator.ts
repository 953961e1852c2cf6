import type { FieldTable, PeriodLabel, PeriodParts } from '../types';
import { InvalidPeriodError } from './errors';

// Fixed English table so labels never depend on the host locale
export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const PERIOD_PATTERN = /^([A-Za-z]+) +(\d{4})$/;

export function parsePeriodLabel(label: string): PeriodParts | null {
  const match = label.match(PERIOD_PATTERN);
  if (!match) return null;

  const [, monthRaw, yearRaw] = match;
  const monthIndex = MONTH_NAMES.findIndex(m => m.toLowerCase() === monthRaw.toLowerCase());
  const year = Number(yearRaw);
  if (monthIndex === -1 || year < 1) return null;

  return { year, month: monthIndex + 1 };
}

export function isValidPeriodLabel(label: string): boolean {
  return parsePeriodLabel(label) !== null;
}

// "september  2024" -> "September 2024"
export function normalizePeriodLabel(label: string): PeriodLabel {
  const parts = parsePeriodLabel(label);
  if (!parts) {
    throw new InvalidPeriodError(label);
  }
  return formatPeriodLabel(parts);
}

export function formatPeriodLabel({ year, month }: PeriodParts): PeriodLabel {
  return `${MONTH_NAMES[month - 1]} ${String(year).padStart(4, '0')}`;
}

// Chronological order; labels that do not parse go last, compared as strings
export function comparePeriodLabels(a: PeriodLabel, b: PeriodLabel): number {
  const pa = parsePeriodLabel(a);
  const pb = parsePeriodLabel(b);

  if (pa && pb) {
    return pa.year - pb.year || pa.month - pb.month;
  }
  if (pa) return -1;
  if (pb) return 1;
  return a.localeCompare(b);
}

export function hasRequiredFields<Row>(
  table: Pick<FieldTable<Row>, 'fields'>,
  requiredFieldNames: readonly string[]
): boolean {
  const present = new Set(table.fields);
  return requiredFieldNames.every(name => present.has(name));
}
