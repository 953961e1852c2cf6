import type { ChangeResult, HoldingRecord, MetricChange, MetricName, PeriodLabel, Snapshot } from '../types';
import { METRIC_NAMES } from '../types';
import { InvalidPeriodError, PeriodNotFoundError } from './errors';
import { isValidPeriodLabel } from './validator';

// Later duplicates of an identity key replace earlier ones but keep its first position
function buildIdentityMap(records: readonly HoldingRecord[]): Map<string, HoldingRecord> {
  const map = new Map<string, HoldingRecord>();
  for (const record of records) {
    map.set(record.identityKey, record);
  }
  return map;
}

export function percentChange(startValue: number, endValue: number): number | null {
  if (startValue === 0) return null;
  return ((endValue - startValue) / startValue) * 100;
}

export function metricChange(start: HoldingRecord, end: HoldingRecord, metric: MetricName): MetricChange {
  return {
    startValue: start[metric],
    endValue: end[metric],
    percentChange: percentChange(start[metric], end[metric]),
  };
}

/**
 * Changes between two stored periods for every end-period holding whose name
 * contains `nameQuery` (case-insensitive). Holdings only present at the end
 * are reported as new additions without metric changes.
 *
 * Results follow the order of the end period's holdings.
 */
export function compareHoldings(
  snapshot: Snapshot,
  nameQuery: string,
  startPeriod: PeriodLabel,
  endPeriod: PeriodLabel
): ChangeResult[] {
  for (const period of [startPeriod, endPeriod]) {
    if (!isValidPeriodLabel(period)) throw new InvalidPeriodError(period);
  }

  const startRecords = snapshot.get(startPeriod);
  const endRecords = snapshot.get(endPeriod);
  if (!startRecords || !endRecords) {
    const missing = [startPeriod, endPeriod].filter(p => !snapshot.has(p));
    throw new PeriodNotFoundError([...new Set(missing)]);
  }

  const startMap = buildIdentityMap(startRecords);
  const endMap = buildIdentityMap(endRecords);
  const query = nameQuery.toLowerCase();

  const results: ChangeResult[] = [];
  for (const [identityKey, end] of endMap) {
    if (!end.name.toLowerCase().includes(query)) continue;

    const identity = { identityKey, name: end.name, category: end.category };
    const start = startMap.get(identityKey);
    if (!start) {
      results.push({ identity, status: 'new-addition', changes: {} });
      continue;
    }

    const changes: ChangeResult['changes'] = {};
    for (const metric of METRIC_NAMES) {
      changes[metric] = metricChange(start, end, metric);
    }
    results.push({ identity, status: 'existing', changes });
  }

  return results;
}
