import type { HoldingDetails, MetricName } from './HoldingRecord';
import type { PeriodLabel } from './Snapshot';

export type HoldingStatus = 'existing' | 'new-addition';

export interface MetricChange {
  startValue: number;
  endValue: number;
  percentChange: number | null; // null when the start value was 0
}

export interface ChangeResult {
  identity: HoldingDetails;
  status: HoldingStatus;
  changes: Partial<Record<MetricName, MetricChange>>;
}

export interface ChangeReport {
  query: string;
  startPeriod: PeriodLabel;
  endPeriod: PeriodLabel;
  results: ChangeResult[];
}
