import type { PeriodLabel } from './Snapshot';

export interface ImportOutcome {
  period: PeriodLabel;
  recordCount: number;
  persisted: boolean; // false: the write failed and nothing was applied
}
