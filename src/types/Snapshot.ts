import type { HoldingRecord } from './HoldingRecord';

// "September 2024" style label, the only temporal key
export type PeriodLabel = string;

export interface PeriodParts {
  year: number;
  month: number; // 1-12
}

export type Snapshot = Map<PeriodLabel, readonly Readonly<HoldingRecord>[]>;
