export type { HoldingDetails, HoldingRecord, MetricName } from './HoldingRecord';
export { METRIC_NAMES } from './HoldingRecord';
export type { PeriodLabel, PeriodParts, Snapshot } from './Snapshot';
export type { Cell, SourceTable, HoldingField, HoldingRow, FieldTable } from './SourceTable';
export type { HoldingStatus, MetricChange, ChangeResult, ChangeReport } from './ChangeResult';
export type { ImportOutcome } from './ImportOutcome';
