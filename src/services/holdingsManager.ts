import type { ChangeReport, HoldingRecord, ImportOutcome, PeriodLabel, Snapshot, SourceTable } from '../types';
import { compareHoldings } from '../utils/changeAnalyzer';
import { extractFromSource } from '../utils/extractor';
import { readSourceTable } from '../utils/spreadsheet';
import { cloneSnapshot, loadSnapshot, putPeriod, saveSnapshot } from '../utils/snapshotStore';
import { comparePeriodLabels, normalizePeriodLabel } from '../utils/validator';
import { logger } from '../utils/logger';

export interface HoldingsManagerOptions {
  readTable?: (path: string) => SourceTable;
}

/**
 * Owns the loaded snapshot and where it is persisted. One instance per run;
 * every import and comparison goes through it.
 */
export class HoldingsManager {
  private snapshot: Snapshot;
  private readonly readTable: (path: string) => SourceTable;

  constructor(
    readonly storePath: string,
    options: HoldingsManagerOptions = {}
  ) {
    this.readTable = options.readTable ?? readSourceTable;
    this.snapshot = loadSnapshot(storePath);
  }

  // Extraction errors propagate. A failed save leaves the in-memory snapshot untouched.
  importSource(sourcePath: string, period: string): ImportOutcome {
    const extracted = extractFromSource(sourcePath, period, this.readTable);

    const next = cloneSnapshot(this.snapshot);
    putPeriod(next, extracted.period, extracted.records);

    const persisted = saveSnapshot(next, this.storePath);
    if (persisted) {
      this.snapshot = next;
      logger.info(`Successfully processed data for ${extracted.period}`);
    } else {
      logger.error(`Import of ${extracted.period} was not applied`);
    }

    return { period: extracted.period, recordCount: extracted.records.length, persisted };
  }

  compare(nameQuery: string, startPeriod: string, endPeriod: string): ChangeReport {
    const start = normalizePeriodLabel(startPeriod);
    const end = normalizePeriodLabel(endPeriod);
    const results = compareHoldings(this.snapshot, nameQuery, start, end);
    return { query: nameQuery, startPeriod: start, endPeriod: end, results };
  }

  listPeriods(): PeriodLabel[] {
    return [...this.snapshot.keys()].sort(comparePeriodLabels);
  }

  hasData(): boolean {
    return this.snapshot.size > 0;
  }

  getSnapshot(): ReadonlyMap<PeriodLabel, readonly Readonly<HoldingRecord>[]> {
    return this.snapshot;
  }
}
