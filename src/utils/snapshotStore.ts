import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { HoldingRecord, PeriodLabel, Snapshot } from '../types';
import { PersistedSnapshotSchema, type PersistedHolding, type PersistedSnapshot } from '../schemas/persisted';
import { PersistenceReadError, PersistenceWriteError } from './errors';
import { logger, perf } from './logger';
import { isValidPeriodLabel, normalizePeriodLabel } from './validator';

export function toPersisted(record: HoldingRecord): PersistedHolding {
  return {
    MutualFundDetails: {
      Name: record.name,
      ISIN: record.identityKey,
      Industry: record.category,
    },
    MonthData: {
      Quantity: record.quantity,
      MarketValueInLakhs: record.marketValue,
      '%ToNAV': record.percentOfNav,
    },
  };
}

export function fromPersisted(entry: PersistedHolding): HoldingRecord {
  return {
    identityKey: entry.MutualFundDetails.ISIN,
    name: entry.MutualFundDetails.Name,
    category: entry.MutualFundDetails.Industry,
    quantity: entry.MonthData.Quantity,
    marketValue: entry.MonthData.MarketValueInLakhs,
    percentOfNav: entry.MonthData['%ToNAV'],
  };
}

export function createSnapshot(): Snapshot {
  return new Map();
}

// Missing file means a fresh store. Anything unreadable is dropped with a warning.
export function loadSnapshot(location: string): Snapshot {
  if (!existsSync(location)) {
    return createSnapshot();
  }

  let parsed: PersistedSnapshot;
  try {
    const raw: unknown = JSON.parse(readFileSync(location, 'utf-8'));
    parsed = PersistedSnapshotSchema.parse(raw);
  } catch (error) {
    logger.warn(`${new PersistenceReadError(location, error).message}. Starting with empty data.`);
    return createSnapshot();
  }

  // Older stores kept labels as typed ("september 2024"); fold them onto the canonical
  // label. When two keys name the same month the later one wins.
  const snapshot = createSnapshot();
  for (const [key, entries] of Object.entries(parsed)) {
    const period = isValidPeriodLabel(key) ? normalizePeriodLabel(key) : key;
    if (snapshot.has(period)) {
      logger.warn(`Stored period "${key}" duplicates ${period}; keeping the later entry`);
    }
    snapshot.set(period, entries.map(fromPersisted));
  }
  logger.debug(`Loaded ${snapshot.size} period(s) from ${location}`);
  return snapshot;
}

// Writes a sibling temp file and renames it over the target, so a failed
// write leaves the previous file as it was.
export function saveSnapshot(snapshot: Snapshot, location: string): boolean {
  const tempLocation = `${location}.tmp`;
  const persisted: PersistedSnapshot = {};
  for (const [period, records] of snapshot) {
    persisted[period] = records.map(toPersisted);
  }

  try {
    perf.measureSync('store:save', () => {
      mkdirSync(dirname(location), { recursive: true });
      writeFileSync(tempLocation, JSON.stringify(persisted, null, 4), 'utf-8');
      renameSync(tempLocation, location);
    });
    return true;
  } catch (error) {
    logger.error(new PersistenceWriteError(location, error).message);
    discardTempFile(tempLocation);
    return false;
  }
}

function discardTempFile(tempLocation: string): void {
  try {
    rmSync(tempLocation, { force: true });
  } catch (error) {
    logger.warn(`Could not remove temporary file ${tempLocation}`, error);
  }
}

// Replaces the period wholesale; earlier records for it are not merged
export function putPeriod(snapshot: Snapshot, period: PeriodLabel, records: readonly HoldingRecord[]): void {
  snapshot.set(period, [...records]);
}

export function cloneSnapshot(snapshot: Snapshot): Snapshot {
  return new Map(snapshot);
}
