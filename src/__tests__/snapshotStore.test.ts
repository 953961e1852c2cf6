import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  cloneSnapshot,
  createSnapshot,
  fromPersisted,
  loadSnapshot,
  putPeriod,
  saveSnapshot,
  toPersisted,
} from '../utils/snapshotStore';
import { logger } from '../utils/logger';
import type { Snapshot } from '../types';
import { makeRecord } from './helpers';

vi.mock('../utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  perf: {
    start: vi.fn(),
    end: vi.fn(),
    measureSync: <T>(_name: string, fn: () => T): T => fn(),
  },
}));

const alpha = makeRecord({
  identityKey: 'INE000A01011',
  name: 'Alpha Bank Ltd',
  category: 'Banks',
  quantity: 100,
  marketValue: 50.25,
  percentOfNav: 1.5,
});

const beta = makeRecord({
  identityKey: 'INE000B01012',
  name: 'Bêta Motors Ltd',
  category: 'Automobiles',
  quantity: 200,
  marketValue: 75,
  percentOfNav: 2,
});

describe('persisted mapping', () => {
  it('maps a record onto the stored JSON keys', () => {
    expect(toPersisted(alpha)).toEqual({
      MutualFundDetails: { Name: 'Alpha Bank Ltd', ISIN: 'INE000A01011', Industry: 'Banks' },
      MonthData: { Quantity: 100, MarketValueInLakhs: 50.25, '%ToNAV': 1.5 },
    });
  });

  it('maps stored JSON back onto a record', () => {
    expect(fromPersisted(toPersisted(beta))).toEqual(beta);
  });
});

describe('putPeriod', () => {
  it('replaces the whole list for a re-imported period', () => {
    const snapshot = createSnapshot();
    putPeriod(snapshot, 'September 2024', [alpha, beta]);
    putPeriod(snapshot, 'September 2024', [beta]);

    expect(snapshot.get('September 2024')).toEqual([beta]);
  });

  it('leaves other periods untouched', () => {
    const snapshot = createSnapshot();
    putPeriod(snapshot, 'September 2024', [alpha]);
    putPeriod(snapshot, 'October 2024', [beta]);

    expect(snapshot.get('September 2024')).toEqual([alpha]);
    expect([...snapshot.keys()]).toEqual(['September 2024', 'October 2024']);
  });

  it('stores a copy of the given list', () => {
    const snapshot = createSnapshot();
    const records = [alpha];
    putPeriod(snapshot, 'September 2024', records);
    records.push(beta);

    expect(snapshot.get('September 2024')).toHaveLength(1);
  });
});

describe('cloneSnapshot', () => {
  it('does not share period entries with the original', () => {
    const snapshot = createSnapshot();
    putPeriod(snapshot, 'September 2024', [alpha]);
    const copy = cloneSnapshot(snapshot);
    putPeriod(copy, 'October 2024', [beta]);

    expect(snapshot.has('October 2024')).toBe(false);
  });
});

describe('loadSnapshot / saveSnapshot', () => {
  let dir: string;
  let location: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'holdings-store-'));
    location = join(dir, 'portfolio_data.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns an empty snapshot when the file does not exist', () => {
    const snapshot = loadSnapshot(location);

    expect(snapshot.size).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('round-trips a snapshot through the file', () => {
    const snapshot: Snapshot = new Map([
      ['September 2024', [alpha, beta]],
      ['October 2024', [beta]],
    ]);

    expect(saveSnapshot(snapshot, location)).toBe(true);
    expect(loadSnapshot(location)).toEqual(snapshot);
  });

  it('writes the compatibility shape with 4-space indentation', () => {
    saveSnapshot(new Map([['September 2024', [alpha]]]), location);

    const content = readFileSync(location, 'utf-8');
    expect(content.startsWith('{\n    "September 2024": [\n')).toBe(true);
    expect(JSON.parse(content)).toEqual({
      'September 2024': [
        {
          MutualFundDetails: { Name: 'Alpha Bank Ltd', ISIN: 'INE000A01011', Industry: 'Banks' },
          MonthData: { Quantity: 100, MarketValueInLakhs: 50.25, '%ToNAV': 1.5 },
        },
      ],
    });
  });

  it('keeps non-ASCII names as written', () => {
    saveSnapshot(new Map([['September 2024', [beta]]]), location);

    expect(readFileSync(location, 'utf-8')).toContain('"Name": "Bêta Motors Ltd"');
  });

  it('reads a file written by an earlier version of the tool', () => {
    writeFileSync(
      location,
      JSON.stringify({
        'August 2024': [
          {
            MutualFundDetails: { Name: 'Alpha Bank Ltd', ISIN: 'INE000A01011', Industry: 'Banks' },
            MonthData: { Quantity: 90, MarketValueInLakhs: 40, '%ToNAV': 0 },
          },
        ],
      })
    );

    expect(loadSnapshot(location).get('August 2024')).toEqual([
      makeRecord({
        identityKey: 'INE000A01011',
        name: 'Alpha Bank Ltd',
        category: 'Banks',
        quantity: 90,
        marketValue: 40,
        percentOfNav: 0,
      }),
    ]);
  });

  it('folds stored labels onto their canonical form', () => {
    const entry = toPersisted(alpha);
    writeFileSync(location, JSON.stringify({ 'september 2024': [entry], 'October 2024': [entry] }));

    const snapshot = loadSnapshot(location);

    expect([...snapshot.keys()]).toEqual(['September 2024', 'October 2024']);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('keeps the later of two keys naming the same month', () => {
    writeFileSync(
      location,
      JSON.stringify({ 'september 2024': [toPersisted(alpha)], 'September  2024': [toPersisted(beta)] })
    );

    const snapshot = loadSnapshot(location);

    expect([...snapshot.keys()]).toEqual(['September 2024']);
    expect(snapshot.get('September 2024')).toEqual([beta]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to an empty snapshot with a warning on invalid JSON', () => {
    writeFileSync(location, '{"September 2024": [');

    expect(loadSnapshot(location).size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to an empty snapshot with a warning on an unexpected shape', () => {
    writeFileSync(
      location,
      JSON.stringify({
        'September 2024': [{ MutualFundDetails: { Name: 'x', ISIN: 'y', Industry: 'z' }, MonthData: { Quantity: '1' } }],
      })
    );

    expect(loadSnapshot(location).size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('creates missing parent directories', () => {
    const nested = join(dir, 'data', 'holdings.json');

    expect(saveSnapshot(new Map([['September 2024', [alpha]]]), nested)).toBe(true);
    expect(existsSync(nested)).toBe(true);
  });

  it('returns false and logs instead of throwing when the write fails', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, '');

    expect(saveSnapshot(new Map([['September 2024', [alpha]]]), join(blocker, 'store.json'))).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('removes the temporary file when the final rename fails', () => {
    mkdirSync(location);
    writeFileSync(join(location, 'keep'), '');

    expect(saveSnapshot(new Map([['September 2024', [alpha]]]), location)).toBe(false);
    expect(existsSync(`${location}.tmp`)).toBe(false);
  });
});
