import type { SourceTable } from './types';
import { loadSettings } from './config/settings';
import { HoldingsManager } from './services/holdingsManager';
import { isHoldingsError } from './utils/errors';
import { formatChangeReport, formatPeriodList } from './utils/reporter';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface CliOptions {
  storePath?: string;
  readTable?: (path: string) => SourceTable;
}

export const USAGE = `Usage:
  holdings-delta import <file> <Month YYYY>
  holdings-delta compare <fund name> <start Month YYYY> <end Month YYYY>
  holdings-delta periods`;

const consoleIO: CliIO = {
  out: text => process.stdout.write(`${text}\n`),
  err: text => process.stderr.write(`${text}\n`),
};

function runImport(manager: HoldingsManager, args: string[], io: CliIO): number {
  const [file, ...periodParts] = args;
  if (!file || periodParts.length === 0) {
    io.err(USAGE);
    return 2;
  }

  // Lets `import file.xlsx September 2024` work without quoting the period
  const outcome = manager.importSource(file, periodParts.join(' '));
  if (!outcome.persisted) {
    io.err(`Failed to import data for ${outcome.period}.`);
    return 1;
  }
  io.out(`Imported ${outcome.recordCount} holdings for ${outcome.period}.`);
  return 0;
}

function runCompare(manager: HoldingsManager, args: string[], io: CliIO): number {
  if (args.length !== 3) {
    io.err(USAGE);
    return 2;
  }
  if (!manager.hasData()) {
    io.err('No data available. Please import data first.');
    return 1;
  }

  const [query, start, end] = args;
  io.out(formatChangeReport(manager.compare(query, start, end)));
  return 0;
}

function runPeriods(manager: HoldingsManager, io: CliIO): number {
  if (!manager.hasData()) {
    io.out('No data available. Please import data first.');
    return 0;
  }
  io.out(formatPeriodList(manager.listPeriods()));
  return 0;
}

export function runCli(argv: string[], io: CliIO = consoleIO, options: CliOptions = {}): number {
  const [command, ...args] = argv;
  if (command !== 'import' && command !== 'compare' && command !== 'periods') {
    io.err(USAGE);
    return 2;
  }

  const storePath = options.storePath ?? loadSettings().storePath;
  const manager = new HoldingsManager(storePath, { readTable: options.readTable });

  try {
    if (command === 'import') return runImport(manager, args, io);
    if (command === 'compare') return runCompare(manager, args, io);
    return runPeriods(manager, io);
  } catch (error) {
    if (isHoldingsError(error)) {
      io.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
