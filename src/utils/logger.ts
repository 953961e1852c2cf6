import { Logger, type ILogObj } from 'tslog';
import { performance } from 'node:perf_hooks';
import { loadSettings, LOG_LEVEL_IDS } from '../config/settings';

const settings = loadSettings();

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'holdings-delta',
  minLevel: LOG_LEVEL_IDS[settings.logLevel],
  type: settings.logFormat,
});

const activeTimers: Map<string, number> = new Map();

export const perf = {
  start(name: string): void {
    activeTimers.set(name, performance.now());
  },

  end(name: string): number {
    const startTime = activeTimers.get(name);
    if (startTime === undefined) {
      logger.warn(`No timer found for: ${name}`);
      return 0;
    }

    const duration = performance.now() - startTime;
    activeTimers.delete(name);
    logger.debug(`[PERF] ${name}: ${duration.toFixed(2)}ms`);
    return duration;
  },

  measureSync<T>(name: string, fn: () => T): T {
    this.start(name);
    try {
      return fn();
    } finally {
      this.end(name);
    }
  },
};
