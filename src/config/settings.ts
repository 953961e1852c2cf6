import { z } from 'zod';

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

// tslog numbers its levels 0 (silly) through 6 (fatal)
export const LOG_LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const DEFAULT_STORE_PATH = 'portfolio_data.json';

const EnvSchema = z.object({
  HOLDINGS_STORE: z.string().trim().min(1).catch(DEFAULT_STORE_PATH),
  HOLDINGS_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .catch('info'),
  HOLDINGS_LOG_FORMAT: z.enum(['pretty', 'json']).catch('pretty'),
});

export interface Settings {
  storePath: string;
  logLevel: LogLevelName;
  logFormat: 'pretty' | 'json';
}

// Unset or unusable values fall back to their defaults
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.parse(env);
  return {
    storePath: parsed.HOLDINGS_STORE,
    logLevel: parsed.HOLDINGS_LOG_LEVEL,
    logFormat: parsed.HOLDINGS_LOG_FORMAT,
  };
}
