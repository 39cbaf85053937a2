import { normalizeDate } from '../../domain/services/DateNormalizer.js';
import type { LogLevel } from '../logging/Logger.js';

export interface DateRange {
  start: string;
  end: string;
}

export interface AppConfig {
  store: {
    path: string;
  };
  ingestion: {
    forceReimport: boolean;
    dateRange?: DateRange;
  };
  logging: {
    level: LogLevel;
  };
  server: {
    port: number;
  };
}

const logLevels: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const isLogLevel = (value: string): value is LogLevel => logLevels.some((level) => level === value);

const parseFlag = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());

/**
 * Parses `START:END` into an inclusive ISO date window. Either side may be left empty
 * for an open-ended range.
 */
export const parseDateRange = (value: string): DateRange => {
  const separator = value.indexOf(':');
  if (separator === -1) {
    throw new Error(`Invalid date range "${value}": expected START:END`);
  }

  const startText = value.slice(0, separator).trim();
  const endText = value.slice(separator + 1).trim();

  const start = startText ? normalizeDate(startText) : '0000-01-01';
  const end = endText ? normalizeDate(endText) : '9999-12-31';

  if (!start || !end) {
    throw new Error(`Invalid date range "${value}": dates must be recognizable, e.g. 2024-01-01:2024-12-31`);
  }

  if (start > end) {
    throw new Error(`Invalid date range "${value}": start is after end`);
  }

  return { start, end };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const level = env.LOG_LEVEL?.trim().toLowerCase() ?? 'info';
  const port = Number(env.PORT ?? 4000);

  return {
    store: {
      path: env.EXPORT_DB_PATH?.trim() || 'ledger.db',
    },
    ingestion: {
      forceReimport: parseFlag(env.FORCE_REIMPORT),
      dateRange: env.DATE_RANGE ? parseDateRange(env.DATE_RANGE) : undefined,
    },
    logging: {
      level: isLogLevel(level) ? level : 'info',
    },
    server: {
      port: Number.isInteger(port) && port > 0 ? port : 4000,
    },
  };
};
