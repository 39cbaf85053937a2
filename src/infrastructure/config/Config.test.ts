import { describe, expect, it } from 'vitest';
import { loadConfig, parseDateRange } from './Config.js';

describe('parseDateRange', () => {
  it('normalizes both ends of the window', () => {
    expect(parseDateRange('01/01/2024:2024-03-31')).toEqual({ start: '2024-01-01', end: '2024-03-31' });
  });

  it('treats an empty side as open-ended', () => {
    expect(parseDateRange(':2024-06-30')).toEqual({ start: '0000-01-01', end: '2024-06-30' });
    expect(parseDateRange('2024-06-01:')).toEqual({ start: '2024-06-01', end: '9999-12-31' });
  });

  it('rejects a missing separator, unknown dates and reversed windows', () => {
    expect(() => parseDateRange('2024-01-01')).toThrow('expected START:END');
    expect(() => parseDateRange('soon:later')).toThrow('dates must be recognizable');
    expect(() => parseDateRange('2024-05-01:2024-01-01')).toThrow('start is after end');
  });
});

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      store: { path: 'ledger.db' },
      ingestion: { forceReimport: false, dateRange: undefined },
      logging: { level: 'info' },
      server: { port: 4000 },
    });
  });

  it('reads the store path, flags and window from the environment', () => {
    const config = loadConfig({
      EXPORT_DB_PATH: '/tmp/finance.db',
      FORCE_REIMPORT: 'true',
      DATE_RANGE: '2024-01-01:2024-12-31',
      LOG_LEVEL: 'DEBUG',
      PORT: '8080',
    });

    expect(config.store.path).toBe('/tmp/finance.db');
    expect(config.ingestion).toEqual({
      forceReimport: true,
      dateRange: { start: '2024-01-01', end: '2024-12-31' },
    });
    expect(config.logging.level).toBe('debug');
    expect(config.server.port).toBe(8080);
  });

  it('ignores an unknown log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'verbose' }).logging.level).toBe('info');
  });
});
