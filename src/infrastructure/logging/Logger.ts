import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// Error properties are not enumerable, so an error in metadata would print as `{}`.
export const serializeErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message };
    }
  }
  return info;
});

export const createLogger = (level: LogLevel = 'info', service = 'ledger-ingest'): winston.Logger =>
  winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      serializeErrors(),
      winston.format.json(),
    ),
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: winston.format.simple(),
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });

/** A logger that drops everything; used by tests and by callers that do not care. */
export const createSilentLogger = (): winston.Logger =>
  winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
