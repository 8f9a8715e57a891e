import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type Logger = winston.Logger;

export function createLogger(options: { level?: LogLevel; service?: string; silent?: boolean } = {}): Logger {
  const { level = 'info', service = 'hotlink-guard', silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    defaultMeta: { service },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level: lvl, message, service: svc, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `[${String(timestamp)}] ${lvl.toUpperCase()} [${String(svc)}]: ${String(message)}${metaStr}`;
      }),
    ),
    transports: [new winston.transports.Console()],
  });
}
