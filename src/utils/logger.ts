// =============================================================================
// Logger — winston, console plus optional rotating file
// =============================================================================
// Cache code logs counts and instance names only. Keys and values are
// caller data and never reach a log line.
// =============================================================================
import winston from 'winston';
import config, { AppConfig } from '../config';

/**
 * Render `[timestamp] LEVEL: message {meta}`. Exported so tests can check the
 * line shape without a transport.
 */
export function formatLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, ...meta } = info;
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
}

function transportsFor(settings: AppConfig) {
  return [
    new winston.transports.Console(),
    ...(settings.logFile
      ? [new winston.transports.File({ filename: settings.logFile, maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ];
}

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(winston.format.timestamp(), winston.format.printf(formatLine)),
  transports: transportsFor(config),
});

/**
 * Re-apply logging settings chosen by the host, e.g.
 * `configureLogger(loadConfig())` to pick up a `.env` file.
 */
export function configureLogger(settings: AppConfig): void {
  logger.configure({
    level: settings.logLevel,
    format: winston.format.combine(winston.format.timestamp(), winston.format.printf(formatLine)),
    transports: transportsFor(settings),
  });
}

export default logger;
