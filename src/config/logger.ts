import winston from 'winston';
import { env } from './environment';

const LOG_FILE_MAX_BYTES = 5 * 1024 * 1024;

const toPlain = (value: unknown): unknown => (typeof value === 'bigint' ? value.toString() : value);

// Amounts and booking ids are bigints; every transport gets decimal strings
const bigintAsString = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = toPlain(info[key]);
  }
  return info;
});

const stringifyMeta = (meta: Record<string, unknown>): string =>
  JSON.stringify(meta, (_key, value: unknown) => toPlain(value), 2);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    bigintAsString(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json({ replacer: (_key, value: unknown) => toPlain(value) })
  ),
  defaultMeta: { service: 'slot-booking-api' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? `\n${stringifyMeta(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', maxsize: LOG_FILE_MAX_BYTES, maxFiles: 5 })
  );
  // Event lines land here too, one JSON object per line
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', maxsize: LOG_FILE_MAX_BYTES, maxFiles: 5 }));
}

if (env.NODE_ENV === 'test') {
  logger.transports.forEach((t) => (t.silent = true));
}

export default logger;
