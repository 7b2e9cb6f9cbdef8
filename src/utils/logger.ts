import winston from 'winston';
import { config } from './config';

const CONSOLE_META_LIMIT = 200;

/**
 * One console line per entry: `time [level]: message (component) {meta}`.
 * Metadata is dropped from the console when it would not fit on a line.
 */
export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, component, ...rest } = info;
  const meta = Object.fromEntries(Object.entries(rest).filter(([key]) => key !== 'service'));

  let line = `${String(timestamp)} [${level}]: ${String(message)}`;
  if (typeof component === 'string') {
    line += ` (${component})`;
  }

  if (Object.keys(meta).length > 0) {
    const serialized = JSON.stringify(meta);
    if (serialized.length < CONSOLE_META_LIMIT) {
      line += ` ${serialized}`;
    }
  }
  return line;
}

const isTest = config.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'nifwright' },
  silent: isTest,
  transports: isTest
    ? [new winston.transports.Console()]
    : [new winston.transports.File({ filename: config.logging.file, maxsize: 5 * 1024 * 1024, maxFiles: 3 })],
});

// Console shows warnings only, unless LOG_LEVEL=debug
if (config.nodeEnv !== 'production' && !isTest) {
  logger.add(
    new winston.transports.Console({
      level: config.logging.level === 'debug' ? 'debug' : 'warn',
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.printf(formatConsoleLine)
      ),
    })
  );
}

export const createComponentLogger = (component: string): winston.Logger => logger.child({ component });

/** Gives file transports a moment to drain before the CLI exits. */
export const flushLogs = async (): Promise<void> =>
  new Promise(resolve => {
    setImmediate(() => setTimeout(resolve, 200));
  });
