import winston, { Logform } from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogLevel = keyof typeof levels;

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const HIDDEN_KEYS = new Set(['level', 'message', 'timestamp', 'service']);

export const formatLine = (info: Logform.TransformableInfo): string => {
  const meta = Object.fromEntries(
    Object.entries(info).filter(([key]) => !HIDDEN_KEYS.has(key))
  );
  const metaString = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
  const service = info.service ? ` [${String(info.service)}]` : '';
  return `${String(info.timestamp)} [${info.level}]${service}: ${String(info.message)}${metaString}`;
};

const logFormat = printf(formatLine);

export const isLogLevel = (value: string): value is LogLevel =>
  Object.keys(levels).includes(value);

/**
 * Level to start with before configuration is loaded. Unknown names fall back to
 * `info`; winston would otherwise drop every line.
 */
export const resolveLogLevel = (value: string | undefined): LogLevel =>
  value && isLogLevel(value) ? value : 'info';

export const logger = winston.createLogger({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  levels,
  silent: process.env.NODE_ENV === 'test',
  format: timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  transports: [
    // All levels go to stderr; stdout carries script output
    new winston.transports.Console({
      stderrLevels: Object.keys(levels),
      format: combine(colorize({ all: true }), logFormat),
    }),
  ],
  exitOnError: false,
});

let fileTransport: winston.transport | undefined;

/**
 * Applies the validated level and, when a file is given, mirrors every line to it.
 * Calling it again replaces the previous file transport.
 */
export const configureLogger = (options: { level: LogLevel; file?: string }): void => {
  logger.level = options.level;

  if (fileTransport) {
    logger.remove(fileTransport);
    fileTransport.close?.();
    fileTransport = undefined;
  }

  if (options.file) {
    fileTransport = new winston.transports.File({
      filename: options.file,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      format: logFormat,
    });
    logger.add(fileTransport);
  }
};

/**
 * Child logger whose lines are tagged with the given service name.
 */
export const getLogger = (service: string): winston.Logger => logger.child({ service });

export type { Logger } from 'winston';

export default logger;
