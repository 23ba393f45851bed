import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export enum LogCategory {
  PIPELINE = 'pipeline',
  TRANSLATION = 'translation',
  GROQ = 'groq',
  CLI = 'cli',
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, category, reviewId }) => {
    let line = `${timestamp} [${level}]`;
    if (category) line += ` [${category}]`;
    if (reviewId) line += ` [review:${reviewId}]`;
    return `${line}: ${message}`;
  }),
);

// Logs go to stderr so the CLI can keep stdout for JSON output.
export const logger = winston.createLogger({
  level: 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

export function categoryLogger(category: LogCategory): winston.Logger {
  return logger.child({ category });
}
