/**
 * Logger Module
 *
 * One winston root logger per process; components take a child logger
 * tagged with their name so every line carries `component`.
 */
import winston from 'winston';

export type Logger = winston.Logger;

const isProduction = process.env.NODE_ENV === 'production';

const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = component ? ` [${String(component)}]` : '';
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${scope}: ${String(message)}${extra}`;
  })
);

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : consoleFormat,
  defaultMeta: { service: 'title-sentiment-pipeline' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    // stdout is reserved for CLI output
    new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) })
  ]
});

/**
 * Create a logger scoped to a component
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

/**
 * Change the level of every logger at once
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

export default rootLogger;
