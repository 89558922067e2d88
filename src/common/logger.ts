/**
 * Logger Module
 *
 * Provides component-scoped winston loggers. Every component gets a child of
 * one root logger so that level and transports are configured in one place.
 */

import * as winston from 'winston';

export type Logger = winston.Logger;

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LEVEL_NAMES.includes(value);
}

function resolveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Console transport writing every level to stderr; stdout is left to
 * command output such as the CLI's JSON
 */
export function createConsoleTransport(): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] });
}

/**
 * Root logger shared by all components
 */
const rootLogger = winston.createLogger({
  level: resolveLevel(),
  silent: process.env.NODE_ENV === 'test' || process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
      const scope = component ? ` [${component}]` : '';
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} ${level.toUpperCase().padEnd(5)}${scope} ${message}${extra}`;
    })
  ),
  transports: [
    createConsoleTransport()
  ]
});

/**
 * Set the level of every logger
 * @param level Log level
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

/**
 * Create a logger for a component
 * @param component Component name
 * @param metadata Extra fields attached to every line
 */
export function createLogger(component: string, metadata: Record<string, unknown> = {}): Logger {
  return rootLogger.child({ component, ...metadata });
}

/**
 * Normalise an unknown thrown value for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default rootLogger;
