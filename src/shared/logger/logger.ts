/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) so the hub operator can filter one instance.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Classes receive a `Logger` through their constructor so tests can pass a spy.
 * - Do not log raw Error objects only—pass `{ err }` so stack/message is preserved.
 *
 * CONFIG:
 * - The instance exists at import time with env fallbacks; the composition root
 *   calls `configureLogger` with the validated config before anything is served.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'hub-singleuser';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

/**
 * The slice of winston the app depends on.
 * Narrow on purpose: anything with these four methods can stand in (tests use vi.fn()).
 */
export type Logger = Pick<winston.Logger, 'error' | 'warn' | 'info' | 'debug'>;

export type LoggerSettings = {
  logLevel: string;
  serviceName: string;
  nodeEnv: string;
};

export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.logLevel;
  logger.defaultMeta = {
    service: settings.serviceName,
    env: settings.nodeEnv,
  };
}
