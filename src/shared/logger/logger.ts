/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Adds stable metadata (service, env) so every line can be filtered by origin.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs, or accept `Logger` as a dependency.
 * - Prefer `withRequestContext(req)` inside request handlers.
 * - Never log raw emails, passwords, reset codes or session ids.
 *   Use emailDomain() / emailKey instead (see modules/accounts/email.ts).
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'anki-study-auth';
const level = process.env.LOG_LEVEL ?? 'info';

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
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
