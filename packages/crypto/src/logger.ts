/**
 * Centralized logger
 *
 * Controlled by environment variables:
 * - LOG_LEVEL: pino level (default "info", "silent" disables output)
 *
 * SECURITY:
 * - Never logs master secrets or derived keys
 * - Never logs cookie envelopes or decrypted payloads (only lengths)
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export type SecurityEvent =
  | 'PARSE_FAILED'
  | 'INTEGRITY_FAILED'
  | 'DECODE_FAILED'
  | 'SESSION_REJECTED';

export const rootLogger: Logger = pino({
  name: 'cookie-vault',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Child logger tagged with a component scope, e.g. createLogger('kdf')
 */
export function createLogger(scope: string): Logger {
  return rootLogger.child({ scope });
}

/**
 * Redact an envelope or cookie value - length only
 */
export function redactEnvelope(value: string | Uint8Array): string {
  return `(len=${value.length})`;
}

/**
 * Redact a secret - presence and length only
 */
export function redactSecret(secret: string | Uint8Array | undefined): string {
  if (!secret || secret.length === 0) return '(empty)';
  return `(redacted, len=${secret.length})`;
}

export function logSecurityEvent(
  logger: Logger,
  event: SecurityEvent,
  details: Record<string, string | number | boolean | undefined>,
): void {
  logger.warn({ event, ...details }, `[SECURITY] ${event}`);
}
