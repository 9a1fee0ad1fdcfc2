import pino from 'pino';
import type { Logger } from 'pino';

const REDACT_PATHS = [
  'headers.authorization',
  'headers.signature',
  'headers["signature-input"]',
  'authorization',
  '*.privateKey',
  '*.accessToken',
  '*.access_token',
  '*.continuationToken',
];

let rootLogger: Logger | undefined;

/** Process-wide logger, created on first use so LOG_LEVEL is read late. */
export function getRootLogger(): Logger {
  rootLogger ??= pino({
    name: 'open-payments',
    level: process.env['LOG_LEVEL'] ?? 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  });
  return rootLogger;
}

export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ component });
}

/** Token values are bearer secrets; only a short prefix ever reaches a log line. */
export function maskToken(value: string): string {
  if (value.length <= 8) return '***';
  return `${value.slice(0, 6)}…`;
}
