import pino from 'pino';

/**
 * Redact card secrets from logs
 * - CVV and verification codes are censored outright
 * - PANs are masked down to their last four digits
 */
const REDACTION_PATHS = [
  'cvv',
  '*.cvv',
  'verificationCode',
  '*.verificationCode',
  'secret',
  'apiKey',
];

const PAN_PATTERN = /\b\d{13,19}\b/g;

/**
 * Mask every PAN-like digit run in a string
 */
export function maskCardNumbers(value: string): string {
  return value.replace(PAN_PATTERN, (match) => `${'*'.repeat(match.length - 4)}${match.slice(-4)}`);
}

/**
 * Recursively prepare a log payload
 * bigint amounts become decimal strings, strings get PAN masking
 */
function sanitizeLogValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'string') {
    return maskCardNumbers(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeLogValue);
  }
  if (value instanceof Error) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = sanitizeLogValue(entry);
    }
    return result;
  }
  return value;
}

function sanitizeLogObject(object: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(object)) {
    result[key] = sanitizeLogValue(entry);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of card secrets (CVV, verification codes, PANs)
 * - bigint-safe payloads
 * - Structured JSON output
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const resolved: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: sanitizeLogObject,
    },
    ...options,
  };

  return destination ? pino(resolved, destination) : pino(resolved);
}

export type Logger = pino.Logger;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
