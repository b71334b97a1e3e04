import pino from 'pino';

/**
 * Redact card numbers wherever they appear as named fields
 */
const REDACTION_PATHS = [
  'creditCardNumber',
  'cardNumber',
  '*.creditCardNumber',
  '*.cardNumber',
];

const CARD_NUMBER_PATTERN = /\b\d{9,15}(\d{4})\b/g;

/**
 * Mask a 13-19 digit run down to its last four digits
 */
export function maskCardNumbers(value: string): string {
  return value.replace(CARD_NUMBER_PATTERN, (match: string, last4: string) =>
    '*'.repeat(match.length - 4) + last4
  );
}

/**
 * Recursively mask card numbers in a log argument
 */
function maskObjectCardNumbers(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return maskCardNumbers(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(maskObjectCardNumbers);
  }
  if (obj instanceof Error) {
    return obj;
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = maskObjectCardNumbers(value);
    }
    return result;
  }
  return obj;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Log level from LOG_LEVEL (default info)
 * - Card number fields censored, card-like digit runs in other fields masked
 * - ISO 8601 timestamps
 */
export function createLogger(options?: pino.LoggerOptions, stream?: pino.DestinationStream) {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        for (let i = 0; i < args.length; i += 1) {
          args[i] = maskObjectCardNumbers(args[i]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return stream ? pino(loggerOptions, stream) : pino(loggerOptions);
}

export type Logger = pino.Logger;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
