/**
 * Tests for logger card number masking and redaction
 */

import { describe, it, expect } from 'vitest';
import { createLogger, maskCardNumbers } from '../logger.js';

function captureLogger() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  const logger = createLogger({ level: 'debug' }, stream);
  return { logger, logs };
}

describe('maskCardNumbers', () => {
  it('should keep only the last four digits of a card number', () => {
    expect(maskCardNumbers('card 4111111111111111 charged')).toBe('card ************1111 charged');
  });

  it('should leave short digit runs alone', () => {
    expect(maskCardNumbers('paid $15.00 in 2 parts, ref 12345')).toBe(
      'paid $15.00 in 2 parts, ref 12345'
    );
  });
});

describe('Logger Redaction', () => {
  it('should censor creditCardNumber fields', () => {
    const { logger, logs } = captureLogger();

    logger.info({ username: 'Bobby', creditCardNumber: '4111111111111111' }, 'card added');

    expect(logs[0]).toBeDefined();
    const logEntry = JSON.parse(logs[0] ?? '{}');
    expect(logEntry.creditCardNumber).toBe('[REDACTED]');
    expect(logEntry.username).toBe('Bobby');
    expect(logEntry.msg).toBe('card added');
  });

  it('should censor nested cardNumber fields', () => {
    const { logger, logs } = captureLogger();

    logger.info({ charge: { cardNumber: '4242424242424242', amount: 15 } }, 'charging card');

    const logEntry = JSON.parse(logs[0] ?? '{}');
    expect(logEntry.charge.cardNumber).toBe('[REDACTED]');
    expect(logEntry.charge.amount).toBe(15);
  });

  it('should mask card numbers inside other string fields and messages', () => {
    const { logger, logs } = captureLogger();

    logger.warn({ reason: 'declined 4242424242424242' }, 'charge to 4111111111111111 failed');

    const logEntry = JSON.parse(logs[0] ?? '{}');
    expect(logEntry.reason).toBe('declined ************4242');
    expect(logEntry.msg).toBe('charge to ************1111 failed');
  });

  it('should not alter non-sensitive fields', () => {
    const { logger, logs } = captureLogger();

    logger.info({ actor: 'Bobby', target: 'Carol', amount: 5, path: 'balance' }, 'payment completed');

    const logEntry = JSON.parse(logs[0] ?? '{}');
    expect(logEntry.actor).toBe('Bobby');
    expect(logEntry.target).toBe('Carol');
    expect(logEntry.amount).toBe(5);
    expect(logEntry.path).toBe('balance');
  });

  it('should format timestamps as ISO 8601', () => {
    const { logger, logs } = captureLogger();

    logger.info('test');

    const logEntry = JSON.parse(logs[0] ?? '{}');
    expect(typeof logEntry.time).toBe('string');
    expect(logEntry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should respect the configured level', () => {
    const logs: string[] = [];
    const logger = createLogger({ level: 'warn' }, { write: (log: string) => logs.push(log) });

    logger.info('hidden');
    logger.warn('shown');

    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0] ?? '{}').msg).toBe('shown');
  });
});
