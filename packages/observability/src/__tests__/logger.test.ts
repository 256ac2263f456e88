/**
 * Tests for logger redaction functionality
 * Verifies that card secrets never reach the log stream in clear text
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, maskCardNumbers } from '../logger.js';

describe('Logger Redaction', () => {
  let logs: string[];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };

  beforeEach(() => {
    logs = [];
  });

  function lastEntry(): Record<string, unknown> {
    expect(logs[0]).toBeDefined();
    return JSON.parse(logs[logs.length - 1]!);
  }

  describe('Card Secret Redaction', () => {
    it('should censor CVV fields', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ cvv: '123' }, 'card issued');

      expect(lastEntry().cvv).toBe('[REDACTED]');
    });

    it('should censor nested verification codes', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ card: { verificationCode: '654321', network: 'visa' } });

      expect(lastEntry().card).toEqual({ verificationCode: '[REDACTED]', network: 'visa' });
    });

    it('should mask PANs down to the last four digits', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ pan: '4111111111111111' });

      expect(lastEntry().pan).toBe('************1111');
    });

    it('should mask PANs embedded in free-text fields', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ note: 'charged 5105105105105100 at merchant' });

      expect(lastEntry().note).toBe('charged ************5100 at merchant');
    });
  });

  describe('Amount Serialization', () => {
    it('should render bigint amounts as decimal strings without masking', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ amount: 10n ** 18n, index: 3 });

      const entry = lastEntry();
      expect(entry.amount).toBe('1000000000000000000');
      expect(entry.index).toBe(3);
    });
  });

  describe('Non-Sensitive Data', () => {
    it('should not redact non-sensitive fields', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ module: 'card-ledger', merchantTag: 'coffee-shop', asset: 'native' });

      const entry = lastEntry();
      expect(entry.module).toBe('card-ledger');
      expect(entry.merchantTag).toBe('coffee-shop');
      expect(entry.asset).toBe('native');
    });
  });

  describe('Timestamp Format', () => {
    it('should format timestamps as ISO 8601', () => {
      const logger = createLogger({ level: 'info' }, stream);

      logger.info('test');

      const entry = lastEntry();
      expect(typeof entry.time).toBe('string');
      expect(entry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });

  describe('Levels', () => {
    it('should drop entries below the configured level', () => {
      const logger = createLogger({ level: 'warn' }, stream);

      logger.info('hidden');
      logger.warn('shown');

      expect(logs).toHaveLength(1);
      expect(lastEntry().msg).toBe('shown');
    });
  });
});

describe('maskCardNumbers', () => {
  it('should leave short digit runs alone', () => {
    expect(maskCardNumbers('code 123456')).toBe('code 123456');
  });

  it('should mask a 19-digit run', () => {
    expect(maskCardNumbers('4000000000000000006')).toBe('***************0006');
  });
});
