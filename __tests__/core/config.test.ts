import { afterEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { cfg, numberEnv, required } from '../../src/core/config.js';
import { ConfigurationError } from '../../src/errors/index.js';

const seconds = z.number().finite().nonnegative();

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should apply defaults for unset numeric settings', () => {
    expect(cfg.dispatcher.defaultRetryAfterSeconds).toBe(1);
    expect(cfg.dispatcher.timeoutMs).toBe(10000);
  });

  describe('numberEnv', () => {
    it('should fall back when the variable is unset or blank', () => {
      expect(numberEnv('RETRY_AFTER_UNSET', seconds, 1)).toBe(1);
      vi.stubEnv('RETRY_AFTER_BLANK', '  ');
      expect(numberEnv('RETRY_AFTER_BLANK', seconds, 1)).toBe(1);
    });

    it('should parse a valid number', () => {
      vi.stubEnv('RETRY_AFTER_VALID', '2.5');
      expect(numberEnv('RETRY_AFTER_VALID', seconds, 1)).toBe(2.5);
    });

    it.each(['soon', 'Infinity', '-1'])('should reject %s', (value) => {
      vi.stubEnv('RETRY_AFTER_BAD', value);
      expect(() => numberEnv('RETRY_AFTER_BAD', seconds, 1)).toThrow(ConfigurationError);
    });

    it('should name the setting in the error', () => {
      vi.stubEnv('HTTP_TIMEOUT_BAD', '1.5');
      const err = (() => {
        try {
          return numberEnv('HTTP_TIMEOUT_BAD', z.number().int().positive(), 10000);
        } catch (e) {
          return e;
        }
      })();
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ setting: 'HTTP_TIMEOUT_BAD' });
    });
  });

  describe('required', () => {
    it('should return a set variable and reject a missing one', () => {
      vi.stubEnv('REQUIRED_PRESENT', 'value');
      expect(required('REQUIRED_PRESENT')).toBe('value');
      expect(() => required('REQUIRED_ABSENT')).toThrow(ConfigurationError);
    });
  });
});
