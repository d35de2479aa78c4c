import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_LOGGER_CONFIG,
  mergeConfig,
  systemClock
} from '../../src/logger/logger-config.js';
import { newYear } from '../test-constants.js';

describe('Logger Configuration', () => {
  describe('Constants', () => {
    it('has correct default log level', () => {
      expect(DEFAULT_LOG_LEVEL).toBe('info');
    });

    it('freezes the facade defaults', () => {
      expect(DEFAULT_LOGGER_CONFIG.name).toBe('default');
      expect(DEFAULT_LOGGER_CONFIG.clock).toBe(systemClock);
      expect(Object.isFrozen(DEFAULT_LOGGER_CONFIG)).toBe(true);
    });
  });

  describe('systemClock', () => {
    it('returns the current wall-clock time', () => {
      const before = Date.now();
      const now = systemClock();
      const after = Date.now();

      expect(now).toBeInstanceOf(Date);
      expect(now instanceof Date ? now.getTime() : -1).toBeGreaterThanOrEqual(before);
      expect(now instanceof Date ? now.getTime() : Infinity).toBeLessThanOrEqual(after);
    });
  });

  describe('mergeConfig', () => {
    it('returns default config when no user config provided', () => {
      const config = mergeConfig();

      expect(config).toEqual({ name: 'default', clock: systemClock });
    });

    it('keeps engine options and overrides facade defaults', () => {
      const config = mergeConfig({ name: 'worker', clock: newYear, format: 'json', minLevel: 'debug' });

      expect(config).toEqual({ name: 'worker', clock: newYear, format: 'json', minLevel: 'debug' });
    });

    it('does not modify the user config', () => {
      const userConfig = { format: 'json' as const };

      mergeConfig(userConfig);

      expect(userConfig).toEqual({ format: 'json' });
    });

    it('rejects an empty name', () => {
      expect(() => mergeConfig({ name: '' })).toThrow(TypeError);
    });
  });
});
