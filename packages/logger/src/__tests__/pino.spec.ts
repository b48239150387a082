import { beforeEach, describe, expect, it, vi } from 'vitest';
import { pino } from 'pino';
import {
  DEFAULT_REDACT_PATHS,
  createLogger,
  REDACTION_CENSOR,
  resolveRedactConfig,
} from '../pino';
import { LogLevel } from '../types';

vi.mock('pino', () => ({
  pino: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  })),
}));

function lastCall(): unknown[] {
  const calls = vi.mocked(pino).mock.calls;
  return calls[calls.length - 1] ?? [];
}

function lastOptions(): unknown {
  return lastCall()[0];
}

describe('Pino Logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createLogger', () => {
    it('should log at info with credential redaction by default', () => {
      createLogger();

      expect(pino).toHaveBeenCalledTimes(1);
      expect(lastOptions()).toMatchObject({
        level: 'info',
        redact: { paths: DEFAULT_REDACT_PATHS, censor: '[Redacted]' },
      });
    });

    it('should use pino-pretty when pretty is requested outside production', () => {
      const originalEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'development';

      createLogger({ pretty: true });

      expect(lastOptions()).toMatchObject({
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' },
        },
      });

      process.env.NODE_ENV = originalEnv;
    });

    it('should not use pino-pretty in production', () => {
      const originalEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'production';

      createLogger({ pretty: true });

      expect(lastOptions()).not.toHaveProperty('transport');

      process.env.NODE_ENV = originalEnv;
    });

    it('should write to the given destination instead of a transport', () => {
      const destination = { write: vi.fn() };

      createLogger({ pretty: true, destination });

      expect(lastOptions()).not.toHaveProperty('transport');
      expect(lastCall()[1]).toBe(destination);
    });

    it('should pass the level through', () => {
      createLogger({ level: LogLevel.Debug });

      expect(lastOptions()).toMatchObject({ level: 'debug' });
    });

    it('should leave redaction out when disabled', () => {
      createLogger({ redact: false });

      expect(lastOptions()).toMatchObject({ redact: undefined });
    });

    it('should upper-case level labels', () => {
      createLogger();

      const options = lastOptions();
      expect(options).toMatchObject({
        formatters: { level: expect.any(Function) },
      });
    });
  });

  describe('resolveRedactConfig', () => {
    it('should redact credentials unless disabled', () => {
      expect(resolveRedactConfig()).toEqual({
        paths: DEFAULT_REDACT_PATHS,
        censor: REDACTION_CENSOR,
      });
      expect(resolveRedactConfig(true)).toEqual(resolveRedactConfig());
      expect(resolveRedactConfig(false)).toBeUndefined();
    });

    it('should add array paths to the defaults once', () => {
      expect(
        resolveRedactConfig(['contactPoints', 'password'])?.paths,
      ).toEqual([...DEFAULT_REDACT_PATHS, 'contactPoints']);
    });

    it('should merge object paths and keep the censor', () => {
      expect(
        resolveRedactConfig({ paths: ['user.name'], censor: '***' }),
      ).toEqual({
        paths: [...DEFAULT_REDACT_PATHS, 'user.name'],
        censor: '***',
      });
    });

    it('should use only the given paths when overriding', () => {
      expect(
        resolveRedactConfig({
          paths: ['only.this'],
          resolution: 'override',
          remove: true,
        }),
      ).toEqual({ paths: ['only.this'], censor: '[Redacted]', remove: true });
    });

    it('should cover cassandra credentials by default', () => {
      expect(DEFAULT_REDACT_PATHS).toContain('credentials.password');
      expect(DEFAULT_REDACT_PATHS).toContain('options.credentials');
      expect(DEFAULT_REDACT_PATHS).toContain('authProvider');
    });
  });
});
