/**
 * Tests for Logger Utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.ENABLE_PRETTY_LOGS;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should create a logger with default level info', async () => {
    delete process.env.LOG_LEVEL;

    const { createLogger } = await import('./logger.js');
    const logger = createLogger('test-logger');

    expect(logger.level).toBe('info');
  });

  it('should use LOG_LEVEL env var', async () => {
    process.env.LOG_LEVEL = 'debug';

    const { createLogger } = await import('./logger.js');

    expect(createLogger('test-logger').level).toBe('debug');
  });

  it('should include name in logger', async () => {
    const { createLogger } = await import('./logger.js');
    const logger = createLogger('pagination-session');

    expect(logger.bindings().name).toBe('pagination-session');
  });
});

describe('customErrorSerializer', () => {
  it('should serialize Error instances with type, message and stack', async () => {
    const { customErrorSerializer } = await import('./logger.js');
    const error = new Error('Missing Permissions');

    const serialized = customErrorSerializer(error) as Record<string, unknown>;

    expect(serialized.type).toBe('Error');
    expect(serialized.message).toBe('Missing Permissions');
    expect(typeof serialized.stack).toBe('string');
  });

  it('should keep the name of Error subclasses', async () => {
    const { customErrorSerializer } = await import('./logger.js');

    class SessionInactiveError extends Error {
      constructor() {
        super('Session is no longer active');
        this.name = 'SessionInactiveError';
      }
    }

    const serialized = customErrorSerializer(new SessionInactiveError()) as Record<
      string,
      unknown
    >;

    expect(serialized.type).toBe('SessionInactiveError');
    expect(serialized.name).toBeUndefined();
  });

  it('should include transport properties such as code and status', async () => {
    const { customErrorSerializer } = await import('./logger.js');
    const error = Object.assign(new Error('Unknown Message'), { code: 10008, status: 404 });

    const serialized = customErrorSerializer(error) as Record<string, unknown>;

    expect(serialized.code).toBe(10008);
    expect(serialized.status).toBe(404);
  });

  it('should serialize cause chains and mark circular causes', async () => {
    const { customErrorSerializer } = await import('./logger.js');
    const inner = new Error('socket hang up');
    const outer = new Error('cleanup failed', { cause: inner });
    const circular = new Error('loop');
    Object.defineProperty(circular, 'cause', { value: circular, enumerable: false });

    const serialized = customErrorSerializer(outer) as Record<string, unknown>;
    const circularSerialized = customErrorSerializer(circular) as Record<string, unknown>;

    expect(serialized.cause).toMatchObject({ type: 'Error', message: 'socket hang up' });
    expect(circularSerialized.cause).toBe('[Circular]');
  });

  it('should handle non-object throwables', async () => {
    const { customErrorSerializer } = await import('./logger.js');

    expect(customErrorSerializer('Bearer test-secret')).toEqual({
      type: 'string',
      value: 'Bearer [REDACTED]',
    });
    expect(customErrorSerializer(null)).toEqual({ type: 'null', value: null });
  });
});
