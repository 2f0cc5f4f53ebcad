/**
 * Tests for Log Sanitization Utility
 */

import { describe, it, expect } from 'vitest';
import { sanitizeLogMessage, sanitizeObject, sanitizeRecord } from './logSanitizer.js';

/** Token-shaped placeholder: 24.6.30 characters */
const FAKE_BOT_TOKEN = `${'a'.repeat(24)}.${'b'.repeat(6)}.${'c'.repeat(30)}`;

describe('sanitizeLogMessage', () => {
  it('should redact bot tokens', () => {
    expect(sanitizeLogMessage(`login with ${FAKE_BOT_TOKEN} failed`)).toBe(
      'login with [REDACTED_TOKEN] failed'
    );
  });

  it('should redact bearer tokens but keep the scheme', () => {
    expect(sanitizeLogMessage('Authorization: Bearer test-secret')).toBe(
      'Authorization: Bearer [REDACTED]'
    );
  });

  it('should redact webhook tokens but keep the webhook id', () => {
    expect(sanitizeLogMessage('POST https://discord.com/api/webhooks/123/test-secret')).toBe(
      'POST https://discord.com/api/webhooks/123/[REDACTED]'
    );
  });

  it('should redact secret properties in serialized JSON', () => {
    expect(sanitizeLogMessage('{"token": "test-secret", "page": 2}')).toBe(
      '{"token": "[REDACTED]", "page": 2}'
    );
  });

  it('should leave ordinary messages alone', () => {
    expect(sanitizeLogMessage('[Pagination] Session started (3 pages)')).toBe(
      '[Pagination] Session started (3 pages)'
    );
  });

  it('should be repeatable (global regex state is reset)', () => {
    const message = `token ${FAKE_BOT_TOKEN}`;
    expect(sanitizeLogMessage(message)).toBe('token [REDACTED_TOKEN]');
    expect(sanitizeLogMessage(message)).toBe('token [REDACTED_TOKEN]');
  });
});

describe('sanitizeObject', () => {
  it('should redact values under sensitive keys', () => {
    expect(sanitizeObject({ discordToken: 'anything', userId: '42' })).toEqual({
      discordToken: '[REDACTED]',
      userId: '42',
    });
  });

  it('should sanitize nested strings and arrays', () => {
    expect(sanitizeObject({ headers: ['Bearer test-secret'], depth: { note: 'ok' } })).toEqual({
      headers: ['Bearer [REDACTED]'],
      depth: { note: 'ok' },
    });
  });

  it('should pass primitives and nullish values through', () => {
    expect(sanitizeObject(42)).toBe(42);
    expect(sanitizeObject(null)).toBeNull();
    expect(sanitizeObject(undefined)).toBeUndefined();
  });

  it('should stop at the maximum depth', () => {
    let nested: Record<string, unknown> = { leaf: 'end' };
    for (let i = 0; i < 12; i++) {
      nested = { child: nested };
    }

    const result = JSON.stringify(sanitizeObject(nested));

    expect(result).toContain('[MAX_DEPTH_EXCEEDED]');
  });
});

describe('sanitizeRecord', () => {
  it('should return a plain record with redactions applied', () => {
    expect(sanitizeRecord({ password: 'test-secret', messageId: '1' })).toEqual({
      password: '[REDACTED]',
      messageId: '1',
    });
  });

  it('should keep the fields pagination logs by', () => {
    expect(sanitizeRecord({ targetId: 'message-1', control: '▶' })).toEqual({
      targetId: 'message-1',
      control: '▶',
    });
    expect(sanitizeRecord({ token: '▶' })).toEqual({ token: '[REDACTED]' });
  });
});
