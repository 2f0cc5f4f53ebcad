/**
 * Startup Utilities Tests
 *
 * Tests for bot-client initialization and validation functions.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createTestConfig } from '@pagewise/common-types';

const mockError = vi.fn();

// Mock common-types before importing module
vi.mock('@pagewise/common-types', async importOriginal => {
  const actual = await importOriginal<typeof import('@pagewise/common-types')>();
  return {
    ...actual,
    createLogger: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: (...args: unknown[]) => mockError(...args),
      debug: vi.fn(),
    }),
  };
});

import { shouldAutoDeployCommands, validateDiscordToken } from './startup.js';

describe('Startup Utilities', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('validateDiscordToken', () => {
    it('should return the token when DISCORD_TOKEN is set', () => {
      const config = createTestConfig({ DISCORD_TOKEN: 'test-token' });

      expect(validateDiscordToken(config)).toBe('test-token');
      expect(mockError).not.toHaveBeenCalled();
    });

    it('should throw when DISCORD_TOKEN is undefined', () => {
      const config = createTestConfig({ DISCORD_TOKEN: undefined });

      expect(() => validateDiscordToken(config)).toThrow(
        'DISCORD_TOKEN environment variable is required'
      );
      expect(mockError).toHaveBeenCalledWith({}, 'DISCORD_TOKEN is required for bot-client');
    });

    it('should throw when DISCORD_TOKEN is empty', () => {
      const config = createTestConfig({ DISCORD_TOKEN: '' });

      expect(() => validateDiscordToken(config)).toThrow(
        'DISCORD_TOKEN environment variable is required'
      );
    });
  });

  describe('shouldAutoDeployCommands', () => {
    it('should be true only for the string "true"', () => {
      expect(shouldAutoDeployCommands(createTestConfig({ AUTO_DEPLOY_COMMANDS: 'true' }))).toBe(
        true
      );
      expect(shouldAutoDeployCommands(createTestConfig({ AUTO_DEPLOY_COMMANDS: 'false' }))).toBe(
        false
      );
      expect(shouldAutoDeployCommands(createTestConfig())).toBe(false);
    });
  });
});
