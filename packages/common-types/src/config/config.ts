import { z } from 'zod';
import { PAGINATION_DEFAULTS, PaginationBehavior, PaginationDeletion } from '../constants/index.js';

/** Type for optional string schema that accepts undefined or transforms empty string to undefined */
type OptionalStringSchema = z.ZodType<string | undefined>;

/**
 * Helper for optional string fields that must be non-empty if provided
 * @returns Zod schema for optional non-empty string
 */
const optionalNonEmptyString = (): OptionalStringSchema =>
  z
    .string()
    .min(1)
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Helper for optional Discord IDs (must be all digits if provided)
 * @returns Zod schema for optional Discord ID
 */
const optionalDiscordId = (): OptionalStringSchema =>
  z
    .string()
    .regex(/^\d+$/, 'Must be a valid Discord ID (all digits)')
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Environment variable validation schema
 * Validates all required configuration at startup
 */
export const envSchema = z.object({
  // Discord Configuration
  DISCORD_TOKEN: optionalNonEmptyString(), // Required at bot startup, see validateDiscordToken()
  DISCORD_CLIENT_ID: optionalDiscordId(),
  GUILD_ID: optionalDiscordId(), // Optional - for dev/testing command deployment
  AUTO_DEPLOY_COMMANDS: z
    .enum(['true', 'false'])
    .optional()
    .or(z.literal('').transform(() => undefined)), // 'true' to deploy slash commands on startup

  // Pagination
  PAGINATION_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'Must be a whole number of milliseconds')
    .transform(Number)
    .refine(value => value > 0, 'Must be greater than zero')
    .default(String(PAGINATION_DEFAULTS.TIMEOUT_MS)),
  PAGINATION_BEHAVIOR: z.nativeEnum(PaginationBehavior).default(PAGINATION_DEFAULTS.BEHAVIOR),
  PAGINATION_DELETION: z.nativeEnum(PaginationDeletion).default(PAGINATION_DEFAULTS.DELETION),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates and returns environment configuration
 * Throws detailed error if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');

      throw new Error(
        `Environment validation failed:\n${issues}\n\n` +
          'Please check your .env file and ensure all required variables are set.'
      );
    }
    throw error;
  }
}

/**
 * Cached config instance
 * Can be reset for testing via resetConfig()
 */
let _config: EnvConfig | undefined;

/**
 * Get validated environment configuration
 * Caches the result, but can be reset via resetConfig()
 */
export function getConfig(): EnvConfig {
  _config ??= validateEnv();
  return _config;
}

/**
 * Reset the cached config (primarily for testing)
 *
 * IMPORTANT: Call this in afterEach() to prevent test pollution
 */
export function resetConfig(): void {
  _config = undefined;
}

/**
 * Create config with custom values (for testing)
 * Uses safe test defaults instead of reading from process.env
 */
export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  const testDefaults: EnvConfig = {
    // Discord
    DISCORD_TOKEN: undefined,
    DISCORD_CLIENT_ID: undefined,
    GUILD_ID: undefined,
    AUTO_DEPLOY_COMMANDS: undefined,

    // Pagination
    PAGINATION_TIMEOUT_MS: PAGINATION_DEFAULTS.TIMEOUT_MS,
    PAGINATION_BEHAVIOR: PAGINATION_DEFAULTS.BEHAVIOR,
    PAGINATION_DELETION: PAGINATION_DEFAULTS.DELETION,

    // Environment
    NODE_ENV: 'test',

    // Logging
    LOG_LEVEL: 'error', // Quiet logs in tests
  };

  return { ...testDefaults, ...overrides };
}
