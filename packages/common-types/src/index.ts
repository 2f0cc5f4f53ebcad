// Runtime configuration (environment variables)
export {
  envSchema,
  validateEnv,
  getConfig,
  resetConfig,
  createTestConfig,
  type EnvConfig,
} from './config/config.js';

// Export constants (compile-time constants)
export * from './constants/index.js';

// Export utilities
export { createLogger, type Logger } from './utils/logger.js';
export { sanitizeLogMessage, sanitizeObject, sanitizeRecord } from './utils/logSanitizer.js';
