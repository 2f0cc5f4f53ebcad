import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { sanitizeLogMessage, sanitizeObject, sanitizeRecord } from './logSanitizer.js';

/** Properties already handled by standard extraction */
const HANDLED_PROPS = new Set(['message', 'stack', 'cause', 'name']);

/** Non-enumerable properties found on discord.js and Node.js errors */
const TRANSPORT_ERROR_PROPS = ['code', 'status', 'method', 'url'];

/**
 * Serialize an error-like value for pino.
 *
 * Handles Error subclasses (including DiscordAPIError, whose `code`/`status` matter
 * when a cleanup call is rejected), `cause` chains and non-Error throwables. All
 * string values go through sanitizeLogMessage().
 */
function customErrorSerializer(err: unknown): object {
  if (err === null || err === undefined) {
    return { type: 'null', value: err };
  }
  if (typeof err !== 'object') {
    return {
      type: typeof err,
      value: typeof err === 'string' ? sanitizeLogMessage(err) : err,
    };
  }

  const errObj = err as Record<string, unknown>;
  const constructorName = errObj.constructor?.name;
  const type =
    constructorName !== undefined && constructorName !== 'Object'
      ? constructorName
      : typeof errObj.name === 'string' && errObj.name !== ''
        ? errObj.name
        : 'Object';
  const serialized: Record<string, unknown> = { type };

  if (typeof errObj.name === 'string' && errObj.name !== type) {
    serialized.name = errObj.name;
  }
  if (typeof errObj.message === 'string') {
    serialized.message = sanitizeLogMessage(errObj.message);
  }
  if (typeof errObj.stack === 'string') {
    serialized.stack = sanitizeLogMessage(errObj.stack);
  }
  if ('cause' in errObj && errObj.cause !== undefined) {
    serialized.cause = errObj.cause === err ? '[Circular]' : customErrorSerializer(errObj.cause);
  }

  for (const key of Object.keys(errObj)) {
    const value = errObj[key];
    if (HANDLED_PROPS.has(key) || typeof value === 'function') {
      continue;
    }
    serialized[key] = sanitizeObject(value);
  }

  if (err instanceof Error) {
    for (const key of TRANSPORT_ERROR_PROPS) {
      if (!(key in serialized) && key in errObj && errObj[key] !== undefined) {
        serialized[key] = errObj[key];
      }
    }
  }

  return serialized;
}

/**
 * Creates a logger instance with environment-aware configuration.
 * Uses pino-pretty transport ONLY when explicitly enabled via ENABLE_PRETTY_LOGS=true.
 *
 * ⚠️ Log errors as `logger.error({ err: error }, 'What failed')` so the error
 * serializer runs. `logger.error('What failed', error)` drops the stack.
 */
export function createLogger(name?: string): Logger {
  const usePrettyLogs = process.env.ENABLE_PRETTY_LOGS === 'true';

  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    name,
    serializers: {
      err: customErrorSerializer,
    },
    formatters: {
      // Runs before serializers, so `err` is left for customErrorSerializer
      log: (object: Record<string, unknown>) => {
        const { err, ...rest } = object;
        const sanitized = sanitizeRecord(rest);
        return err === undefined ? sanitized : { ...sanitized, err };
      },
    },
  };

  if (usePrettyLogs) {
    config.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(config);
}

export { customErrorSerializer };
export type { Logger };
