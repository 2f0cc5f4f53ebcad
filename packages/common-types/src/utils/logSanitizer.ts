/**
 * Log Sanitization Utility
 *
 * Redacts credentials (Discord bot tokens, bearer tokens, webhook URLs) from log
 * messages before they are written.
 *
 * Patterns covered:
 * - Discord bot tokens: three dot-separated base64url segments
 * - Discord webhook URLs: /api/webhooks/{id}/{token}
 * - Generic Bearer tokens
 * - Secret-looking JSON properties
 */

/**
 * Sensitive patterns to redact from logs.
 *
 * IMPORTANT: Order matters! Webhook URLs must be matched before the generic token
 * patterns so the path prefix is preserved.
 */
const SENSITIVE_PATTERNS: { pattern: RegExp; replacement: string }[] = [
  // Discord webhook URLs (keep the id, drop the token)
  {
    pattern: /(\/api\/webhooks\/\d+\/)[A-Za-z0-9_-]+/g,
    replacement: '$1[REDACTED]',
  },

  // Bearer tokens in headers (preserve "Bearer" prefix)
  { pattern: /(Bearer\s+)[A-Za-z0-9_.-]+/gi, replacement: '$1[REDACTED]' },

  // Discord bot tokens: {base64 user id}.{timestamp}.{hmac}
  {
    pattern: /[A-Za-z0-9_-]{23,28}\.[A-Za-z0-9_-]{6,7}\.[A-Za-z0-9_-]{27,40}/g,
    replacement: '[REDACTED_TOKEN]',
  },

  // Secret-looking properties in serialized JSON
  {
    pattern: /"(token|secret|password|authorization)":\s*"[^"]+"/gi,
    replacement: '"$1": "[REDACTED]"',
  },
];

/** Keys whose values are always redacted, whatever they contain */
const SENSITIVE_KEYS = ['token', 'secret', 'password', 'authorization'];

/**
 * Sanitizes a string by replacing sensitive patterns with redaction markers.
 */
export function sanitizeLogMessage(message: string): string {
  let sanitized = message;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    // Global patterns keep lastIndex between calls
    pattern.lastIndex = 0;
    sanitized = sanitized.replace(pattern, replacement);
  }
  return sanitized;
}

/**
 * Recursively sanitizes an object, redacting sensitive values in strings.
 *
 * @param obj - The value to sanitize
 * @param depth - Current recursion depth (stops runaway recursion on cyclic input)
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return sanitizeLogMessage(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    return sanitizeRecord(obj, depth);
  }

  return obj;
}

/**
 * Sanitizes the own enumerable properties of an object. Keys that look like
 * credentials are redacted outright; other values are sanitized recursively.
 */
export function sanitizeRecord(obj: object, depth = 0): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeObject(value, depth + 1);
    }
  }
  return sanitized;
}
