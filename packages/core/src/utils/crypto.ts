/**
 * Identifier and comparison helpers.
 *
 * Uses node:crypto only; no custom primitives.
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';

/**
 * Constant-time comparison of two strings.
 * Length mismatch returns early, which leaks only the length.
 */
export function secureCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  if (bufA.length !== bufB.length) {
    return false;
  }
  return timingSafeEqual(bufA, bufB);
}

/**
 * Generate a UUID v7 (time-sortable), RFC 9562 layout.
 * Used for session and judge-run identifiers.
 */
export function uuidv7(now: number = Date.now()): string {
  const uuid = randomBytes(16);
  uuid.writeUIntBE(now, 0, 6);
  uuid.writeUInt8(0x70 | (uuid.readUInt8(6) & 0x0f), 6); // version 7
  uuid.writeUInt8(0x80 | (uuid.readUInt8(8) & 0x3f), 8); // variant 10

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const SECRET_PATTERNS: Array<{ regex: RegExp; replacement: string }> = [
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

/**
 * Redact secret-looking values before they are logged. Session output and
 * typed input pass through here, so anything the agent types at a password
 * prompt in a shell is covered by the key-based rule only when it is logged
 * under a sensitive key.
 */
export function sanitizeForLogging(input: Record<string, unknown>): Record<string, unknown>;
export function sanitizeForLogging(input: unknown): unknown;
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map((item) => sanitizeForLogging(item));
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      sanitized[key] = SENSITIVE_KEYS.some((s) => lowerKey.includes(s))
        ? '[REDACTED]'
        : sanitizeForLogging(value);
    }
    return sanitized;
  }

  return input;
}
