import { singleton } from 'tsyringe';
import { SENSITIVE_FIELD_WORDS } from '@ventanilla/shared';

const DANGEROUS_PATTERNS: readonly RegExp[] = [
  /<script.*?>/i,
  /javascript:/i,
  /union.*select/i,
  /drop\s+table/i,
  /exec\s*\(/i,
  /eval\s*\(/i,
];

const SENSITIVE_WORDS: ReadonlySet<string> = new Set(SENSITIVE_FIELD_WORDS);

/**
 * Splits a field name into lower-case words: `api_key`, `api-key` and
 * `apiKey` all yield `['api', 'key']`.
 */
export function keyWords(key: string): string[] {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[\s_\-.]+/)
    .map((word) => word.toLowerCase())
    .filter(Boolean);
}

export function isSensitiveKey(key: string): boolean {
  return keyWords(key).some((word) => SENSITIVE_WORDS.has(word));
}

/**
 * Input denylist and response redaction applied at the service boundary.
 */
@singleton()
export class SecurityValidator {
  /**
   * False when the text matches any injection pattern.
   */
  isSafe(text: string): boolean {
    return !DANGEROUS_PATTERNS.some((pattern) => pattern.test(text));
  }

  /**
   * Returns a copy of `value` without object fields whose name contains a
   * sensitive word, at any depth.
   */
  sanitizeResponse<T>(value: T): T;
  sanitizeResponse(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.sanitizeResponse(item));
    }
    if (isPlainObject(value)) {
      const out: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        if (isSensitiveKey(key)) continue;
        out[key] = this.sanitizeResponse(nested);
      }
      return out;
    }
    return value;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
