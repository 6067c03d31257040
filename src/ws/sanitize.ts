const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Deep-copy parsed JSON, dropping keys that could pollute prototypes.
 * `JSON.parse` creates `__proto__` as an own property, so it must be removed
 * before the value is spread or merged anywhere.
 */
export function sanitizeJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitizeJson);
  }
  if (value !== null && typeof value === 'object') {
    const clean: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      if (UNSAFE_KEYS.has(key)) continue;
      clean[key] = sanitizeJson(inner);
    }
    return clean;
  }
  return value;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
