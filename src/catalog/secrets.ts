const MASK = "***";

/** Key fragments whose values never reach logs. */
const SECRET_KEY_FRAGMENTS = ["key", "token", "secret", "password"];

function isSecretKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SECRET_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment));
}

/**
 * Returns a copy of `value` where every property whose key looks like a
 * credential is replaced by a mask. Nested objects and arrays are walked.
 */
export function maskSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskSecrets(item));
  }
  if (value && typeof value === "object") {
    const masked: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      masked[key] = isSecretKey(key) ? MASK : maskSecrets(entry);
    }
    return masked;
  }
  return value;
}
