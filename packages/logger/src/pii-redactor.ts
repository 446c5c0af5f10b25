/**
 * Redaction of secrets and e-mail addresses in log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Field names whose values never reach the log, in the casing used by config
 * objects and HTTP headers.
 */
const SENSITIVE_FIELDS = [
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "password",
  "secret",
  "token",
] as const;

const SENSITIVE_KEYS: ReadonlySet<string> = new Set(
  SENSITIVE_FIELDS.map((field) => field.toLowerCase()),
);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Redact a single key/value pair: sensitive keys lose their whole value,
 * e-mail addresses inside string values are masked.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_KEYS.has(key.toLowerCase())) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log record.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

/**
 * Paths for pino's `redact` option: each sensitive field at the top level
 * and one level down (e.g. `headers.authorization`).
 */
export const REDACT_PATHS: string[] = SENSITIVE_FIELDS.flatMap((field) => [field, `*.${field}`]);
