// Keys under these fields are caller data and go out untouched
const OPAQUE_FIELDS = new Set(['metadata']);

export function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Converts a validated camelCase request into the snake_case body the API
 * takes, dropping undefined fields.
 */
export function toWirePayload(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => toWirePayload(item));
  }
  if (typeof value !== 'object' || value === null || value instanceof Date) {
    return value;
  }

  const payload: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined) {
      continue;
    }
    payload[snakeCase(key)] = OPAQUE_FIELDS.has(key) ? field : toWirePayload(field);
  }
  return payload;
}
