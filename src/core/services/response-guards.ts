export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** True when `value` is absent or an array. */
export function isOptionalArray(value: unknown): boolean {
  return value === undefined || value === null || Array.isArray(value);
}
