/**
 * Set an optional property only when a value is present.
 *
 * Under `exactOptionalPropertyTypes` an optional property must be left out
 * rather than set to `undefined`; this keeps builders free of repeated
 * `if (x !== undefined) target.x = x` lines.
 */
export function assignDefined<T extends object, K extends keyof T>(
  target: T,
  key: K,
  value: T[K] | undefined,
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * True for strings with at least one non-whitespace character
 */
export function hasText(value: string | undefined | null): value is string {
  return value !== undefined && value !== null && value.trim().length > 0;
}
