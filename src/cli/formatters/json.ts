/**
 * JSON output for machine consumption.
 */

/**
 * Serialize a value with two-space indentation.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
