/**
 * JSON Validation Utilities
 *
 * Type guards for values parsed from JSON or YAML files written outside
 * this process (state files, config files).
 *
 * @module utils/json-validation
 */

/**
 * Check if a value is a plain object (not null, array, or other types)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Check if a value is a number (including finite check)
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

/**
 * Check if a value is a boolean
 */
export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}
