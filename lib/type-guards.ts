/**
 * Type Guards - runtime narrowing for values coming out of raw documents
 *
 * Graph documents arrive as `unknown` from the JSON layer. These guards let
 * the container classify stored values without `as` assertions.
 *
 * @example
 * ```typescript
 * if (isPlainRecord(value)) {
 *   // value is Record<string, unknown> with Object.prototype (or null) as prototype
 * }
 * ```
 */

import type { GraphPrimitive } from '../types/graph.js'

// ============================================================================
// PRIMITIVE TYPE GUARDS
// ============================================================================

/**
 * Check if value is one of the JSON scalar kinds a graph object stores
 */
export function isGraphPrimitive(value: unknown): value is GraphPrimitive {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

// ============================================================================
// OBJECT TYPE GUARDS
// ============================================================================

/**
 * Check if value is a Record<string, unknown> (any non-array object)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if value is a plain object literal or a null-prototype object.
 *
 * Class instances (Date, Map, user classes) are records but not plain records.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Check if an object has its own property (prototype chain excluded)
 */
export function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Check if a property name is a member of Object.prototype (`toString`,
 * `valueOf`, ...) that a proxy should keep answering when it has no field of
 * that name
 */
export function isObjectPrototypeKey(key: string): boolean {
  return hasOwn(Object.prototype, key)
}

/**
 * Short description of a value's kind, for log lines and error details
 */
export function describeKind(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value)
    if (proto === Object.prototype || proto === null) return 'object'
    const name = value.constructor?.name
    return name ? `instance of ${name}` : 'object'
  }
  return typeof value
}
