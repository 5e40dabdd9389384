/**
 * Value Comparison Utilities
 *
 * Structural equality used when comparing histories and when the views
 * answer containment queries.
 */

/**
 * Deep equality check for two values
 *
 * Handles:
 * - Primitives and symbols (SameValueZero, so NaN equals NaN)
 * - Dates (compared by timestamp)
 * - Arrays (element-wise comparison)
 * - Maps (size, then values compared per key; keys match by identity)
 * - Sets (size, then each member paired with a structurally equal one)
 * - Plain objects (key-value comparison)
 *
 * Unlike loose equality, `null` and `undefined` are different values here:
 * a slot explicitly holding `null` is not the same history as one holding
 * `undefined`.
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [1, 2]) // true
 * deepEqual(null, undefined) // false
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b)
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false
    }
    return true
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false
    const unmatched: unknown[] = Array.from(b)
    for (const value of a) {
      const index = unmatched.findIndex((candidate) => deepEqual(value, candidate))
      if (index === -1) return false
      unmatched.splice(index, 1)
    }
    return true
  }

  const aKeys = Object.keys(a)
  const bKeys = Object.keys(b)
  if (aKeys.length !== bKeys.length) return false
  return aKeys.every(
    (k) => Object.prototype.hasOwnProperty.call(b, k) &&
      deepEqual(Reflect.get(a, k), Reflect.get(b, k))
  )
}
