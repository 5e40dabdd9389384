/**
 * revwindow Constants
 *
 * Sentinels shared by the windowed map and its views.
 */

/**
 * Marks a revision from which a slot holds no value. The slot stays empty
 * until a later revision records something else.
 */
export const UNSET: unique symbol = Symbol.for('revwindow.unset')

export type Unset = typeof UNSET

/**
 * Check if a stored value is the unset marker
 */
export function isUnset(value: unknown): value is Unset {
  return value === UNSET
}

/**
 * Label used in error messages and invariant reports
 */
export const STRUCTURE_NAMES = {
  queue: 'BidirectionalQueue',
  map: 'RevisionWindowedMap',
  sequence: 'CursorSequence',
  slots: 'StructuredDefaultMap',
} as const
