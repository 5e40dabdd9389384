/**
 * Windowed Map Views
 *
 * Live, restartable views over a map's history. Iterating a view walks the
 * recorded entries in ascending revision order without moving the window.
 */

import type { Unset } from '../constants'
import { deepEqual } from '../utils/comparison'

/**
 * A recorded change: the revision and the value effective from it onwards
 */
export type RevisionEntry<V> = readonly [revision: number, value: V | Unset]

/**
 * What the views need from the map behind them
 */
export interface HistorySource<V> {
  readonly size: number
  readonly firstRevision: number | undefined
  entries(): IterableIterator<RevisionEntry<V>>
  get(revision: number): V | Unset
  revBefore(revision: number): number
}

abstract class HistoryView<V, T> implements Iterable<T> {
  constructor(protected readonly source: HistorySource<V>) {}

  get size(): number {
    return this.source.size
  }

  abstract [Symbol.iterator](): IterableIterator<T>

  abstract has(item: T): boolean

  toArray(): T[] {
    return Array.from(this)
  }
}

/**
 * Recorded revisions. `has` is true only for a revision that was recorded
 * exactly, not for revisions that merely inherit a value, and is false for
 * anything that is not a safe integer.
 */
export class RevisionKeysView<V> extends HistoryView<V, number> {
  *[Symbol.iterator](): IterableIterator<number> {
    for (const [revision] of this.source.entries()) yield revision
  }

  has(revision: number): boolean {
    if (!Number.isSafeInteger(revision)) return false
    const first = this.source.firstRevision
    if (first === undefined || revision < first) return false
    return this.source.revBefore(revision) === revision
  }
}

/**
 * Recorded values, unset markers included
 */
export class RevisionValuesView<V> extends HistoryView<V, V | Unset> {
  *[Symbol.iterator](): IterableIterator<V | Unset> {
    for (const [, value] of this.source.entries()) yield value
  }

  has(value: V | Unset): boolean {
    for (const [, recorded] of this.source.entries()) {
      if (deepEqual(recorded, value)) return true
    }
    return false
  }
}

/**
 * Recorded `[revision, value]` pairs. `has` answers with the value effective
 * at the revision, so `[7, 'a']` is contained when `'a'` was set at 5 and
 * nothing changed before 7. Revisions below the first recorded one are never
 * contained.
 */
export class RevisionItemsView<V> extends HistoryView<V, RevisionEntry<V>> {
  *[Symbol.iterator](): IterableIterator<RevisionEntry<V>> {
    yield* this.source.entries()
  }

  has(item: RevisionEntry<V>): boolean {
    const [revision, value] = item
    if (!Number.isSafeInteger(revision)) return false
    const first = this.source.firstRevision
    if (first === undefined || revision < first) return false
    return deepEqual(this.source.get(revision), value)
  }
}
