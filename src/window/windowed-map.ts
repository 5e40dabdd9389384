/**
 * Revision-Windowed Map
 *
 * Keeps every value a slot has held, keyed by revision, and answers "what
 * was the value as of revision r". Entries live in two queues whose
 * concatenation is strictly ascending by revision:
 *
 *   past:   revisions <= the last revision sought
 *   future: revisions >  the last revision sought
 *
 * Every lookup first calls `seek`, which moves entries across the split one
 * at a time. Repeated lookups at the same or neighbouring revisions cost
 * O(1); a jump costs O(entries crossed). Nothing is ever re-sorted.
 *
 * A value of UNSET at a revision means the slot is empty from that revision
 * until the next recorded value.
 *
 * @example
 * ```typescript
 * const name = new RevisionWindowedMap<string>()
 * name.set(5, 'a')
 * name.set(10, 'b')
 * name.get(7)       // 'a'
 * name.revAfter(7)  // 10
 * name.truncateFrom(8)
 * name.get(10)      // UNSET
 * ```
 */

import { STRUCTURE_NAMES, UNSET, isUnset, type Unset } from '../constants'
import { getConfig } from '../config'
import {
  DuplicateRevisionError,
  InvariantViolationError,
  OrderingViolationError,
  RevisionNotFoundError,
  assertRevision,
} from '../errors'
import { BidirectionalQueue, type ContainerOptions } from '../linked/queue'
import { deepEqual } from '../utils/comparison'
import { logger } from '../utils/logger'
import {
  RevisionItemsView,
  RevisionKeysView,
  RevisionValuesView,
  type HistorySource,
  type RevisionEntry,
} from './views'

/**
 * Copies of both halves of the window, for inspection
 */
export interface WindowSnapshot<V> {
  past: RevisionEntry<V>[]
  future: RevisionEntry<V>[]
}

export class RevisionWindowedMap<V> implements HistorySource<V>, Iterable<RevisionEntry<V>> {
  private readonly past: BidirectionalQueue<RevisionEntry<V>>
  private readonly future: BidirectionalQueue<RevisionEntry<V>>
  private readonly options: ContainerOptions
  /** Revision the window was last positioned at */
  private sought: number | null = null
  /** Bumped whenever entries are relinked between or within the queues */
  private layout = 0

  /**
   * @param initial - Entries in any order, e.g. a `Map<number, V>`
   * @throws ValidationError when a revision is not a safe integer
   * @throws DuplicateRevisionError when a revision appears twice
   */
  constructor(initial: Iterable<readonly [number, V | Unset]> = [], options: ContainerOptions = {}) {
    this.options = options
    const sorted: RevisionEntry<V>[] = []
    for (const [revision, value] of initial) {
      assertRevision(revision)
      sorted.push([revision, value])
    }
    sorted.sort((a, b) => a[0] - b[0])
    for (let i = 1; i < sorted.length; i++) {
      const current = sorted[i]
      const previous = sorted[i - 1]
      if (current && previous && current[0] === previous[0]) {
        throw new DuplicateRevisionError(current[0])
      }
    }

    this.past = new BidirectionalQueue(sorted, options)
    this.future = new BidirectionalQueue<RevisionEntry<V>>([], options)
    this.afterMutation()
  }

  /** Number of recorded entries, unset markers included */
  get size(): number {
    return this.past.length + this.future.length
  }

  get firstRevision(): number | undefined {
    if (!this.past.isEmpty) return this.past.peekLeft()[0]
    if (!this.future.isEmpty) return this.future.peekLeft()[0]
    return undefined
  }

  get lastRevision(): number | undefined {
    if (!this.future.isEmpty) return this.future.peek()[0]
    if (!this.past.isEmpty) return this.past.peek()[0]
    return undefined
  }

  // ===========================================================================
  // Window
  // ===========================================================================

  /**
   * Move the split so that `past` ends at the last entry <= `revision` and
   * `future` starts at the first entry > `revision`.
   */
  seek(revision: number): void {
    assertRevision(revision)
    const before = this.layout
    while (!this.past.isEmpty && this.past.peek()[0] > revision) {
      this.future.prepend(this.past.pop())
      this.layout = before + 1
    }
    while (!this.future.isEmpty && this.future.peekLeft()[0] <= revision) {
      this.past.append(this.future.popLeft())
      this.layout = before + 1
    }
    this.sought = revision
    this.afterMutation()
  }

  window(): WindowSnapshot<V> {
    return { past: this.past.toArray(), future: this.future.toArray() }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Value effective at `revision`: the one recorded at the greatest
   * revision <= `revision`. May be UNSET.
   *
   * @throws RevisionNotFoundError when nothing is recorded at or before `revision`
   */
  get(revision: number): V | Unset {
    this.seek(revision)
    if (this.past.isEmpty) throw new RevisionNotFoundError(revision)
    return this.past.peek()[1]
  }

  /**
   * True when a value (not UNSET) is effective at `revision`
   */
  has(revision: number): boolean {
    this.seek(revision)
    return !this.past.isEmpty && !isUnset(this.past.peek()[1])
  }

  /**
   * Effective value at `revision`, or `fallback` when there is none
   */
  getOrDefault<D>(revision: number, fallback: D): V | D {
    this.seek(revision)
    if (this.past.isEmpty) return fallback
    const value = this.past.peek()[1]
    return isUnset(value) ? fallback : value
  }

  /**
   * Last revision <= `revision` at which the value changed
   *
   * @throws RevisionNotFoundError when nothing is recorded at or before `revision`
   */
  revBefore(revision: number): number {
    this.seek(revision)
    if (this.past.isEmpty) throw new RevisionNotFoundError(revision)
    return this.past.peek()[0]
  }

  /**
   * First revision > `revision` at which the value changes, or null when no
   * later change is recorded
   */
  revAfter(revision: number): number | null {
    this.seek(revision)
    if (this.future.isEmpty) return null
    return this.future.peekLeft()[0]
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Record `value` at `revision`. Overwrites an entry already recorded at
   * exactly `revision`; otherwise inserts a new one.
   *
   * @throws OrderingViolationError if the window is found out of position
   */
  set(revision: number, value: V | Unset): void {
    assertRevision(revision)
    if (this.size === 0) {
      this.past.append([revision, value])
      this.layout++
      this.sought = revision
      this.afterMutation()
      return
    }

    this.seek(revision)
    if (this.past.isEmpty) {
      this.past.append([revision, value])
      this.layout++
      this.afterMutation()
      return
    }

    const tailRevision = this.past.peek()[0]
    if (revision === tailRevision) {
      this.past.setAt(-1, [revision, value])
    } else if (revision > tailRevision) {
      this.past.append([revision, value])
      this.layout++
    } else {
      logger.warn(`Refusing to record revision ${revision} behind revision ${tailRevision}`)
      throw new OrderingViolationError(revision, tailRevision)
    }
    this.afterMutation()
  }

  /**
   * Apply a batch of assignments in the order given. The batch must be in
   * non-decreasing revision order; it is checked in full before anything is
   * written.
   *
   * @throws OrderingViolationError on an out-of-order batch
   */
  update(batch: Iterable<readonly [number, V | Unset]>): void {
    const entries = Array.from(batch)
    let previous: number | null = null
    for (const [revision] of entries) {
      assertRevision(revision)
      if (previous !== null && revision < previous) {
        logger.warn(`Rejecting batch: revision ${revision} follows revision ${previous}`)
        throw new OrderingViolationError(revision, previous)
      }
      previous = revision
    }
    for (const [revision, value] of entries) {
      this.set(revision, value)
    }
  }

  /**
   * Discard every entry at or after `revision` and record UNSET at exactly
   * `revision`. This rewrites history from that point on; it is not a point
   * deletion.
   *
   * @returns Number of entries discarded
   */
  truncateFrom(revision: number): number {
    assertRevision(revision)
    while (!this.past.isEmpty) {
      this.future.prepend(this.past.pop())
    }

    let discarded = 0
    while (!this.future.isEmpty) {
      const entry = this.future.popLeft()
      if (entry[0] < revision) {
        this.past.append(entry)
      } else {
        discarded = 1 + this.future.length
        this.future.clear()
      }
    }

    this.past.append([revision, UNSET])
    this.layout++
    this.sought = revision
    logger.debug(`Truncated history from revision ${revision}`, { discarded })
    this.afterMutation()
    return discarded
  }

  // ===========================================================================
  // Iteration and comparison
  // ===========================================================================

  /**
   * Recorded entries in ascending revision order. Does not move the window.
   *
   * Reads and writes made while iterating are allowed: when the window has
   * moved since the last step, iteration resumes after the last revision
   * yielded, so entries recorded later are picked up and truncated ones are
   * not.
   */
  *entries(): IterableIterator<RevisionEntry<V>> {
    let last: number | null = null
    let layout = this.layout
    let walker = this.entriesAfter(last)
    for (;;) {
      if (layout !== this.layout) {
        layout = this.layout
        walker = this.entriesAfter(last)
      }
      const step = walker.next()
      if (step.done) return
      last = step.value[0]
      yield step.value
    }
  }

  [Symbol.iterator](): IterableIterator<RevisionEntry<V>> {
    return this.entries()
  }

  keys(): RevisionKeysView<V> {
    return new RevisionKeysView(this)
  }

  values(): RevisionValuesView<V> {
    return new RevisionValuesView(this)
  }

  items(): RevisionItemsView<V> {
    return new RevisionItemsView(this)
  }

  /**
   * Same recorded history, wherever each window currently sits
   */
  equals(other: RevisionWindowedMap<V>): boolean {
    if (this.size !== other.size) return false
    const theirs = other.entries()
    for (const [revision, value] of this.entries()) {
      const next = theirs.next()
      if (next.done) return false
      const [otherRevision, otherValue] = next.value
      if (revision !== otherRevision || !deepEqual(value, otherValue)) return false
    }
    return true
  }

  /**
   * Independent copy of the history. Values themselves are shared.
   */
  clone(): RevisionWindowedMap<V> {
    return new RevisionWindowedMap<V>(this.entries(), this.options)
  }

  /**
   * Verify both queues, the ascending order across them, and the split
   * around the last revision sought.
   *
   * @throws InvariantViolationError
   */
  assertInvariants(): void {
    this.past.assertInvariants()
    this.future.assertInvariants()

    let previous: number | null = null
    for (const [revision] of this.entries()) {
      if (previous !== null && revision <= previous) {
        this.fail(`revision ${revision} follows revision ${previous}`, { revision, previous })
      }
      previous = revision
    }

    if (this.sought !== null) {
      if (!this.past.isEmpty && this.past.peek()[0] > this.sought) {
        this.fail(`past ends after revision ${this.sought}`, { sought: this.sought })
      }
      if (!this.future.isEmpty && this.future.peekLeft()[0] <= this.sought) {
        this.fail(`future starts at or before revision ${this.sought}`, { sought: this.sought })
      }
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  /**
   * Entries with a revision above `revision` (all of them for null). Only
   * valid until the queues are next relinked.
   */
  private *entriesAfter(revision: number | null): IterableIterator<RevisionEntry<V>> {
    for (const queue of [this.past, this.future]) {
      for (const entry of queue) {
        if (revision === null || entry[0] > revision) yield entry
      }
    }
  }

  private fail(message: string, context: Record<string, unknown>): never {
    const error = new InvariantViolationError(STRUCTURE_NAMES.map, message, context)
    logger.error('Windowed map invariant check failed', error)
    throw error
  }

  private afterMutation(): void {
    if (this.options.checkInvariants ?? getConfig().checkInvariants) {
      this.assertInvariants()
    }
  }
}
