/**
 * Cursor Sequence
 *
 * A doubly-linked sequence that remembers the last node it visited (the
 * cursor). Reads and writes at the cursor are O(1); moving the cursor by
 * `n` costs O(|n|); absolute indexes walk from whichever of head, tail or
 * cursor is nearest.
 *
 * The cursor always points into the chain. Removing the node under it moves
 * it to the following node, or the preceding one at the tail, or clears it
 * when the sequence empties.
 *
 * @example
 * ```typescript
 * const seq = new CursorSequence([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
 * seq.seek(5)   // 5
 * seq.seek(-2)  // 3
 * seq.at(-1)    // 9, cursor stays on 3
 * ```
 */

import { STRUCTURE_NAMES } from '../constants'
import { getConfig } from '../config'
import {
  EmptyContainerError,
  IndexOutOfRangeError,
  InvariantViolationError,
  SeekOutOfRangeError,
  assertIndex,
} from '../errors'
import type { ContainerOptions } from '../linked/queue'
import {
  checkChain,
  createNode,
  linkAfter,
  linkBefore,
  unlinkNode,
  walk,
  type LinkedNode,
} from '../linked/node'
import { logger } from '../utils/logger'

export class CursorSequence<T> implements Iterable<T> {
  private head: LinkedNode<T> | null = null
  private tail: LinkedNode<T> | null = null
  private waist: LinkedNode<T> | null = null
  private _length = 0
  private _position = -1
  private readonly options: ContainerOptions

  /**
   * @param items - Initial contents; the cursor starts on the first one
   */
  constructor(items: Iterable<T> = [], options: ContainerOptions = {}) {
    this.options = options
    for (const item of items) {
      this.linkTail(createNode(item))
    }
    this.afterMutation()
  }

  get length(): number {
    return this._length
  }

  /** Index of the cursor, -1 when the sequence is empty */
  get position(): number {
    return this._position
  }

  /**
   * Value under the cursor
   *
   * @throws EmptyContainerError
   */
  get current(): T {
    return this.requireWaist('read the cursor').value
  }

  // ===========================================================================
  // Absolute access
  // ===========================================================================

  /**
   * Read by index (negative counts from the tail). Leaves the cursor alone.
   *
   * @throws IndexOutOfRangeError
   */
  at(index: number): T {
    return this.locate(this.normalize(index)).value
  }

  /**
   * Overwrite by index. `index === length` appends.
   *
   * @throws IndexOutOfRangeError
   */
  setAt(index: number, value: T): void {
    assertIndex(index)
    if (index === this._length) {
      this.append(value)
      return
    }
    this.locate(this.normalize(index)).value = value
    this.afterMutation()
  }

  /**
   * Put the cursor on `index` and return the value there
   *
   * @throws IndexOutOfRangeError
   */
  moveTo(index: number): T {
    const target = this.normalize(index)
    this.waist = this.locate(target)
    this._position = target
    return this.waist.value
  }

  /**
   * Insert at `index`, shifting later values right; `index === length`
   * appends. The cursor lands on the new value.
   *
   * @throws IndexOutOfRangeError
   */
  insert(index: number, value: T): void {
    assertIndex(index)
    if (index === this._length) {
      this.append(value)
      this.waist = this.tail
      this._position = this._length - 1
      this.afterMutation()
      return
    }
    this.moveTo(index)
    this.insertAtCursor(value)
  }

  /**
   * Remove and return the value at `index`
   *
   * @throws IndexOutOfRangeError
   */
  remove(index: number): T {
    this.moveTo(index)
    return this.removeAtCursor()
  }

  // ===========================================================================
  // Cursor
  // ===========================================================================

  /**
   * Move the cursor `offset` places (negative moves toward the head) and
   * return the value there. The cursor does not move on failure.
   *
   * @throws SeekOutOfRangeError
   */
  seek(offset: number): T {
    assertIndex(offset)
    const target = this._position + offset
    if (this.waist === null || target < 0 || target >= this._length) {
      throw new SeekOutOfRangeError(offset, this._position, this._length)
    }
    this.waist = this.locate(target)
    this._position = target
    return this.waist.value
  }

  setAtCursor(value: T): void {
    this.requireWaist('write the cursor').value = value
    this.afterMutation()
  }

  /**
   * Insert before the cursor; the cursor moves onto the new value, so its
   * index is unchanged. On an empty sequence the value becomes the only one.
   */
  insertAtCursor(value: T): void {
    const node = createNode(value)
    if (this.waist === null) {
      this.linkTail(node)
      this.afterMutation()
      return
    }
    linkBefore(node, this.waist)
    if (this.waist === this.head) this.head = node
    this.waist = node
    this._length++
    this.afterMutation()
  }

  /**
   * Remove and return the value under the cursor
   *
   * @throws EmptyContainerError
   */
  removeAtCursor(): T {
    const node = this.requireWaist('remove at the cursor')
    this.unlink(node, this._position)
    this.afterMutation()
    return node.value
  }

  /**
   * Seek `offset` from the cursor, then insert there
   *
   * @throws SeekOutOfRangeError
   */
  insertRelative(offset: number, value: T): void {
    this.seek(offset)
    this.insertAtCursor(value)
  }

  /**
   * Seek `offset` from the cursor, then remove there
   *
   * @throws SeekOutOfRangeError
   */
  removeRelative(offset: number): T {
    this.seek(offset)
    return this.removeAtCursor()
  }

  // ===========================================================================
  // Ends
  // ===========================================================================

  append(value: T): void {
    this.linkTail(createNode(value))
    this.afterMutation()
  }

  prepend(value: T): void {
    const node = createNode(value)
    if (this.head === null) {
      this.linkTail(node)
    } else {
      linkBefore(node, this.head)
      this.head = node
      this._length++
      this._position++
    }
    this.afterMutation()
  }

  /**
   * @throws EmptyContainerError
   */
  pop(): T {
    const node = this.tail
    if (node === null) throw new EmptyContainerError('pop', STRUCTURE_NAMES.sequence)
    this.unlink(node, this._length - 1)
    this.afterMutation()
    return node.value
  }

  /**
   * @throws EmptyContainerError
   */
  popLeft(): T {
    const node = this.head
    if (node === null) throw new EmptyContainerError('popLeft', STRUCTURE_NAMES.sequence)
    this.unlink(node, 0)
    this.afterMutation()
    return node.value
  }

  clear(): void {
    this.head = null
    this.tail = null
    this.waist = null
    this._length = 0
    this._position = -1
  }

  // ===========================================================================
  // Iteration
  // ===========================================================================

  *[Symbol.iterator](): IterableIterator<T> {
    let current = this.head
    while (current) {
      yield current.value
      current = current.next
    }
  }

  *reversed(): IterableIterator<T> {
    let current = this.tail
    while (current) {
      yield current.value
      current = current.prev
    }
  }

  toArray(): T[] {
    return Array.from(this)
  }

  /**
   * Verify the chain, the length counter and that the cursor sits on the
   * node at `position`
   *
   * @throws InvariantViolationError
   */
  assertInvariants(): void {
    const problem = checkChain(this.head, this.tail, this._length)
    if (problem !== null) this.fail(problem)

    if (this._length === 0) {
      if (this.waist !== null || this._position !== -1) this.fail('cursor set on an empty sequence')
      return
    }
    if (this._position < 0 || this._position >= this._length) {
      this.fail(`cursor position ${this._position} outside length ${this._length}`)
    }
    if (this.head === null || walk(this.head, this._position) !== this.waist) {
      this.fail(`cursor is not the node at position ${this._position}`)
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private normalize(index: number): number {
    assertIndex(index)
    const normalized = index < 0 ? this._length + index : index
    if (normalized < 0 || normalized >= this._length) {
      throw new IndexOutOfRangeError(index, this._length)
    }
    return normalized
  }

  /**
   * Find the node at an in-range index, starting from the nearest of head,
   * tail and cursor
   */
  private locate(index: number): LinkedNode<T> {
    let start = this.head
    let steps = index
    const fromTail = index - (this._length - 1)
    if (this.tail !== null && -fromTail < Math.abs(steps)) {
      start = this.tail
      steps = fromTail
    }
    const fromWaist = index - this._position
    if (this.waist !== null && Math.abs(fromWaist) < Math.abs(steps)) {
      start = this.waist
      steps = fromWaist
    }

    const node = start === null ? null : walk(start, steps)
    if (node === null) {
      this.fail(`chain ended before index ${index}`)
    }
    return node
  }

  private linkTail(node: LinkedNode<T>): void {
    if (this.tail === null) {
      this.head = node
      this.tail = node
      this.waist = node
      this._position = 0
    } else {
      linkAfter(node, this.tail)
      this.tail = node
    }
    this._length++
  }

  /**
   * Detach the node at `index`, re-homing the cursor if it sat there
   */
  private unlink(node: LinkedNode<T>, index: number): void {
    if (node === this.waist) {
      if (node.next !== null) {
        this.waist = node.next
      } else if (node.prev !== null) {
        this.waist = node.prev
        this._position = index - 1
      } else {
        this.waist = null
        this._position = -1
      }
    } else if (index < this._position) {
      this._position--
    }

    if (node === this.head) this.head = node.next
    if (node === this.tail) this.tail = node.prev
    unlinkNode(node)
    this._length--
  }

  private requireWaist(operation: string): LinkedNode<T> {
    if (this.waist === null) {
      throw new EmptyContainerError(operation, STRUCTURE_NAMES.sequence)
    }
    return this.waist
  }

  private fail(message: string): never {
    const error = new InvariantViolationError(STRUCTURE_NAMES.sequence, message, {
      length: this._length,
      position: this._position,
    })
    logger.error('Cursor sequence invariant check failed', error)
    throw error
  }

  private afterMutation(): void {
    if (this.options.checkInvariants ?? getConfig().checkInvariants) {
      this.assertInvariants()
    }
  }
}
