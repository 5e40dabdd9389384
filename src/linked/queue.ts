/**
 * Bidirectional Queue
 *
 * A doubly-linked deque built from LinkedNodes. O(1) push/pop at either end,
 * O(min(i, n - i)) indexed access, O(1) length via an explicit counter.
 *
 * The windowed map keeps its `past` and `future` runs in two of these.
 *
 * @example
 * ```typescript
 * const q = new BidirectionalQueue([1, 2, 3])
 * q.prepend(0)
 * q.at(-1) // 3
 * q.popLeftMany(2).toArray() // [0, 1]
 * q.toArray() // [2, 3]
 * ```
 */

import { STRUCTURE_NAMES } from '../constants'
import { getConfig } from '../config'
import {
  EmptyContainerError,
  ErrorCode,
  IndexOutOfRangeError,
  InvariantViolationError,
  ValidationError,
  assertIndex,
} from '../errors'
import { logger } from '../utils/logger'
import { checkChain, createNode, unlinkNode, type LinkedNode } from './node'

/**
 * Options shared by every container in the package
 */
export interface ContainerOptions {
  /** Re-verify invariants after each mutation (defaults to the global config) */
  checkInvariants?: boolean | undefined
}

export class BidirectionalQueue<T> implements Iterable<T> {
  private head: LinkedNode<T> | null = null
  private tail: LinkedNode<T> | null = null
  private _length = 0
  private readonly options: ContainerOptions

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

  get isEmpty(): boolean {
    return this._length === 0
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
    node.next = this.head
    if (this.head) {
      this.head.prev = node
    } else {
      this.tail = node
    }
    this.head = node
    this._length++
    this.afterMutation()
  }

  extend(values: Iterable<T>): void {
    for (const value of values) {
      this.linkTail(createNode(value))
    }
    this.afterMutation()
  }

  /**
   * Read the tail value
   *
   * @throws EmptyContainerError
   */
  peek(): T {
    if (!this.tail) throw new EmptyContainerError('peek', STRUCTURE_NAMES.queue)
    return this.tail.value
  }

  /**
   * Read the head value
   *
   * @throws EmptyContainerError
   */
  peekLeft(): T {
    if (!this.head) throw new EmptyContainerError('peekLeft', STRUCTURE_NAMES.queue)
    return this.head.value
  }

  /**
   * Remove and return the tail value
   *
   * @throws EmptyContainerError
   */
  pop(): T {
    const node = this.tail
    if (!node) throw new EmptyContainerError('pop', STRUCTURE_NAMES.queue)
    this.unlink(node)
    this.afterMutation()
    return node.value
  }

  /**
   * Remove and return the head value
   *
   * @throws EmptyContainerError
   */
  popLeft(): T {
    const node = this.head
    if (!node) throw new EmptyContainerError('popLeft', STRUCTURE_NAMES.queue)
    this.unlink(node)
    this.afterMutation()
    return node.value
  }

  /**
   * Remove up to `count` values from the tail. The removed run comes back
   * as a new queue in its original order.
   */
  popMany(count: number): BidirectionalQueue<T> {
    const taken = this.clampCount(count)
    const scratch = new BidirectionalQueue<T>([], this.options)
    for (let i = 0; i < taken; i++) {
      scratch.prepend(this.pop())
    }
    return scratch
  }

  /**
   * Remove up to `count` values from the head. The removed run comes back
   * as a new queue in its original order.
   */
  popLeftMany(count: number): BidirectionalQueue<T> {
    const taken = this.clampCount(count)
    const scratch = new BidirectionalQueue<T>([], this.options)
    for (let i = 0; i < taken; i++) {
      scratch.append(this.popLeft())
    }
    return scratch
  }

  clear(): void {
    this.head = null
    this.tail = null
    this._length = 0
  }

  // ===========================================================================
  // Indexed access
  // ===========================================================================

  /**
   * Read by index; negative indexes count from the tail.
   *
   * @throws IndexOutOfRangeError
   */
  at(index: number): T {
    return this.nodeAt(index).value
  }

  /**
   * Overwrite by index; negative indexes count from the tail.
   *
   * @throws IndexOutOfRangeError
   */
  setAt(index: number, value: T): void {
    this.nodeAt(index).value = value
    this.afterMutation()
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
   * Verify the chain against the length counter
   *
   * @throws InvariantViolationError
   */
  assertInvariants(): void {
    const problem = checkChain(this.head, this.tail, this._length)
    if (problem !== null) {
      const error = new InvariantViolationError(STRUCTURE_NAMES.queue, problem, {
        length: this._length,
      })
      logger.error('Queue invariant check failed', error)
      throw error
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private linkTail(node: LinkedNode<T>): void {
    node.prev = this.tail
    if (this.tail) {
      this.tail.next = node
    } else {
      this.head = node
    }
    this.tail = node
    this._length++
  }

  private unlink(node: LinkedNode<T>): void {
    if (node === this.head) this.head = node.next
    if (node === this.tail) this.tail = node.prev
    unlinkNode(node)
    this._length--
  }

  /**
   * Locate a node, walking from whichever end is nearer
   */
  private nodeAt(index: number): LinkedNode<T> {
    assertIndex(index)
    const normalized = index < 0 ? this._length + index : index
    if (normalized < 0 || normalized >= this._length) {
      throw new IndexOutOfRangeError(index, this._length)
    }

    if (normalized <= this._length - 1 - normalized) {
      let current = this.head
      for (let i = 0; i < normalized && current; i++) current = current.next
      if (current) return current
    } else {
      let current = this.tail
      for (let i = this._length - 1; i > normalized && current; i--) current = current.prev
      if (current) return current
    }
    throw new InvariantViolationError(
      STRUCTURE_NAMES.queue,
      `chain ended before index ${normalized}`,
      { index, length: this._length }
    )
  }

  private clampCount(count: number): number {
    assertIndex(count)
    if (count < 0) {
      throw new ValidationError(
        `Count must not be negative, got ${count}`,
        ErrorCode.INVALID_INPUT,
        { count }
      )
    }
    return Math.min(count, this._length)
  }

  private afterMutation(): void {
    if (this.options.checkInvariants ?? getConfig().checkInvariants) {
      this.assertInvariants()
    }
  }
}
