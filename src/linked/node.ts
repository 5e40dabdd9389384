/**
 * Linked Node
 *
 * A cell in a doubly-linked chain. A node belongs to exactly one container
 * and is never handed out: containers expose values, not nodes.
 */

export interface LinkedNode<T> {
  value: T
  prev: LinkedNode<T> | null
  next: LinkedNode<T> | null
}

export function createNode<T>(value: T): LinkedNode<T> {
  return { value, prev: null, next: null }
}

/**
 * Detach a node from its neighbours, patching their links to each other.
 * The container is responsible for its own head/tail references.
 */
export function unlinkNode<T>(node: LinkedNode<T>): void {
  if (node.prev) node.prev.next = node.next
  if (node.next) node.next.prev = node.prev
  node.prev = null
  node.next = null
}

/**
 * Insert `node` directly before `anchor`
 */
export function linkBefore<T>(node: LinkedNode<T>, anchor: LinkedNode<T>): void {
  node.prev = anchor.prev
  node.next = anchor
  if (anchor.prev) anchor.prev.next = node
  anchor.prev = node
}

/**
 * Insert `node` directly after `anchor`
 */
export function linkAfter<T>(node: LinkedNode<T>, anchor: LinkedNode<T>): void {
  node.next = anchor.next
  node.prev = anchor
  if (anchor.next) anchor.next.prev = node
  anchor.next = node
}

/**
 * Walk `steps` links forward (positive) or backward (negative).
 * Returns null when the walk runs off the chain.
 */
export function walk<T>(from: LinkedNode<T>, steps: number): LinkedNode<T> | null {
  let current: LinkedNode<T> | null = from
  if (steps >= 0) {
    for (let i = 0; i < steps && current; i++) current = current.next
  } else {
    for (let i = 0; i > steps && current; i--) current = current.prev
  }
  return current
}

/**
 * Count the nodes between `head` and `tail` in both directions and check
 * that the links agree. Returns a description of the first problem found,
 * or null when the chain is sound.
 */
export function checkChain<T>(
  head: LinkedNode<T> | null,
  tail: LinkedNode<T> | null,
  length: number
): string | null {
  if (head === null || tail === null) {
    if (head !== tail) return 'exactly one of head and tail is null'
    return length === 0 ? null : `empty chain reports length ${length}`
  }
  if (head.prev !== null) return 'head has a previous node'
  if (tail.next !== null) return 'tail has a next node'

  let forward = 1
  let current = head
  while (current.next) {
    if (current.next.prev !== current) return `broken back-link after node ${forward - 1}`
    current = current.next
    forward++
    if (forward > length) return `forward walk exceeds length ${length}`
  }
  if (current !== tail) return 'forward walk does not end at tail'
  if (forward !== length) return `forward walk counts ${forward} nodes, length is ${length}`

  let backward = 1
  current = tail
  while (current.prev) {
    current = current.prev
    backward++
    if (backward > length) return `backward walk exceeds length ${length}`
  }
  if (current !== head) return 'backward walk does not end at head'
  return null
}
