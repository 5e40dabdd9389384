/**
 * Attribute-slot maps
 *
 * The versioned store keeps one RevisionWindowedMap per attribute slot,
 * addressed by a fixed-depth key path such as (graph, node, key). These maps
 * create missing slots on first access and only accept assignments at the
 * innermost layer.
 *
 * @example
 * ```typescript
 * const slots = new StructuredDefaultMap<RevisionWindowedMap<unknown>, [string, string, string]>(3, {
 *   factory: () => new RevisionWindowedMap(),
 * })
 * slots.get(['g', 'n1', 'color']).set(5, 'red')
 * ```
 */

import { STRUCTURE_NAMES } from '../constants'
import { ErrorCode, InvariantViolationError, ValidationError } from '../errors'

export interface PickyDefaultMapOptions<K, V> {
  /** Builds the value for a key that is read before it is set */
  factory: (key: K) => V
  /** Rejects assignments that fail this check */
  validate?: ((value: V, key: K) => boolean) | undefined
  /** Names the accepted values in rejection messages */
  description?: string | undefined
}

/**
 * A map that builds missing values with a factory and refuses assignments
 * that fail validation.
 */
export class PickyDefaultMap<K, V extends object> implements Iterable<[K, V]> {
  private readonly store = new Map<K, V>()
  private readonly factory: (key: K) => V
  private readonly validate: ((value: V, key: K) => boolean) | undefined
  private readonly description: string

  constructor(options: PickyDefaultMapOptions<K, V>) {
    this.factory = options.factory
    this.validate = options.validate
    this.description = options.description ?? 'value'
  }

  get size(): number {
    return this.store.size
  }

  /**
   * Value for `key`, built and stored on first access
   */
  get(key: K): V {
    const existing = this.store.get(key)
    if (existing !== undefined) return existing
    const created = this.factory(key)
    this.set(key, created)
    return created
  }

  /**
   * Value for `key` without creating one
   */
  peek(key: K): V | undefined {
    return this.store.get(key)
  }

  has(key: K): boolean {
    return this.store.has(key)
  }

  /**
   * @throws ValidationError when `value` fails validation
   */
  set(key: K, value: V): this {
    if (this.validate && !this.validate(value, key)) {
      throw new ValidationError(
        `Expected ${this.description} for key ${String(key)}`,
        ErrorCode.INVALID_INPUT,
        { key: String(key), expected: this.description }
      )
    }
    this.store.set(key, value)
    return this
  }

  delete(key: K): boolean {
    return this.store.delete(key)
  }

  clear(): void {
    this.store.clear()
  }

  keys(): IterableIterator<K> {
    return this.store.keys()
  }

  values(): IterableIterator<V> {
    return this.store.values()
  }

  entries(): IterableIterator<[K, V]> {
    return this.store.entries()
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store.entries()
  }
}

class Branch<K, V extends object> {
  readonly children = new Map<K, Layer<K, V>>()
}

type Layer<K, V extends object> = Branch<K, V> | PickyDefaultMap<K, V>

/**
 * A fixed-depth nest of maps addressed by key paths. Intermediate layers are
 * created on demand; only full-length paths can be read or assigned.
 */
export class StructuredDefaultMap<V extends object, P extends readonly unknown[] = readonly unknown[]> {
  private readonly root: Layer<P[number], V>
  private readonly options: PickyDefaultMapOptions<P[number], V>

  /**
   * @param depth - Number of keys in a path
   * @throws ValidationError when depth is below 1
   */
  constructor(readonly depth: P['length'], options: PickyDefaultMapOptions<P[number], V>) {
    if (!Number.isSafeInteger(depth) || depth < 1) {
      throw new ValidationError(
        `Depth must be a positive integer, got ${String(depth)}`,
        ErrorCode.INVALID_INPUT,
        { depth }
      )
    }
    this.options = options
    this.root = depth === 1 ? this.createLeaf() : new Branch<P[number], V>()
  }

  /** Number of values stored across all layers */
  get size(): number {
    let count = 0
    for (const leaf of this.leaves()) count += leaf.size
    return count
  }

  /**
   * Value at `path`, created (with every missing layer) on first access
   */
  get(path: P): V {
    const [leaf, key] = this.resolve(path, true)
    if (leaf === undefined) {
      return this.fail(`no layer created for ${this.describe(path)}`)
    }
    return leaf.get(key)
  }

  /**
   * Value at `path` without creating anything
   */
  peek(path: P): V | undefined {
    const [leaf, key] = this.resolve(path, false)
    return leaf?.peek(key)
  }

  has(path: P): boolean {
    const [leaf, key] = this.resolve(path, false)
    return leaf?.has(key) ?? false
  }

  /**
   * @throws ValidationError when `path` is not full length or `value` is rejected
   */
  set(path: P, value: V): this {
    const [leaf, key] = this.resolve(path, true)
    if (leaf === undefined) {
      return this.fail(`no layer created for ${this.describe(path)}`)
    }
    leaf.set(key, value)
    return this
  }

  delete(path: P): boolean {
    const [leaf, key] = this.resolve(path, false)
    return leaf?.delete(key) ?? false
  }

  clear(): void {
    if (this.root instanceof Branch) {
      this.root.children.clear()
    } else {
      this.root.clear()
    }
  }

  /**
   * Every stored value, depth first in insertion order
   */
  *values(): IterableIterator<V> {
    for (const leaf of this.leaves()) yield* leaf.values()
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private *leaves(): IterableIterator<PickyDefaultMap<P[number], V>> {
    const pending: Layer<P[number], V>[] = [this.root]
    while (pending.length > 0) {
      const layer = pending.pop()
      if (layer === undefined) break
      if (layer instanceof Branch) {
        pending.push(...Array.from(layer.children.values()).reverse())
      } else {
        yield layer
      }
    }
  }

  private resolve(
    path: P,
    create: boolean
  ): [PickyDefaultMap<P[number], V> | undefined, P[number]] {
    if (path.length !== this.depth) {
      throw new ValidationError(
        `Expected a path of ${this.depth} keys, got ${path.length}`,
        ErrorCode.INVALID_INPUT,
        { depth: this.depth, pathLength: path.length }
      )
    }

    let layer: Layer<P[number], V> = this.root
    for (let i = 0; i < this.depth - 1; i++) {
      if (!(layer instanceof Branch)) {
        return this.fail(`leaf found at layer ${i} of ${this.describe(path)}`)
      }
      const key = path[i]
      let child = layer.children.get(key)
      if (child === undefined) {
        if (!create) return [undefined, path[this.depth - 1]]
        child = i === this.depth - 2 ? this.createLeaf() : new Branch<P[number], V>()
        layer.children.set(key, child)
      }
      layer = child
    }

    if (layer instanceof Branch) {
      return this.fail(`branch found at the innermost layer of ${this.describe(path)}`)
    }
    return [layer, path[this.depth - 1]]
  }

  private createLeaf(): PickyDefaultMap<P[number], V> {
    return new PickyDefaultMap<P[number], V>(this.options)
  }

  private describe(path: P): string {
    return `[${path.map((k) => String(k)).join(', ')}]`
  }

  private fail(message: string): never {
    throw new InvariantViolationError(STRUCTURE_NAMES.slots, message, { depth: this.depth })
  }
}
