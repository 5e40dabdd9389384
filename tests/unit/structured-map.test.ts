/**
 * Attribute-slot map tests
 */

import { describe, it, expect, vi } from 'vitest'
import { PickyDefaultMap, StructuredDefaultMap } from '../../src/slots/structured-map'
import { RevisionWindowedMap } from '../../src/window/windowed-map'
import { ErrorCode, ValidationError } from '../../src/errors'

type Slot = RevisionWindowedMap<string>
type SlotPath = [graph: string, node: string, key: string]

function createSlots(): StructuredDefaultMap<Slot, SlotPath> {
  return new StructuredDefaultMap<Slot, SlotPath>(3, {
    factory: () => new RevisionWindowedMap<string>(),
    validate: (value) => value instanceof RevisionWindowedMap,
    description: 'a RevisionWindowedMap',
  })
}

describe('PickyDefaultMap', () => {
  it('should build a value on first access and keep it', () => {
    const factory = vi.fn((key: string) => ({ key, hits: 0 }))
    const map = new PickyDefaultMap({ factory })

    const first = map.get('a')
    first.hits++
    const second = map.get('a')

    expect(second).toBe(first)
    expect(second.hits).toBe(1)
    expect(factory).toHaveBeenCalledTimes(1)
    expect(factory).toHaveBeenCalledWith('a')
  })

  it('should not create values on peek or has', () => {
    const map = new PickyDefaultMap({ factory: () => ({ n: 1 }) })

    expect(map.peek('missing')).toBeUndefined()
    expect(map.has('missing')).toBe(false)
    expect(map.size).toBe(0)
  })

  it('should refuse values that fail validation', () => {
    const map = new PickyDefaultMap<string, { n: number }>({
      factory: () => ({ n: 0 }),
      validate: (value) => value.n >= 0,
      description: 'a non-negative counter',
    })

    expect(() => map.set('k', { n: -1 })).toThrow('Expected a non-negative counter for key k')
    expect(map.has('k')).toBe(false)
    map.set('k', { n: 2 })
    expect(map.get('k')).toEqual({ n: 2 })
  })

  it('should iterate, delete and clear', () => {
    const map = new PickyDefaultMap({ factory: (key: number) => ({ key }) })
    map.get(1)
    map.get(2)

    expect(Array.from(map.keys())).toEqual([1, 2])
    expect(Array.from(map)).toEqual([[1, { key: 1 }], [2, { key: 2 }]])
    expect(map.delete(1)).toBe(true)
    expect(map.delete(1)).toBe(false)
    map.clear()
    expect(map.size).toBe(0)
  })
})

describe('StructuredDefaultMap', () => {
  it('should create every missing layer on first access', () => {
    const slots = createSlots()
    slots.get(['g', 'n1', 'color']).set(5, 'red')

    expect(slots.get(['g', 'n1', 'color']).get(7)).toBe('red')
    expect(slots.size).toBe(1)
    expect(slots.has(['g', 'n1', 'color'])).toBe(true)
  })

  it('should keep sibling paths apart', () => {
    const slots = createSlots()
    slots.get(['g', 'n1', 'color']).set(1, 'red')
    slots.get(['g', 'n1', 'size']).set(1, 'large')
    slots.get(['g', 'n2', 'color']).set(1, 'blue')

    expect(slots.size).toBe(3)
    expect(slots.get(['g', 'n2', 'color']).get(1)).toBe('blue')
    expect(Array.from(slots.values()).map((slot) => slot.get(1))).toEqual(['red', 'large', 'blue'])
  })

  it('should not create layers on peek, has or delete', () => {
    const slots = createSlots()

    expect(slots.peek(['g', 'n', 'k'])).toBeUndefined()
    expect(slots.has(['g', 'n', 'k'])).toBe(false)
    expect(slots.delete(['g', 'n', 'k'])).toBe(false)
    expect(slots.size).toBe(0)
  })

  it('should assign only at full depth', () => {
    const slots = new StructuredDefaultMap<Slot>(3, {
      factory: () => new RevisionWindowedMap<string>(),
    })

    try {
      slots.get(['g', 'n'])
      expect.fail('expected a validation error')
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Expected a path of 3 keys, got 2')
        expect(error.code).toBe(ErrorCode.INVALID_INPUT)
      }
    }
    expect(() => slots.set(['g', 'n', 'k', 'extra'], new RevisionWindowedMap<string>())).toThrow(
      'Expected a path of 3 keys, got 4'
    )
  })

  it('should replace a slot with a validated value', () => {
    const slots = createSlots()
    const replacement = new RevisionWindowedMap<string>([[2, 'green']])
    slots.set(['g', 'n', 'color'], replacement)

    expect(slots.get(['g', 'n', 'color'])).toBe(replacement)
    expect(slots.peek(['g', 'n', 'color'])?.get(3)).toBe('green')
  })

  it('should delete and clear', () => {
    const slots = createSlots()
    slots.get(['g', 'n', 'a'])
    slots.get(['g', 'n', 'b'])

    expect(slots.delete(['g', 'n', 'a'])).toBe(true)
    expect(slots.size).toBe(1)
    slots.clear()
    expect(slots.size).toBe(0)
    expect(slots.has(['g', 'n', 'b'])).toBe(false)
  })

  it('should work with a single layer', () => {
    const slots = new StructuredDefaultMap<{ n: number }, [string]>(1, { factory: () => ({ n: 0 }) })
    slots.get(['x']).n = 4

    expect(slots.peek(['x'])).toEqual({ n: 4 })
    expect(slots.size).toBe(1)
    slots.clear()
    expect(slots.size).toBe(0)
  })

  it('should reject a depth below one', () => {
    expect(() => new StructuredDefaultMap(0, { factory: () => ({}) })).toThrow(
      'Depth must be a positive integer, got 0'
    )
  })
})
