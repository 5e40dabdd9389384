/**
 * Windowed map randomized tests
 *
 * Drives maps through seeded random operations and compares every answer
 * with a plain sorted model. Invariant checking is on (see tests/setup.ts),
 * so every intermediate window split is verified as well.
 */

import { describe, it, expect } from 'vitest'
import { RevisionWindowedMap } from '../../src/window/windowed-map'
import { UNSET, type Unset } from '../../src/constants'
import { RevisionNotFoundError } from '../../src/errors'
import { HistoryModel, createRandom, type SeededRandom } from '../factories'

const SEEDS = [1, 7, 42, 1234, 99991]

function expectSameHistory(map: RevisionWindowedMap<number>, model: HistoryModel<number>): void {
  expect(Array.from(map.entries())).toEqual(model.entries())
  expect(map.size).toBe(model.entries().length)
}

function randomValue(random: SeededRandom): number | Unset {
  return random.int(6) === 0 ? UNSET : random.int(1000)
}

describe('RevisionWindowedMap (randomized)', () => {
  describe.each(SEEDS)('seed %i', (seed) => {
    it('should agree with the model across writes, truncations and reads', () => {
      const random = createRandom(seed)
      const map = new RevisionWindowedMap<number>()
      const model = new HistoryModel<number>()

      for (let step = 0; step < 300; step++) {
        const revision = random.between(0, 60)
        const choice = random.int(10)

        if (choice < 5) {
          const value = randomValue(random)
          map.set(revision, value)
          model.set(revision, value)
        } else if (choice === 5) {
          map.truncateFrom(revision)
          model.truncateFrom(revision)
        } else {
          const effective = model.effective(revision)
          if (effective === undefined) {
            expect(() => map.get(revision)).toThrow(RevisionNotFoundError)
            expect(() => map.revBefore(revision)).toThrow(RevisionNotFoundError)
          } else {
            expect(map.get(revision)).toBe(effective[1])
            expect(map.revBefore(revision)).toBe(effective[0])
          }
          expect(map.revAfter(revision)).toBe(model.after(revision))
        }
      }

      expectSameHistory(map, model)
    })

    it('should split the window exactly at the sought revision', () => {
      const random = createRandom(seed)
      const map = new RevisionWindowedMap<number>()
      for (let i = 0; i < 40; i++) {
        map.set(random.between(0, 100), i)
      }

      for (let i = 0; i < 50; i++) {
        const revision = random.between(-5, 105)
        map.seek(revision)
        const { past, future } = map.window()

        for (const [recorded] of past) expect(recorded).toBeLessThanOrEqual(revision)
        for (const [recorded] of future) expect(recorded).toBeGreaterThan(revision)
        expect(past.length + future.length).toBe(map.size)
      }
    })

    it('should answer the same whichever order revisions are read in', () => {
      const random = createRandom(seed)
      const entries = new Map<number, number>()
      for (let i = 0; i < 30; i++) entries.set(random.between(0, 80), i)

      const ascending = new RevisionWindowedMap(entries)
      const shuffled = new RevisionWindowedMap(entries)
      const lookups = Array.from({ length: 81 }, (_, i) => i)

      const forward = lookups.map((revision) => ascending.getOrDefault(revision, -1))
      const scattered = new Map<number, number | Unset>()
      for (let i = 0; i < lookups.length; i++) {
        const revision = lookups[random.int(lookups.length)] ?? 0
        scattered.set(revision, shuffled.getOrDefault(revision, -1))
      }

      for (const [revision, value] of scattered) {
        expect(value).toBe(forward[revision])
      }
      expect(ascending.equals(shuffled)).toBe(true)
    })
  })

  it('should keep batches atomic under random out-of-order input', () => {
    const random = createRandom(2024)
    const map = new RevisionWindowedMap<number>()
    const model = new HistoryModel<number>()

    for (let round = 0; round < 40; round++) {
      const start = random.between(0, 50)
      const batch: [number, number][] = []
      for (let i = 0; i < 4; i++) {
        batch.push([start + random.between(-3, 6), round * 10 + i])
      }

      const ordered = batch.every(([revision], i) => i === 0 || revision >= (batch[i - 1]?.[0] ?? revision))
      if (ordered) {
        map.update(batch)
        for (const [revision, value] of batch) model.set(revision, value)
      } else {
        expect(() => map.update(batch)).toThrow()
      }
      expectSameHistory(map, model)
    }
  })
})
