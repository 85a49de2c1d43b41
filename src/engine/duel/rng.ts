import { DuelError } from './errors'
import type { Rng } from './types'

const A = 1664525
const C = 1013904223
const M = 0x100000000

/** Seeded 32-bit LCG. Same seed, same duel. */
export function createRng(seed: number): Rng {
  let s = seed >>> 0
  return {
    next() {
      s = (Math.imul(s, A) + C) >>> 0
      return s / M
    },
  }
}

/** Plays back fixed values in order, then repeats the last one. */
export function scriptedRng(values: number[], fallback = 0.5): Rng {
  let i = 0
  return {
    next() {
      if (i < values.length) return values[i++]
      return values.length ? values[values.length - 1] : fallback
    },
  }
}

export function randInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1))
}

/** Rolls 1..100 and passes when the roll is within `percent`. */
export function chance(rng: Rng, percent: number): boolean {
  return randInt(rng, 1, 100) <= percent
}

export function pick<T>(rng: Rng, list: readonly T[]): T {
  if (list.length === 0) {
    throw new DuelError('cannot pick from an empty list')
  }
  return list[randInt(rng, 0, list.length - 1)]
}
