import type { RandomSource } from '@shared/types'

export function mulberry32(seed: number): RandomSource {
  let value = seed >>> 0

  return () => {
    value += 0x6d2b79f5
    let t = value
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random()
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list')
  }

  const index = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[index]
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}
