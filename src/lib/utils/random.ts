// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

/** A source of uniformly distributed numbers in [0, 1). */
export type Random = () => number

/**
 * Creates a deterministic generator (mulberry32) so that quizzes and feedback
 * can be reproduced from a seed.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// Index in [0, length) for the next draw
const nextIndex = (random: Random, length: number) =>
  Math.min(length - 1, Math.floor(random() * length))

export function pickOne<T>(items: readonly T[], random: Random): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list')
  }
  return items[nextIndex(random, items.length)]
}

/**
 * Draws `count` distinct items (partial Fisher-Yates). Asking for more items
 * than exist returns all of them in drawn order.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: Random,
): T[] {
  const pool = [...items]
  const size = Math.min(Math.max(0, count), pool.length)

  for (let i = 0; i < size; i++) {
    const j = i + nextIndex(random, pool.length - i)
    const drawn = pool[j]
    pool[j] = pool[i]
    pool[i] = drawn
  }

  return pool.slice(0, size)
}

export function shuffle<T>(items: readonly T[], random: Random): T[] {
  const shuffled = [...items]
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = nextIndex(random, i + 1)
    const current = shuffled[i]
    shuffled[i] = shuffled[j]
    shuffled[j] = current
  }
  return shuffled
}
