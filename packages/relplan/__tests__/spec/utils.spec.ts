/**
 * Utility Tests
 */

import { describe, it, expect } from 'vitest'
import { UniqueNames, formatElapsed } from '../../src'

describe('formatElapsed', () => {
  it.each([
    [0, ' 0.000000s'],
    [1_500_000, ' 0.001500s'],
    [61e9, '1m  1.000000s'],
    [3661e9, '1h 1m  1.000000s'],
    [3600e9, '1h  0.000000s'],
    [90061e9, '1d 1h 1m  1.000000s'],
  ])('renders %d ns as %j', (nanos, expected) => {
    expect(formatElapsed(nanos)).toBe(expected)
  })
})

describe('UniqueNames', () => {
  it('suffixes repeated names', () => {
    const names = new UniqueNames()
    expect(['x', 'x', 'y', 'x', 'x1'].map((name) => names.take(name))).toEqual(['x', 'x1', 'y', 'x2', 'x11'])
  })
})
