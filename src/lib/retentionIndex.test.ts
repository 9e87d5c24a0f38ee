import { describe, expect, it } from 'vitest'
import { BoundaryResolutionError } from './errors'
import { fractionEndIndex, fractionStartIndex } from './retentionIndex'
import { fivePeaks, mkPeak } from './__fixtures__/peaks'

describe('retentionIndex', () => {
  const peaks = fivePeaks()

  it('picks the peak ending closest at or after the cutoff', () => {
    expect(fractionEndIndex(peaks, 3)).toBe(3)
    expect(fractionEndIndex(peaks, 0)).toBe(1)
    expect(fractionEndIndex(peaks, 5.2)).toBe(5)
  })

  it('counts a peak ending exactly on the cutoff', () => {
    expect(fractionEndIndex(peaks, 3.5)).toBe(3)
  })

  it('resolves equally close ends to the earliest peak', () => {
    const tied = [mkPeak(1, 0, 1, 2, 10), mkPeak(2, 1, 1.5, 2, 20), mkPeak(3, 2, 3, 4, 30)]
    expect(fractionEndIndex(tied, 1.8)).toBe(1)
  })

  it('fails when no peak ends at or after the cutoff', () => {
    expect(() => fractionEndIndex(peaks, 6)).toThrow(BoundaryResolutionError)
    expect(() => fractionEndIndex(peaks, 6)).toThrow('no peak found ending at or after target retention time 6')
    expect(() => fractionEndIndex([], 1)).toThrow(BoundaryResolutionError)
  })

  it('picks the peak starting closest at or before the cutoff', () => {
    expect(fractionStartIndex(peaks, 2.6)).toBe(3)
    expect(fractionStartIndex(peaks, 2.5)).toBe(3)
    expect(fractionStartIndex(peaks, 99)).toBe(5)
  })

  it('falls back to 1 when every peak starts after the cutoff', () => {
    expect(fractionStartIndex(peaks, 0.2)).toBe(1)
    expect(fractionStartIndex([], 4)).toBe(1)
  })

  it('returns list positions rather than stored peak indices', () => {
    const renumbered = peaks.map((p, i) => ({ ...p, index: 40 + i }))
    expect(fractionEndIndex(renumbered, 3)).toBe(3)
    expect(fractionStartIndex(renumbered, 2.6)).toBe(3)
  })
})
