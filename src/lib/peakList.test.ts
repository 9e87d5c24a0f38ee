import { describe, expect, it } from 'vitest'
import { checkPeakList, mean, roundTo, sumAreas } from './peakList'
import { fivePeaks, mkPeak } from './__fixtures__/peaks'

describe('peakList', () => {
  const peaks = fivePeaks()

  it('sums areas over a half-open position range', () => {
    expect(sumAreas(peaks, 1, 4)).toBe(200 + 300 + 400)
    expect(sumAreas(peaks, 0, 5)).toBe(1500)
    expect(sumAreas(peaks, 0, 2)).toBe(300)
  })

  it('sums an empty or reversed range to zero and clamps past the end', () => {
    expect(sumAreas(peaks, 2, 2)).toBe(0)
    expect(sumAreas(peaks, 4, 1)).toBe(0)
    expect(sumAreas(peaks, 3, 10)).toBe(900)
  })

  it('averages values', () => {
    expect(mean([1, 2, 3])).toBe(2)
    expect(mean([])).toBeNull()
  })

  it('rounds to a fixed number of decimals', () => {
    expect(roundTo(2.34567, 2)).toBe(2.35)
    expect(roundTo(2.675, 2)).toBe(2.67)
    expect(Object.is(roundTo(-0.001, 2), 0)).toBe(true)
  })

  it('rounds exact ties to the even neighbour', () => {
    expect(roundTo(12.5, 0)).toBe(12)
    expect(roundTo(13.5, 0)).toBe(14)
    expect(roundTo(0.125, 2)).toBe(0.12)
    expect(roundTo(0.375, 2)).toBe(0.38)
    expect(roundTo(-0.125, 2)).toBe(-0.12)
    expect(roundTo(-2.5, 0)).toBe(-2)
    expect(Object.is(roundTo(-0.5, 0), 0)).toBe(true)
  })

  it('accepts a well-formed list without warnings', () => {
    expect(checkPeakList(peaks)).toEqual([])
  })

  it('reports structural problems as warnings', () => {
    expect(checkPeakList([mkPeak(3, 0, 1, 2, 10), mkPeak(4, 2, 3, 4, 10)])).toEqual([
      '2 peak(s) have an index that does not match their position; positions are used.',
    ])
    expect(checkPeakList([mkPeak(1, 2, 1, 3, 10)])).toEqual(['Peak 1: expected start <= RT <= end, got 2 / 1 / 3.'])
    expect(checkPeakList([mkPeak(1, 0, 1, 2, -5)])).toEqual(['Peak 1: area -5 is not a non-negative number.'])
    expect(checkPeakList([mkPeak(1, 2, 3, 4, 1), mkPeak(2, 0, 1, 2, 1)])).toEqual([
      'Peak 2: RT 1 is earlier than the preceding peak (3).',
    ])
  })
})
