import { BoundaryResolutionError } from './errors'
import type { PeakList } from './peakList'

// Both resolvers return the 1-based ordinal of the chosen peak (position + 1).
// On equal distance the earliest peak wins.

export const fractionEndIndex = (peaks: PeakList, rtEnd: number): number => {
  let best = -1
  let bestDiff = Number.POSITIVE_INFINITY
  for (let pos = 0; pos < peaks.length; pos += 1) {
    const diff = peaks[pos].endRt - rtEnd
    if (diff < 0) continue
    if (diff < bestDiff) {
      bestDiff = diff
      best = pos
    }
  }
  if (best < 0) throw new BoundaryResolutionError(rtEnd)
  return best + 1
}

export const fractionStartIndex = (peaks: PeakList, rtStart: number): number => {
  let best = -1
  let bestDiff = Number.POSITIVE_INFINITY
  for (let pos = 0; pos < peaks.length; pos += 1) {
    const offset = peaks[pos].startRt - rtStart
    if (offset > 0) continue
    const diff = Math.abs(offset)
    if (diff < bestDiff) {
      bestDiff = diff
      best = pos
    }
  }
  // First detected peak already starts after the boundary: treat the run as starting clean.
  if (best < 0) return 1
  return best + 1
}
