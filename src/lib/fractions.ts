import type { PeakList } from './peakList'
import { fractionEndIndex, fractionStartIndex } from './retentionIndex'

export const ANALYSIS_MODES = ['C6-C10', 'TRH'] as const
export type AnalysisMode = (typeof ANALYSIS_MODES)[number]

export const FRACTION_IDS = ['C6-C10', 'C10-C16', 'C16-C34', 'C34-C40', 'C10-C40'] as const
export type FractionId = (typeof FRACTION_IDS)[number]

export const MODE_FRACTIONS = {
  'C6-C10': ['C6-C10'],
  TRH: ['C10-C16', 'C16-C34', 'C34-C40', 'C10-C40'],
} as const satisfies Record<AnalysisMode, readonly FractionId[]>

export type ModeFraction<M extends AnalysisMode> = (typeof MODE_FRACTIONS)[M][number]

export type BoundaryKey = 'c6C10End' | 'c10C16Start' | 'c10C16End' | 'c16C34End' | 'c34C40End'

// Retention-time cutoffs in minutes. Only the keys a mode needs have to be set.
export type FractionBoundaries = Partial<Record<BoundaryKey, number>>

export const MODE_BOUNDARIES: Record<AnalysisMode, readonly BoundaryKey[]> = {
  'C6-C10': ['c6C10End'],
  TRH: ['c10C16Start', 'c10C16End', 'c16C34End', 'c34C40End'],
}

/** Half-open position range [low, high) over a PeakList. */
export type FractionWindow = {
  low: number
  high: number
}

const requireBoundary = (boundaries: FractionBoundaries, key: BoundaryKey): number => {
  const value = boundaries[key]
  if (value === undefined || !Number.isFinite(value)) {
    throw new RangeError(`Fraction boundary '${key}' is not configured.`)
  }
  return value
}

/**
 * Resolves the summation window of one fraction. A start resolves to the peak
 * starting nearest at or before its cutoff and an end to the peak ending
 * nearest at or after it; adjacent fractions share the resolved ordinal, so
 * C10-C16 + C16-C34 + C34-C40 covers exactly the C10-C40 window.
 */
export const resolveFractionWindow = (
  peaks: PeakList,
  fraction: FractionId,
  boundaries: FractionBoundaries
): FractionWindow => {
  const end = (key: BoundaryKey) => fractionEndIndex(peaks, requireBoundary(boundaries, key))
  const start = () => fractionStartIndex(peaks, requireBoundary(boundaries, 'c10C16Start'))

  switch (fraction) {
    case 'C6-C10':
      return { low: 0, high: end('c6C10End') }
    case 'C10-C16':
      return { low: start(), high: end('c10C16End') }
    case 'C16-C34':
      return { low: end('c10C16End'), high: end('c16C34End') }
    case 'C34-C40':
      return { low: end('c16C34End'), high: end('c34C40End') }
    case 'C10-C40':
      return { low: start(), high: end('c34C40End') }
  }
}
