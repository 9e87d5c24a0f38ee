import { NumericDegeneracyError, withQuantificationContext } from './errors'
import {
  resolveFractionWindow,
  type AnalysisMode,
  type FractionBoundaries,
  type FractionId,
  type ModeFraction,
} from './fractions'
import { locateInternalStandard, type IstdParams } from './internalStandard'
import { mean, sumAreas, type PeakList } from './peakList'

type BlankAverageOf<M extends AnalysisMode> = {
  readonly mode: M
  readonly runs: number
  readonly istd: number
  readonly areas: Readonly<Record<ModeFraction<M>, number>>
}

export type BlankAverageC6C10 = BlankAverageOf<'C6-C10'>
export type BlankAverageTrh = BlankAverageOf<'TRH'>
export type BlankAverage = BlankAverageC6C10 | BlankAverageTrh

export type BlankRun = {
  name: string
  peaks: PeakList
}

export type BlankAverageOptions = {
  analysisMode: AnalysisMode
  boundaries: FractionBoundaries
  istd: IstdParams
}

const averageOf = (values: number[], quantity: string): number => {
  const avg = mean(values)
  if (avg === null) throw new NumericDegeneracyError(quantity, `cannot average ${quantity} over zero blank runs`)
  return avg
}

const fractionSum = (run: BlankRun, fraction: FractionId, boundaries: FractionBoundaries): number =>
  withQuantificationContext({ sampleName: run.name, fraction }, () => {
    const window = resolveFractionWindow(run.peaks, fraction, boundaries)
    return sumAreas(run.peaks, window.low, window.high)
  })

/**
 * Averages background area per fraction and the ISTD area over a batch of
 * blank runs. Any blank that cannot be resolved aborts the whole average.
 */
export const buildBlankAverage = (blankRuns: readonly BlankRun[], options: BlankAverageOptions): BlankAverage => {
  const average = (fraction: FractionId) =>
    averageOf(
      blankRuns.map((run) => fractionSum(run, fraction, options.boundaries)),
      `${fraction} blank area`
    )
  // Fraction windows resolve before the ISTD is located, so a blank with both
  // defects reports the boundary failure.
  const averageIstd = (): number => {
    const istdAreas = blankRuns.map((run) =>
      withQuantificationContext({ sampleName: run.name }, () => locateInternalStandard(run.peaks, options.istd))
    )
    return averageOf(istdAreas, 'blank ISTD area')
  }

  if (options.analysisMode === 'C6-C10') {
    const areas = Object.freeze({ 'C6-C10': average('C6-C10') })
    const c6c10: BlankAverageC6C10 = { mode: 'C6-C10', runs: blankRuns.length, istd: averageIstd(), areas }
    return Object.freeze(c6c10)
  }

  // C10-C40 is summed over its own window rather than added up from the parts.
  const areas = Object.freeze({
    'C10-C16': average('C10-C16'),
    'C16-C34': average('C16-C34'),
    'C34-C40': average('C34-C40'),
    'C10-C40': average('C10-C40'),
  })
  const trh: BlankAverageTrh = { mode: 'TRH', runs: blankRuns.length, istd: averageIstd(), areas }
  return Object.freeze(trh)
}

/** Averaged blank area for a fraction, or null when the blank was built for the other mode. */
export const blankFractionArea = (blank: BlankAverage, fraction: FractionId): number | null => {
  if (blank.mode === 'C6-C10') return fraction === 'C6-C10' ? blank.areas['C6-C10'] : null
  if (fraction === 'C6-C10') return null
  return blank.areas[fraction]
}
