import { blankFractionArea, buildBlankAverage, type BlankAverage, type BlankRun } from './blankAverage'
import { computeConcentrationDetail } from './concentration'
import { dilutionFactorFor, type QuantificationConfig } from './config'
import {
  NumericDegeneracyError,
  QuantificationError,
  withQuantificationContext,
  type QuantificationErrorKind,
} from './errors'
import { MODE_FRACTIONS, resolveFractionWindow, type FractionId } from './fractions'
import type { PeakList } from './peakList'

export type SampleRun = BlankRun & {
  acquiredAt?: string
}

export type ResultRecord = {
  sampleName: string
  acquiredAt: string
  fraction: FractionId
  concentration: number
  area: number
  istdArea: number
  blankArea: number
  responseRatio: number
  dilutionFactor: number
}

export type FailureRecord = {
  sampleName: string
  fraction: FractionId
  kind: QuantificationErrorKind
  message: string
}

export type BatchResult = {
  blank: BlankAverage
  records: ResultRecord[]
  failures: FailureRecord[]
}

export type BatchInput = {
  blanks: readonly BlankRun[]
  samples: readonly SampleRun[]
  config: QuantificationConfig
}

const quantifyFraction = (
  sample: SampleRun,
  fraction: FractionId,
  blank: BlankAverage,
  config: QuantificationConfig
): ResultRecord => {
  const peaks: PeakList = sample.peaks
  const calibration = config.calibration[fraction]
  if (!calibration) throw new RangeError(`No calibration configured for ${fraction}.`)
  const blankArea = blankFractionArea(blank, fraction)
  if (blankArea === null) {
    throw new NumericDegeneracyError('blank fraction area', `blank average (${blank.mode}) has no ${fraction} area`)
  }
  const dilutionFactor = dilutionFactorFor(config, sample.name)

  const detail = computeConcentrationDetail({
    peaks,
    window: resolveFractionWindow(peaks, fraction, config.boundaries),
    istd: config.istd,
    blankAverage: blank,
    blankFractionArea: blankArea,
    calibration,
    istdConcentration: config.istdConcentration,
    dilutionFactor,
    decimalPlaces: config.decimalPlaces,
  })

  return {
    sampleName: sample.name,
    acquiredAt: sample.acquiredAt ?? '',
    fraction,
    concentration: detail.concentration,
    area: detail.area,
    istdArea: detail.istdArea,
    blankArea,
    responseRatio: detail.responseRatio,
    dilutionFactor,
  }
}

/**
 * Quantifies every sample against one blank batch. A blank that cannot be
 * averaged throws; a sample/fraction that cannot be quantified is logged,
 * recorded as a failure, and the batch carries on.
 */
export const quantifyBatch = ({ blanks, samples, config }: BatchInput): BatchResult => {
  const blank = buildBlankAverage(blanks, {
    analysisMode: config.analysisMode,
    boundaries: config.boundaries,
    istd: config.istd,
  })
  console.log(`Quantify: ${config.analysisMode} blank averaged over ${blank.runs} run(s), ISTD area ${blank.istd}`)

  const records: ResultRecord[] = []
  const failures: FailureRecord[] = []

  for (const sample of samples) {
    for (const fraction of MODE_FRACTIONS[config.analysisMode]) {
      try {
        records.push(
          withQuantificationContext({ sampleName: sample.name, fraction }, () =>
            quantifyFraction(sample, fraction, blank, config)
          )
        )
      } catch (err) {
        if (!(err instanceof QuantificationError)) throw err
        console.warn(`Quantify: ${err.message}`)
        failures.push({ sampleName: sample.name, fraction, kind: err.kind, message: err.message })
      }
    }
  }

  console.log(`Quantify: ${records.length} result(s), ${failures.length} failure(s) across ${samples.length} sample(s)`)
  return { blank, records, failures }
}
