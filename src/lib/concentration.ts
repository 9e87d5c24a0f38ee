import type { BlankAverage } from './blankAverage'
import { NumericDegeneracyError } from './errors'
import type { FractionWindow } from './fractions'
import { locateInternalStandard, type IstdParams } from './internalStandard'
import { roundTo, sumAreas, type PeakList } from './peakList'

export type CalibrationModel = {
  slope: number
  intercept: number
}

export type ConcentrationInput = {
  peaks: PeakList
  window: FractionWindow
  istd: IstdParams
  blankAverage: Pick<BlankAverage, 'istd'>
  // Averaged blank area of the fraction being quantified.
  blankFractionArea: number
  calibration: CalibrationModel
  istdConcentration: number
  dilutionFactor: number
  decimalPlaces: number
}

export type ConcentrationDetail = {
  area: number
  istdArea: number
  istdBlankCorrected: number
  areaBlankCorrected: number
  responseRatio: number
  concentrationRatio: number
  concentrationVial: number
  concentrationSample: number
  concentration: number
}

const requireFinite = (quantity: string, value: number): number => {
  if (!Number.isFinite(value)) throw new NumericDegeneracyError(quantity, `${quantity} is not a finite number (${value})`)
  return value
}

const divide = (quantity: string, numerator: number, denominator: number, denominatorName: string): number => {
  if (denominator === 0) throw new NumericDegeneracyError(quantity, `${denominatorName} is zero, cannot compute ${quantity}`)
  return requireFinite(quantity, numerator / denominator)
}

/** Concentration ratio that would have produced `responseRatio` on the calibration line. */
export const invertCalibration = (calibration: CalibrationModel, responseRatio: number): number =>
  divide('concentration ratio', responseRatio - calibration.intercept, calibration.slope, 'calibration slope')

export const computeConcentrationDetail = (input: ConcentrationInput): ConcentrationDetail => {
  const area = requireFinite('fraction area', sumAreas(input.peaks, input.window.low, input.window.high))
  const istdArea = locateInternalStandard(input.peaks, input.istd)
  requireFinite('blank fraction area', input.blankFractionArea)

  // Background the blank would contribute at this sample's ISTD response.
  const blankRatio = divide('blank-to-ISTD ratio', input.blankFractionArea, input.blankAverage.istd, 'blank ISTD area')
  const istdBlankCorrected = istdArea * blankRatio
  const areaBlankCorrected = area - istdBlankCorrected

  const responseRatio = divide('response ratio', areaBlankCorrected, istdArea, 'sample ISTD area')
  const concentrationRatio = invertCalibration(input.calibration, responseRatio)
  const concentrationVial = requireFinite('vial concentration', concentrationRatio * input.istdConcentration)
  const concentrationSample = requireFinite('sample concentration', concentrationVial * input.dilutionFactor)

  return {
    area,
    istdArea,
    istdBlankCorrected,
    areaBlankCorrected,
    responseRatio,
    concentrationRatio,
    concentrationVial,
    concentrationSample,
    concentration: roundTo(concentrationSample, input.decimalPlaces),
  }
}

export const computeConcentration = (input: ConcentrationInput): number => computeConcentrationDetail(input).concentration
