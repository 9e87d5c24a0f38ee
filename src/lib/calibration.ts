import type { CalibrationModel } from './concentration'

export type CalibrationPoint = {
  concentrationRatio: number
  responseRatio: number
}

export type CalibrationFit = CalibrationModel & {
  r2: number
  n: number
}

const isFiniteNumber = (n: unknown): n is number => typeof n === 'number' && Number.isFinite(n)

const r2Score = (y: number[], yHat: number[]): number => {
  const mean = y.reduce((acc, v) => acc + v, 0) / y.length
  let ssTot = 0
  let ssRes = 0
  for (let i = 0; i < y.length; i += 1) {
    ssTot += (y[i] - mean) ** 2
    ssRes += (y[i] - yHat[i]) ** 2
  }
  return ssTot === 0 ? Number.NaN : 1 - ssRes / ssTot
}

export const evalCalibration = (model: CalibrationModel, concentrationRatio: number): number =>
  model.slope * concentrationRatio + model.intercept

/**
 * Ordinary least-squares line of response ratio against concentration ratio.
 * Returns null with fewer than two usable standards or when every standard
 * sits at the same concentration.
 */
export const fitCalibration = (points: readonly CalibrationPoint[]): CalibrationFit | null => {
  const clean = points.filter((p) => isFiniteNumber(p.concentrationRatio) && isFiniteNumber(p.responseRatio))
  if (clean.length < 2) return null

  const xs = clean.map((p) => p.concentrationRatio)
  const ys = clean.map((p) => p.responseRatio)
  const xMean = xs.reduce((a, v) => a + v, 0) / xs.length
  const yMean = ys.reduce((a, v) => a + v, 0) / ys.length

  let cov = 0
  let varx = 0
  for (let i = 0; i < xs.length; i += 1) {
    cov += (xs[i] - xMean) * (ys[i] - yMean)
    varx += (xs[i] - xMean) ** 2
  }
  if (varx === 0) return null

  const slope = cov / varx
  const intercept = yMean - slope * xMean
  const yHat = xs.map((x) => slope * x + intercept)
  return { slope, intercept, r2: r2Score(ys, yHat), n: clean.length }
}
