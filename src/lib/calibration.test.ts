import { describe, expect, it } from 'vitest'
import { evalCalibration, fitCalibration } from './calibration'

describe('calibration', () => {
  it('fits a noiseless line exactly', () => {
    // response = 2 * conc + 0.5
    const points = [0, 1, 2, 3].map((c) => ({ concentrationRatio: c, responseRatio: 2 * c + 0.5 }))
    const fit = fitCalibration(points)
    expect(fit).not.toBeNull()
    expect(fit!.n).toBe(4)
    expect(fit!.slope).toBeCloseTo(2, 10)
    expect(fit!.intercept).toBeCloseTo(0.5, 10)
    expect(fit!.r2).toBeCloseTo(1, 10)
    expect(evalCalibration(fit!, 1.5)).toBeCloseTo(3.5, 10)
  })

  it('ignores non-finite standards', () => {
    const fit = fitCalibration([
      { concentrationRatio: 0, responseRatio: 1 },
      { concentrationRatio: Number.NaN, responseRatio: 4 },
      { concentrationRatio: 2, responseRatio: 5 },
    ])
    expect(fit!.n).toBe(2)
    expect(fit!.slope).toBeCloseTo(2, 10)
    expect(fit!.intercept).toBeCloseTo(1, 10)
  })

  it('returns null when the standards do not define a line', () => {
    expect(fitCalibration([{ concentrationRatio: 1, responseRatio: 1 }])).toBeNull()
    expect(
      fitCalibration([
        { concentrationRatio: 1, responseRatio: 1 },
        { concentrationRatio: 1, responseRatio: 2 },
      ])
    ).toBeNull()
  })
})
