import type { Peak } from '../peakList'

export const mkPeak = (index: number, startRt: number, rt: number, endRt: number, area: number): Peak => ({
  index,
  startRt,
  rt,
  endRt,
  area,
})

// Five evenly spaced peaks, one minute apart, each 1 min wide.
export const fivePeaks = (areas: readonly number[] = [100, 200, 300, 400, 500]): Peak[] =>
  areas.map((area, i) => mkPeak(i + 1, i + 0.5, i + 1, i + 1.5, area))

export const trhBoundaries = {
  c10C16Start: 0.6,
  c10C16End: 3.2,
  c16C34End: 4.1,
  c34C40End: 5.0,
}

// Peak 3 (RT 3) in every fixture run.
export const fixtureIstd = { rt: 3, rtTolerance: 0.2, area: 300, areaTolerance: 400 }
