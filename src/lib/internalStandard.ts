import { IstdAmbiguityError } from './errors'
import type { Peak, PeakList } from './peakList'

export type IstdParams = {
  rt: number
  rtTolerance: number
  area: number
  areaTolerance: number
}

const windowText = (params: IstdParams): string => {
  const rtLow = params.rt - params.rtTolerance
  const rtHigh = params.rt + params.rtTolerance
  const areaLow = params.area - params.areaTolerance
  const areaHigh = params.area + params.areaTolerance
  return `RT [${rtLow}, ${rtHigh}] and area [${areaLow}, ${areaHigh}]`
}

/** Peaks inside both the retention-time and the area window (bounds inclusive). */
export const findInternalStandardCandidates = (peaks: PeakList, params: IstdParams): Peak[] => {
  const rtLow = params.rt - params.rtTolerance
  const rtHigh = params.rt + params.rtTolerance
  const areaLow = params.area - params.areaTolerance
  const areaHigh = params.area + params.areaTolerance
  return peaks.filter((p) => rtLow <= p.rt && p.rt <= rtHigh && areaLow <= p.area && p.area <= areaHigh)
}

/**
 * Area of the internal-standard peak. When several peaks fit both windows the
 * one eluting closest to the nominal RT is taken (earliest on a tie).
 */
export const locateInternalStandard = (peaks: PeakList, params: IstdParams): number => {
  let candidates = findInternalStandardCandidates(peaks, params)

  if (candidates.length > 1) {
    let closest = candidates[0]
    for (const peak of candidates.slice(1)) {
      if (Math.abs(peak.rt - params.rt) < Math.abs(closest.rt - params.rt)) closest = peak
    }
    candidates = [closest]
  }

  if (candidates.length === 0) {
    throw new IstdAmbiguityError(`no acceptable internal standard peak within ${windowText(params)}`, 0)
  }
  if (candidates.length > 1) {
    throw new IstdAmbiguityError(
      `${candidates.length} candidate internal standard peaks within ${windowText(params)}, ambiguous`,
      candidates.length
    )
  }
  return candidates[0].area
}
