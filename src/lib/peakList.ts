export type Peak = {
  index: number
  startRt: number
  rt: number
  endRt: number
  area: number
}

// Ordered by ascending rt. Boundary lookups work on positions, not on `index`.
export type PeakList = readonly Peak[]

const isFiniteNumber = (n: unknown): n is number => typeof n === 'number' && Number.isFinite(n)

/** Sum of `area` over positions [low, high). Out-of-range bounds clamp; an empty range sums to 0. */
export const sumAreas = (peaks: PeakList, low: number, high: number): number => {
  const start = Math.max(0, Math.trunc(low))
  const end = Math.min(peaks.length, Math.trunc(high))
  let total = 0
  for (let i = start; i < end; i += 1) total += peaks[i].area
  return total
}

export const mean = (values: readonly number[]): number | null => {
  if (!values.length) return null
  return values.reduce((acc, v) => acc + v, 0) / values.length
}

/**
 * Rounds half to even. A value is a tie only when its exact binary value sits
 * halfway, so `0.125` rounds to `0.12` while `2.675` (stored just below) gives `2.67`.
 */
export const roundTo = (value: number, decimalPlaces: number): number => {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value
  const magnitude = Math.abs(value)
  // enough digits to show the exact expansion past the rounding position
  const exact = magnitude.toFixed(Math.min(100, decimalPlaces + 30))
  const cut = exact.indexOf('.') + 1 + decimalPlaces
  const kept = exact.slice(0, cut)
  const isTie = /^50*$/.test(exact.slice(cut))
  const lastDigit = Number(kept.replace('.', '').slice(-1))
  const rounded = isTie && lastDigit % 2 === 0 ? Number(kept) : Number(magnitude.toFixed(decimalPlaces))
  const signed = value < 0 ? -rounded : rounded
  return signed === 0 ? 0 : signed
}

/**
 * Structural problems that do not stop quantification but are worth reporting:
 * stored indices that drift from list position, inverted retention windows,
 * negative areas, and peaks out of retention order.
 */
export const checkPeakList = (peaks: PeakList): string[] => {
  const warnings: string[] = []
  let indexDrift = 0

  peaks.forEach((peak, pos) => {
    if (peak.index !== pos + 1) indexDrift += 1
    if (!isFiniteNumber(peak.startRt) || !isFiniteNumber(peak.rt) || !isFiniteNumber(peak.endRt)) {
      warnings.push(`Peak ${peak.index}: retention times are not finite numbers.`)
      return
    }
    if (peak.startRt > peak.rt || peak.rt > peak.endRt) {
      warnings.push(`Peak ${peak.index}: expected start <= RT <= end, got ${peak.startRt} / ${peak.rt} / ${peak.endRt}.`)
    }
    if (!isFiniteNumber(peak.area) || peak.area < 0) {
      warnings.push(`Peak ${peak.index}: area ${peak.area} is not a non-negative number.`)
    }
    const prev = pos > 0 ? peaks[pos - 1] : null
    if (prev && peak.rt < prev.rt) {
      warnings.push(`Peak ${peak.index}: RT ${peak.rt} is earlier than the preceding peak (${prev.rt}).`)
    }
  })

  if (indexDrift) {
    warnings.push(`${indexDrift} peak(s) have an index that does not match their position; positions are used.`)
  }
  return warnings
}
