import type { FractionId } from './fractions'

export type QuantificationContext = {
  sampleName?: string
  fraction?: FractionId
}

export type QuantificationErrorKind = 'boundary-resolution' | 'istd-ambiguity' | 'numeric-degeneracy'

const describeContext = (context: QuantificationContext): string => {
  const parts: string[] = []
  if (context.sampleName !== undefined) parts.push(`sample '${context.sampleName}'`)
  if (context.fraction !== undefined) parts.push(`fraction ${context.fraction}`)
  return parts.length ? `${parts.join(', ')}: ` : ''
}

/**
 * Base for every failure the quantification engine raises. `condition` is the
 * bare description; `message` prefixes it with whatever sample/fraction context
 * the caller attached.
 */
export abstract class QuantificationError extends Error {
  abstract readonly kind: QuantificationErrorKind
  readonly condition: string
  readonly context: QuantificationContext

  constructor(condition: string, context: QuantificationContext = {}) {
    super(`${describeContext(context)}${condition}`)
    this.condition = condition
    this.context = context
  }

  abstract withContext(context: QuantificationContext): QuantificationError
}

export class BoundaryResolutionError extends QuantificationError {
  readonly kind = 'boundary-resolution' as const
  readonly name = 'BoundaryResolutionError'
  readonly targetRt: number

  constructor(targetRt: number, context: QuantificationContext = {}) {
    super(`no peak found ending at or after target retention time ${targetRt}`, context)
    this.targetRt = targetRt
  }

  withContext(context: QuantificationContext): BoundaryResolutionError {
    return new BoundaryResolutionError(this.targetRt, { ...this.context, ...context })
  }
}

export class IstdAmbiguityError extends QuantificationError {
  readonly kind = 'istd-ambiguity' as const
  readonly name = 'IstdAmbiguityError'
  readonly candidates: number

  constructor(condition: string, candidates: number, context: QuantificationContext = {}) {
    super(condition, context)
    this.candidates = candidates
  }

  withContext(context: QuantificationContext): IstdAmbiguityError {
    return new IstdAmbiguityError(this.condition, this.candidates, { ...this.context, ...context })
  }
}

export class NumericDegeneracyError extends QuantificationError {
  readonly kind = 'numeric-degeneracy' as const
  readonly name = 'NumericDegeneracyError'
  readonly quantity: string

  constructor(quantity: string, condition: string, context: QuantificationContext = {}) {
    super(condition, context)
    this.quantity = quantity
  }

  withContext(context: QuantificationContext): NumericDegeneracyError {
    return new NumericDegeneracyError(this.quantity, this.condition, { ...this.context, ...context })
  }
}

// Runs `fn`, re-raising engine failures with the given context attached.
export const withQuantificationContext = <T>(context: QuantificationContext, fn: () => T): T => {
  try {
    return fn()
  } catch (err) {
    if (err instanceof QuantificationError) throw err.withContext(context)
    throw err
  }
}

export class ReportFormatError extends Error {
  readonly name = 'ReportFormatError'
  readonly source: string

  constructor(source: string, condition: string) {
    super(`${source}: ${condition}`)
    this.source = source
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError'
}
