import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { fitCalibration } from './calibration'
import type { CalibrationModel } from './concentration'
import { ConfigError } from './errors'
import {
  ANALYSIS_MODES,
  FRACTION_IDS,
  MODE_BOUNDARIES,
  MODE_FRACTIONS,
  type AnalysisMode,
  type FractionBoundaries,
  type FractionId,
} from './fractions'
import type { IstdParams } from './internalStandard'

export const DEFAULT_DECIMAL_PLACES = 2
export const DEFAULT_OUTPUT_FIELDS: readonly string[] = ['sampleName', 'acquiredAt', 'fraction', 'concentration']

const finite = z.number().finite()
const positive = finite.positive()

const calibrationSchema = z.union([
  z.object({ slope: finite, intercept: finite }).strict(),
  z
    .object({
      standards: z
        .array(z.object({ concentrationRatio: finite, responseRatio: finite }).strict())
        .min(2, 'at least two calibration standards are needed'),
    })
    .strict(),
])

const boundariesSchema = z
  .object({
    c6C10End: finite.optional(),
    c10C16Start: finite.optional(),
    c10C16End: finite.optional(),
    c16C34End: finite.optional(),
    c34C40End: finite.optional(),
  })
  .strict()

export const quantificationConfigSchema = z
  .object({
    analysisMode: z.enum(ANALYSIS_MODES),
    boundaries: boundariesSchema,
    istd: z
      .object({
        rt: finite,
        rtTolerance: finite.nonnegative(),
        area: finite,
        areaTolerance: finite.nonnegative(),
      })
      .strict(),
    calibration: z.record(z.enum(FRACTION_IDS), calibrationSchema),
    istdConcentration: finite,
    dilutionFactor: positive.default(1),
    dilutionFactors: z.record(z.string(), positive).default(() => ({})),
    decimalPlaces: z.number().int().min(0).max(10).default(DEFAULT_DECIMAL_PLACES),
    outputFields: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_OUTPUT_FIELDS]),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    for (const key of MODE_BOUNDARIES[cfg.analysisMode]) {
      if (cfg.boundaries[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['boundaries', key],
          message: `required for ${cfg.analysisMode} analysis`,
        })
      }
    }
    for (const fraction of MODE_FRACTIONS[cfg.analysisMode]) {
      if (cfg.calibration[fraction] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['calibration', fraction],
          message: `required for ${cfg.analysisMode} analysis`,
        })
      }
    }
  })

type RawConfig = z.infer<typeof quantificationConfigSchema>

export type QuantificationConfig = {
  analysisMode: AnalysisMode
  boundaries: FractionBoundaries
  istd: IstdParams
  calibration: Partial<Record<FractionId, CalibrationModel>>
  istdConcentration: number
  dilutionFactor: number
  dilutionFactors: Record<string, number>
  decimalPlaces: number
  outputFields: string[]
}

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')

const resolveCalibrations = (raw: RawConfig['calibration']): QuantificationConfig['calibration'] => {
  const resolved: QuantificationConfig['calibration'] = {}
  for (const fraction of FRACTION_IDS) {
    const entry = raw[fraction]
    if (entry === undefined) continue
    if ('standards' in entry) {
      const fit = fitCalibration(entry.standards)
      if (!fit) throw new ConfigError(`calibration.${fraction}: standards do not define a line (all at one concentration)`)
      resolved[fraction] = { slope: fit.slope, intercept: fit.intercept }
    } else {
      resolved[fraction] = { slope: entry.slope, intercept: entry.intercept }
    }
  }
  return resolved
}

export const parseConfig = (value: unknown): QuantificationConfig => {
  const parsed = quantificationConfigSchema.safeParse(value)
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  const cfg = parsed.data
  return {
    analysisMode: cfg.analysisMode,
    boundaries: cfg.boundaries,
    istd: cfg.istd,
    calibration: resolveCalibrations(cfg.calibration),
    istdConcentration: cfg.istdConcentration,
    dilutionFactor: cfg.dilutionFactor,
    dilutionFactors: cfg.dilutionFactors,
    decimalPlaces: cfg.decimalPlaces,
    outputFields: cfg.outputFields,
  }
}

export const loadConfig = async (path: string): Promise<QuantificationConfig> => {
  const text = await readFile(path, 'utf8')
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`${path}: not valid JSON (${err instanceof Error ? err.message : String(err)})`)
  }
  return parseConfig(value)
}

export const dilutionFactorFor = (config: QuantificationConfig, sampleName: string): number =>
  config.dilutionFactors[sampleName] ?? config.dilutionFactor
