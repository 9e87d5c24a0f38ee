import { parseArgs } from 'node:util'
import { quantifyBatch } from './lib/batch'
import { loadConfig } from './lib/config'
import { writeCsvFile } from './lib/csvWriter'
import { readReportFile, type RunReport } from './lib/massHunterReport'

const USAGE = 'Usage: trh-quant --config <config.json> --blank <report> [--blank <report> ...] --out <results.csv> <sample report> ...'

const readReports = async (paths: readonly string[]): Promise<RunReport[]> => {
  const reports: RunReport[] = []
  for (const path of paths) {
    const report = await readReportFile(path)
    for (const warning of report.warnings) console.warn(`Report: ${report.source}: ${warning}`)
    console.log(`Report: ${report.source} -> '${report.name}', ${report.peaks.length} peak(s)`)
    reports.push(report)
  }
  return reports
}

const main = async (argv: string[]): Promise<number> => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      blank: { type: 'string', short: 'b', multiple: true },
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return 0
  }
  const blankPaths = values.blank ?? []
  if (!values.config || !values.out || !blankPaths.length || !positionals.length) {
    console.error(USAGE)
    return 2
  }

  const config = await loadConfig(values.config)
  const blanks = await readReports(blankPaths)
  const samples = await readReports(positionals)

  const result = quantifyBatch({ blanks, samples, config })
  await writeCsvFile(values.out, result.records, config.outputFields)
  console.log(`Quantify: wrote ${result.records.length} record(s) to ${values.out}`)

  for (const failure of result.failures) {
    console.error(`Quantify: FAILED ${failure.sampleName} ${failure.fraction} [${failure.kind}] ${failure.message}`)
  }
  return result.failures.length ? 1 : 0
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(`Quantify: aborted: ${err instanceof Error ? err.message : String(err)}`)
    process.exitCode = 1
  }
)
