import { readFile } from 'node:fs/promises'
import { basename, extname } from 'node:path'
import * as XLSX from 'xlsx'
import { ReportFormatError } from './errors'
import { checkPeakList, type Peak } from './peakList'
import { parseTableText } from './tableText'

export type ReportCell = string | number | boolean | Date | null | undefined
export type ReportGrid = ReadonlyArray<ReadonlyArray<ReportCell>>

export type RunReport = {
  source: string
  name: string
  acquiredAt: string
  peaks: Peak[]
  warnings: string[]
}

type CellPos = { row: number; col: number }

const SAMPLE_NAME_LABEL = 'Sample Name'
const ACQUIRED_TIME_LABEL = 'Acquired Time'
const PEAK_LIST_LABEL = 'Integration Peak List'
const PEAK_COLUMNS = { startRt: 'Start', rt: 'RT', endRt: 'End', area: 'Area' } as const

const cellText = (cell: ReportCell): string => {
  if (cell === null || cell === undefined) return ''
  if (cell instanceof Date) return cell.toISOString()
  return String(cell).trim()
}

const sameLabel = (cell: ReportCell, label: string) => cellText(cell).toLowerCase() === label.toLowerCase()

const toNumber = (cell: ReportCell): number | null => {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null
  const s = cellText(cell)
  if (!s) return null
  const n = Number(s)
  return Number.isFinite(n) ? n : null
}

const findLabel = (rows: ReportGrid, label: string): CellPos | null => {
  for (let row = 0; row < rows.length; row += 1) {
    const col = rows[row].findIndex((cell) => sameLabel(cell, label))
    if (col >= 0) return { row, col }
  }
  return null
}

// Labels and values sit in merged cells, so the value is the first non-empty cell to the right.
const valueRightOf = (rows: ReportGrid, pos: CellPos): string | null => {
  const row = rows[pos.row]
  for (let col = pos.col + 1; col < row.length; col += 1) {
    const text = cellText(row[col])
    if (text) return text
  }
  return null
}

const labelledValue = (rows: ReportGrid, label: string, source: string): string => {
  const pos = findLabel(rows, label)
  if (!pos) throw new ReportFormatError(source, `'${label}' label not found`)
  const value = valueRightOf(rows, pos)
  if (value === null) throw new ReportFormatError(source, `no value next to '${label}' (row ${pos.row + 1})`)
  return value
}

const findColumn = (header: ReadonlyArray<ReportCell>, title: string, source: string, row: number): number => {
  const col = header.findIndex((cell) => sameLabel(cell, title))
  if (col < 0) throw new ReportFormatError(source, `peak list column '${title}' not found on row ${row + 1}`)
  return col
}

const readNumber = (cell: ReportCell, what: string, source: string, row: number): number => {
  const n = toNumber(cell)
  if (n === null) throw new ReportFormatError(source, `row ${row + 1}: ${what} '${cellText(cell)}' is not a number`)
  return n
}

/**
 * Reads sample metadata and the integration peak list out of an exported
 * GC-MS report laid out as a grid of cells (first worksheet or delimited text).
 */
export const parseReportRows = (rows: ReportGrid, source = 'report'): RunReport => {
  const name = labelledValue(rows, SAMPLE_NAME_LABEL, source)
  const acquiredAt = labelledValue(rows, ACQUIRED_TIME_LABEL, source)

  const title = findLabel(rows, PEAK_LIST_LABEL)
  if (!title) throw new ReportFormatError(source, `'${PEAK_LIST_LABEL}' section not found`)
  const headerRow = title.row + 1
  const header = rows[headerRow]
  if (!header) throw new ReportFormatError(source, `peak list header row missing after row ${title.row + 1}`)

  const indexCol = title.col
  const cols = {
    startRt: findColumn(header, PEAK_COLUMNS.startRt, source, headerRow),
    rt: findColumn(header, PEAK_COLUMNS.rt, source, headerRow),
    endRt: findColumn(header, PEAK_COLUMNS.endRt, source, headerRow),
    area: findColumn(header, PEAK_COLUMNS.area, source, headerRow),
  }

  const peaks: Peak[] = []
  for (let r = headerRow + 1; r < rows.length; r += 1) {
    const row = rows[r]
    if (!cellText(row[indexCol])) break
    const index = readNumber(row[indexCol], 'peak index', source, r)
    if (!Number.isInteger(index)) {
      throw new ReportFormatError(source, `row ${r + 1}: peak index '${cellText(row[indexCol])}' is not an integer`)
    }
    peaks.push({
      index,
      startRt: readNumber(row[cols.startRt], PEAK_COLUMNS.startRt, source, r),
      rt: readNumber(row[cols.rt], PEAK_COLUMNS.rt, source, r),
      endRt: readNumber(row[cols.endRt], PEAK_COLUMNS.endRt, source, r),
      area: readNumber(row[cols.area], PEAK_COLUMNS.area, source, r),
    })
  }

  const warnings = checkPeakList(peaks)
  if (!peaks.length) warnings.push('Integration peak list is empty.')
  return { source, name, acquiredAt, peaks, warnings }
}

export const parseReportText = (text: string, source = 'report'): RunReport =>
  parseReportRows(parseTableText(text).rows, source)

export const parseReportWorkbook = (data: Uint8Array, source = 'report'): RunReport => {
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true })
  const sheetName = workbook.SheetNames[0]
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName]
  if (!sheet) throw new ReportFormatError(source, 'workbook has no worksheets')
  const rows = XLSX.utils.sheet_to_json<ReportCell[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true })
  return parseReportRows(rows, source)
}

export const readReportFile = async (path: string): Promise<RunReport> => {
  const source = basename(path)
  const ext = extname(path).toLowerCase()
  if (ext === '.xlsx' || ext === '.xls') return parseReportWorkbook(await readFile(path), source)
  if (ext === '.csv' || ext === '.tsv' || ext === '.txt') return parseReportText(await readFile(path, 'utf8'), source)
  throw new ReportFormatError(source, `unsupported report type '${ext || '(none)'}'`)
}
