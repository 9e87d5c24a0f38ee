import { writeFile } from 'node:fs/promises'

export type CsvValue = string | number | boolean | null | undefined
export type CsvRecord = Readonly<Record<string, CsvValue>>

const formatValue = (value: CsvValue): string => {
  if (value === null || value === undefined) return ''
  return String(value)
}

const escapeCell = (text: string, delimiter: string): string => {
  if (text.includes(delimiter) || text.includes('"') || /[\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

/** Header row plus one line per record; fields outside `fields` are ignored. */
export const formatCsv = (records: readonly CsvRecord[], fields: readonly string[], delimiter = ','): string => {
  const lines = [fields.map((f) => escapeCell(f, delimiter)).join(delimiter)]
  for (const record of records) {
    lines.push(fields.map((f) => escapeCell(formatValue(record[f]), delimiter)).join(delimiter))
  }
  return `${lines.join('\n')}\n`
}

export const writeCsvFile = async (path: string, records: readonly CsvRecord[], fields: readonly string[]) => {
  await writeFile(path, formatCsv(records, fields), 'utf8')
}
