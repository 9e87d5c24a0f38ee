export type Separator = 'tab' | 'comma' | 'semicolon' | 'pipe'

export type TableText = {
  rows: string[][]
  maxColumns: number
  separator: Separator
}

const SEPARATOR_CHARS: Record<Separator, string> = {
  tab: '\t',
  comma: ',',
  semicolon: ';',
  pipe: '|',
}

export const detectSeparator = (text: string): Separator => {
  const head = text.split(/\r?\n/).slice(0, 12).join('\n')
  let best: Separator = 'comma'
  let bestCount = 0
  for (const separator of ['tab', 'comma', 'semicolon', 'pipe'] as const) {
    const count = head.split(SEPARATOR_CHARS[separator]).length - 1
    if (count > bestCount) {
      best = separator
      bestCount = count
    }
  }
  return best
}

// Splits one line, honouring double-quoted cells ("a, b" and "" escapes) as spreadsheet exports write them.
export const splitRow = (line: string, separator: Separator): string[] => {
  const sep = SEPARATOR_CHARS[separator]
  const cells: string[] = []
  let cell = ''
  let quoted = false

  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i]
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cell += '"'
        i += 1
      } else if (ch === '"') {
        quoted = false
      } else {
        cell += ch
      }
    } else if (ch === '"' && cell.trim() === '') {
      quoted = true
      cell = ''
    } else if (ch === sep) {
      cells.push(cell.trim())
      cell = ''
    } else {
      cell += ch
    }
  }
  cells.push(cell.trim())
  return cells
}

/**
 * Splits a delimited export into a rectangular grid. Blank lines are kept as
 * rows of empty cells because they delimit report sections.
 */
export const parseTableText = (text: string, separator?: Separator): TableText => {
  const normalized = text.replace(/\r/g, '').replace(/\n+$/, '')
  if (!normalized.trim()) return { rows: [], maxColumns: 0, separator: separator ?? 'comma' }

  const sep = separator ?? detectSeparator(normalized)
  const rawRows = normalized.split('\n').map((line) => splitRow(line, sep))
  const maxColumns = rawRows.reduce((max, row) => Math.max(max, row.length), 0)
  const rows = rawRows.map((row) => {
    if (row.length === maxColumns) return row
    return [...row, ...Array.from({ length: maxColumns - row.length }, () => '')]
  })
  return { rows, maxColumns, separator: sep }
}
