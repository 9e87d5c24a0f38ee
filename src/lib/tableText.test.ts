import { describe, expect, it } from 'vitest'
import { detectSeparator, parseTableText, splitRow } from './tableText'

describe('tableText', () => {
  it('detects the separator from the leading lines', () => {
    expect(detectSeparator('a\tb\tc\n1\t2\t3')).toBe('tab')
    expect(detectSeparator('a;b;c')).toBe('semicolon')
    expect(detectSeparator('single column')).toBe('comma')
  })

  it('splits quoted cells with embedded separators and quotes', () => {
    expect(splitRow('"say ""hi""",2', 'comma')).toEqual(['say "hi"', '2'])
    expect(splitRow(' a ,"1,5", b', 'comma')).toEqual(['a', '1,5', 'b'])
  })

  it('keeps blank lines as padded empty rows', () => {
    const table = parseTableText('a,b,c\r\n\r\n"x, y",2\n')
    expect(table.separator).toBe('comma')
    expect(table.maxColumns).toBe(3)
    expect(table.rows).toEqual([
      ['a', 'b', 'c'],
      ['', '', ''],
      ['x, y', '2', ''],
    ])
  })

  it('returns no rows for blank text', () => {
    expect(parseTableText('  \n ').rows).toEqual([])
  })
})
