import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { formatCsv, writeCsvFile } from './csvWriter'

describe('csvWriter', () => {
  it('writes a header and the declared fields only', () => {
    const csv = formatCsv(
      [
        { sampleName: 'SW-1', fraction: 'C10-C16', concentration: 12.5, area: 999 },
        { sampleName: 'SW-2', fraction: 'C16-C34', concentration: null },
      ],
      ['sampleName', 'fraction', 'concentration']
    )
    expect(csv).toBe('sampleName,fraction,concentration\nSW-1,C10-C16,12.5\nSW-2,C16-C34,\n')
  })

  it('quotes cells holding delimiters, quotes or newlines', () => {
    const csv = formatCsv([{ a: 'x,y', b: 'say "hi"', c: 'two\nlines' }], ['a', 'b', 'c'])
    expect(csv).toBe('a,b,c\n"x,y","say ""hi""","two\nlines"\n')
  })

  it('writes the table to disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'trh-csv-'))
    try {
      const path = join(dir, 'results.csv')
      await writeCsvFile(path, [{ sampleName: 'SW-1', concentration: 3 }], ['sampleName', 'concentration'])
      expect(await readFile(path, 'utf8')).toBe('sampleName,concentration\nSW-1,3\n')
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
