import { describe, it, expect } from 'vitest'
import { decodeUtf8, parseCSV, serializeCSV, uniqueNames } from './csvParse'
import { MalformedInputError } from './errors'
import type { TabularDataset } from '../types'

describe('csvParse', () => {
  describe('decodeUtf8', () => {
    it('decodes UTF-8 and drops the byte order mark', () => {
      expect(decodeUtf8(new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0xc3, 0xa9]))).toBe('aé')
    })

    it('rejects bytes that are not valid UTF-8', () => {
      let error: unknown
      try {
        decodeUtf8(new Uint8Array([0x61, 0xff, 0x62]))
      } catch (err) {
        error = err
      }
      expect(error).toBeInstanceOf(MalformedInputError)
      expect(error instanceof MalformedInputError && error.reason).toBe('decode')
    })
  })

  describe('parseCSV', () => {
    it('keeps every cell as a raw string', () => {
      const ds = parseCSV('id,"name"\n1, "Ana"\n2,Bo\n')
      expect(ds.columns).toEqual([
        { name: 'id', type: 'string' },
        { name: 'name', type: 'string' },
      ])
      expect(ds.rows).toEqual([
        { id: '1', name: ' "Ana"' },
        { id: '2', name: 'Bo' },
      ])
    })

    it('pads short rows with missing cells', () => {
      expect(parseCSV('a,b\n1\n').rows).toEqual([{ a: '1', b: null }])
    })

    it('rejects rows wider than the header', () => {
      expect(() => parseCSV('a,b\n1,2,3\n')).toThrow(MalformedInputError)
    })

    it('rejects an unterminated quoted field', () => {
      expect(() => parseCSV('a,b\n"1,2\n')).toThrow(/Malformed CSV/)
    })

    it('rejects empty input', () => {
      expect(() => parseCSV('')).toThrow('CSV file is empty.')
    })

    it('names blank headers and disambiguates duplicates', () => {
      const ds = parseCSV('a,,a\n1,2,3\n')
      expect(ds.columns.map((c) => c.name)).toEqual(['a', 'Column_2', 'a.1'])
      expect(ds.rows[0]).toEqual({ a: '1', Column_2: '2', 'a.1': '3' })
    })

    it('skips lines that hold a single empty field', () => {
      expect(parseCSV('v\n1\n\n""\n2\n').rows).toEqual([{ v: '1' }, { v: '2' }])
    })

    it('honours a custom delimiter', () => {
      expect(parseCSV('a;b\n1;2\n', { delimiter: ';' }).rows).toEqual([{ a: '1', b: '2' }])
    })
  })

  it('uniqueNames suffixes repeats in order', () => {
    expect(uniqueNames(['x', 'x', 'x', 'y'])).toEqual(['x', 'x.1', 'x.2', 'y'])
  })

  it('serializeCSV quotes fields containing the delimiter and blanks missing cells', () => {
    const ds: TabularDataset = {
      columns: [
        { name: 'id', type: 'numeric' },
        { name: 'note', type: 'string' },
      ],
      rows: [
        { id: 1, note: 'a,b' },
        { id: null, note: 'x' },
      ],
    }
    expect(serializeCSV(ds)).toBe('id,note\n1,"a,b"\n,x')
  })
})
