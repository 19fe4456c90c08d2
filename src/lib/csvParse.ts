import Papa from 'papaparse'
import type { CellValue, ColumnMeta, DataRow, PipelineOptions, TabularDataset } from '../types'
import { MalformedInputError } from './errors'
import { DEFAULT_PIPELINE_OPTIONS } from './options'

/** Decode uploaded bytes. Invalid UTF-8 is rejected instead of being replaced. */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MalformedInputError('decode', 'Could not decode the CSV file as UTF-8.', { cause: message })
  }
}

/** Make names unique in order: a, a -> a, a.1 */
export function uniqueNames(names: string[]): string[] {
  const seen = new Set<string>()
  return names.map((name) => {
    let candidate = name
    let i = 1
    while (seen.has(candidate)) candidate = `${name}.${i++}`
    seen.add(candidate)
    return candidate
  })
}

/**
 * Parse delimited text into a string-typed dataset. The first row is the header.
 * Rows shorter than the header are padded with missing cells; wider rows are an error.
 */
export function parseCSV(csvText: string, options: Pick<PipelineOptions, 'delimiter'> = DEFAULT_PIPELINE_OPTIONS): TabularDataset {
  const parsed = Papa.parse<string[]>(csvText, { delimiter: options.delimiter, skipEmptyLines: true })
  const fatal = parsed.errors.find((e) => e.code === 'MissingQuotes')
  if (fatal) {
    throw new MalformedInputError('parse', `Malformed CSV: ${fatal.message} (row ${fatal.row ?? '?'}).`)
  }
  const rows = parsed.data
  if (rows.length === 0) throw new MalformedInputError('parse', 'CSV file is empty.')

  const headers = uniqueNames(rows[0].map((h, j) => h.trim() || `Column_${j + 1}`))
  const dataRows: DataRow[] = []

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i]
    if (row.length > headers.length) {
      throw new MalformedInputError(
        'parse',
        `Malformed CSV: expected ${headers.length} fields in line ${i + 1}, saw ${row.length}.`,
      )
    }
    dataRows.push(Object.fromEntries(headers.map((h, j): [string, CellValue] => [h, j < row.length ? row[j] : null])))
  }

  return { columns: headers.map((name): ColumnMeta => ({ name, type: 'string' })), rows: dataRows }
}

function formatCell(value: CellValue): string {
  if (value === null) return ''
  return typeof value === 'number' ? String(value) : value
}

/** Serialize a dataset back to delimited text with a header row. Missing cells become empty fields. */
export function serializeCSV(dataset: TabularDataset, options: Pick<PipelineOptions, 'delimiter'> = DEFAULT_PIPELINE_OPTIONS): string {
  const fields = dataset.columns.map((c) => c.name)
  const data = dataset.rows.map((row) => fields.map((f) => formatCell(row[f] ?? null)))
  return Papa.unparse({ fields, data }, { delimiter: options.delimiter, newline: '\n' })
}
