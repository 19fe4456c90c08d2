/**
 * Table sanitizer: strips quote characters and whitespace from column names and
 * cells, then coerces each column to numeric when every present value parses.
 */

import type { CellValue, ColumnMeta, DataRow, TabularDataset } from '../types'
import { uniqueNames } from './csvParse'

const QUOTES = /["']/g
const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

export function stripQuotes(value: string): string {
  return value.replace(QUOTES, '').trim()
}

/** Parse a decimal literal; anything else (including '', 'NaN', '0x1F') is null. */
export function parseNumber(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (value === null) return null
  const s = value.trim()
  if (!NUMERIC_LITERAL.test(s)) return null
  const n = Number(s)
  return Number.isFinite(n) ? n : null
}

function cleanCell(value: CellValue): CellValue {
  if (typeof value !== 'string') return value
  const s = stripQuotes(value)
  return s === '' ? null : s
}

/** All-or-nothing: numbers for every cell, or null if any present cell does not parse. */
function coerceColumn(values: CellValue[]): number[] | null {
  const out: number[] = []
  for (const v of values) {
    if (v === null) continue
    const n = parseNumber(v)
    if (n === null) return null
    out.push(n)
  }
  return out
}

export function sanitizeDataset(dataset: TabularDataset): TabularDataset {
  const sourceNames = dataset.columns.map((c) => c.name)
  const names = uniqueNames(sourceNames.map(stripQuotes))
  const columns: ColumnMeta[] = []
  const cleanedByColumn: CellValue[][] = []

  sourceNames.forEach((source, j) => {
    const cleaned = dataset.rows.map((row) => cleanCell(row[source] ?? null))
    const numeric = coerceColumn(cleaned)
    if (numeric) {
      let k = 0
      cleanedByColumn.push(cleaned.map((v) => (v === null ? null : numeric[k++])))
      columns.push({ name: names[j], type: 'numeric' })
    } else {
      cleanedByColumn.push(cleaned)
      columns.push({ name: names[j], type: 'string' })
    }
  })

  // fromEntries defines own keys, so a column named __proto__ stays a column
  const rows: DataRow[] = dataset.rows.map((_, i) =>
    Object.fromEntries(columns.map((c, j): [string, CellValue] => [c.name, cleanedByColumn[j][i]])),
  )

  return { columns, rows }
}
