/**
 * Schema projector for the LMFR table. Column layout is generated from the
 * profile count k: Variable, Level, n, perc, k1..kk, k1_perc_lj..kk_perc_lj.
 */

import type { CellValue, ColumnMeta, DataRow, ProfileSchema, ReportRecord, TabularDataset } from '../types'
import { MalformedInputError, SchemaMismatchError } from './errors'
import { parseNumber } from './sanitize'

const LABEL_COLUMNS = ['Variable', 'Level'] as const

/** Upper bound on k; GoM runs fit a handful of profiles. */
export const MAX_PROFILE_COUNT = 50

export function profileSchema(k: number): ProfileSchema {
  if (!Number.isInteger(k) || k < 1)
    throw new MalformedInputError('parameter', `Profile count must be a positive integer, got ${k}.`)
  if (k > MAX_PROFILE_COUNT)
    throw new MalformedInputError('parameter', `Profile count must not exceed ${MAX_PROFILE_COUNT}, got ${k}.`)
  const profiles = Array.from({ length: k }, (_, i) => `k${i + 1}`)
  const numericColumns = ['n', 'perc', ...profiles, ...profiles.map((p) => `${p}_perc_lj`)]
  const columns = [...LABEL_COLUMNS, ...numericColumns]
  return { k, columns, rowWidth: columns.length - 1, numericColumns }
}

/** Coerce the given columns to numbers; a token that fails to parse becomes null. */
export function typeRow(row: DataRow, numericColumns: readonly string[]): DataRow {
  const typed: DataRow = { ...row }
  for (const c of numericColumns) typed[c] = parseNumber(typed[c] ?? null)
  return typed
}

export function projectRecords(records: ReportRecord[], schema: ProfileSchema): TabularDataset {
  const rows: DataRow[] = records.map((record, i) => {
    if (record.length !== schema.columns.length) {
      throw new SchemaMismatchError(
        `Record ${i + 1} has ${record.length} fields; the k=${schema.k} LMFR table expects ${schema.columns.length}.`,
        { expected: schema.columns.length, actual: record.length, record: i },
      )
    }
    const row: DataRow = Object.fromEntries(schema.columns.map((c, j): [string, CellValue] => [c, record[j]]))
    return typeRow(row, schema.numericColumns)
  })
  const numeric = new Set(schema.numericColumns)
  return {
    columns: schema.columns.map((name): ColumnMeta => ({ name, type: numeric.has(name) ? 'numeric' : 'string' })),
    rows,
  }
}
