/**
 * Column summary of a sanitized upload, returned with the model result so the
 * front end can show what was actually sent to the model.
 */

import { max, mean, min, standardDeviation } from 'simple-statistics'
import type { ColumnType, TabularDataset } from '../types'

export interface NumericSummary {
  mean: number
  sd: number
  min: number
  max: number
}

export interface ColumnProfile {
  name: string
  type: ColumnType
  missingPct: number
  distinct: number
  numeric?: NumericSummary
}

export interface DatasetProfile {
  rowCount: number
  columns: ColumnProfile[]
}

function round(n: number, digits = 4): number {
  const f = 10 ** digits
  return Math.round(n * f) / f
}

export function profileDataset(dataset: TabularDataset): DatasetProfile {
  const n = dataset.rows.length
  const columns = dataset.columns.map((col): ColumnProfile => {
    const present = dataset.rows.map((r) => r[col.name] ?? null).filter((v): v is string | number => v !== null)
    const profile: ColumnProfile = {
      name: col.name,
      type: col.type,
      missingPct: n ? Math.round(((n - present.length) / n) * 1000) / 10 : 0,
      distinct: new Set(present).size,
    }
    const nums = present.filter((v): v is number => typeof v === 'number')
    if (col.type === 'numeric' && nums.length > 0) {
      profile.numeric = {
        mean: round(mean(nums)),
        sd: round(standardDeviation(nums)),
        min: min(nums),
        max: max(nums),
      }
    }
    return profile
  })
  return { rowCount: n, columns }
}
