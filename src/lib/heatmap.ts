import type { CellValue, HeatmapPayload, HeatmapPoint, TabularDataset } from '../types'
import { SchemaMismatchError } from './errors'
import { parseNumber } from './sanitize'

// Fixed two-profile projection, whatever k the table was extracted with.
export const HEATMAP_PROFILES = ['k1', 'k2'] as const
export const HEATMAP_VALUE_KEY = 'Coeficiente GOM'
const REQUIRED = ['Variable', 'Level', ...HEATMAP_PROFILES]

function label(value: CellValue): string {
  return value === null ? '' : String(value)
}

export function toHeatmap(table: TabularDataset): HeatmapPayload {
  const present = new Set(table.columns.map((c) => c.name))
  const missing = REQUIRED.filter((c) => !present.has(c))
  if (missing.length > 0) {
    throw new SchemaMismatchError(`Heatmap source table is missing columns: ${missing.join(', ')}`, {
      missing,
      available: table.columns.map((c) => c.name),
    })
  }

  const yAxisLabels: string[] = []
  const data: HeatmapPoint[] = []
  table.rows.forEach((row, y) => {
    yAxisLabels.push(`${label(row.Variable)} - ${label(row.Level)}`)
    HEATMAP_PROFILES.forEach((profile, x) => {
      data.push([x, y, parseNumber(row[profile] ?? null)])
    })
  })

  return { xAxisLabels: [...HEATMAP_PROFILES], yAxisLabels, data, valueKey: HEATMAP_VALUE_KEY }
}
