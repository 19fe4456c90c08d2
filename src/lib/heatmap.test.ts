import { describe, it, expect } from 'vitest'
import { toHeatmap } from './heatmap'
import { SchemaMismatchError } from './errors'
import type { ColumnMeta, TabularDataset } from '../types'

function table(rows: TabularDataset['rows'], names = ['Variable', 'Level', 'k1', 'k2']): TabularDataset {
  return { columns: names.map((name): ColumnMeta => ({ name, type: name === 'Variable' || name === 'Level' ? 'string' : 'numeric' })), rows }
}

describe('toHeatmap', () => {
  it('projects k1/k2 into [x, y, value] triples with "Variable - Level" labels', () => {
    const payload = toHeatmap(
      table([
        { Variable: 'A', Level: '1', k1: 0.6, k2: 0.0 },
        { Variable: 'A', Level: '2', k1: 0.1, k2: 0.9 },
      ]),
    )
    expect(payload.data).toEqual([
      [0, 0, 0.6],
      [1, 0, 0.0],
      [0, 1, 0.1],
      [1, 1, 0.9],
    ])
    expect(payload.yAxisLabels).toEqual(['A - 1', 'A - 2'])
    expect(payload.xAxisLabels).toEqual(['k1', 'k2'])
    expect(payload.valueKey).toBe('Coeficiente GOM')
  })

  it('ignores profiles past k2 and other columns', () => {
    const payload = toHeatmap(
      table([{ Variable: 'x1', Level: '3', n: 10, k1: 0.2, k2: 0.3, k3: 0.5 }], ['Variable', 'Level', 'n', 'k1', 'k2', 'k3']),
    )
    expect(payload.data).toEqual([
      [0, 0, 0.2],
      [1, 0, 0.3],
    ])
    expect(payload.yAxisLabels).toEqual(['x1 - 3'])
  })

  it('emits null for missing values', () => {
    const payload = toHeatmap(table([{ Variable: 'A', Level: 1, k1: null, k2: 0.5 }]))
    expect(payload.data).toEqual([
      [0, 0, null],
      [1, 0, 0.5],
    ])
    expect(payload.yAxisLabels).toEqual(['A - 1'])
  })

  it('names the required columns that are missing', () => {
    let error: unknown
    try {
      toHeatmap(table([], ['Variable', 'Level', 'k1']))
    } catch (err) {
      error = err
    }
    expect(error).toBeInstanceOf(SchemaMismatchError)
    if (!(error instanceof SchemaMismatchError)) return
    expect(error.details).toEqual({ missing: ['k2'], available: ['Variable', 'Level', 'k1'] })
  })
})
