import { describe, it, expect } from 'vitest'
import { profileDataset } from './datasetProfile'
import type { TabularDataset } from '../types'

describe('profileDataset', () => {
  const dataset: TabularDataset = {
    columns: [
      { name: 'age', type: 'numeric' },
      { name: 'grp', type: 'string' },
    ],
    rows: [
      { age: 30, grp: 'a' },
      { age: null, grp: 'a' },
      { age: 40, grp: null },
    ],
  }

  it('summarises numeric columns', () => {
    const age = profileDataset(dataset).columns[0]
    expect(age).toEqual({
      name: 'age',
      type: 'numeric',
      missingPct: 33.3,
      distinct: 2,
      numeric: { mean: 35, sd: 5, min: 30, max: 40 },
    })
  })

  it('reports missing share and distinct values for string columns', () => {
    const profile = profileDataset(dataset)
    expect(profile.rowCount).toBe(3)
    expect(profile.columns[1]).toEqual({ name: 'grp', type: 'string', missingPct: 33.3, distinct: 1 })
  })

  it('handles an empty dataset', () => {
    const profile = profileDataset({ columns: [{ name: 'v', type: 'numeric' }], rows: [] })
    expect(profile).toEqual({ rowCount: 0, columns: [{ name: 'v', type: 'numeric', missingPct: 0, distinct: 0 }] })
  })
})
