/**
 * Variable reference validation: check that caller-supplied column names exist
 * in a sanitized dataset, reporting exactly which ones do not.
 */

import type { TabularDataset } from '../types'
import { ReferenceValidationError } from './errors'

/** Split a delimited list, trim each entry and drop empties. Order is kept. */
export function splitVariableList(raw: string | null | undefined, delimiter = ','): string[] {
  if (!raw || !raw.trim()) return []
  return raw
    .split(delimiter)
    .map((v) => v.trim())
    .filter(Boolean)
}

export function columnNames(dataset: TabularDataset): string[] {
  return dataset.columns.map((c) => c.name)
}

/** Names in `names` that are not columns of the dataset, in request order. */
export function findMissingVariables(names: string[], dataset: TabularDataset): string[] {
  const available = new Set(columnNames(dataset))
  return names.filter((n) => !available.has(n))
}

/** Required single column, e.g. the case identifier. */
export function requireColumn(dataset: TabularDataset, name: string): void {
  const missing = findMissingVariables([name], dataset)
  if (missing.length > 0) {
    const available = columnNames(dataset)
    throw new ReferenceValidationError(
      `The CSV does not contain the column '${name}'. Available columns: ${available.join(', ')}`,
      missing,
      available,
    )
  }
}

export function requireVariables(dataset: TabularDataset, names: string[]): void {
  const missing = findMissingVariables(names, dataset)
  if (missing.length > 0) {
    const available = columnNames(dataset)
    throw new ReferenceValidationError(
      `Variables not found in the CSV: ${missing.join(', ')}. Available columns: ${available.join(', ')}`,
      missing,
      available,
    )
  }
}
