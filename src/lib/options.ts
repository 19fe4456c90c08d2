import type { PipelineOptions } from '../types'
import { MalformedInputError } from './errors'

export const LMFR_HEADER_MARKER = 'Lambda-Marginal Frequency Ratio (LMFR)'

export const DEFAULT_PIPELINE_OPTIONS: Readonly<PipelineOptions> = Object.freeze({
  delimiter: ',',
  encoding: 'utf-8',
  headerMarker: LMFR_HEADER_MARKER,
  sentinel: '*',
})

/** Merge per-request overrides onto the defaults. Returns a fresh object every call. */
export function resolveOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  const options: PipelineOptions = { ...DEFAULT_PIPELINE_OPTIONS, ...overrides }
  if (options.delimiter.length !== 1)
    throw new MalformedInputError('parameter', `Delimiter must be a single character, got "${options.delimiter}".`)
  if (options.sentinel.length === 0)
    throw new MalformedInputError('parameter', 'Sentinel must not be empty.')
  if (options.headerMarker.length === 0)
    throw new MalformedInputError('parameter', 'Header marker must not be empty.')
  return options
}
