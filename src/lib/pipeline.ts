/**
 * The consolidated upload / convert / heatmap flows. Each call takes its own
 * options; nothing here keeps state between requests except the derived table file.
 */

import path from 'node:path'
import type { DroppedLines, HeatmapPayload, PipelineOptions, VariableMarker } from '../types'
import { MalformedInputError } from './errors'
import { decodeUtf8, parseCSV } from './csvParse'
import { sanitizeDataset } from './sanitize'
import { columnNames, requireColumn, requireVariables, splitVariableList } from './variableRefs'
import { extractSection } from './reportExtract'
import { profileSchema, projectRecords } from './profileSchema'
import { toHeatmap } from './heatmap'
import { profileDataset, type DatasetProfile } from './datasetProfile'
import { DerivedTableStore, readTextSource } from './artifactStore'
import type { ModelRunner } from './modelRunner'
import { log } from './log'

/** Marker used when the caller names no variables: GoM logs label variables x1, x2, ... */
export const DEFAULT_VARIABLE_PREFIX = 'x'

export interface UploadRequest {
  fileName: string
  bytes: Uint8Array
  kInitial: number
  kFinal: number
  caseId: string
  internalVarsString?: string | null
}

export interface UploadResult {
  status: 'success'
  message: string
  fileName: string
  columns: string[]
  rowCount: number
  profile: DatasetProfile
  modelOutput: unknown
}

export interface ConversionRequest {
  k: number
  internalVarsString?: string | null
}

export interface ConversionResult {
  status: 'success'
  message: string
  columns: string[]
  rowCount: number
  dropped: DroppedLines
  csvPath: string
}

function checkProfileRange(kInitial: number, kFinal: number): void {
  for (const [name, k] of [['k_initial', kInitial], ['k_final', kFinal]] as const) {
    if (!Number.isInteger(k) || k < 1)
      throw new MalformedInputError('parameter', `${name} must be a positive integer, got ${k}.`)
  }
  if (kInitial > kFinal)
    throw new MalformedInputError('parameter', `k_initial (${kInitial}) must not exceed k_final (${kFinal}).`)
}

export async function processUpload(
  req: UploadRequest,
  runner: ModelRunner,
  options: PipelineOptions,
): Promise<UploadResult> {
  if (!req.fileName.toLowerCase().endsWith('.csv'))
    throw new MalformedInputError('file-kind', 'The uploaded file must be a CSV.', { fileName: req.fileName })
  checkProfileRange(req.kInitial, req.kFinal)

  const dataset = sanitizeDataset(parseCSV(decodeUtf8(req.bytes), options))
  requireColumn(dataset, req.caseId)

  const internalVars = splitVariableList(req.internalVarsString, options.delimiter)
  if (internalVars.length > 0) {
    log(`validating variables [${internalVars.join(', ')}] against [${columnNames(dataset).join(', ')}]`, 'upload')
    requireVariables(dataset, internalVars)
  }

  const modelOutput = await runner.run({
    dataset,
    fileName: req.fileName,
    kInitial: req.kInitial,
    kFinal: req.kFinal,
    caseId: req.caseId,
    internalVars,
    options,
  })

  return {
    status: 'success',
    message: 'Data processed successfully.',
    fileName: req.fileName,
    columns: columnNames(dataset),
    rowCount: dataset.rows.length,
    profile: profileDataset(dataset),
    modelOutput,
  }
}

export function reportPath(reportsDir: string, k: number): string {
  return path.join(reportsDir, `K${k}`, `LogGoMK${k}(1).TXT`)
}

export function variableMarker(internalVars: string[]): VariableMarker {
  return internalVars.length > 0
    ? { kind: 'names', names: new Set(internalVars) }
    : { kind: 'prefix', prefix: DEFAULT_VARIABLE_PREFIX }
}

export async function convertReport(
  req: ConversionRequest,
  reportsDir: string,
  store: DerivedTableStore,
  options: PipelineOptions,
): Promise<ConversionResult> {
  const text = await readTextSource(reportPath(reportsDir, req.k))
  const schema = profileSchema(req.k)
  const marker = variableMarker(splitVariableList(req.internalVarsString, options.delimiter))

  const { records, dropped } = extractSection(text, options, marker, schema.rowWidth)
  if (dropped.short > 0 || dropped.unlabeled > 0)
    log(`k=${req.k}: dropped ${dropped.short} short and ${dropped.unlabeled} unlabeled lines`, 'convert')

  const table = projectRecords(records, schema)
  const csvPath = await store.write(table, options)

  return {
    status: 'success',
    message: 'LMFR table extracted and saved as CSV.',
    columns: columnNames(table),
    rowCount: table.rows.length,
    dropped,
    csvPath,
  }
}

export async function loadHeatmap(store: DerivedTableStore, options: PipelineOptions): Promise<HeatmapPayload> {
  return toHeatmap(await store.read(options))
}
