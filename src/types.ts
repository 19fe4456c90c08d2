/** Cell value after ingestion; `null` marks a missing cell */
export type CellValue = string | number | null

/** Column type decided by the sanitizer (all-or-nothing per column) */
export type ColumnType = 'numeric' | 'string'

export interface ColumnMeta {
  name: string
  type: ColumnType
}

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** Ordered columns + rows. Every row carries every column. */
export interface TabularDataset {
  columns: ColumnMeta[]
  rows: DataRow[]
}

/** Request-scoped parsing options (no process-wide defaults are mutated) */
export interface PipelineOptions {
  /** CSV field delimiter, also used to split variable lists */
  delimiter: string
  encoding: 'utf-8'
  /** Exact, case-sensitive substring locating the report section */
  headerMarker: string
  /** A trimmed report line starting with this character ends the section */
  sentinel: string
}

/** How a record's leading token is recognised as a new variable */
export type VariableMarker =
  | { kind: 'prefix'; prefix: string }
  | { kind: 'names'; names: ReadonlySet<string> }

/** Column layout for a given profile count k */
export interface ProfileSchema {
  k: number
  columns: string[]
  /** Tokens kept per data line after the variable label (Level onwards) */
  rowWidth: number
  numericColumns: string[]
}

/** [label, level, ...scalars] */
export type ReportRecord = string[]

export interface ExtractionWindow {
  /** Index of the first line after the header marker and its separator line */
  start: number
  /** Exclusive end index in the original line stream */
  end: number
  lines: string[]
}

export interface DroppedLines {
  /** Lines seen before any variable label (legend / column headers) */
  unlabeled: number
  /** Labelled lines with fewer tokens than the schema row width */
  short: number
}

export interface ExtractionResult {
  window: ExtractionWindow
  records: ReportRecord[]
  dropped: DroppedLines
}

/** [x index, y index, value] */
export type HeatmapPoint = [number, number, number | null]

export interface HeatmapPayload {
  xAxisLabels: string[]
  yAxisLabels: string[]
  data: HeatmapPoint[]
  valueKey: string
}
