/**
 * Fixed-layout report extractor.
 *
 * A GoM log prints the LMFR table as a block of whitespace-aligned rows:
 *
 *   Lambda-Marginal Frequency Ratio (LMFR)
 *   ----------------------------------------
 *   Variable Level  n  perc  k1  k2  ...      <- legend, dropped (no variable yet)
 *   x1       1     40  0.40  ...              <- new variable x1, level 1
 *            2     60  0.60  ...              <- inherits x1
 *
 *   * footnote                                <- sentinel, ends the section
 *
 * `locateSection` bounds the table; `segmentRecords` turns its lines into
 * fixed-width records under the running variable label.
 */

import type { DroppedLines, ExtractionResult, ExtractionWindow, PipelineOptions, ReportRecord, VariableMarker } from '../types'
import { SectionNotFoundError } from './errors'

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/)
}

export function locateSection(
  lines: readonly string[],
  options: Pick<PipelineOptions, 'headerMarker' | 'sentinel'>,
): ExtractionWindow {
  const markerIdx = lines.findIndex((line) => line.includes(options.headerMarker))
  if (markerIdx === -1) throw new SectionNotFoundError(options.headerMarker)

  const start = markerIdx + 2
  const window: string[] = []
  let blankRun = 0
  let end = lines.length

  for (let i = start; i < lines.length; i++) {
    const stripped = lines[i].trim()
    if (stripped === '') {
      blankRun++
      if (blankRun >= 2) {
        end = i
        break
      }
      continue
    }
    blankRun = 0
    if (stripped.startsWith(options.sentinel)) {
      end = i
      break
    }
    window.push(stripped)
  }

  return { start: Math.min(start, lines.length), end, lines: window }
}

export type ScanState = { kind: 'no-variable' } | { kind: 'variable'; label: string }

export const INITIAL_SCAN_STATE: ScanState = { kind: 'no-variable' }

export function isVariableToken(token: string, marker: VariableMarker): boolean {
  return marker.kind === 'prefix' ? token.startsWith(marker.prefix) : marker.names.has(token)
}

/** One transition: a leading marker token becomes the active label and is consumed. */
export function advance(state: ScanState, tokens: string[], marker: VariableMarker): { state: ScanState; rest: string[] } {
  const [head, ...rest] = tokens
  if (head !== undefined && isVariableToken(head, marker)) return { state: { kind: 'variable', label: head }, rest }
  return { state, rest: tokens }
}

export function segmentRecords(
  lines: readonly string[],
  marker: VariableMarker,
  rowWidth: number,
): { records: ReportRecord[]; dropped: DroppedLines } {
  const records: ReportRecord[] = []
  const dropped: DroppedLines = { unlabeled: 0, short: 0 }
  let state = INITIAL_SCAN_STATE

  for (const line of lines) {
    const tokens = line.split(/\s+/).filter(Boolean)
    if (tokens.length === 0) continue
    const step = advance(state, tokens, marker)
    state = step.state
    if (state.kind === 'no-variable') {
      dropped.unlabeled++
      continue
    }
    if (step.rest.length < rowWidth) {
      dropped.short++
      continue
    }
    records.push([state.label, ...step.rest.slice(0, rowWidth)])
  }

  return { records, dropped }
}

export function extractSection(
  text: string,
  options: Pick<PipelineOptions, 'headerMarker' | 'sentinel'>,
  marker: VariableMarker,
  rowWidth: number,
): ExtractionResult {
  const window = locateSection(splitLines(text), options)
  const { records, dropped } = segmentRecords(window.lines, marker, rowWidth)
  return { window, records, dropped }
}
