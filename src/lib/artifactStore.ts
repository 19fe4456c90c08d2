/**
 * Persistence of the derived LMFR table. Writes go to a unique temp sibling and
 * are renamed over the target, so a concurrent reader sees the old file or the
 * new one, never a partial write.
 */

import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import type { ColumnMeta, PipelineOptions, TabularDataset } from '../types'
import { isErrnoException, SourceNotAvailableError } from './errors'
import { parseCSV, serializeCSV } from './csvParse'
import { typeRow } from './profileSchema'

export const DERIVED_TABLE_FILE = 'LMFR.csv'

export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  const tmp = `${filePath}.${process.pid}.${randomUUID()}.tmp`
  try {
    await fs.writeFile(tmp, contents, 'utf-8')
    await fs.rename(tmp, filePath)
  } catch (err) {
    await fs.rm(tmp, { force: true })
    throw err
  }
}

export async function readTextSource(filePath: string): Promise<string> {
  let bytes: Buffer
  try {
    bytes = await fs.readFile(filePath)
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') throw new SourceNotAvailableError(filePath)
    throw err
  }
  // undecodable bytes are dropped
  return new TextDecoder('utf-8').decode(bytes).replace(/\uFFFD/g, '')
}

export class DerivedTableStore {
  readonly filePath: string

  constructor(resultsDir: string, fileName = DERIVED_TABLE_FILE) {
    this.filePath = path.join(resultsDir, fileName)
  }

  async write(table: TabularDataset, options: Pick<PipelineOptions, 'delimiter'>): Promise<string> {
    await writeFileAtomic(this.filePath, serializeCSV(table, options) + '\n')
    return this.filePath
  }

  /** Read back the table, re-applying the LMFR typing: labels stay strings, the rest numeric. */
  async read(options: Pick<PipelineOptions, 'delimiter'>): Promise<TabularDataset> {
    const raw = parseCSV(await readTextSource(this.filePath), options)
    const names = raw.columns.map((c) => c.name)
    const numericColumns = names.filter((n) => n !== 'Variable' && n !== 'Level')
    const numeric = new Set(numericColumns)
    return {
      columns: names.map((name): ColumnMeta => ({ name, type: numeric.has(name) ? 'numeric' : 'string' })),
      rows: raw.rows.map((row) => typeRow(row, numericColumns)),
    }
  }
}
