/**
 * External GoM model collaborator.
 *
 * The model itself lives in an R script. We hand it the sanitized table as a CSV
 * file in a private temp directory and read back the single JSON document it
 * writes. The process runs asynchronously so other requests keep being served.
 */

import { spawn } from 'node:child_process'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { PipelineOptions, TabularDataset } from '../types'
import { ExternalComputationError, isErrnoException } from './errors'
import { serializeCSV } from './csvParse'
import { log } from './log'

export interface ModelRunInput {
  dataset: TabularDataset
  /** Name the CSV is written under; only its base name is used */
  fileName: string
  kInitial: number
  kFinal: number
  caseId: string
  internalVars: string[]
  options: Pick<PipelineOptions, 'delimiter'>
}

export interface ModelRunner {
  run(input: ModelRunInput): Promise<unknown>
}

export interface RscriptRunnerConfig {
  rscriptPath: string
  scriptPath: string
  timeoutMs: number
  cwd?: string
}

export interface ProcessResult {
  code: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
}

export function runProcess(
  command: string,
  args: string[],
  opts: { cwd?: string; timeoutMs?: number } = {},
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: opts.cwd, timeout: opts.timeoutMs, stdio: ['ignore', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    child.stdout.setEncoding('utf-8')
    child.stderr.setEncoding('utf-8')
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })
    child.on('error', reject)
    child.on('close', (code, signal) => resolve({ code, signal, stdout, stderr }))
  })
}

export function buildModelArgs(scriptPath: string, csvPath: string, outputPath: string, input: ModelRunInput): string[] {
  const args = [
    scriptPath,
    '--file-path', csvPath,
    '--k-initial', String(input.kInitial),
    '--k-final', String(input.kFinal),
    '--case-id', input.caseId,
    '--output-path', outputPath,
  ]
  if (input.internalVars.length > 0) args.push('--internal-vars', input.internalVars.join(','))
  return args
}

export class RscriptModelRunner implements ModelRunner {
  private config: RscriptRunnerConfig

  constructor(config: RscriptRunnerConfig) {
    this.config = config
  }

  async run(input: ModelRunInput): Promise<unknown> {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gom-'))
    try {
      const csvPath = path.join(tempDir, path.basename(input.fileName) || 'data.csv')
      const outputPath = path.join(tempDir, 'model_output.json')
      await fs.writeFile(csvPath, serializeCSV(input.dataset, input.options) + '\n', 'utf-8')

      const args = buildModelArgs(this.config.scriptPath, csvPath, outputPath, input)
      const cmd = [this.config.rscriptPath, ...args].join(' ')
      log(`running ${cmd}`, 'model')

      let result: ProcessResult
      try {
        result = await runProcess(this.config.rscriptPath, args, { cwd: this.config.cwd, timeoutMs: this.config.timeoutMs })
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        throw new ExternalComputationError('exit', `Failed to start the model process: ${message}`, { stdout: '', stderr: '', cmd })
      }

      if (result.code !== 0) {
        const reason = result.signal ? `was killed by ${result.signal}` : `exited with code ${result.code}`
        throw new ExternalComputationError('exit', `Model process ${reason}.`, {
          stdout: result.stdout,
          stderr: result.stderr,
          cmd,
        })
      }

      return await readModelOutput(outputPath)
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true })
    }
  }
}

export async function readModelOutput(outputPath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fs.readFile(outputPath, 'utf-8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT')
      throw new ExternalComputationError('missing-output', 'The model process did not produce its output file.')
    throw err
  }
  try {
    return JSON.parse(raw) as unknown
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ExternalComputationError('invalid-output', `Model output is not valid JSON: ${message}`)
  }
}
