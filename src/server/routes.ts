/**
 * GoM API routes
 *
 *   GET  /               welcome
 *   POST /upload-data    sanitize + validate a CSV, run the GoM model
 *   GET  /conversao-txt  extract the LMFR table of the K{num_k} report into LMFR.csv
 *   GET  /dados-heatmap  LMFR.csv as heatmap coordinates
 */

import type { Express, NextFunction, Request, RequestHandler, Response } from 'express'
import multer from 'multer'
import { z } from 'zod'
import { MalformedInputError } from '../lib/errors'
import { resolveOptions } from '../lib/options'
import { convertReport, loadHeatmap, processUpload } from '../lib/pipeline'
import { MAX_PROFILE_COUNT } from '../lib/profileSchema'
import type { DerivedTableStore } from '../lib/artifactStore'
import type { ModelRunner } from '../lib/modelRunner'
import { log } from '../lib/log'

export interface RouteDeps {
  runner: ModelRunner
  store: DerivedTableStore
  reportsDir: string
  uploadLimitBytes: number
}

const UploadFormSchema = z.object({
  k_initial: z.coerce.number().int().positive(),
  k_final: z.coerce.number().int().positive(),
  case_id: z.string().trim().min(1),
  internal_vars_string: z.string().optional(),
})

const ConversionQuerySchema = z.object({
  num_k: z.coerce.number().int().positive().max(MAX_PROFILE_COUNT),
  internal_vars_string: z.string().optional(),
})

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new MalformedInputError('parameter', `Invalid parameters: ${issues.join('; ')}`, { issues })
  }
  return parsed.data
}

/** Forward rejections from async handlers to the error middleware. */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next)
  }
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.uploadLimitBytes },
  })

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Welcome to the GoM API. Use /upload-data/ to send your data.' })
  })

  app.post(
    '/upload-data',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      if (!req.file) throw new MalformedInputError('parameter', 'No file uploaded.')
      const form = parseParams(UploadFormSchema, req.body)
      const { buffer, originalname, size } = req.file
      log(`upload ${originalname} (${size} bytes), k=${form.k_initial}..${form.k_final}, case_id=${form.case_id}`, 'upload')

      const result = await processUpload(
        {
          fileName: originalname,
          bytes: buffer,
          kInitial: form.k_initial,
          kFinal: form.k_final,
          caseId: form.case_id,
          internalVarsString: form.internal_vars_string,
        },
        deps.runner,
        resolveOptions(),
      )
      res.json(result)
    }),
  )

  app.get(
    '/conversao-txt',
    asyncHandler(async (req, res) => {
      const query = parseParams(ConversionQuerySchema, req.query)
      const result = await convertReport(
        { k: query.num_k, internalVarsString: query.internal_vars_string },
        deps.reportsDir,
        deps.store,
        resolveOptions(),
      )
      res.json(result)
    }),
  )

  app.get(
    '/dados-heatmap',
    asyncHandler(async (_req, res) => {
      res.json(await loadHeatmap(deps.store, resolveOptions()))
    }),
  )
}
