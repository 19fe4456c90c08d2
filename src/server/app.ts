import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import multer from 'multer'
import { MalformedInputError, PipelineError, toPipelineError } from '../lib/errors'
import { DerivedTableStore } from '../lib/artifactStore'
import { RscriptModelRunner, type ModelRunner } from '../lib/modelRunner'
import { log, logError } from '../lib/log'
import type { ServerConfig } from './config'
import { registerRoutes } from './routes'

function toHttpError(err: unknown): PipelineError {
  if (err instanceof multer.MulterError) return new MalformedInputError('parameter', `Upload rejected: ${err.message}`, { code: err.code })
  return toPipelineError(err)
}

export function createApp(config: ServerConfig, runner?: ModelRunner): Express {
  const app = express()

  app.use(cors({ origin: config.corsOrigins, credentials: true }))

  app.use((req, res, next) => {
    const start = Date.now()
    const path = req.path
    res.on('finish', () => {
      log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`, 'http')
    })
    next()
  })

  registerRoutes(app, {
    runner:
      runner ??
      new RscriptModelRunner({
        rscriptPath: config.rscriptPath,
        scriptPath: config.gomScript,
        timeoutMs: config.modelTimeoutMs,
      }),
    store: new DerivedTableStore(config.resultsDir),
    reportsDir: config.reportsDir,
    uploadLimitBytes: config.uploadLimitBytes,
  })

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const error = toHttpError(err)
    if (error.kind === 'unexpected') logError('Unhandled error', err, 'http')
    else log(`${error.kind}: ${error.message}`, 'http')
    res.status(error.status).json({ error: error.toJSON() })
  })

  return app
}
