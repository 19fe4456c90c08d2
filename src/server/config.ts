import { z } from 'zod'

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  /** Comma-separated origins allowed to call the API (the charting front end) */
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),
  /** Directory holding K{k}/LogGoMK{k}(1).TXT reports */
  REPORTS_DIR: z.string().min(1).default('.'),
  RESULTS_DIR: z.string().min(1).default('csv_results'),
  RSCRIPT_PATH: z.string().min(1).default('Rscript'),
  GOM_SCRIPT: z.string().min(1).default('GomRccp_API.R'),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(50),
})

export interface ServerConfig {
  port: number
  corsOrigins: string[]
  reportsDir: string
  resultsDir: string
  rscriptPath: string
  gomScript: string
  modelTimeoutMs: number
  uploadLimitBytes: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid environment configuration:\n  ${issues.join('\n  ')}`)
  }
  const e = parsed.data
  return {
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    reportsDir: e.REPORTS_DIR,
    resultsDir: e.RESULTS_DIR,
    rscriptPath: e.RSCRIPT_PATH,
    gomScript: e.GOM_SCRIPT,
    modelTimeoutMs: e.MODEL_TIMEOUT_MS,
    uploadLimitBytes: Math.round(e.UPLOAD_LIMIT_MB * 1024 * 1024),
  }
}
