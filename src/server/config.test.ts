import { describe, it, expect } from 'vitest'
import { loadConfig } from './config'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      corsOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173'],
      reportsDir: '.',
      resultsDir: 'csv_results',
      rscriptPath: 'Rscript',
      gomScript: 'GomRccp_API.R',
      modelTimeoutMs: 600_000,
      uploadLimitBytes: 50 * 1024 * 1024,
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({ PORT: '9001', CORS_ORIGINS: ' http://a.test , ,http://b.test', UPLOAD_LIMIT_MB: '0.5' })
    expect(config.port).toBe(9001)
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test'])
    expect(config.uploadLimitBytes).toBe(524288)
  })

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid environment configuration:/)
  })
})
