/**
 * Error taxonomy for the pipeline. Every failure surfaced to a caller carries a
 * machine-readable `kind`, an HTTP status and optional structured details.
 */

export type PipelineErrorKind =
  | 'malformed_input'
  | 'reference_validation'
  | 'section_not_found'
  | 'schema_mismatch'
  | 'external_computation'
  | 'source_not_available'
  | 'unexpected'

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind
  readonly status: number
  readonly details?: Record<string, unknown>

  constructor(kind: PipelineErrorKind, status: number, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'PipelineError'
    this.kind = kind
    this.status = status
    this.details = details
  }

  toJSON(): { kind: PipelineErrorKind; message: string; details?: Record<string, unknown> } {
    return this.details ? { kind: this.kind, message: this.message, details: this.details } : { kind: this.kind, message: this.message }
  }
}

export type MalformedInputReason = 'decode' | 'parse' | 'file-kind' | 'parameter'

export class MalformedInputError extends PipelineError {
  readonly reason: MalformedInputReason

  constructor(reason: MalformedInputReason, message: string, details?: Record<string, unknown>) {
    super('malformed_input', 400, message, { reason, ...details })
    this.name = 'MalformedInputError'
    this.reason = reason
  }
}

export class ReferenceValidationError extends PipelineError {
  readonly missing: string[]
  readonly available: string[]

  constructor(message: string, missing: string[], available: string[]) {
    super('reference_validation', 400, message, { missing, available })
    this.name = 'ReferenceValidationError'
    this.missing = missing
    this.available = available
  }
}

export class SectionNotFoundError extends PipelineError {
  constructor(headerMarker: string) {
    super('section_not_found', 400, `Section "${headerMarker}" not found in report.`, { headerMarker })
    this.name = 'SectionNotFoundError'
  }
}

export class SchemaMismatchError extends PipelineError {
  constructor(message: string, details: Record<string, unknown>) {
    super('schema_mismatch', 500, message, details)
    this.name = 'SchemaMismatchError'
  }
}

export type ExternalFailure = 'exit' | 'missing-output' | 'invalid-output'

export class ExternalComputationError extends PipelineError {
  readonly failure: ExternalFailure

  constructor(failure: ExternalFailure, message: string, details: Record<string, unknown> = {}) {
    super('external_computation', 500, message, { failure, ...details })
    this.name = 'ExternalComputationError'
    this.failure = failure
  }
}

export class SourceNotAvailableError extends PipelineError {
  constructor(path: string) {
    super('source_not_available', 404, `Source file not found: ${path}`, { path })
    this.name = 'SourceNotAvailableError'
  }
}

/** Wrap anything thrown into a PipelineError; unknown failures become `unexpected`. */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new PipelineError('unexpected', 500, `Unexpected error: ${message}`)
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}
