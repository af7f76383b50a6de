import type { AuditStage } from './types.js'

export type AdapterErrorKind = 'InvalidInput' | 'Unavailable' | 'RateLimited'

export type ValidationErrorKind = 'DuplicatePage' | 'DanglingEntity' | 'InvalidRecord' | 'InvalidInput'

export type IOErrorKind = 'WriteFailed'

function toCode(prefix: string, kind: string) {
  return `${prefix}_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`
}

export class AdapterError extends Error {
  readonly kind: AdapterErrorKind
  readonly code: string
  // Set for failures worth another attempt (network, timeout, 5xx, 429).
  readonly transient: boolean

  constructor(kind: AdapterErrorKind, message: string, options?: { transient?: boolean; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'AdapterError'
    this.kind = kind
    this.code = toCode('ADAPTER', kind)
    this.transient = options?.transient ?? kind !== 'InvalidInput'
  }
}

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind
  readonly code: string

  constructor(kind: ValidationErrorKind, message: string) {
    super(message)
    this.name = 'ValidationError'
    this.kind = kind
    this.code = toCode('VALIDATION', kind)
  }
}

export class IOError extends Error {
  readonly kind: IOErrorKind
  readonly code: string

  constructor(kind: IOErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'IOError'
    this.kind = kind
    this.code = toCode('IO', kind)
  }
}

export type StageError = AdapterError | ValidationError | IOError

export class PipelineError extends Error {
  readonly documentId: string
  readonly stage: AuditStage
  readonly cause: StageError

  constructor(documentId: string, stage: AuditStage, cause: StageError) {
    super(`${stage} failed for ${documentId}: ${cause.code} ${cause.message}`)
    this.name = 'PipelineError'
    this.documentId = documentId
    this.stage = stage
    this.cause = cause
  }

  get code() {
    return this.cause.code
  }
}

export function isStageError(error: unknown): error is StageError {
  return error instanceof AdapterError || error instanceof ValidationError || error instanceof IOError
}

export function describeError(error: unknown): string {
  if (isStageError(error)) return `${error.code}: ${error.message}`
  if (error instanceof Error) return error.message
  return String(error)
}
