import type { Request, Response } from 'express'
import { isProviderName, type ProviderName } from '../config.js'
import { AdapterError, PipelineError, ValidationError, describeError } from '../errors.js'
import type { PipelineRuntime } from '../runtime.js'
import { resolveInputPath } from '../services/documentSource.js'
import type { ExtractionQueue } from '../services/extractionQueue.js'
import { isOutputFormat, type OutputFormat } from '../types.js'

export function sendExtractionError(res: Response, status: number, code: string, message?: string, extra: Record<string, unknown> = {}) {
  return res.status(status).json({ code, message: message || code, ...extra })
}

function statusForPipelineError(error: PipelineError) {
  if (error.cause instanceof AdapterError) return error.cause.kind === 'InvalidInput' ? 400 : 502
  if (error.cause instanceof ValidationError) return 400
  return 500
}

type DocumentRequest = {
  path: string
  format: OutputFormat
  provider: ProviderName
}

async function resolveRequest(runtime: PipelineRuntime, request: DocumentRequest): Promise<DocumentRequest | null> {
  const resolved = await resolveInputPath(runtime.config.inputDir, request.path)
  return resolved ? { ...request, path: resolved } : null
}

function parseDocumentRequest(runtime: PipelineRuntime, body: unknown): DocumentRequest | string {
  if (!body || typeof body !== 'object') return 'Missing body'

  const filePath: unknown = Reflect.get(body, 'path')
  const format: unknown = Reflect.get(body, 'format') ?? runtime.config.outputFormat
  const provider: unknown = Reflect.get(body, 'provider') ?? runtime.config.provider

  if (typeof filePath !== 'string' || !filePath.trim()) return 'Missing path'
  if (!isOutputFormat(format)) return 'format must be json or fhir'
  if (!isProviderName(provider)) return `Unknown provider: ${String(provider)}`
  return { path: filePath.trim(), format, provider }
}

export function createDocumentRoutes(runtime: PipelineRuntime, queue: ExtractionQueue | null) {
  async function processDocument(req: Request, res: Response) {
    const parsed = parseDocumentRequest(runtime, req.body)
    if (typeof parsed === 'string') return sendExtractionError(res, 400, 'VALIDATION_ERROR', parsed)

    try {
      const request = await resolveRequest(runtime, parsed)
      if (!request) return sendExtractionError(res, 400, 'INPUT_OUTSIDE_ROOT', `INPUT_OUTSIDE_ROOT: ${parsed.path}`)

      const result = await runtime.pipelineFor(request.provider).processDocument({ filePath: request.path, format: request.format })
      return res.json({
        ok: true,
        document_id: result.documentId,
        output_path: result.outputPath,
        pages: result.document.pages.length,
        entities: result.document.entities
      })
    } catch (error) {
      if (error instanceof PipelineError) {
        return sendExtractionError(res, statusForPipelineError(error), error.code, error.cause.message, {
          document_id: error.documentId,
          stage: error.stage
        })
      }
      console.error('[extraction-routes] process failed', describeError(error))
      return sendExtractionError(res, 500, 'INTERNAL_ERROR', describeError(error))
    }
  }

  async function queueDocument(req: Request, res: Response) {
    if (!queue) return sendExtractionError(res, 503, 'QUEUE_DISABLED')

    const parsed = parseDocumentRequest(runtime, req.body)
    if (typeof parsed === 'string') return sendExtractionError(res, 400, 'VALIDATION_ERROR', parsed)

    try {
      const request = await resolveRequest(runtime, parsed)
      if (!request) return sendExtractionError(res, 400, 'INPUT_OUTSIDE_ROOT', `INPUT_OUTSIDE_ROOT: ${parsed.path}`)

      await queue.enqueue(request)
      return res.status(202).json({ ok: true, queued: request })
    } catch (error) {
      console.error('[extraction-routes] enqueue failed', describeError(error))
      return sendExtractionError(res, 500, 'QUEUE_FAILED', describeError(error))
    }
  }

  async function getDocumentAudit(req: Request, res: Response) {
    const id = String(req.params.id || '').trim()
    if (!id) return sendExtractionError(res, 400, 'VALIDATION_ERROR', 'Missing id')

    try {
      const entries = await runtime.auditLog.read(id)
      if (entries.length === 0) return sendExtractionError(res, 404, 'NOT_FOUND')
      return res.json({ document_id: id, entries })
    } catch (error) {
      console.error('[extraction-routes] audit read failed', describeError(error))
      return sendExtractionError(res, 500, 'INTERNAL_ERROR', describeError(error))
    }
  }

  return { processDocument, queueDocument, getDocumentAudit }
}
