import path from 'path'
import { PipelineError, ValidationError, describeError, isStageError, type StageError } from '../errors.js'
import type { AuditStage, CanonicalDocument, Entity, OutputFormat } from '../types.js'
import type { AuditLog } from './auditLog.js'
import { addEntities, addPage, beginDocument, finalize } from './canonicalRecord.js'
import { loadPageImages, readSourceDocument, type DocumentSourceOptions, type SourceDocument } from './documentSource.js'
import { computeOcrMetadata, describeOcrMetadata, type ExtractionSink, type OcrMetadata, type RawAdapterOutput } from './extractionSink.js'
import { withRetry, type OcrPage, type ProviderAdapter, type RetryPolicy } from './providerAdapter.js'
import { summarizeDocument, type DocumentSummary, type SummaryCapability } from './summaryProvider.js'

export type ExtractionPipelineDeps = {
  adapter: ProviderAdapter
  sink: ExtractionSink
  auditLog: AuditLog
  retry: RetryPolicy
  documentTimeoutMs: number
  source: DocumentSourceOptions
  summarizer?: SummaryCapability | null
  now?: () => Date
}

export type ProcessDocumentInput = {
  filePath: string
  format: OutputFormat
}

export type ProcessDocumentResult = {
  documentId: string
  outputPath: string
  rawResultsPath: string
  document: CanonicalDocument
  summary: DocumentSummary | null
}

export type BatchOutcome =
  | { filePath: string; ok: true; result: ProcessDocumentResult }
  | { filePath: string; ok: false; error: Error }

export type ExtractionPipeline = {
  processDocument(input: ProcessDocumentInput): Promise<ProcessDocumentResult>
  processDocuments(inputs: ProcessDocumentInput[], concurrency: number): Promise<BatchOutcome[]>
}

function asStageError(error: unknown, fallbackCode: string): StageError {
  if (isStageError(error)) return error
  return new ValidationError('InvalidInput', `${fallbackCode}: ${describeError(error)}`)
}

export function createExtractionPipeline(deps: ExtractionPipelineDeps): ExtractionPipeline {
  const now = deps.now || (() => new Date())

  // A document whose success cannot be audited is not processed.
  async function recordStage(documentId: string, stage: AuditStage, detail: string) {
    try {
      await deps.auditLog.append({ documentId, stage, status: 'OK', detail })
    } catch (error) {
      const cause = asStageError(error, 'AUDIT_WRITE_FAILED')
      console.error('[extraction-pipeline] audit append failed', { documentId, stage, code: cause.code, message: cause.message })
      throw new PipelineError(documentId, stage, cause)
    }
  }

  // The stage error is reported even when its audit entry cannot be written.
  async function fail(documentId: string, stage: AuditStage, error: unknown, fallbackCode: string): Promise<never> {
    const cause = asStageError(error, fallbackCode)
    try {
      await deps.auditLog.append({ documentId, stage, status: 'FAILED', detail: `${cause.code}: ${cause.message}` })
    } catch (auditError) {
      console.error('[extraction-pipeline] audit append failed', { documentId, stage, error: describeError(auditError) })
    }
    console.error('[extraction-pipeline] stage failed', { documentId, stage, code: cause.code, message: cause.message })
    throw new PipelineError(documentId, stage, cause)
  }

  async function runOcrStage(source: SourceDocument, signal: AbortSignal) {
    let doc = beginDocument(source.documentId, now())
    const pages: OcrPage[] = []
    const pageImages = await loadPageImages(source, deps.source)

    for (const pageImage of pageImages) {
      const page = await withRetry(
        () => deps.adapter.runOcr(pageImage.image, { pageNumber: pageImage.pageNumber, signal }),
        deps.retry,
        signal
      )
      const numbered: OcrPage = { ...page, page_number: pageImage.pageNumber }
      pages.push(numbered)
      doc = addPage(doc, { page_number: numbered.page_number, text: numbered.text, bounding_boxes: numbered.bounding_boxes })
    }
    return { document: doc, pages }
  }

  async function runNerStage(doc: CanonicalDocument, signal: AbortSignal) {
    const entitiesByPage: RawAdapterOutput['entities_by_page'] = []
    let next = doc

    for (const page of doc.pages) {
      if (!page.text.trim()) continue
      const entities: Entity[] = await withRetry(
        () => deps.adapter.runNer(page.text, { sourcePage: page.page_number, signal }),
        deps.retry,
        signal
      )
      entitiesByPage.push({ page_number: page.page_number, entities })
      next = addEntities(next, entities)
    }

    return { document: finalize(next), entitiesByPage }
  }

  // Summaries are an optional extra; a failure is recorded in the raw results only.
  async function runSummaryStage(documentId: string, pages: OcrPage[], signal: AbortSignal) {
    if (!deps.summarizer) return { summary: null }
    try {
      return { summary: await summarizeDocument(deps.summarizer, pages, { retry: deps.retry, signal }) }
    } catch (error) {
      const message = describeError(error)
      console.warn('[extraction-pipeline] summary failed', { documentId, error: message })
      return { summary: null, error: message }
    }
  }

  /**
   * Runs one document through OCR, NER and the sink. OCR covers every page
   * before NER starts. Each stage appends exactly one audit entry, and a
   * failure aborts the document without writing structured output.
   */
  async function processDocument(input: ProcessDocumentInput): Promise<ProcessDocumentResult> {
    let source: SourceDocument
    try {
      source = await readSourceDocument(input.filePath, deps.source)
    } catch (error) {
      return fail(path.basename(input.filePath), 'OCR', error, 'INPUT_REJECTED')
    }

    const documentId = source.documentId
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(new Error('DOCUMENT_TIMEOUT')), deps.documentTimeoutMs)
    console.log('[extraction-pipeline] processing', { documentId, file: source.fileName, provider: deps.adapter.name })

    let ocr: { document: CanonicalDocument; pages: OcrPage[] }
    let metadata: OcrMetadata
    let finalized: CanonicalDocument
    let entitiesByPage: RawAdapterOutput['entities_by_page']
    let summary: { summary: DocumentSummary | null; error?: string }
    try {
      try {
        ocr = await runOcrStage(source, controller.signal)
      } catch (error) {
        return await fail(documentId, 'OCR', error, 'PAGE_RENDER_FAILED')
      }
      metadata = computeOcrMetadata(ocr.pages)
      await recordStage(documentId, 'OCR', describeOcrMetadata(metadata))

      try {
        const ner = await runNerStage(ocr.document, controller.signal)
        finalized = ner.document
        entitiesByPage = ner.entitiesByPage
      } catch (error) {
        return await fail(documentId, 'NER', error, 'NER_FAILED')
      }
      await recordStage(documentId, 'NER', `${finalized.entities.length} entities`)

      summary = await runSummaryStage(documentId, ocr.pages, controller.signal)
    } finally {
      clearTimeout(timeout)
    }

    let rawResultsPath: string
    try {
      rawResultsPath = await deps.sink.writeRawResults({
        document_id: documentId,
        provider: deps.adapter.name,
        metadata,
        pages: ocr.pages,
        entities_by_page: entitiesByPage,
        summary: summary.summary,
        ...(summary.error ? { summary_error: summary.error } : {})
      })
    } catch (error) {
      return fail(documentId, 'SINK', error, 'WRITE_FAILED')
    }

    let outputPath: string
    try {
      outputPath = await deps.sink.write(finalized, input.format)
    } catch (error) {
      // The sink audits its own write failures.
      const cause = asStageError(error, 'WRITE_FAILED')
      console.error('[extraction-pipeline] stage failed', { documentId, stage: 'SINK', code: cause.code, message: cause.message })
      throw new PipelineError(documentId, 'SINK', cause)
    }

    console.log('[extraction-pipeline] document processed', {
      documentId,
      pages: finalized.pages.length,
      entities: finalized.entities.length,
      outputPath
    })

    return { documentId, outputPath, rawResultsPath, document: finalized, summary: summary.summary }
  }

  // Independent documents share nothing but the audit log.
  async function processDocuments(inputs: ProcessDocumentInput[], concurrency: number): Promise<BatchOutcome[]> {
    const outcomes: BatchOutcome[] = new Array(inputs.length)
    let cursor = 0

    async function worker() {
      while (cursor < inputs.length) {
        const index = cursor
        cursor += 1
        const input = inputs[index]
        try {
          outcomes[index] = { filePath: input.filePath, ok: true, result: await processDocument(input) }
        } catch (error) {
          outcomes[index] = {
            filePath: input.filePath,
            ok: false,
            error: error instanceof Error ? error : new Error(String(error))
          }
        }
      }
    }

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, inputs.length)) }, () => worker())
    await Promise.all(workers)
    return outcomes
  }

  return { processDocument, processDocuments }
}
