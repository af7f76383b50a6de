import { mkdir, writeFile } from 'node:fs/promises'
import path from 'path'
import { IOError, describeError } from '../errors.js'
import type { CanonicalDocument, Entity, OutputFormat } from '../types.js'
import type { AuditLog } from './auditLog.js'
import { serializeCanonicalDocument } from './canonicalRecord.js'
import { toFhirBundle } from './fhirMapping.js'
import type { OcrPage } from './providerAdapter.js'
import type { DocumentSummary } from './summaryProvider.js'

export type OcrMetadata = {
  total_pages: number
  average_confidence: number
  language_codes: string[]
}

export type RawAdapterOutput = {
  document_id: string
  provider: string
  metadata: OcrMetadata
  pages: OcrPage[]
  entities_by_page: Array<{ page_number: number; entities: Entity[] }>
  summary: DocumentSummary | null
  summary_error?: string
}

// Pages without a reported confidence count as 0 towards the average.
export function computeOcrMetadata(pages: OcrPage[]): OcrMetadata {
  const codes: string[] = []
  let total = 0
  for (const page of pages) {
    total += page.average_confidence ?? 0
    for (const language of page.detected_languages || []) {
      if (!codes.includes(language.language_code)) codes.push(language.language_code)
    }
  }
  return {
    total_pages: pages.length,
    average_confidence: pages.length ? total / pages.length : 0,
    language_codes: codes
  }
}

export function describeOcrMetadata(metadata: OcrMetadata) {
  const languages = metadata.language_codes.join(',') || 'none'
  return `${metadata.total_pages} pages; average_confidence=${metadata.average_confidence.toFixed(2)}; languages=${languages}`
}

export type ExtractionSink = {
  write(doc: CanonicalDocument, format: OutputFormat): Promise<string>
  writeRawResults(raw: RawAdapterOutput): Promise<string>
}

export function structuredOutputFileName(documentId: string, format: OutputFormat) {
  return format === 'fhir' ? `${documentId}.fhir.json` : `${documentId}_structured.json`
}

export function rawResultsFileName(documentId: string) {
  return `vision_results_${documentId}.json`
}

export function createExtractionSink(params: { outputDir: string; auditLog: AuditLog }): ExtractionSink {
  const { outputDir, auditLog } = params

  return {
    async write(doc, format) {
      const filePath = path.join(outputDir, structuredOutputFileName(doc.document_id, format))
      const body = format === 'fhir'
        ? JSON.stringify(toFhirBundle(doc), null, 2)
        : serializeCanonicalDocument(doc)

      try {
        await mkdir(outputDir, { recursive: true })
        await writeFile(filePath, `${body}\n`, 'utf8')
      } catch (error) {
        const ioError = new IOError('WriteFailed', `WRITE_FAILED: ${filePath}: ${describeError(error)}`, { cause: error })
        try {
          await auditLog.append({ documentId: doc.document_id, stage: 'SINK', status: 'FAILED', detail: ioError.message })
        } catch (auditError) {
          console.error('[extraction-sink] audit append failed', { documentId: doc.document_id, error: describeError(auditError) })
        }
        throw ioError
      }

      await auditLog.append({ documentId: doc.document_id, stage: 'SINK', status: 'OK', detail: `${format} -> ${filePath}` })
      return filePath
    },

    // Raw results are a debug artifact; they are not audited and not rolled back.
    async writeRawResults(raw) {
      const filePath = path.join(outputDir, rawResultsFileName(raw.document_id))
      try {
        await mkdir(outputDir, { recursive: true })
        await writeFile(filePath, `${JSON.stringify(raw, null, 2)}\n`, 'utf8')
      } catch (error) {
        throw new IOError('WriteFailed', `WRITE_FAILED: ${filePath}: ${describeError(error)}`, { cause: error })
      }
      return filePath
    }
  }
}
