import { AdapterError } from '../errors.js'
import type { BoundingBox } from '../types.js'
import {
  assertNonEmptyImage,
  averageOf,
  clampConfidence,
  mergeLanguages,
  ensureOkResponse,
  toAdapterError,
  type FetchLike,
  type OcrCapability,
  type OcrOptions,
  type OcrPage
} from './providerAdapter.js'

export type GoogleVisionConfig = {
  baseUrl: string
  apiKey: string
  confidenceThreshold: number
  languageHints: string[]
}

export type VisionVertex = {
  x?: number
  y?: number
}

export type VisionSymbol = {
  text?: string
}

export type VisionWord = {
  symbols?: VisionSymbol[]
}

export type VisionParagraph = {
  words?: VisionWord[]
}

export type VisionBlock = {
  boundingBox?: { vertices?: VisionVertex[] }
  confidence?: number
  paragraphs?: VisionParagraph[]
}

export type VisionDetectedLanguage = {
  languageCode?: string
  confidence?: number
}

export type VisionPage = {
  property?: { detectedLanguages?: VisionDetectedLanguage[] }
  width?: number
  height?: number
  confidence?: number
  blocks?: VisionBlock[]
}

export type VisionFullTextAnnotation = {
  text?: string
  pages?: VisionPage[]
}

export type VisionAnnotateResponse = {
  responses?: Array<{
    fullTextAnnotation?: VisionFullTextAnnotation
    error?: { code?: number; message?: string }
  }>
}

function verticesToBox(vertices: VisionVertex[]) {
  if (vertices.length === 0) return null
  // Vision omits a coordinate when it is zero.
  const xs = vertices.map((v) => v.x ?? 0)
  const ys = vertices.map((v) => v.y ?? 0)
  const minX = Math.min(...xs)
  const minY = Math.min(...ys)
  return { x: minX, y: minY, width: Math.max(...xs) - minX, height: Math.max(...ys) - minY }
}

function blockText(block: VisionBlock) {
  const words = (block.paragraphs || []).flatMap((paragraph) => paragraph.words || [])
  return words
    .map((word) => (word.symbols || []).map((symbol) => symbol.text || '').join(''))
    .filter(Boolean)
    .join(' ')
}

export function fromVisionAnnotation(
  annotation: VisionFullTextAnnotation,
  pageNumber: number,
  confidenceThreshold: number
): OcrPage {
  const boxes: BoundingBox[] = []
  const confidences: number[] = []
  const languages: Array<{ language_code: string; confidence: number }> = []

  for (const page of annotation.pages || []) {
    for (const language of page.property?.detectedLanguages || []) {
      languages.push({ language_code: String(language.languageCode || ''), confidence: clampConfidence(language.confidence ?? 0) })
    }
    for (const block of page.blocks || []) {
      if (block.confidence === undefined || block.confidence < confidenceThreshold) continue
      const box = verticesToBox(block.boundingBox?.vertices || [])
      const text = blockText(block)
      if (!box || !text) continue
      boxes.push({ text, ...box })
      confidences.push(block.confidence)
    }
  }

  return {
    page_number: pageNumber,
    text: String(annotation.text || '').trim(),
    bounding_boxes: boxes,
    detected_languages: mergeLanguages(languages),
    average_confidence: averageOf(confidences)
  }
}

export function createGoogleVisionOcr(config: GoogleVisionConfig, fetchImpl: FetchLike = fetch): OcrCapability {
  if (!config.baseUrl || !config.apiKey) {
    throw new Error('PROVIDER_CONFIG_INCOMPLETE: GCP_VISION_API_KEY')
  }

  return {
    async runOcr(pageImage: Uint8Array, options: OcrOptions): Promise<OcrPage> {
      assertNonEmptyImage(pageImage)

      const url = `${config.baseUrl}/v1/images:annotate?key=${encodeURIComponent(config.apiKey)}`
      let body: VisionAnnotateResponse
      try {
        const response = await fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            requests: [
              {
                image: { content: Buffer.from(pageImage).toString('base64') },
                features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
                imageContext: { languageHints: config.languageHints }
              }
            ]
          }),
          signal: options.signal
        })
        await ensureOkResponse(response, 'VISION')
        body = await response.json() as VisionAnnotateResponse
      } catch (error) {
        throw toAdapterError(error, 'VISION')
      }

      const result = body.responses?.[0]
      if (result?.error) {
        // google.rpc.Code: 8 RESOURCE_EXHAUSTED, 14 UNAVAILABLE, 4 DEADLINE_EXCEEDED
        const code = Number(result.error.code || 0)
        const detail = `VISION_ERROR: ${code} ${result.error.message || ''}`.trim()
        if (code === 8) throw new AdapterError('RateLimited', detail)
        if (code === 14 || code === 4) throw new AdapterError('Unavailable', detail)
        throw new AdapterError('InvalidInput', detail)
      }

      return fromVisionAnnotation(result?.fullTextAnnotation || {}, options.pageNumber, config.confidenceThreshold)
    }
  }
}
