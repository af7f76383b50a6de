import { AdapterError } from '../errors.js'
import type { BoundingBox } from '../types.js'
import {
  assertNonEmptyImage,
  averageOf,
  clampConfidence,
  ensureOkResponse,
  mergeLanguages,
  sleep,
  toAdapterError,
  type FetchLike,
  type OcrCapability,
  type OcrOptions,
  type OcrPage
} from './providerAdapter.js'

export type AzureReadConfig = {
  endpoint: string
  apiKey: string
  pollIntervalMs: number
  maxPolls: number
}

export type AzurePoint = {
  x: number
  y: number
}

export type AzureLine = {
  content: string
  polygon?: number[] | AzurePoint[]
}

export type AzurePage = {
  pageNumber: number
  width?: number
  height?: number
  unit?: 'pixel' | 'inch'
  lines?: AzureLine[]
  words?: Array<{ content?: string; confidence?: number }>
}

export type AzureAnalyzeResult = {
  content?: string
  pages?: AzurePage[]
  languages?: Array<{ locale?: string; confidence?: number }>
}

export type AzureOperation = {
  status?: 'notStarted' | 'running' | 'succeeded' | 'failed'
  analyzeResult?: AzureAnalyzeResult
  error?: { code?: string; message?: string }
}

const API_VERSION = '2023-07-31'

// The REST API returns a flat [x0, y0, x1, y1, ...] list; the SDK returns points.
function toPoints(polygon: number[] | AzurePoint[]): AzurePoint[] {
  const points: AzurePoint[] = []
  for (let i = 0; i < polygon.length; i += 1) {
    const entry = polygon[i]
    if (typeof entry === 'number') {
      const y = polygon[i + 1]
      if (typeof y === 'number') points.push({ x: entry, y })
      i += 1
    } else {
      points.push(entry)
    }
  }
  return points
}

function polygonToBox(polygon: number[] | AzurePoint[]) {
  const points = toPoints(polygon)
  if (points.length < 4) return null
  const xs = points.map((p) => p.x)
  const ys = points.map((p) => p.y)
  const minX = Math.min(...xs)
  const minY = Math.min(...ys)
  return {
    x: Math.round(minX),
    y: Math.round(minY),
    width: Math.round(Math.max(...xs) - minX),
    height: Math.round(Math.max(...ys) - minY)
  }
}

export function fromAzureRead(result: AzureAnalyzeResult, pageNumber: number): OcrPage {
  const page = result.pages?.[0]
  if (page?.unit && page.unit !== 'pixel') {
    throw new AdapterError('InvalidInput', `AZURE_UNSUPPORTED_UNIT: ${page.unit}`)
  }

  const boxes: BoundingBox[] = []
  const lines: string[] = []
  for (const line of page?.lines || []) {
    const text = String(line.content || '').trim()
    if (!text) continue
    lines.push(text)
    const box = line.polygon ? polygonToBox(line.polygon) : null
    if (box) boxes.push({ text, ...box })
  }

  return {
    page_number: pageNumber,
    text: String(result.content || '').trim() || lines.join('\n'),
    bounding_boxes: boxes,
    detected_languages: mergeLanguages((result.languages || []).map((language) => ({
      language_code: String(language.locale || ''),
      confidence: clampConfidence(language.confidence ?? 0)
    }))),
    average_confidence: averageOf((page?.words || [])
      .filter((word) => word.confidence !== undefined)
      .map((word) => clampConfidence(word.confidence)))
  }
}

export function createAzureReadOcr(config: AzureReadConfig, fetchImpl: FetchLike = fetch): OcrCapability {
  if (!config.endpoint || !config.apiKey) {
    throw new Error('PROVIDER_CONFIG_INCOMPLETE: AZURE_DOCUMENT_API_KEY')
  }

  const analyzeUrl = `${config.endpoint}/formrecognizer/documentModels/prebuilt-read:analyze?api-version=${API_VERSION}`

  async function submit(pageImage: Uint8Array, signal?: AbortSignal) {
    const response = await fetchImpl(analyzeUrl, {
      method: 'POST',
      headers: {
        'Ocp-Apim-Subscription-Key': config.apiKey,
        'Content-Type': 'application/octet-stream'
      },
      body: Buffer.from(pageImage),
      signal
    })
    await ensureOkResponse(response, 'AZURE_READ')
    const location = response.headers.get('operation-location')
    if (!location) {
      throw new AdapterError('Unavailable', 'AZURE_READ_MISSING_OPERATION')
    }
    return location
  }

  async function poll(location: string, signal?: AbortSignal): Promise<AzureAnalyzeResult> {
    for (let attempt = 0; attempt < config.maxPolls; attempt += 1) {
      const response = await fetchImpl(location, {
        headers: { 'Ocp-Apim-Subscription-Key': config.apiKey },
        signal
      })
      await ensureOkResponse(response, 'AZURE_READ')
      const operation = await response.json() as AzureOperation

      if (operation.status === 'succeeded') {
        return operation.analyzeResult || {}
      }
      if (operation.status === 'failed') {
        throw new AdapterError('InvalidInput', `AZURE_READ_FAILED: ${operation.error?.code || ''} ${operation.error?.message || ''}`.trim())
      }
      await sleep(config.pollIntervalMs, signal)
    }
    throw new AdapterError('Unavailable', 'AZURE_READ_POLL_TIMEOUT')
  }

  return {
    async runOcr(pageImage: Uint8Array, options: OcrOptions): Promise<OcrPage> {
      assertNonEmptyImage(pageImage)

      let result: AzureAnalyzeResult
      try {
        const location = await submit(pageImage, options.signal)
        result = await poll(location, options.signal)
      } catch (error) {
        throw toAdapterError(error, 'AZURE_READ')
      }

      return fromAzureRead(result, options.pageNumber)
    }
  }
}
