import { AdapterError } from '../errors.js'
import type { BoundingBox } from '../types.js'
import { readImageDimensions, type ImageDimensions } from './imageSize.js'
import {
  assertNonEmptyImage,
  averageOf,
  clampConfidence,
  toAdapterError,
  type OcrCapability,
  type OcrOptions,
  type OcrPage
} from './providerAdapter.js'

export type TextractBoundingBox = {
  Width?: number
  Height?: number
  Left?: number
  Top?: number
}

export type TextractBlock = {
  Id?: string
  BlockType?: string
  Text?: string
  Confidence?: number
  Geometry?: { BoundingBox?: TextractBoundingBox }
}

export type TextractResponse = {
  Blocks?: TextractBlock[]
}

// Authenticated Textract client, supplied by the caller.
export type TextractClientLike = {
  detectDocumentText(document: Uint8Array, signal?: AbortSignal): Promise<TextractResponse>
}

/**
 * Textract geometry is a 0-1 fraction of the page; scale it by the image size
 * to get absolute pixels. LINE blocks form the page text and boxes.
 * Textract does not detect languages.
 */
export function fromTextract(response: TextractResponse, pageNumber: number, dimensions: ImageDimensions): OcrPage {
  const boxes: BoundingBox[] = []
  const lines: string[] = []
  const confidences: number[] = []

  for (const block of response.Blocks || []) {
    if (block.BlockType !== 'LINE') continue
    const text = String(block.Text || '').trim()
    if (!text) continue
    lines.push(text)
    // 0-100 scale
    if (block.Confidence !== undefined) confidences.push(clampConfidence(block.Confidence, 100))

    const bbox = block.Geometry?.BoundingBox
    if (!bbox) continue
    boxes.push({
      text,
      x: Math.round((bbox.Left ?? 0) * dimensions.width),
      y: Math.round((bbox.Top ?? 0) * dimensions.height),
      width: Math.round((bbox.Width ?? 0) * dimensions.width),
      height: Math.round((bbox.Height ?? 0) * dimensions.height)
    })
  }

  return {
    page_number: pageNumber,
    text: lines.join('\n'),
    bounding_boxes: boxes,
    detected_languages: [],
    average_confidence: averageOf(confidences)
  }
}

function classifyAwsError(error: unknown) {
  if (!(error instanceof Error)) return toAdapterError(error, 'TEXTRACT')
  if (error.name === 'ProvisionedThroughputExceededException' || error.name === 'ThrottlingException') {
    return new AdapterError('RateLimited', `TEXTRACT_THROTTLED: ${error.message}`, { cause: error })
  }
  if (error.name === 'InvalidParameterException' || error.name === 'UnsupportedDocumentException' || error.name === 'BadDocumentException') {
    return new AdapterError('InvalidInput', `TEXTRACT_REJECTED: ${error.message}`, { cause: error })
  }
  return toAdapterError(error, 'TEXTRACT')
}

export function createTextractOcr(client: TextractClientLike): OcrCapability {
  return {
    async runOcr(pageImage: Uint8Array, options: OcrOptions): Promise<OcrPage> {
      assertNonEmptyImage(pageImage)

      const dimensions = readImageDimensions(pageImage)
      if (!dimensions) {
        throw new AdapterError('InvalidInput', 'UNSUPPORTED_IMAGE_FORMAT')
      }

      let response: TextractResponse
      try {
        response = await client.detectDocumentText(pageImage, options.signal)
      } catch (error) {
        throw classifyAwsError(error)
      }

      return fromTextract(response, options.pageNumber, dimensions)
    }
  }
}

export const __textractTestables = {
  classifyAwsError
}
