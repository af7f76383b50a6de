import { AdapterError } from '../errors.js'
import type { Entity } from '../types.js'
import { COMPREHEND_MEDICAL_TAXONOMY, mapVendorCategory } from './entityTaxonomy.js'
import {
  assertNonEmptyText,
  clampConfidence,
  toAdapterError,
  type NerCapability,
  type NerOptions
} from './providerAdapter.js'

export type ComprehendMedicalEntity = {
  Text?: string
  Category?: string
  Type?: string
  Score?: number
  BeginOffset?: number
}

export type ComprehendMedicalResponse = {
  Entities?: ComprehendMedicalEntity[]
}

// Authenticated Comprehend Medical client, supplied by the caller.
export type ComprehendMedicalClientLike = {
  detectEntities(text: string, signal?: AbortSignal): Promise<ComprehendMedicalResponse>
}

// DetectEntitiesV2 accepts at most 20,000 UTF-8 characters per request.
const MAX_TEXT_LENGTH = 20000

export function fromComprehendMedical(response: ComprehendMedicalResponse, sourcePage: number): Entity[] {
  return (response.Entities || [])
    .filter((entity) => String(entity.Text || '').trim())
    .map((entity) => ({
      kind: mapVendorCategory(COMPREHEND_MEDICAL_TAXONOMY, entity.Category),
      value: String(entity.Text).trim(),
      source_page: sourcePage,
      confidence: clampConfidence(entity.Score)
    }))
}

export function createComprehendMedicalNer(client: ComprehendMedicalClientLike): NerCapability {
  return {
    async runNer(text: string, options: NerOptions): Promise<Entity[]> {
      assertNonEmptyText(text)
      if (text.length > MAX_TEXT_LENGTH) {
        throw new AdapterError('InvalidInput', `TEXT_TOO_LONG: ${text.length} > ${MAX_TEXT_LENGTH}`)
      }

      let response: ComprehendMedicalResponse
      try {
        response = await client.detectEntities(text, options.signal)
      } catch (error) {
        if (error instanceof Error && (error.name === 'TooManyRequestsException' || error.name === 'ThrottlingException')) {
          throw new AdapterError('RateLimited', `COMPREHEND_THROTTLED: ${error.message}`, { cause: error })
        }
        if (error instanceof Error && (error.name === 'TextSizeLimitExceededException' || error.name === 'InvalidRequestException')) {
          throw new AdapterError('InvalidInput', `COMPREHEND_REJECTED: ${error.message}`, { cause: error })
        }
        throw toAdapterError(error, 'COMPREHEND')
      }

      return fromComprehendMedical(response, options.sourcePage)
    }
  }
}
