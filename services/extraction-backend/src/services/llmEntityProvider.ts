import { AdapterError } from '../errors.js'
import type { Entity } from '../types.js'
import { LLM_TAXONOMY, mapVendorCategory } from './entityTaxonomy.js'
import { requestChatCompletion, type ChatEndpointConfig } from './chatCompletion.js'
import {
  assertNonEmptyText,
  clampConfidence,
  type FetchLike,
  type NerCapability,
  type NerOptions
} from './providerAdapter.js'

export type LlmEntityConfig = ChatEndpointConfig

const SYSTEM_PROMPT = [
  'You extract medical named entities from OCR text of clinical documents.',
  'Return only a JSON array. Each element is {"kind": string, "value": string, "confidence": number}.',
  'kind is one of: diagnosis, medication, test, other.',
  'value is copied verbatim from the text. confidence is between 0 and 1.',
  'Return [] when nothing is found. Do not add explanations.'
].join('\n')

function stripCodeFence(value: string) {
  const fenced = value.match(/```(?:json)?\s*([\s\S]*?)```/i)
  return (fenced ? fenced[1] : value).trim()
}

function readField(row: object, ...keys: string[]): unknown {
  for (const key of keys) {
    if (key in row) {
      const value: unknown = Reflect.get(row, key)
      if (value !== undefined && value !== null) return value
    }
  }
  return undefined
}

/**
 * Parses the model reply into canonical entities. Models sometimes answer in
 * percentages, so scores above 1 are read on a 0-100 scale.
 */
export function parseLlmEntities(content: string, sourcePage: number): Entity[] {
  const payload = stripCodeFence(content)
  let parsed: unknown
  try {
    parsed = JSON.parse(payload)
  } catch {
    throw new AdapterError('Unavailable', 'LLM_NER_MALFORMED_RESPONSE')
  }

  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    parsed = readField(parsed, 'entities') ?? []
  }
  if (!Array.isArray(parsed)) {
    throw new AdapterError('Unavailable', 'LLM_NER_MALFORMED_RESPONSE')
  }

  const entities: Entity[] = []
  for (const row of parsed) {
    if (!row || typeof row !== 'object') continue
    const value = String(readField(row, 'value', 'text') ?? '').trim()
    if (!value) continue
    const rawConfidence = Number(readField(row, 'confidence', 'score') ?? 1)
    entities.push({
      kind: mapVendorCategory(LLM_TAXONOMY, String(readField(row, 'kind', 'category', 'type') ?? '')),
      value,
      source_page: sourcePage,
      confidence: clampConfidence(rawConfidence, rawConfidence > 1 ? 100 : 1)
    })
  }
  return entities
}

export function createLlmEntityNer(config: LlmEntityConfig, fetchImpl: FetchLike = fetch): NerCapability {
  if (!config.baseUrl || !config.apiKey || !config.model) {
    throw new Error('PROVIDER_CONFIG_INCOMPLETE: NER_API_KEY')
  }

  return {
    async runNer(text: string, options: NerOptions): Promise<Entity[]> {
      assertNonEmptyText(text)

      const content = await requestChatCompletion(
        config,
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: text }
        ],
        { context: 'LLM_NER', fetchImpl, signal: options.signal }
      )
      return parseLlmEntities(content, options.sourcePage)
    }
  }
}
