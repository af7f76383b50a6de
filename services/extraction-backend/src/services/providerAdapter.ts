import { AdapterError } from '../errors.js'
import type { Entity, PageText } from '../types.js'

export type OcrOptions = {
  pageNumber: number
  signal?: AbortSignal
}

export type NerOptions = {
  sourcePage: number
  signal?: AbortSignal
}

export type DetectedLanguage = {
  language_code: string
  confidence: number
}

// OCR output before it enters the canonical record; the extra fields feed the raw results only.
export type OcrPage = PageText & {
  detected_languages?: DetectedLanguage[]
  average_confidence?: number
}

export type OcrCapability = {
  runOcr(pageImage: Uint8Array, options: OcrOptions): Promise<OcrPage>
}

export type NerCapability = {
  runNer(text: string, options: NerOptions): Promise<Entity[]>
}

// Adapters translate vendor responses only; the pipeline owns retries and auditing.
export type ProviderAdapter = OcrCapability & NerCapability & {
  name: string
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type RetryPolicy = {
  maxRetries: number
  baseDelayMs: number
  factor: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  onRetry?: (info: { attempt: number; delayMs: number; error: AdapterError }) => void
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  factor: 2
}

export function composeAdapter(name: string, ocr: OcrCapability, ner: NerCapability): ProviderAdapter {
  return {
    name,
    runOcr: (pageImage, options) => ocr.runOcr(pageImage, options),
    runNer: (text, options) => ner.runNer(text, options)
  }
}

export function assertNonEmptyImage(pageImage: Uint8Array) {
  if (!pageImage || pageImage.byteLength === 0) {
    throw new AdapterError('InvalidInput', 'EMPTY_PAGE_IMAGE')
  }
}

export function assertNonEmptyText(text: string) {
  if (!String(text || '').trim()) {
    throw new AdapterError('InvalidInput', 'EMPTY_TEXT')
  }
}

export function clampConfidence(value: unknown, scale = 1) {
  const numeric = Number(value)
  if (!Number.isFinite(numeric)) return 0
  return Math.min(Math.max(numeric / scale, 0), 1)
}

export function averageOf(values: number[]) {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

// One entry per language code, keeping the highest confidence, best first.
export function mergeLanguages(languages: DetectedLanguage[]): DetectedLanguage[] {
  const byCode = new Map<string, DetectedLanguage>()
  for (const language of languages) {
    if (!language.language_code) continue
    const existing = byCode.get(language.language_code)
    if (!existing || language.confidence > existing.confidence) {
      byCode.set(language.language_code, language)
    }
  }
  return Array.from(byCode.values()).sort((a, b) => b.confidence - a.confidence)
}

export function isAbortError(error: unknown) {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

// Maps fetch failures and non-2xx responses onto the adapter taxonomy.
export function toAdapterError(error: unknown, context: string): AdapterError {
  if (error instanceof AdapterError) return error
  if (isAbortError(error)) {
    return new AdapterError('Unavailable', `${context}_ABORTED`, { transient: false, cause: error })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new AdapterError('Unavailable', `${context}_NETWORK: ${message}`, { cause: error })
}

export async function ensureOkResponse(response: Response, context: string) {
  if (response.ok) return
  const body = await response.text().catch(() => '')
  if (response.status === 429) {
    throw new AdapterError('RateLimited', `${context}_RATE_LIMITED: ${body}`)
  }
  if (response.status >= 500 || response.status === 408) {
    throw new AdapterError('Unavailable', `${context}_FAILED: ${response.status} ${body}`)
  }
  throw new AdapterError('InvalidInput', `${context}_REJECTED: ${response.status} ${body}`)
}

export function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = () => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

// Settles as soon as the signal aborts, even when the call itself ignores the signal.
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = () => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Runs an adapter call, retrying transient failures with exponential backoff.
 *
 * The first call plus `maxRetries` retries are attempted. When the last one fails
 * the error surfaces as `Unavailable`, or `RateLimited` when the vendor was
 * throttling. Non-transient errors and cancellations are rethrown as-is.
 */
export async function withRetry<T>(
  call: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  signal?: AbortSignal
): Promise<T> {
  const wait = policy.sleep || sleep
  let lastError: AdapterError | null = null

  for (let attempt = 0; attempt <= policy.maxRetries; attempt += 1) {
    if (signal?.aborted) {
      throw new AdapterError('Unavailable', 'DOCUMENT_TIMEOUT', { transient: false, cause: signal.reason })
    }

    try {
      return await raceWithSignal(call(), signal)
    } catch (error) {
      if (signal?.aborted) {
        throw new AdapterError('Unavailable', 'DOCUMENT_TIMEOUT', { transient: false, cause: error })
      }
      const adapterError = toAdapterError(error, 'PROVIDER')
      if (!adapterError.transient) {
        throw adapterError
      }
      lastError = adapterError
      if (attempt === policy.maxRetries) break

      const delayMs = policy.baseDelayMs * policy.factor ** attempt
      policy.onRetry?.({ attempt: attempt + 1, delayMs, error: adapterError })
      try {
        await wait(delayMs, signal)
      } catch (sleepError) {
        throw new AdapterError('Unavailable', 'DOCUMENT_TIMEOUT', { transient: false, cause: sleepError })
      }
    }
  }

  const attempts = policy.maxRetries + 1
  const detail = lastError ? lastError.message : 'UNKNOWN'
  if (lastError?.kind === 'RateLimited') {
    throw new AdapterError('RateLimited', `RETRIES_EXHAUSTED after ${attempts} attempts: ${detail}`, { transient: false, cause: lastError })
  }
  throw new AdapterError('Unavailable', `RETRIES_EXHAUSTED after ${attempts} attempts: ${detail}`, { transient: false, cause: lastError })
}
