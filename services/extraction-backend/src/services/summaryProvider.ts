import { requestChatCompletion, type ChatEndpointConfig } from './chatCompletion.js'
import {
  assertNonEmptyText,
  withRetry,
  type FetchLike,
  type OcrPage,
  type RetryPolicy
} from './providerAdapter.js'

export type PageSummary = {
  page_number: number
  summary: string
}

export type DocumentSummary = {
  primary_language: string
  page_summaries: PageSummary[]
  overall_summary: string | null
}

export type SummaryCapability = {
  summarize(text: string, options: { language: string; signal?: AbortSignal }): Promise<string>
}

const DEFAULT_LANGUAGE = 'en'

const SUMMARY_PROMPTS: Readonly<Record<string, string>> = {
  en: [
    'You summarize OCR text from clinical documents.',
    'Write a concise summary in English covering diagnoses, medications, tests and follow-up instructions.',
    'Use only facts present in the text. Do not add explanations about the task.'
  ].join('\n'),
  ja: [
    'あなたは医療文書のOCRテキストを要約します。',
    '診断、薬剤、検査、今後の指示を中心に、日本語で簡潔に要約してください。',
    'テキストに書かれている事実のみを使用してください。'
  ].join('\n')
}

export function summaryPromptFor(language: string) {
  const code = language.toLowerCase().split('-')[0]
  return Object.hasOwn(SUMMARY_PROMPTS, code) ? SUMMARY_PROMPTS[code] : SUMMARY_PROMPTS[DEFAULT_LANGUAGE]
}

// The most confident language on the first page that reports any, else English.
export function primaryLanguage(pages: OcrPage[]) {
  for (const page of pages) {
    const best = page.detected_languages?.[0]
    if (best?.language_code) return best.language_code
  }
  return DEFAULT_LANGUAGE
}

export function createChatSummarizer(config: ChatEndpointConfig, fetchImpl: FetchLike = fetch): SummaryCapability {
  if (!config.baseUrl || !config.apiKey || !config.model) {
    throw new Error('PROVIDER_CONFIG_INCOMPLETE: SUMMARY_API_KEY')
  }

  return {
    async summarize(text, options) {
      assertNonEmptyText(text)
      return requestChatCompletion(
        config,
        [
          { role: 'system', content: summaryPromptFor(options.language) },
          { role: 'user', content: text }
        ],
        { context: 'SUMMARY', fetchImpl, signal: options.signal }
      )
    }
  }
}

/**
 * Summarizes each page with text, then the page summaries together when there
 * is more than one. The prompt language follows the OCR's primary language.
 */
export async function summarizeDocument(
  summarizer: SummaryCapability,
  pages: OcrPage[],
  options: { retry: RetryPolicy; signal?: AbortSignal }
): Promise<DocumentSummary> {
  const language = primaryLanguage(pages)
  const pageSummaries: PageSummary[] = []

  for (const page of pages) {
    if (!page.text.trim()) continue
    const summary = await withRetry(
      () => summarizer.summarize(page.text, { language, signal: options.signal }),
      options.retry,
      options.signal
    )
    pageSummaries.push({ page_number: page.page_number, summary })
  }

  let overall: string | null = null
  if (pageSummaries.length > 1) {
    const combined = pageSummaries.map((item) => item.summary).join('\n')
    overall = await withRetry(
      () => summarizer.summarize(combined, { language, signal: options.signal }),
      options.retry,
      options.signal
    )
  }

  return { primary_language: language, page_summaries: pageSummaries, overall_summary: overall }
}
