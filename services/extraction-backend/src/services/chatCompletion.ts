import { AdapterError } from '../errors.js'
import { ensureOkResponse, toAdapterError, type FetchLike } from './providerAdapter.js'

export type ChatEndpointConfig = {
  baseUrl: string
  apiKey: string
  model: string
}

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant'
  content: string
}

type ChatCompletionBody = {
  choices?: Array<{ message?: { content?: unknown } }>
}

export function extractTextFromChatContent(content: unknown): string {
  if (typeof content === 'string') return content.trim()
  if (!Array.isArray(content)) return ''

  return content
    .map((part) => {
      if (!part || typeof part !== 'object' || !('text' in part)) return ''
      return typeof part.text === 'string' ? part.text : ''
    })
    .filter(Boolean)
    .join('\n')
    .trim()
}

// Any OpenAI-compatible chat endpoint works here (Gemini, Bedrock gateways, Vertex).
export async function requestChatCompletion(
  config: ChatEndpointConfig,
  messages: ChatMessage[],
  options: { context: string; fetchImpl: FetchLike; signal?: AbortSignal }
): Promise<string> {
  let body: ChatCompletionBody
  try {
    const response = await options.fetchImpl(`${config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        model: config.model,
        temperature: 0,
        messages
      }),
      signal: options.signal
    })
    await ensureOkResponse(response, options.context)
    body = await response.json() as ChatCompletionBody
  } catch (error) {
    throw toAdapterError(error, options.context)
  }

  const content = extractTextFromChatContent(body.choices?.[0]?.message?.content)
  if (!content) {
    throw new AdapterError('Unavailable', `${options.context}_EMPTY`)
  }
  return content
}
