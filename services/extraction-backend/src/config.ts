import path from 'path'
import { isOutputFormat, type OutputFormat } from './types.js'

export const PROVIDER_NAMES = ['gcp', 'aws', 'azure'] as const

export type ProviderName = typeof PROVIDER_NAMES[number]

export type PipelineConfig = {
  provider: ProviderName
  inputDir: string
  outputDir: string
  outputFormat: OutputFormat
  maxFileSizeBytes: number
  allowedExtensions: string[]
  documentTimeoutMs: number
  maxRetries: number
  retryBaseMs: number
  auditEnabled: boolean
  pdfRenderScale: number
  vision: {
    baseUrl: string
    apiKey: string
    confidenceThreshold: number
    languageHints: string[]
  }
  ner: {
    baseUrl: string
    apiKey: string
    model: string
  }
  summary: {
    enabled: boolean
    baseUrl: string
    apiKey: string
    model: string
  }
  aws: {
    region: string
  }
  azure: {
    endpoint: string
    apiKey: string
    pollIntervalMs: number
    maxPolls: number
  }
  server: {
    port: number
    jsonBodyLimit: string
    corsOrigins: string[]
  }
  queue: {
    redisUrl: string
    queueKey: string
    concurrency: number
  }
}

type Env = Record<string, string | undefined>

const DEFAULT_VISION_BASE_URL = 'https://vision.googleapis.com'
const DEFAULT_NER_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai'
const DEFAULT_NER_MODEL = 'gemini-1.5-flash'
const DEFAULT_CORS_ORIGINS = ['http://localhost:8080', 'http://localhost:5173']

export function isProviderName(value: unknown): value is ProviderName {
  return typeof value === 'string' && (PROVIDER_NAMES as readonly string[]).includes(value)
}

function normalizeBaseUrl(value: string) {
  return value.endsWith('/') ? value.slice(0, -1) : value
}

function readString(env: Env, key: string, fallback = '') {
  return String(env[key] || '').trim() || fallback
}

function readNumber(env: Env, key: string, fallback: number) {
  const raw = String(env[key] || '').trim()
  if (!raw) return fallback
  const value = Number(raw)
  return Number.isFinite(value) ? value : fallback
}

function readCount(env: Env, key: string, fallback: number, min: number) {
  return Math.max(Math.floor(readNumber(env, key, fallback)), min)
}

function readBoolean(env: Env, key: string, fallback: boolean) {
  const raw = String(env[key] || '').trim().toLowerCase()
  if (!raw) return fallback
  return raw === 'true' || raw === '1' || raw === 'yes'
}

function readList(env: Env, key: string, fallback: string[]) {
  const values = String(env[key] || '').split(',').map((item) => item.trim()).filter(Boolean)
  return values.length ? values : fallback
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const provider = readString(env, 'EXTRACTION_PROVIDER', 'gcp')
  if (!isProviderName(provider)) {
    throw new Error(`UNKNOWN_PROVIDER: ${provider}`)
  }

  const outputFormat = readString(env, 'OUTPUT_FORMAT', 'json')
  if (!isOutputFormat(outputFormat)) {
    throw new Error(`UNKNOWN_OUTPUT_FORMAT: ${outputFormat}`)
  }

  const nerBaseUrl = normalizeBaseUrl(readString(env, 'NER_BASE_URL', DEFAULT_NER_BASE_URL))
  const nerApiKey = readString(env, 'NER_API_KEY')
  const nerModel = readString(env, 'NER_MODEL', DEFAULT_NER_MODEL)

  return {
    provider,
    inputDir: path.resolve(readString(env, 'INPUT_DIR', path.join('data', 'input'))),
    outputDir: path.resolve(readString(env, 'OUTPUT_DIR', path.join('data', 'output'))),
    outputFormat,
    maxFileSizeBytes: Math.max(readNumber(env, 'MAX_FILE_SIZE_MB', 10), 1) * 1024 * 1024,
    allowedExtensions: ['.pdf', '.png', '.jpg', '.jpeg'],
    documentTimeoutMs: Math.max(readNumber(env, 'DOCUMENT_TIMEOUT_MS', 120000), 1000),
    maxRetries: readCount(env, 'ADAPTER_MAX_RETRIES', 3, 0),
    retryBaseMs: Math.max(readNumber(env, 'ADAPTER_RETRY_BASE_MS', 500), 0),
    auditEnabled: readBoolean(env, 'ENABLE_AUDIT_LOGS', true),
    pdfRenderScale: Math.max(readNumber(env, 'PDF_RENDER_SCALE', 2), 0.5),
    vision: {
      baseUrl: normalizeBaseUrl(readString(env, 'GCP_VISION_BASE_URL', DEFAULT_VISION_BASE_URL)),
      apiKey: readString(env, 'GCP_VISION_API_KEY'),
      confidenceThreshold: readNumber(env, 'VISION_CONFIDENCE_THRESHOLD', 0.7),
      languageHints: readList(env, 'VISION_LANGUAGE_HINTS', ['ja', 'en'])
    },
    ner: {
      baseUrl: nerBaseUrl,
      apiKey: nerApiKey,
      model: nerModel
    },
    summary: {
      enabled: readBoolean(env, 'SUMMARY_ENABLED', false),
      baseUrl: normalizeBaseUrl(readString(env, 'SUMMARY_BASE_URL', nerBaseUrl)),
      apiKey: readString(env, 'SUMMARY_API_KEY', nerApiKey),
      model: readString(env, 'SUMMARY_MODEL', nerModel)
    },
    aws: {
      region: readString(env, 'AWS_REGION', 'us-east-1')
    },
    azure: {
      endpoint: normalizeBaseUrl(readString(env, 'AZURE_DOCUMENT_ENDPOINT')),
      apiKey: readString(env, 'AZURE_DOCUMENT_API_KEY'),
      pollIntervalMs: Math.max(readNumber(env, 'AZURE_POLL_INTERVAL_MS', 1000), 0),
      maxPolls: readCount(env, 'AZURE_MAX_POLLS', 60, 1)
    },
    server: {
      port: readNumber(env, 'PORT', 4020),
      jsonBodyLimit: readString(env, 'JSON_BODY_LIMIT', '1mb'),
      corsOrigins: [...new Set([...DEFAULT_CORS_ORIGINS, ...readList(env, 'CORS_ORIGINS', [])])]
    },
    queue: {
      redisUrl: readString(env, 'REDIS_URL'),
      queueKey: readString(env, 'EXTRACTION_QUEUE_KEY', 'extraction:documents'),
      concurrency: readCount(env, 'EXTRACTION_CONCURRENCY', 2, 1)
    }
  }
}
