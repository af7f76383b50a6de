import { Redis } from 'ioredis'
import { isProviderName, type ProviderName } from '../config.js'
import { isOutputFormat, type OutputFormat } from '../types.js'

export type ExtractionJob = {
  path: string
  format: OutputFormat
  provider: ProviderName
}

export type ExtractionQueue = {
  enqueue(job: ExtractionJob): Promise<void>
  pop(timeoutSeconds?: number): Promise<ExtractionJob | null>
  close(): Promise<void>
}

export function parseExtractionJob(payload: string): ExtractionJob | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(payload)
  } catch {
    return null
  }
  if (!parsed || typeof parsed !== 'object') return null

  const filePath: unknown = Reflect.get(parsed, 'path')
  const format: unknown = Reflect.get(parsed, 'format')
  const provider: unknown = Reflect.get(parsed, 'provider')
  if (typeof filePath !== 'string' || !filePath.trim()) return null
  if (!isOutputFormat(format) || !isProviderName(provider)) return null
  return { path: filePath, format, provider }
}

export function createExtractionQueue(redisUrl: string, queueKey: string): ExtractionQueue | null {
  if (!redisUrl) return null

  let client: Redis | null = null
  const getClient = () => {
    if (!client) {
      client = new Redis(redisUrl, {
        maxRetriesPerRequest: null,
        enableReadyCheck: false
      })
    }
    return client
  }

  return {
    async enqueue(job) {
      await getClient().lpush(queueKey, JSON.stringify(job))
    },

    async pop(timeoutSeconds = 5) {
      const result = await getClient().brpop(queueKey, timeoutSeconds)
      if (!result || result.length < 2) return null
      const job = parseExtractionJob(result[1])
      if (!job) {
        console.warn('[extraction-queue] dropping malformed job', { payload: result[1] })
      }
      return job
    },

    async close() {
      if (client) {
        const c = client
        client = null
        await c.quit()
      }
    }
  }
}
