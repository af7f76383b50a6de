import 'dotenv/config'
import { loadPipelineConfig } from '../config.js'
import { describeError } from '../errors.js'
import { createPipelineRuntime } from '../runtime.js'
import { resolveInputPath } from '../services/documentSource.js'
import { createExtractionQueue } from '../services/extractionQueue.js'

const idleTimeoutSec = Math.max(Number(process.env.EXTRACTION_QUEUE_BRPOP_TIMEOUT_SEC || 5), 1)

const config = loadPipelineConfig()
const runtime = createPipelineRuntime(config)
const queue = createExtractionQueue(config.queue.redisUrl, config.queue.queueKey)

let stopping = false

async function runWorker() {
  if (!queue) return
  while (!stopping) {
    try {
      const job = await queue.pop(idleTimeoutSec)
      if (!job) continue
      const filePath = await resolveInputPath(config.inputDir, job.path)
      if (!filePath) {
        console.warn(`[extraction-queue-worker] skipping job outside input root path=${job.path}`)
        continue
      }
      const result = await runtime.pipelineFor(job.provider).processDocument({ filePath, format: job.format })
      console.log(`[extraction-queue-worker] processed document=${result.documentId} output=${result.outputPath}`)
    } catch (error) {
      console.error('[extraction-queue-worker] failed', describeError(error))
    }
  }
}

async function shutdown() {
  stopping = true
  await queue?.close()
  process.exit(0)
}

async function main() {
  if (!queue) {
    console.log('[extraction-queue-worker] REDIS_URL not set, nothing to consume')
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })

  console.log(`[extraction-queue-worker] started provider=${config.provider} concurrency=${config.queue.concurrency}`)
  await Promise.all(Array.from({ length: config.queue.concurrency }, () => runWorker()))
}

main().catch((error) => {
  console.error('[extraction-queue-worker] crashed', describeError(error))
  process.exit(1)
})
