import 'dotenv/config'
import { createApp } from './app.js'
import { loadPipelineConfig } from './config.js'
import { createPipelineRuntime } from './runtime.js'
import { createExtractionQueue } from './services/extractionQueue.js'

const config = loadPipelineConfig()
const runtime = createPipelineRuntime(config)
const queue = createExtractionQueue(config.queue.redisUrl, config.queue.queueKey)
const app = createApp(runtime, queue)

app.listen(config.server.port, () => {
  console.log(`Extraction backend listening on :${config.server.port}`, {
    provider: config.provider,
    outputDir: config.outputDir,
    queue: queue ? config.queue.queueKey : 'disabled'
  })
})
