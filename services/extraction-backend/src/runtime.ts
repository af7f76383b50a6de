import type { PipelineConfig, ProviderName } from './config.js'
import { createFileAuditLog, type AuditLog } from './services/auditLog.js'
import { createExtractionPipeline, type ExtractionPipeline } from './services/extractionPipeline.js'
import { createExtractionSink } from './services/extractionSink.js'
import { createProviderAdapter, type ProviderDependencies } from './services/providerFactory.js'
import type { PageRasterizer } from './services/documentSource.js'
import { createChatSummarizer, type SummaryCapability } from './services/summaryProvider.js'

export type PipelineRuntime = {
  config: PipelineConfig
  auditLog: AuditLog
  pipelineFor(provider?: ProviderName): ExtractionPipeline
}

export type RuntimeOverrides = ProviderDependencies & {
  rasterize?: PageRasterizer
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  summarizer?: SummaryCapability | null
}

// Wires config into adapters and the pipeline; one pipeline per provider, built on first use.
export function createPipelineRuntime(config: PipelineConfig, overrides: RuntimeOverrides = {}): PipelineRuntime {
  const auditLog = createFileAuditLog({ outputDir: config.outputDir, enabled: config.auditEnabled })
  const sink = createExtractionSink({ outputDir: config.outputDir, auditLog })
  const pipelines = new Map<ProviderName, ExtractionPipeline>()
  const summarizer: SummaryCapability | null = overrides.summarizer
    ?? (config.summary.enabled ? createChatSummarizer(config.summary, overrides.fetchImpl) : null)

  function pipelineFor(provider: ProviderName = config.provider) {
    const existing = pipelines.get(provider)
    if (existing) return existing

    const adapter = createProviderAdapter(provider, config, overrides)
    const pipeline = createExtractionPipeline({
      adapter,
      sink,
      auditLog,
      retry: {
        maxRetries: config.maxRetries,
        baseDelayMs: config.retryBaseMs,
        factor: 2,
        sleep: overrides.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          console.warn('[extraction-pipeline] retrying provider call', { provider, attempt, delayMs, code: error.code })
        }
      },
      documentTimeoutMs: config.documentTimeoutMs,
      summarizer,
      source: {
        allowedExtensions: config.allowedExtensions,
        maxFileSizeBytes: config.maxFileSizeBytes,
        renderScale: config.pdfRenderScale,
        rasterize: overrides.rasterize
      }
    })
    pipelines.set(provider, pipeline)
    return pipeline
  }

  return { config, auditLog, pipelineFor }
}
