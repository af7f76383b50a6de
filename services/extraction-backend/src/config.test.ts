import test from 'node:test'
import assert from 'node:assert/strict'
import path from 'path'
import { loadPipelineConfig } from './config.js'

test('loadPipelineConfig applies defaults', () => {
  const config = loadPipelineConfig({})
  assert.equal(config.provider, 'gcp')
  assert.equal(config.outputFormat, 'json')
  assert.equal(config.outputDir, path.resolve('data', 'output'))
  assert.equal(config.maxFileSizeBytes, 10 * 1024 * 1024)
  assert.equal(config.documentTimeoutMs, 120000)
  assert.equal(config.maxRetries, 3)
  assert.equal(config.retryBaseMs, 500)
  assert.equal(config.auditEnabled, true)
  assert.equal(config.vision.confidenceThreshold, 0.7)
  assert.deepEqual(config.vision.languageHints, ['ja', 'en'])
  assert.equal(config.server.port, 4020)
  assert.equal(config.queue.redisUrl, '')
  assert.equal(config.queue.queueKey, 'extraction:documents')
})

test('loadPipelineConfig reads overrides', () => {
  const config = loadPipelineConfig({
    EXTRACTION_PROVIDER: 'aws',
    OUTPUT_FORMAT: 'fhir',
    OUTPUT_DIR: '/tmp/extraction-out',
    MAX_FILE_SIZE_MB: '2',
    ENABLE_AUDIT_LOGS: 'false',
    VISION_LANGUAGE_HINTS: 'en, de',
    NER_BASE_URL: 'https://llm.test/v1/',
    AWS_REGION: 'eu-west-1'
  })
  assert.equal(config.provider, 'aws')
  assert.equal(config.outputFormat, 'fhir')
  assert.equal(config.outputDir, '/tmp/extraction-out')
  assert.equal(config.maxFileSizeBytes, 2 * 1024 * 1024)
  assert.equal(config.auditEnabled, false)
  assert.deepEqual(config.vision.languageHints, ['en', 'de'])
  assert.equal(config.ner.baseUrl, 'https://llm.test/v1')
  assert.equal(config.aws.region, 'eu-west-1')
})

test('loadPipelineConfig rejects unknown provider and format', () => {
  assert.throws(() => loadPipelineConfig({ EXTRACTION_PROVIDER: 'ibm' }), /UNKNOWN_PROVIDER: ibm/)
  assert.throws(() => loadPipelineConfig({ OUTPUT_FORMAT: 'xml' }), /UNKNOWN_OUTPUT_FORMAT: xml/)
})

test('loadPipelineConfig ignores non-numeric values', () => {
  const config = loadPipelineConfig({ ADAPTER_MAX_RETRIES: 'many', PORT: 'eighty' })
  assert.equal(config.maxRetries, 3)
  assert.equal(config.server.port, 4020)
})

test('loadPipelineConfig rounds fractional counts down', () => {
  const config = loadPipelineConfig({ ADAPTER_MAX_RETRIES: '2.5', AZURE_MAX_POLLS: '3.9', EXTRACTION_CONCURRENCY: '0.5' })
  assert.equal(config.maxRetries, 2)
  assert.equal(config.azure.maxPolls, 3)
  assert.equal(config.queue.concurrency, 1)
})

test('loadPipelineConfig reads input root, cors origins and summary settings', () => {
  const defaults = loadPipelineConfig({})
  assert.equal(defaults.inputDir, path.resolve('data', 'input'))
  assert.deepEqual(defaults.server.corsOrigins, ['http://localhost:8080', 'http://localhost:5173'])
  assert.equal(defaults.summary.enabled, false)

  const config = loadPipelineConfig({
    INPUT_DIR: '/srv/scans',
    CORS_ORIGINS: 'https://records.test, http://localhost:5173',
    SUMMARY_ENABLED: 'true',
    NER_BASE_URL: 'https://llm.test/v1',
    NER_API_KEY: 'test-secret',
    SUMMARY_MODEL: 'summary-model'
  })
  assert.equal(config.inputDir, '/srv/scans')
  assert.deepEqual(config.server.corsOrigins, ['http://localhost:8080', 'http://localhost:5173', 'https://records.test'])
  assert.deepEqual(config.summary, {
    enabled: true,
    baseUrl: 'https://llm.test/v1',
    apiKey: 'test-secret',
    model: 'summary-model'
  })
})
