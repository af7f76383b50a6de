import 'dotenv/config'
import process from 'process'
import { isProviderName, loadPipelineConfig } from '../src/config.js'
import { PipelineError, describeError } from '../src/errors.js'
import { createPipelineRuntime } from '../src/runtime.js'
import { isOutputFormat } from '../src/types.js'

const USAGE = 'Usage: tsx scripts/process.ts <input.pdf> [more inputs...] --format=json|fhir --provider=<gcp|aws|azure> [--out <dir>] [--concurrency <n>]'

function parseArgs(argv: string[]) {
  const positional: string[] = []
  const options = new Map<string, string>()

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }
    const eq = arg.indexOf('=')
    if (eq > 0) {
      options.set(arg.slice(2, eq), arg.slice(eq + 1))
      continue
    }
    const key = arg.slice(2)
    const value = argv[i + 1] && !argv[i + 1].startsWith('--') ? argv[i + 1] : 'true'
    options.set(key, value)
    if (value !== 'true') i += 1
  }

  return { positional, options }
}

async function main() {
  const { positional, options } = parseArgs(process.argv)
  const inputs = positional[0] === 'process' ? positional.slice(1) : positional
  if (inputs.length === 0) {
    throw new Error(USAGE)
  }

  const outDir = options.get('out')
  const config = loadPipelineConfig(outDir ? { ...process.env, OUTPUT_DIR: outDir } : process.env)

  const format = options.get('format') || config.outputFormat
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid --format: ${format}\n${USAGE}`)
  }
  const provider = options.get('provider') || config.provider
  if (!isProviderName(provider)) {
    throw new Error(`Invalid --provider: ${provider}\n${USAGE}`)
  }
  const concurrency = Math.max(Math.floor(Number(options.get('concurrency') || config.queue.concurrency)) || 1, 1)

  const runtime = createPipelineRuntime(config)
  const outcomes = await runtime.pipelineFor(provider).processDocuments(
    inputs.map((filePath) => ({ filePath, format })),
    concurrency
  )

  let failed = 0
  for (const outcome of outcomes) {
    if (outcome.ok) {
      const { result } = outcome
      console.log(`[process] ok file=${outcome.filePath} document=${result.documentId}`)
      console.log(`[process] structured: ${result.outputPath}`)
      console.log(`[process] raw: ${result.rawResultsPath}`)
      console.log(`[process] pages=${result.document.pages.length} entities=${result.document.entities.length}`)
      continue
    }
    failed += 1
    const { error } = outcome
    if (error instanceof PipelineError) {
      console.error(`[process] failed file=${outcome.filePath} document=${error.documentId} stage=${error.stage} cause=${error.code}: ${error.cause.message}`)
    } else {
      console.error(`[process] failed file=${outcome.filePath}:`, describeError(error))
    }
  }

  console.log(`[process] done ${outcomes.length - failed}/${outcomes.length} succeeded`)
  if (failed > 0) process.exitCode = 1
}

main().catch((error) => {
  console.error('[process] failed:', describeError(error))
  process.exit(1)
})
