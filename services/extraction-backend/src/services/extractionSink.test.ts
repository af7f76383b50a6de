import test from 'node:test'
import assert from 'node:assert/strict'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'os'
import path from 'path'
import { IOError } from '../errors.js'
import type { CanonicalDocument } from '../types.js'
import { AUDIT_LOG_FILE, createFileAuditLog } from './auditLog.js'
import { parseCanonicalDocument } from './canonicalRecord.js'
import { computeOcrMetadata, createExtractionSink, describeOcrMetadata, rawResultsFileName, structuredOutputFileName } from './extractionSink.js'

const timestamp = new Date('2026-07-08T09:10:11.000Z')

const doc: CanonicalDocument = {
  document_id: 'feedbeef00000001',
  created_at: '2026-07-08T09:00:00.000Z',
  pages: [{ page_number: 1, text: 'Aspirin 81mg', bounding_boxes: [{ text: 'Aspirin 81mg', x: 1, y: 2, width: 3, height: 4 }] }],
  entities: [{ kind: 'Medication', value: 'Aspirin', source_page: 1, confidence: 0.97 }]
}

test('output file names follow the format', () => {
  assert.equal(structuredOutputFileName('d1', 'json'), 'd1_structured.json')
  assert.equal(structuredOutputFileName('d1', 'fhir'), 'd1.fhir.json')
  assert.equal(rawResultsFileName('d1'), 'vision_results_d1.json')
})

test('write stores the canonical record and audits the sink', async () => {
  const outputDir = await mkdtemp(path.join(os.tmpdir(), 'extraction-sink-'))
  try {
    const auditLog = createFileAuditLog({ outputDir, enabled: true, now: () => timestamp })
    const sink = createExtractionSink({ outputDir, auditLog })

    const filePath = await sink.write(doc, 'json')
    assert.equal(filePath, path.join(outputDir, 'feedbeef00000001_structured.json'))
    assert.deepEqual(parseCanonicalDocument(await readFile(filePath, 'utf8')), doc)

    assert.deepEqual(await auditLog.read(), [
      {
        document_id: 'feedbeef00000001',
        stage: 'SINK',
        status: 'OK',
        timestamp: '2026-07-08T09:10:11.000Z',
        detail: `json -> ${filePath}`
      }
    ])
  } finally {
    await rm(outputDir, { recursive: true, force: true })
  }
})

test('write failure raises WriteFailed and audits it', async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'extraction-sink-'))
  try {
    // A regular file where the output directory should be.
    const outputDir = path.join(root, 'blocked')
    await writeFile(outputDir, 'not a directory')
    const auditLog = createFileAuditLog({ outputDir: root, enabled: true, now: () => timestamp })
    const sink = createExtractionSink({ outputDir, auditLog })

    await assert.rejects(
      sink.write(doc, 'fhir'),
      (error: unknown) => error instanceof IOError && error.kind === 'WriteFailed' && error.code === 'IO_WRITE_FAILED'
    )
    const audit = await auditLog.read('feedbeef00000001')
    assert.equal(audit.length, 1)
    assert.equal(audit[0].stage, 'SINK')
    assert.equal(audit[0].status, 'FAILED')
    assert.ok(audit[0].detail.startsWith(`WRITE_FAILED: ${path.join(outputDir, 'feedbeef00000001.fhir.json')}: `))
  } finally {
    await rm(root, { recursive: true, force: true })
  }
})

test('audit log appends one line per entry and filters by document', async () => {
  const outputDir = await mkdtemp(path.join(os.tmpdir(), 'extraction-audit-'))
  try {
    const auditLog = createFileAuditLog({ outputDir, enabled: true, now: () => timestamp })
    await auditLog.append({ documentId: 'a', stage: 'OCR', status: 'OK', detail: '1 pages' })
    await auditLog.append({ documentId: 'b', stage: 'OCR', status: 'FAILED', detail: 'x' })
    await auditLog.append({ documentId: 'a', stage: 'NER', status: 'OK', detail: '0 entities' })

    const lines = (await readFile(path.join(outputDir, AUDIT_LOG_FILE), 'utf8')).split('\n')
    assert.equal(lines.length, 4)
    assert.equal(lines[3], '')
    assert.equal(lines[0], '{"document_id":"a","stage":"OCR","status":"OK","timestamp":"2026-07-08T09:10:11.000Z","detail":"1 pages"}')

    assert.deepEqual((await auditLog.read('a')).map((e) => e.stage), ['OCR', 'NER'])
    assert.equal((await auditLog.read()).length, 3)
  } finally {
    await rm(outputDir, { recursive: true, force: true })
  }
})

test('audit log skips lines it cannot parse', async () => {
  const outputDir = await mkdtemp(path.join(os.tmpdir(), 'extraction-audit-'))
  try {
    await writeFile(path.join(outputDir, AUDIT_LOG_FILE), '{"document_id":"a"\n{"document_id":"a","stage":"SINK","status":"OK","timestamp":"t","detail":"d"}\n')
    const auditLog = createFileAuditLog({ outputDir, enabled: true })
    assert.deepEqual(await auditLog.read('a'), [{ document_id: 'a', stage: 'SINK', status: 'OK', timestamp: 't', detail: 'd' }])
  } finally {
    await rm(outputDir, { recursive: true, force: true })
  }
})

test('disabled audit log writes nothing', async () => {
  const outputDir = await mkdtemp(path.join(os.tmpdir(), 'extraction-audit-'))
  try {
    const auditLog = createFileAuditLog({ outputDir, enabled: false })
    assert.equal(await auditLog.append({ documentId: 'a', stage: 'OCR', status: 'OK', detail: '' }), null)
    assert.deepEqual(await auditLog.read(), [])
  } finally {
    await rm(outputDir, { recursive: true, force: true })
  }
})

test('audit append failure surfaces as WriteFailed', async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'extraction-audit-'))
  try {
    const outputDir = path.join(root, 'blocked')
    await writeFile(outputDir, 'not a directory')
    const auditLog = createFileAuditLog({ outputDir, enabled: true })

    await assert.rejects(
      auditLog.append({ documentId: 'a', stage: 'OCR', status: 'OK', detail: '1 pages' }),
      (error: unknown) => error instanceof IOError
        && error.code === 'IO_WRITE_FAILED'
        && error.message.startsWith(`AUDIT_WRITE_FAILED: ${path.join(outputDir, AUDIT_LOG_FILE)}: `)
    )
  } finally {
    await rm(root, { recursive: true, force: true })
  }
})

test('write failure is reported even when its audit entry cannot be written', async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'extraction-sink-'))
  try {
    const outputDir = path.join(root, 'blocked')
    await writeFile(outputDir, 'not a directory')
    const auditLog = createFileAuditLog({ outputDir, enabled: true })
    const sink = createExtractionSink({ outputDir, auditLog })

    await assert.rejects(
      sink.write(doc, 'json'),
      (error: unknown) => error instanceof IOError
        && error.message.startsWith(`WRITE_FAILED: ${path.join(outputDir, 'feedbeef00000001_structured.json')}: `)
    )
  } finally {
    await rm(root, { recursive: true, force: true })
  }
})

test('computeOcrMetadata averages page confidence and collects languages in order', () => {
  const metadata = computeOcrMetadata([
    { page_number: 1, text: 'a', bounding_boxes: [], average_confidence: 0.5, detected_languages: [{ language_code: 'ja', confidence: 0.8 }, { language_code: 'en', confidence: 0.2 }] },
    { page_number: 2, text: 'b', bounding_boxes: [], detected_languages: [{ language_code: 'en', confidence: 0.9 }] }
  ])
  assert.deepEqual(metadata, { total_pages: 2, average_confidence: 0.25, language_codes: ['ja', 'en'] })
  assert.equal(describeOcrMetadata(metadata), '2 pages; average_confidence=0.25; languages=ja,en')
  assert.deepEqual(computeOcrMetadata([]), { total_pages: 0, average_confidence: 0, language_codes: [] })
})
