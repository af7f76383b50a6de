import test from 'node:test'
import assert from 'node:assert/strict'
import { AdapterError } from '../errors.js'
import { createAzureReadOcr, fromAzureRead, type AzureOperation } from './azureReadProvider.js'

const config = { endpoint: 'https://azure.test', apiKey: 'test-secret', pollIntervalMs: 0, maxPolls: 3 }

const succeeded: AzureOperation = {
  status: 'succeeded',
  analyzeResult: {
    content: 'Hypertension\nLisinopril 10mg',
    pages: [
      {
        pageNumber: 1,
        unit: 'pixel',
        lines: [
          { content: 'Hypertension', polygon: [10, 20, 110.4, 20, 110.4, 40.6, 10, 40.6] },
          { content: 'Lisinopril 10mg', polygon: [{ x: 10, y: 50 }, { x: 90, y: 50 }, { x: 90, y: 70 }, { x: 10, y: 70 }] }
        ]
      }
    ]
  }
}

test('fromAzureRead accepts flat and point polygons', () => {
  const result = succeeded.analyzeResult
  assert.ok(result)
  const page = fromAzureRead(result, 5)
  assert.equal(page.page_number, 5)
  assert.equal(page.text, 'Hypertension\nLisinopril 10mg')
  assert.deepEqual(page.bounding_boxes, [
    { text: 'Hypertension', x: 10, y: 20, width: 100, height: 21 },
    { text: 'Lisinopril 10mg', x: 10, y: 50, width: 80, height: 20 }
  ])
})

test('fromAzureRead rejects non-pixel units', () => {
  assert.throws(
    () => fromAzureRead({ pages: [{ pageNumber: 1, unit: 'inch', lines: [] }] }, 1),
    (error: unknown) => error instanceof AdapterError && error.kind === 'InvalidInput'
  )
})

test('runOcr submits the image and polls the operation', async () => {
  const requests: string[] = []
  const replies: AzureOperation[] = [{ status: 'running' }, succeeded]
  const ocr = createAzureReadOcr(config, async (url, init) => {
    requests.push(`${init?.method || 'GET'} ${url}`)
    if (init?.method === 'POST') {
      return new Response(null, { status: 202, headers: { 'operation-location': 'https://azure.test/operations/1' } })
    }
    return new Response(JSON.stringify(replies.shift()), { status: 200 })
  })

  const page = await ocr.runOcr(new Uint8Array([1, 2]), { pageNumber: 1 })
  assert.equal(page.bounding_boxes.length, 2)
  assert.deepEqual(requests, [
    'POST https://azure.test/formrecognizer/documentModels/prebuilt-read:analyze?api-version=2023-07-31',
    'GET https://azure.test/operations/1',
    'GET https://azure.test/operations/1'
  ])
})

test('runOcr reports a failed analysis as invalid input', async () => {
  const ocr = createAzureReadOcr(config, async (_url, init) => {
    if (init?.method === 'POST') {
      return new Response(null, { status: 202, headers: { 'operation-location': 'https://azure.test/operations/2' } })
    }
    return new Response(JSON.stringify({ status: 'failed', error: { code: 'InvalidImage', message: 'corrupt' } }))
  })
  await assert.rejects(
    ocr.runOcr(new Uint8Array([1]), { pageNumber: 1 }),
    (error: unknown) => error instanceof AdapterError && error.kind === 'InvalidInput' && error.message === 'AZURE_READ_FAILED: InvalidImage corrupt'
  )
})

test('runOcr gives up after maxPolls', async () => {
  let polls = 0
  const ocr = createAzureReadOcr(config, async (_url, init) => {
    if (init?.method === 'POST') {
      return new Response(null, { status: 202, headers: { 'operation-location': 'https://azure.test/operations/3' } })
    }
    polls += 1
    return new Response(JSON.stringify({ status: 'running' }))
  })
  await assert.rejects(
    ocr.runOcr(new Uint8Array([1]), { pageNumber: 1 }),
    (error: unknown) => error instanceof AdapterError && error.kind === 'Unavailable' && error.message === 'AZURE_READ_POLL_TIMEOUT'
  )
  assert.equal(polls, 3)
})

test('runOcr needs the operation-location header', async () => {
  const ocr = createAzureReadOcr(config, async () => new Response(null, { status: 202 }))
  await assert.rejects(
    ocr.runOcr(new Uint8Array([1]), { pageNumber: 1 }),
    (error: unknown) => error instanceof AdapterError && error.message === 'AZURE_READ_MISSING_OPERATION'
  )
})
