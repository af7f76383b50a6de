import test from 'node:test'
import assert from 'node:assert/strict'
import { AdapterError } from '../errors.js'
import { readImageDimensions } from './imageSize.js'
import { __textractTestables, createTextractOcr, fromTextract, type TextractResponse } from './textractProvider.js'

function pngHeader(width: number, height: number) {
  const bytes = new Uint8Array(33)
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0)
  bytes.set([0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52], 8)
  const view = new DataView(bytes.buffer)
  view.setUint32(16, width)
  view.setUint32(20, height)
  return bytes
}

function jpegHeader(width: number, height: number) {
  // SOI, an APP0 segment of length 4, then SOF0
  return new Uint8Array([
    0xff, 0xd8,
    0xff, 0xe0, 0x00, 0x04, 0x00, 0x00,
    0xff, 0xc0, 0x00, 0x11, 0x08, height >> 8, height & 0xff, width >> 8, width & 0xff, 0x03
  ])
}

const response: TextractResponse = {
  Blocks: [
    { BlockType: 'PAGE', Geometry: { BoundingBox: { Left: 0, Top: 0, Width: 1, Height: 1 } } },
    { BlockType: 'LINE', Text: 'Diagnosis: Hypertension', Geometry: { BoundingBox: { Left: 0.1, Top: 0.2, Width: 0.5, Height: 0.05 } } },
    { BlockType: 'WORD', Text: 'Diagnosis:', Geometry: { BoundingBox: { Left: 0.1, Top: 0.2, Width: 0.2, Height: 0.05 } } },
    { BlockType: 'LINE', Text: 'Lisinopril 10mg' }
  ]
}

test('readImageDimensions reads PNG and JPEG headers', () => {
  assert.deepEqual(readImageDimensions(pngHeader(800, 600)), { width: 800, height: 600 })
  assert.deepEqual(readImageDimensions(jpegHeader(1024, 768)), { width: 1024, height: 768 })
  assert.equal(readImageDimensions(new Uint8Array([1, 2, 3, 4])), null)
})

test('readImageDimensions skips fill bytes before a JPEG marker', () => {
  const bytes = new Uint8Array([
    0xff, 0xd8,
    0xff, 0xe0, 0x00, 0x04, 0x00, 0x00,
    0xff, 0xff, 0xff, 0xc0, 0x00, 0x11, 0x08, 0x02, 0x58, 0x03, 0x20, 0x03
  ])
  assert.deepEqual(readImageDimensions(bytes), { width: 800, height: 600 })
})

test('fromTextract scales LINE geometry to pixels', () => {
  const page = fromTextract(response, 1, { width: 1000, height: 2000 })
  assert.equal(page.text, 'Diagnosis: Hypertension\nLisinopril 10mg')
  assert.deepEqual(page.bounding_boxes, [{ text: 'Diagnosis: Hypertension', x: 100, y: 400, width: 500, height: 100 }])
})

test('runOcr forwards the image and stamps the page number', async () => {
  const seen: Uint8Array[] = []
  const ocr = createTextractOcr({
    async detectDocumentText(document) {
      seen.push(document)
      return response
    }
  })
  const image = pngHeader(1000, 2000)
  const page = await ocr.runOcr(image, { pageNumber: 4 })
  assert.equal(page.page_number, 4)
  assert.equal(page.bounding_boxes[0].y, 400)
  assert.equal(seen[0], image)
})

test('runOcr rejects images it cannot size', async () => {
  const ocr = createTextractOcr({
    async detectDocumentText() {
      throw new Error('should not be called')
    }
  })
  await assert.rejects(
    ocr.runOcr(new Uint8Array([1, 2, 3]), { pageNumber: 1 }),
    (error: unknown) => error instanceof AdapterError && error.kind === 'InvalidInput' && error.message === 'UNSUPPORTED_IMAGE_FORMAT'
  )
})

function awsError(name: string, message: string) {
  const error = new Error(message)
  error.name = name
  return error
}

test('classifyAwsError maps service exceptions', () => {
  const { classifyAwsError } = __textractTestables
  assert.equal(classifyAwsError(awsError('ThrottlingException', 'slow down')).kind, 'RateLimited')
  assert.equal(classifyAwsError(awsError('ProvisionedThroughputExceededException', 'slow down')).kind, 'RateLimited')
  assert.equal(classifyAwsError(awsError('UnsupportedDocumentException', 'bad')).kind, 'InvalidInput')
  const network = classifyAwsError(awsError('InternalServerError', 'oops'))
  assert.equal(network.kind, 'Unavailable')
  assert.equal(network.message, 'TEXTRACT_NETWORK: oops')
  assert.equal(network.transient, true)
})
