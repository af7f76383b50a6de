import { createHash } from 'crypto'
import { ValidationError } from '../errors.js'
import { ENTITY_KINDS, type BoundingBox, type CanonicalDocument, type Entity, type EntityKind, type PageText } from '../types.js'

export function computeDocumentId(input: Uint8Array) {
  return createHash('sha256').update(input).digest('hex').slice(0, 16)
}

export function beginDocument(documentId: string, createdAt: Date = new Date()): CanonicalDocument {
  return {
    document_id: documentId,
    pages: [],
    entities: [],
    created_at: createdAt.toISOString()
  }
}

export function addPage(doc: CanonicalDocument, page: PageText): CanonicalDocument {
  if (doc.pages.some((existing) => existing.page_number === page.page_number)) {
    throw new ValidationError('DuplicatePage', `DUPLICATE_PAGE: page ${page.page_number} already added to ${doc.document_id}`)
  }
  return { ...doc, pages: [...doc.pages, page] }
}

function entityKey(entity: Entity) {
  return `${entity.source_page}\u0000${entity.kind}\u0000${entity.value}`
}

// Repeated (page, kind, value) triples collapse into one entry with the higher confidence.
export function addEntities(doc: CanonicalDocument, entities: Entity[]): CanonicalDocument {
  const merged = new Map<string, Entity>()
  for (const entity of [...doc.entities, ...entities]) {
    const key = entityKey(entity)
    const existing = merged.get(key)
    if (!existing || entity.confidence > existing.confidence) {
      merged.set(key, entity)
    }
  }
  return { ...doc, entities: Array.from(merged.values()) }
}

function compareText(a: string, b: string) {
  if (a === b) return 0
  return a < b ? -1 : 1
}

export function compareEntities(a: Entity, b: Entity) {
  return a.source_page - b.source_page
    || ENTITY_KINDS.indexOf(a.kind) - ENTITY_KINDS.indexOf(b.kind)
    || compareText(a.value, b.value)
}

/**
 * Checks that every entity points at a page present in the document and puts
 * pages and entities in their canonical order. The result is frozen.
 */
export function finalize(doc: CanonicalDocument): CanonicalDocument {
  const pageNumbers = new Set(doc.pages.map((page) => page.page_number))
  for (const entity of doc.entities) {
    if (!pageNumbers.has(entity.source_page)) {
      throw new ValidationError(
        'DanglingEntity',
        `DANGLING_ENTITY: ${entity.kind} "${entity.value}" references page ${entity.source_page}, which is not in ${doc.document_id}`
      )
    }
  }

  const pages = [...doc.pages].sort((a, b) => a.page_number - b.page_number)
  const entities = [...doc.entities].sort(compareEntities)
  Object.freeze(pages)
  Object.freeze(entities)

  return Object.freeze({ ...doc, pages, entities })
}

export function serializeCanonicalDocument(doc: CanonicalDocument) {
  return JSON.stringify(doc, null, 2)
}

function invalid(message: string): never {
  throw new ValidationError('InvalidRecord', `INVALID_RECORD: ${message}`)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function readFiniteNumber(row: Record<string, unknown>, key: string, where: string) {
  const value = row[key]
  if (typeof value !== 'number' || !Number.isFinite(value)) invalid(`${where}.${key} must be a number`)
  return value
}

function readText(row: Record<string, unknown>, key: string, where: string) {
  const value = row[key]
  if (typeof value !== 'string') invalid(`${where}.${key} must be a string`)
  return value
}

function parseBox(value: unknown, where: string): BoundingBox {
  if (!isRecord(value)) invalid(`${where} must be an object`)
  return {
    text: readText(value, 'text', where),
    x: readFiniteNumber(value, 'x', where),
    y: readFiniteNumber(value, 'y', where),
    width: readFiniteNumber(value, 'width', where),
    height: readFiniteNumber(value, 'height', where)
  }
}

function parsePage(value: unknown, index: number): PageText {
  const where = `pages[${index}]`
  if (!isRecord(value)) invalid(`${where} must be an object`)
  const pageNumber = readFiniteNumber(value, 'page_number', where)
  if (!Number.isInteger(pageNumber) || pageNumber < 1) invalid(`${where}.page_number must be a positive integer`)
  const boxes = value.bounding_boxes
  if (!Array.isArray(boxes)) invalid(`${where}.bounding_boxes must be an array`)
  return {
    page_number: pageNumber,
    text: readText(value, 'text', where),
    bounding_boxes: boxes.map((box, boxIndex) => parseBox(box, `${where}.bounding_boxes[${boxIndex}]`))
  }
}

function isEntityKind(value: unknown): value is EntityKind {
  return typeof value === 'string' && (ENTITY_KINDS as readonly string[]).includes(value)
}

function parseEntity(value: unknown, index: number): Entity {
  const where = `entities[${index}]`
  if (!isRecord(value)) invalid(`${where} must be an object`)
  const kind = value.kind
  if (!isEntityKind(kind)) invalid(`${where}.kind must be one of ${ENTITY_KINDS.join(', ')}`)
  const confidence = readFiniteNumber(value, 'confidence', where)
  if (confidence < 0 || confidence > 1) invalid(`${where}.confidence must be within [0, 1]`)
  return {
    kind,
    value: readText(value, 'value', where),
    source_page: readFiniteNumber(value, 'source_page', where),
    confidence
  }
}

export function parseCanonicalDocument(json: string): CanonicalDocument {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (error) {
    invalid(error instanceof Error ? error.message : 'unparseable JSON')
  }

  if (!isRecord(raw)) invalid('document must be an object')
  if (!Array.isArray(raw.pages)) invalid('pages must be an array')
  if (!Array.isArray(raw.entities)) invalid('entities must be an array')

  const createdAt = readText(raw, 'created_at', 'document')
  if (Number.isNaN(Date.parse(createdAt))) invalid('document.created_at must be an ISO timestamp')

  return {
    document_id: readText(raw, 'document_id', 'document'),
    pages: raw.pages.map(parsePage),
    entities: raw.entities.map(parseEntity),
    created_at: createdAt
  }
}
