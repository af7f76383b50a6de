export const ENTITY_KINDS = ['Diagnosis', 'Medication', 'Test', 'Other'] as const

export type EntityKind = typeof ENTITY_KINDS[number]

export type BoundingBox = {
  text: string
  x: number
  y: number
  width: number
  height: number
}

export type PageText = {
  page_number: number
  text: string
  bounding_boxes: BoundingBox[]
}

export type Entity = {
  kind: EntityKind
  value: string
  source_page: number
  confidence: number
}

export type CanonicalDocument = {
  document_id: string
  pages: PageText[]
  entities: Entity[]
  created_at: string
}

export type AuditStage = 'OCR' | 'NER' | 'SINK'

export type AuditStatus = 'OK' | 'FAILED'

export type AuditEntry = {
  document_id: string
  stage: AuditStage
  status: AuditStatus
  timestamp: string
  detail: string
}

export type OutputFormat = 'json' | 'fhir'

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'fhir'
}
