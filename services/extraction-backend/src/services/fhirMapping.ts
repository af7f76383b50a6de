import type { CanonicalDocument, Entity } from '../types.js'

export type FhirCodeableConcept = {
  text: string
}

export type FhirCondition = {
  resourceType: 'Condition'
  id: string
  code: FhirCodeableConcept
}

export type FhirMedicationStatement = {
  resourceType: 'MedicationStatement'
  id: string
  status: 'unknown'
  medicationCodeableConcept: FhirCodeableConcept
}

export type FhirObservation = {
  resourceType: 'Observation'
  id: string
  status: 'preliminary'
  code: FhirCodeableConcept
}

export type FhirResource = FhirCondition | FhirMedicationStatement | FhirObservation

export type FhirBundle = {
  resourceType: 'Bundle'
  id: string
  type: 'collection'
  timestamp: string
  entry: Array<{ fullUrl: string; resource: FhirResource }>
}

function toResource(entity: Entity, id: string): FhirResource | null {
  switch (entity.kind) {
    case 'Diagnosis':
      return { resourceType: 'Condition', id, code: { text: entity.value } }
    case 'Medication':
      return { resourceType: 'MedicationStatement', id, status: 'unknown', medicationCodeableConcept: { text: entity.value } }
    case 'Test':
      return { resourceType: 'Observation', id, status: 'preliminary', code: { text: entity.value } }
    case 'Other':
      return null
  }
}

// Lossy: Other entities have no FHIR counterpart and are left out of the bundle.
export function toFhirBundle(doc: CanonicalDocument): FhirBundle {
  const entry: FhirBundle['entry'] = []
  doc.entities.forEach((entity, index) => {
    const id = `${doc.document_id}-${index + 1}`
    const resource = toResource(entity, id)
    if (!resource) return
    entry.push({ fullUrl: `urn:extraction:${resource.resourceType}/${id}`, resource })
  })

  return {
    resourceType: 'Bundle',
    id: doc.document_id,
    type: 'collection',
    timestamp: doc.created_at,
    entry
  }
}
